import {
  Controller,
  Post,
  Param,
  Body,
  Headers,
  HttpCode,
  HttpException,
  HttpStatus,
  BadRequestException,
  InternalServerErrorException,
  UnauthorizedException,
  Logger,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  SIGNATURE_HEADER,
  TIMESTAMP_HEADER,
  TaskResultSnapshot,
  UnknownStatusError,
  WebhookSignatureError,
  WebhookValidationError,
} from '../../../core';
import { ApiWebhookEndpoint } from '../../../_shared/swagger/decorators';
import { AdcpWebhookService } from '../services/adcp-webhook.service';
import { ConfigurationService } from '../services/configuration.service';

/**
 * Webhook Controller
 *
 * HTTP endpoint agents post task updates to. The operation id is part of the
 * URL the buyer registered with the agent.
 */
@ApiTags('Ingest')
@Controller('webhooks')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    private readonly webhookService: AdcpWebhookService,
    private readonly configuration: ConfigurationService,
  ) {}

  @Post(':taskType/:operationId')
  @HttpCode(HttpStatus.OK)
  @ApiWebhookEndpoint()
  async handleWebhook(
    @Param('taskType') taskType: string,
    @Param('operationId') operationId: string,
    @Body() body: unknown,
    @Headers(SIGNATURE_HEADER.toLowerCase()) signature?: string,
    @Headers(TIMESTAMP_HEADER.toLowerCase()) timestamp?: string,
  ): Promise<TaskResultSnapshot<unknown>> {
    this.logger.log(`Received ${taskType} webhook for operation ${operationId}`);

    try {
      const result = await this.webhookService.handleWebhook(body, taskType, operationId, {
        signature: signature || undefined,
        timestamp: timestamp || undefined,
      });

      return result.toPlainObject();
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  /**
   * Map webhook errors to HTTP responses; anything else is a 500, with the
   * underlying error only shown in debug mode
   */
  private toHttpException(error: unknown): HttpException {
    if (error instanceof WebhookSignatureError) {
      return new UnauthorizedException({
        code: error.code,
        message: error.message,
      });
    }

    if (error instanceof WebhookValidationError) {
      return new BadRequestException({
        code: error.code,
        message: error.message,
        issues: error.issues,
      });
    }

    if (error instanceof UnknownStatusError) {
      return new BadRequestException({
        code: error.code,
        message: error.message,
      });
    }

    this.logger.error(
      `Webhook processing error: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
    return new InternalServerErrorException({
      code: 'WEBHOOK_PROCESSING_FAILED',
      message: 'Webhook processing failed',
      details: this.configuration.isDebugMode()
        ? {
            message: error instanceof Error ? error.message : String(error),
            type: error instanceof Error ? error.name : 'Unknown',
          }
        : undefined,
    });
  }
}
