/**
 * Example: Receiving AdCP webhooks in a NestJS application
 *
 * Inside your own project, import from 'adcp-webhooks' instead of '../src'.
 */

// app.module.ts
import { Injectable, Logger, Module } from '@nestjs/common';
import {
  AdcpModule,
  AdcpWebhookService,
  GetProductsResponseDto,
  TaskStatus,
  createMcpWebhookPayload,
  getAdcpSignedHeadersForWebhook,
  getRequiredAssets,
  ListCreativeFormatsResponseDto,
} from '../src';

@Module({
  imports: [
    AdcpModule.forRoot({
      webhooks: {
        // Current secret first, previous one kept during rotation
        secret: [process.env.ADCP_WEBHOOK_SECRET ?? '', process.env.ADCP_PREVIOUS_SECRET ?? ''],
        requireSignature: true,
        signatureToleranceSeconds: 300,
      },
      hooks: {
        onTaskResult: (result, context) => {
          new Logger('AdcpHooks').log(
            `${context.taskType} ${result.status} in ${context.totalDurationMs}ms`,
          );
        },
      },
    }),
  ],
  providers: [],
})
export class AppModule {}

// media-buying.service.ts
@Injectable()
export class MediaBuyingService {
  private readonly logger = new Logger(MediaBuyingService.name);

  constructor(private readonly webhookService: AdcpWebhookService) {}

  /**
   * Webhooks consumed from a queue instead of the built-in endpoint
   */
  async onProductsWebhook(body: unknown, operationId: string, signature?: string) {
    const result = await this.webhookService.handleWebhook(body, 'get_products', operationId, {
      signature,
    });

    if (result.data instanceof GetProductsResponseDto) {
      for (const product of result.data.products) {
        this.logger.log(`Product offered: ${product.product_id} (${product.name})`);
      }
    } else if (result.status === TaskStatus.NEEDS_INPUT) {
      this.logger.warn(`Agent needs input: ${result.error ?? result.metadata.message ?? 'no details'}`);
    }

    return result;
  }

  async onFormatsWebhook(body: unknown, operationId: string) {
    const result = await this.webhookService.handleWebhook(
      body,
      'list_creative_formats',
      operationId,
    );

    if (result.data instanceof ListCreativeFormatsResponseDto) {
      for (const format of result.data.formats) {
        this.logger.log(`${format.name} needs ${getRequiredAssets(format).length} assets`);
      }
    }
  }
}

// agent side: sending a signed MCP webhook
export function buildSignedProductsWebhook(secret: string) {
  const timestamp = new Date().toISOString();
  const payload = createMcpWebhookPayload({
    taskId: 'task_123',
    taskType: 'get_products',
    status: TaskStatus.COMPLETED,
    timestamp,
    result: { products: [] },
  });

  return {
    payload,
    headers: getAdcpSignedHeadersForWebhook(
      { 'Content-Type': 'application/json' },
      secret,
      timestamp,
      payload,
    ),
  };
}
