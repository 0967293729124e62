import { applyDecorators } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiBody,
  ApiHeader,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { TaskResultResponseDto } from '../../dto/webhook.dto';
import {
  SIGNATURE_HEADER,
  TIMESTAMP_HEADER,
} from '../../../core/signing/signature';

/**
 * Swagger decorator for the task webhook endpoint
 */
export const ApiWebhookEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive task webhook',
      description:
        'Receives MCP or A2A task webhooks from AdCP agents. Detects the transport, verifies MCP signatures, and returns the normalized task result.',
    }),
    ApiParam({
      name: 'taskType',
      description: 'AdCP task the webhook reports on',
      example: 'get_products',
      required: true,
    }),
    ApiParam({
      name: 'operationId',
      description: 'Buyer-side operation id registered with the webhook URL',
      example: 'op_456',
      required: true,
    }),
    ApiHeader({
      name: SIGNATURE_HEADER,
      description: 'HMAC-SHA256 over the canonical JSON body (MCP only)',
      required: false,
      example: 'sha256=5257a869e7ecf1234...',
    }),
    ApiHeader({
      name: TIMESTAMP_HEADER,
      description: 'Timestamp bound into the signature',
      required: false,
      example: '2025-01-15T10:00:00Z',
    }),
    ApiBody({
      description: 'MCP webhook payload or A2A Task / TaskStatusUpdateEvent',
      required: true,
      schema: {
        type: 'object',
        additionalProperties: true,
        example: {
          task_id: 'task_123',
          task_type: 'get_products',
          status: 'completed',
          timestamp: '2025-01-15T10:00:00Z',
          result: {
            products: [
              { product_id: 'p1', name: 'Banner', description: 'Homepage banner' },
            ],
          },
        },
      },
    }),
    ApiOkResponse({
      description: 'Normalized task result',
      type: TaskResultResponseDto,
    }),
    ApiBadRequestResponse({
      description: 'Payload matches neither transport, or has an unknown status',
    }),
    ApiUnauthorizedResponse({
      description: 'MCP signature missing or invalid',
    }),
  );
};
