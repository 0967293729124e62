import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for basic health check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Basic health check',
      description: 'Returns service health status and uptime',
    }),
    ApiResponse({
      status: 200,
      description: 'Service is healthy',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'healthy' },
          timestamp: { type: 'string', format: 'date-time' },
          uptime: { type: 'number', description: 'Uptime in seconds' },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for pipeline statistics
 */
export const ApiPipelineStatistics = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Get pipeline statistics',
      description: 'Lists the pipeline stages, registered task types and signature settings',
    }),
    ApiResponse({
      status: 200,
      description: 'Pipeline statistics',
      schema: {
        type: 'object',
        properties: {
          stages: { type: 'array', items: { type: 'string' } },
          taskTypes: { type: 'array', items: { type: 'string' } },
          configuration: {
            type: 'object',
            properties: {
              secretsConfigured: { type: 'number' },
              requireSignature: { type: 'boolean' },
              signatureToleranceSeconds: { type: 'number', nullable: true },
            },
          },
        },
      },
    }),
  );
};
