import { Test, TestingModule } from '@nestjs/testing';
import {
  BadRequestException,
  InternalServerErrorException,
  UnauthorizedException,
} from '@nestjs/common';
import {
  AdcpModule,
  AdcpWebhookService,
  ConfigurationService,
  HealthController,
  MockWebhookFactory,
  SIGNATURE_HEADER,
  TIMESTAMP_HEADER,
  TaskStatus,
  WebhookController,
  mergeAdcpConfig,
} from '../../src';
import { AppModule } from '../../src/app.module';

const catchError = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
};

describe('AdcpModule', () => {
  describe('forRoot', () => {
    let moduleRef: TestingModule;
    let controller: WebhookController;

    beforeEach(async () => {
      moduleRef = await Test.createTestingModule({
        imports: [
          AdcpModule.forRoot({
            webhooks: { secret: 'test-secret', requireSignature: true },
          }),
        ],
      }).compile();

      controller = moduleRef.get(WebhookController);
    });

    afterEach(async () => {
      await moduleRef.close();
    });

    it('should return the normalized task result for a signed webhook', async () => {
      const webhook = MockWebhookFactory.productsCompleted({
        secret: 'test-secret',
        taskId: 'task_http',
      });

      const response = await controller.handleWebhook(
        'get_products',
        'op_http',
        webhook.body,
        webhook.headers[SIGNATURE_HEADER],
        webhook.headers[TIMESTAMP_HEADER],
      );

      expect(response.success).toBe(true);
      expect(response.status).toBe(TaskStatus.COMPLETED);
      expect(response.dataKind).toBe('typed');
      expect(response.metadata.task_id).toBe('task_http');
      expect(response.metadata.operation_id).toBe('op_http');
    });

    it('should answer 401 for a bad signature', async () => {
      const webhook = MockWebhookFactory.invalidSignature();

      const error = await catchError(
        controller.handleWebhook(
          'get_products',
          'op_1',
          webhook.body,
          webhook.headers[SIGNATURE_HEADER],
          webhook.headers[TIMESTAMP_HEADER],
        ),
      );

      expect(error).toBeInstanceOf(UnauthorizedException);
      if (!(error instanceof UnauthorizedException)) return;
      expect(error.getResponse()).toEqual({
        code: 'WEBHOOK_SIGNATURE_INVALID',
        message: 'Webhook signature verification failed',
      });
    });

    it('should answer 401 for a missing signature', async () => {
      const webhook = MockWebhookFactory.productsCompleted();

      await expect(
        controller.handleWebhook('get_products', 'op_1', webhook.body),
      ).rejects.toBeInstanceOf(UnauthorizedException);
    });

    it('should treat an empty signature header as missing', async () => {
      const webhook = MockWebhookFactory.productsCompleted();

      const error = await catchError(
        controller.handleWebhook('get_products', 'op_1', webhook.body, '', ''),
      );

      expect(error).toBeInstanceOf(UnauthorizedException);
      if (!(error instanceof UnauthorizedException)) return;
      expect(error.getResponse()).toEqual({
        code: 'WEBHOOK_SIGNATURE_INVALID',
        message: 'Missing webhook signature',
      });
    });

    it('should answer 400 with the issues for an invalid payload', async () => {
      const error = await catchError(
        controller.handleWebhook('get_products', 'op_1', { task_id: 't1' }),
      );

      expect(error).toBeInstanceOf(BadRequestException);
      if (!(error instanceof BadRequestException)) return;
      expect(error.getResponse()).toEqual({
        code: 'WEBHOOK_VALIDATION_FAILED',
        message: 'Webhook payload matches neither the MCP nor the A2A shape',
        issues: ['status: expected a status string (MCP) or a status object (A2A)'],
      });
    });

    it('should answer 400 for an unknown status', async () => {
      const error = await catchError(
        controller.handleWebhook('get_products', 'op_1', {
          id: 'task_1',
          status: { state: 'canceled' },
        }),
      );

      expect(error).toBeInstanceOf(BadRequestException);
      if (!(error instanceof BadRequestException)) return;
      expect(error.getResponse()).toEqual({
        code: 'UNKNOWN_TASK_STATUS',
        message: "Unknown a2a task status: 'canceled'",
      });
    });

    it('should accept A2A webhooks without a signature', async () => {
      const webhook = MockWebhookFactory.a2aWorking({ taskId: 'task_a2a' });

      const response = await controller.handleWebhook(
        'create_media_buy',
        'op_a2a',
        webhook.body,
      );

      expect(response.status).toBe(TaskStatus.WORKING);
      expect(response.metadata.message).toBe('Processing');
    });

    it('should report pipeline statistics', () => {
      const health = moduleRef.get(HealthController);

      expect(health.health().status).toBe('healthy');
      expect(health.statistics().configuration).toEqual({
        secretsConfigured: 1,
        requireSignature: true,
        signatureToleranceSeconds: null,
      });
    });
  });

  describe('unexpected errors', () => {
    const buildController = async (debug: boolean): Promise<WebhookController> => {
      const moduleRef = await Test.createTestingModule({
        imports: [AdcpModule.forRoot({ debug })],
      })
        .overrideProvider(AdcpWebhookService)
        .useValue({ handleWebhook: jest.fn().mockRejectedValue(new Error('boom')) })
        .compile();

      return moduleRef.get(WebhookController);
    };

    it('should answer 500 with details in debug mode', async () => {
      const controller = await buildController(true);

      const error = await catchError(controller.handleWebhook('get_products', 'op_1', {}));

      expect(error).toBeInstanceOf(InternalServerErrorException);
      if (!(error instanceof InternalServerErrorException)) return;
      expect(error.getResponse()).toEqual({
        code: 'WEBHOOK_PROCESSING_FAILED',
        message: 'Webhook processing failed',
        details: { message: 'boom', type: 'Error' },
      });
    });

    it('should hide the details outside debug mode', async () => {
      const controller = await buildController(false);

      const error = await catchError(controller.handleWebhook('get_products', 'op_1', {}));

      expect(error).toBeInstanceOf(InternalServerErrorException);
      if (!(error instanceof InternalServerErrorException)) return;
      expect(error.getResponse()).toEqual({
        code: 'WEBHOOK_PROCESSING_FAILED',
        message: 'Webhook processing failed',
      });
    });
  });

  describe('forRootAsync', () => {
    it('should build the pipeline from the factory configuration', async () => {
      const onTaskResult = jest.fn();
      const moduleRef = await Test.createTestingModule({
        imports: [
          AdcpModule.forRootAsync({
            useFactory: () => ({
              webhooks: {
                secret: ['current-secret', '', 'test-secret'],
                signatureToleranceSeconds: 600,
              },
              hooks: { onTaskResult },
            }),
          }),
        ],
      }).compile();

      const configuration = moduleRef.get(ConfigurationService);
      const service = moduleRef.get(AdcpWebhookService);

      expect(configuration.getWebhookSecrets()).toEqual(['current-secret', 'test-secret']);
      expect(configuration.isSignatureRequired()).toBe(false);
      expect(configuration.isSwaggerEnabled()).toBe(true);
      expect(service.getStatistics().configuration).toEqual({
        secretsConfigured: 2,
        requireSignature: false,
        signatureToleranceSeconds: 600,
      });

      const webhook = MockWebhookFactory.a2aProductsCompleted();
      const result = await service.handleWebhook(webhook.body, 'get_products', 'op_async');

      expect(result.success).toBe(true);
      expect(onTaskResult).toHaveBeenCalledTimes(1);

      await moduleRef.close();
    });
  });
});

describe('AppModule', () => {
  const previousDebug = process.env.ADCP_DEBUG;

  afterEach(() => {
    if (previousDebug === undefined) {
      delete process.env.ADCP_DEBUG;
    } else {
      process.env.ADCP_DEBUG = previousDebug;
    }
  });

  const debugMode = async (): Promise<boolean> => {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] }).compile();
    const enabled = moduleRef.get(ConfigurationService).isDebugMode();
    await moduleRef.close();
    return enabled;
  };

  it('should keep debug mode off unless ADCP_DEBUG is set', async () => {
    delete process.env.ADCP_DEBUG;

    await expect(debugMode()).resolves.toBe(false);
  });

  it('should turn debug mode on when ADCP_DEBUG is true', async () => {
    process.env.ADCP_DEBUG = 'true';

    await expect(debugMode()).resolves.toBe(true);
  });
});

describe('mergeAdcpConfig', () => {
  it('should fill in defaults', () => {
    expect(mergeAdcpConfig({})).toEqual({
      webhooks: { requireSignature: false },
      api: { enableSwagger: true },
      debug: false,
    });
  });

  it('should merge each section over its defaults', () => {
    expect(
      mergeAdcpConfig({
        webhooks: { secret: 'test-secret' },
        api: { globalPrefix: 'v1' },
      }),
    ).toEqual({
      webhooks: { requireSignature: false, secret: 'test-secret' },
      api: { enableSwagger: true, globalPrefix: 'v1' },
      debug: false,
    });
  });
});
