import {
  JsonObject,
  Protocol,
  SIGNATURE_HEADER,
  TaskStatus,
  getAdcpSignedHeadersForWebhook,
} from '../../core';
import {
  createA2aWebhookPayload,
  createMcpWebhookPayload,
} from '../../adapters/protocols';

export const MOCK_TIMESTAMP = '2025-01-15T10:00:00.000Z';

/**
 * Factory for generating mock AdCP webhooks
 * Used for testing webhook handling without a live agent
 */
export class MockWebhookFactory {
  private static sequence = 0;

  /**
   * MCP get_products webhook for a completed task
   */
  static productsCompleted(options: WebhookOptions = {}): MockWebhook {
    return this.mcp(TaskStatus.COMPLETED, 'get_products', options, {
      products: options.products ?? [
        { product_id: 'prod_1', name: 'Homepage Banner', description: 'Above the fold' },
      ],
    });
  }

  /**
   * MCP webhook for a failed task
   */
  static taskFailed(options: WebhookOptions = {}): MockWebhook {
    return this.mcp(TaskStatus.FAILED, options.taskType ?? 'create_media_buy', options, {
      errors: [
        {
          code: 'INTERNAL_ERROR',
          message: options.errorMessage ?? 'Database connection failed',
        },
      ],
    });
  }

  /**
   * MCP webhook for a task blocked on the buyer
   */
  static inputRequired(options: WebhookOptions = {}): MockWebhook {
    return this.mcp(TaskStatus.NEEDS_INPUT, options.taskType ?? 'create_media_buy', options, {
      errors: [{ message: options.errorMessage ?? 'Budget needs approval' }],
    });
  }

  /**
   * Signed MCP webhook whose signature does not match the body
   */
  static invalidSignature(options: WebhookOptions = {}): MockWebhook {
    const webhook = this.productsCompleted({ secret: 'test-secret', ...options });
    webhook.headers[SIGNATURE_HEADER] = `sha256=${'0'.repeat(64)}`;
    return webhook;
  }

  /**
   * A2A Task for a completed get_products task
   */
  static a2aProductsCompleted(options: WebhookOptions = {}): MockWebhook {
    return {
      protocol: Protocol.A2A,
      body: createA2aWebhookPayload({
        taskId: options.taskId ?? this.generateRef('task'),
        contextId: options.contextId ?? this.generateRef('ctx'),
        status: TaskStatus.COMPLETED,
        timestamp: options.timestamp ?? MOCK_TIMESTAMP,
        result: { products: options.products ?? [] },
        message: options.message,
      }),
      headers: { 'Content-Type': 'application/json' },
    };
  }

  /**
   * A2A TaskStatusUpdateEvent for a task still in progress
   */
  static a2aWorking(options: WebhookOptions = {}): MockWebhook {
    return {
      protocol: Protocol.A2A,
      body: createA2aWebhookPayload({
        taskId: options.taskId ?? this.generateRef('task'),
        contextId: options.contextId ?? this.generateRef('ctx'),
        status: TaskStatus.WORKING,
        timestamp: options.timestamp ?? MOCK_TIMESTAMP,
        message: options.message ?? 'Processing',
      }),
      headers: { 'Content-Type': 'application/json' },
    };
  }

  /**
   * Generate a batch of completed MCP webhooks
   */
  static batch(count: number, options: WebhookOptions = {}): MockWebhook[] {
    const webhooks: MockWebhook[] = [];
    for (let i = 0; i < count; i++) {
      webhooks.push(
        this.productsCompleted({
          ...options,
          taskId: `${options.taskId ?? 'batch'}_${i}`,
        }),
      );
    }
    return webhooks;
  }

  private static mcp(
    status: TaskStatus,
    taskType: string,
    options: WebhookOptions,
    result: JsonObject,
  ): MockWebhook {
    const timestamp = options.timestamp ?? MOCK_TIMESTAMP;
    const body = createMcpWebhookPayload({
      taskId: options.taskId ?? this.generateRef('task'),
      taskType,
      status,
      timestamp,
      result,
      message: options.message,
      contextId: options.contextId,
    });

    const headers = { 'Content-Type': 'application/json' };

    return {
      protocol: Protocol.MCP,
      body,
      headers: options.secret
        ? getAdcpSignedHeadersForWebhook(headers, options.secret, timestamp, body)
        : headers,
    };
  }

  /**
   * Generate a reference ID
   */
  private static generateRef(prefix: string): string {
    this.sequence += 1;
    return `${prefix}_${this.sequence}`;
  }
}

/**
 * Options for webhook generation
 */
export interface WebhookOptions {
  /**
   * Sign MCP webhooks with this secret
   */
  secret?: string;
  taskId?: string;
  taskType?: string;
  contextId?: string;
  timestamp?: string;
  message?: string;
  errorMessage?: string;
  products?: JsonObject[];
}

/**
 * Generated webhook
 */
export interface MockWebhook {
  protocol: Protocol;
  body: JsonObject;
  headers: Record<string, string>;
}
