import { Injectable, Inject } from '@nestjs/common';
import type {
  HandleWebhookOptions,
  TaskResult,
  TaskTypeOf,
  WebhookProcessor,
} from '../../../core';
import type { AdcpResponseTypes } from '../../../_shared/registry';
import { WEBHOOK_PROCESSOR } from '../constants';

/**
 * AdcpWebhookService
 *
 * Entry point for applications that receive webhooks through their own
 * controllers or queues
 */
@Injectable()
export class AdcpWebhookService {
  constructor(
    @Inject(WEBHOOK_PROCESSOR)
    private readonly webhookProcessor: WebhookProcessor<AdcpResponseTypes>,
  ) {}

  /**
   * Normalize a webhook body into a TaskResult
   */
  async handleWebhook<K extends TaskTypeOf<AdcpResponseTypes>>(
    raw: unknown,
    taskType: K,
    operationId: string,
    options?: HandleWebhookOptions,
  ): Promise<TaskResult<AdcpResponseTypes[K]>>;
  async handleWebhook(
    raw: unknown,
    taskType: string,
    operationId: string,
    options?: HandleWebhookOptions,
  ): Promise<TaskResult>;
  async handleWebhook(
    raw: unknown,
    taskType: string,
    operationId: string,
    options?: HandleWebhookOptions,
  ): Promise<TaskResult> {
    return this.webhookProcessor.handleWebhook(raw, taskType, operationId, options);
  }

  /**
   * Get pipeline statistics
   */
  getStatistics(): ReturnType<WebhookProcessor<AdcpResponseTypes>['getStatistics']> {
    return this.webhookProcessor.getStatistics();
  }
}
