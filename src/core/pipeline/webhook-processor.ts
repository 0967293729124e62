import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  HandleWebhookOptions,
  PipelineConfig,
  PipelineStage,
  WebhookContext,
  requireContext,
} from './types';
import { DetectionStage } from './stages/detection.stage';
import { VerificationStage } from './stages/verification.stage';
import { StatusStage } from './stages/status.stage';
import { ExtractionStage } from './stages/extraction.stage';
import { DecodingStage } from './stages/decoding.stage';
import { ResultStage } from './stages/result.stage';
import { TaskResult } from '../domain/models';
import { HookContext, LifecycleHooks, WebhookLogger } from '../interfaces';
import { TypedResultDecoder } from '../decoding';
import { TaskTypeOf } from '../registry';

/**
 * Per-call timings handed to lifecycle hooks
 */
export interface ProcessingMetrics {
  totalDurationMs: number;
  stageDurations: Map<string, number>;
}

/**
 * WebhookProcessor turns a raw webhook of either transport into a TaskResult
 *
 * Pipeline stages:
 * 1. Detection - Tag the transport and validate the payload shape
 * 2. Verification - Check the HMAC signature (MCP only)
 * 3. Status - Map the transport status to TaskStatus
 * 4. Extraction - Pull result, message, context id and timestamp
 * 5. Decoding - Parse the result into its response model (raw fallback)
 * 6. Result - Build the immutable TaskResult
 */
export class WebhookProcessor<M extends object> {
  private readonly stages: PipelineStage[];
  private readonly hooks?: LifecycleHooks;
  private readonly logger: WebhookLogger;
  private readonly secrets: string[];

  constructor(private readonly config: PipelineConfig<M>) {
    this.hooks = config.hooks;
    this.logger = config.logger ?? new Logger(WebhookProcessor.name);
    this.secrets = this.extractSecrets();
    this.stages = this.initializeStages();
  }

  /**
   * Normalize one webhook delivery
   *
   * @throws WebhookValidationError when the payload fits neither transport
   * @throws WebhookSignatureError when an MCP signature does not verify
   * @throws UnknownStatusError for a status outside the transport's vocabulary
   */
  async handleWebhook<K extends TaskTypeOf<M>>(
    raw: unknown,
    taskType: K,
    operationId: string,
    options?: HandleWebhookOptions,
  ): Promise<TaskResult<M[K]>>;
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
    options: HandleWebhookOptions = {},
  ): Promise<TaskResult> {
    const startTime = Date.now();

    const context: WebhookContext = {
      raw,
      taskType,
      operationId,
      signature: options.signature,
      signatureTimestamp: options.timestamp,
      processingId: uuidv4(),
    };

    const metrics: ProcessingMetrics = {
      totalDurationMs: 0,
      stageDurations: new Map(),
    };

    try {
      this.executePipeline(context, metrics);
      metrics.totalDurationMs = Date.now() - startTime;

      const result = requireContext(context, 'result', 'pipeline');
      this.logger.debug(
        `[${context.processingId}] ${taskType} ${result.status} via ${result.metadata.protocol} (${result.dataKind} data, ${context.signatureVerified ? 'signature verified' : 'unsigned'}, ${metrics.totalDurationMs}ms)`,
      );

      await this.notify('onTaskResult', context, metrics, (hooks, hookContext) =>
        hooks.onTaskResult?.(result, hookContext),
      );

      return result;
    } catch (error) {
      metrics.totalDurationMs = Date.now() - startTime;
      const failure = error instanceof Error ? error : new Error(String(error));

      this.logger.warn(
        `[${context.processingId}] Webhook for ${taskType} (operation ${operationId}) rejected: ${failure.message}`,
      );

      await this.notify('onError', context, metrics, (hooks, hookContext) =>
        hooks.onError?.(failure, hookContext),
      );

      throw error;
    }
  }

  /**
   * Execute the pipeline stages sequentially
   */
  private executePipeline(
    context: WebhookContext,
    metrics: ProcessingMetrics,
  ): void {
    for (const stage of this.stages) {
      const stageStartTime = Date.now();
      try {
        stage.execute(context);
      } finally {
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);
      }
    }
  }

  /**
   * Run a lifecycle hook; a failing hook is logged and never changes the outcome
   */
  private async notify(
    hookName: keyof LifecycleHooks,
    context: WebhookContext,
    metrics: ProcessingMetrics,
    invoke: (
      hooks: LifecycleHooks,
      hookContext: HookContext,
    ) => Promise<void> | void,
  ): Promise<void> {
    if (!this.hooks?.[hookName]) {
      return;
    }

    const hookContext: HookContext = {
      processingId: context.processingId,
      taskType: context.taskType,
      operationId: context.operationId,
      protocol: context.inbound?.protocol,
      stageDurations: metrics.stageDurations,
      totalDurationMs: metrics.totalDurationMs,
    };

    try {
      await invoke(this.hooks, hookContext);
    } catch (hookError) {
      this.logger.error(
        `[${context.processingId}] ${hookName} hook failed: ${hookError instanceof Error ? hookError.message : String(hookError)}`,
        hookError instanceof Error ? hookError.stack : undefined,
      );
    }
  }

  /**
   * Initialize pipeline stages based on configuration
   */
  private initializeStages(): PipelineStage[] {
    const { adapters, registry } = this.config;

    return [
      new DetectionStage(adapters),
      new VerificationStage(
        {
          secrets: this.secrets,
          requireSignature: this.config.requireSignature ?? false,
          toleranceSeconds: this.config.signatureToleranceSeconds,
          now: this.config.now,
        },
        this.logger,
      ),
      new StatusStage(adapters),
      new ExtractionStage(adapters),
      new DecodingStage(new TypedResultDecoder(registry), this.logger),
      new ResultStage(adapters),
    ];
  }

  /**
   * Extract secrets from configuration
   */
  private extractSecrets(): string[] {
    const { webhookSecret } = this.config;
    if (webhookSecret === undefined) {
      return [];
    }
    return Array.isArray(webhookSecret) ? [...webhookSecret] : [webhookSecret];
  }

  /**
   * Get pipeline statistics
   */
  getStatistics(): {
    stages: string[];
    taskTypes: string[];
    configuration: {
      secretsConfigured: number;
      requireSignature: boolean;
      signatureToleranceSeconds: number | null;
    };
  } {
    return {
      stages: this.stages.map((s) => s.name),
      taskTypes: this.config.registry.taskTypes(),
      configuration: {
        secretsConfigured: this.secrets.length,
        requireSignature: this.config.requireSignature ?? false,
        signatureToleranceSeconds: this.config.signatureToleranceSeconds ?? null,
      },
    };
  }
}
