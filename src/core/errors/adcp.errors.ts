import { Protocol } from '../domain/enums';

/**
 * Base class for every error raised by the AdCP webhook core
 */
export class AdcpError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'AdcpError';
  }
}

/**
 * Raw payload matches neither transport shape, or misses required fields
 */
export class WebhookValidationError extends AdcpError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 'WEBHOOK_VALIDATION_FAILED');
    this.name = 'WebhookValidationError';
  }
}

/**
 * HMAC signature did not match any configured secret
 */
export class WebhookSignatureError extends AdcpError {
  constructor(message: string) {
    super(message, 'WEBHOOK_SIGNATURE_INVALID');
    this.name = 'WebhookSignatureError';
  }
}

/**
 * Transport reported a status outside its documented vocabulary
 */
export class UnknownStatusError extends AdcpError {
  constructor(
    public readonly protocol: Protocol,
    public readonly status: string,
  ) {
    super(`Unknown ${protocol} task status: '${status}'`, 'UNKNOWN_TASK_STATUS');
    this.name = 'UnknownStatusError';
  }
}

/**
 * Task result rejected by its response model.
 * Recovered by the decoder; never escapes handleWebhook.
 */
export class SchemaValidationError extends AdcpError {
  constructor(
    public readonly taskType: string,
    public readonly issues: string[],
  ) {
    super(
      `Result does not match the ${taskType} response schema: ${issues.join('; ')}`,
      'SCHEMA_VALIDATION_FAILED',
    );
    this.name = 'SchemaValidationError';
  }
}
