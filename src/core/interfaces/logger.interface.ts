/**
 * Logger accepted by the pipeline. NestJS `Logger` satisfies it.
 */
export interface WebhookLogger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string, trace?: string): void;
  debug(message: string): void;
}
