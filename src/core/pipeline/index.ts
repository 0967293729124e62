/**
 * Webhook normalization pipeline
 *
 * 1. Detection - Tag the transport, validate the payload
 * 2. Verification - HMAC signature (MCP only)
 * 3. Status - Canonical TaskStatus
 * 4. Extraction - Result, message, context id, timestamp
 * 5. Decoding - Typed response model or raw fallback
 * 6. Result - TaskResult
 */

// Main processor
export { WebhookProcessor, ProcessingMetrics } from './webhook-processor';

// Pipeline types
export * from './types';
export * from './inbound';

// Individual stages (for testing or custom pipelines)
export { DetectionStage } from './stages/detection.stage';
export { VerificationStage, VerificationOptions } from './stages/verification.stage';
export { StatusStage } from './stages/status.stage';
export { ExtractionStage } from './stages/extraction.stage';
export { DecodingStage } from './stages/decoding.stage';
export { ResultStage, buildTaskResult, TaskResultParts } from './stages/result.stage';
