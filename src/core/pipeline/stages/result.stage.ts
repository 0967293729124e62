import {
  PipelineStage,
  WebhookContext,
  requireContext,
} from '../types';
import {
  Protocol,
  TaskStatus,
  isErrorReportingStatus,
} from '../../domain/enums';
import { TaskResult } from '../../domain/models';
import {
  DecodeOutcome,
  ExtractedPayload,
  ProtocolAdapters,
  TaskResultMetadata,
} from '../../interfaces';
import { readTaskId } from '../inbound';

export interface TaskResultParts<T> {
  status: TaskStatus;
  protocol: Protocol;
  taskId: string;
  operationId: string;
  extracted: ExtractedPayload;
  decoded: DecodeOutcome<T>;
  candidateError: string | null;
}

/**
 * Assemble a TaskResult.
 * `errors[]` only becomes `error` for FAILED and NEEDS_INPUT; a completed
 * task reports its errors through `data.errors`.
 */
export function buildTaskResult<T>(parts: TaskResultParts<T>): TaskResult<T> {
  const { extracted } = parts;

  const metadata: TaskResultMetadata = {
    task_id: parts.taskId,
    operation_id: parts.operationId,
    protocol: parts.protocol,
  };
  if (extracted.contextId !== null) {
    metadata.context_id = extracted.contextId;
  }
  if (extracted.message !== null) {
    metadata.message = extracted.message;
  }
  if (extracted.timestamp !== null) {
    metadata.timestamp = extracted.timestamp;
  }

  const error = isErrorReportingStatus(parts.status) ? parts.candidateError : null;

  return new TaskResult(parts.status, parts.decoded, error, metadata);
}

/**
 * Stage 6: Result
 */
export class ResultStage implements PipelineStage {
  name = 'result';

  constructor(private readonly adapters: ProtocolAdapters) {}

  execute(context: WebhookContext): void {
    const inbound = requireContext(context, 'inbound', this.name);
    const mapped = requireContext(context, 'mappedStatus', this.name);

    context.result = buildTaskResult({
      status: mapped.status,
      protocol: mapped.protocol,
      taskId: readTaskId(inbound, this.adapters),
      operationId: context.operationId,
      extracted: requireContext(context, 'extracted', this.name),
      decoded: requireContext(context, 'decoded', this.name),
      candidateError: context.candidateError ?? null,
    });
  }
}
