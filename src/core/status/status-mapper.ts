import { Protocol, TaskStatus } from '../domain/enums';
import { UnknownStatusError } from '../errors';

/**
 * Native status vocabulary of each transport.
 * MCP agents emit both spellings of "input required"; A2A only the hyphenated one.
 */
const STATUS_VOCABULARY: Record<Protocol, Readonly<Record<string, TaskStatus>>> = {
  [Protocol.MCP]: {
    submitted: TaskStatus.SUBMITTED,
    working: TaskStatus.WORKING,
    'input-required': TaskStatus.NEEDS_INPUT,
    input_required: TaskStatus.NEEDS_INPUT,
    completed: TaskStatus.COMPLETED,
    failed: TaskStatus.FAILED,
  },
  [Protocol.A2A]: {
    submitted: TaskStatus.SUBMITTED,
    working: TaskStatus.WORKING,
    'input-required': TaskStatus.NEEDS_INPUT,
    completed: TaskStatus.COMPLETED,
    failed: TaskStatus.FAILED,
  },
};

/**
 * Map a transport status string to the canonical TaskStatus
 *
 * @throws UnknownStatusError for anything outside the transport's vocabulary
 */
export function mapStatus(protocol: Protocol, raw: string): TaskStatus {
  const vocabulary = STATUS_VOCABULARY[protocol];
  if (!Object.prototype.hasOwnProperty.call(vocabulary, raw)) {
    throw new UnknownStatusError(protocol, raw);
  }
  return vocabulary[raw];
}

/**
 * Raw status strings a transport accepts
 */
export function supportedStatuses(protocol: Protocol): string[] {
  return Object.keys(STATUS_VOCABULARY[protocol]);
}

/**
 * Status string written into outbound webhooks (both transports use the
 * hyphenated "input-required")
 */
export function toWireStatus(status: TaskStatus): string {
  return status === TaskStatus.NEEDS_INPUT ? 'input-required' : status;
}
