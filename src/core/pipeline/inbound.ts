import { Protocol, TaskStatus } from '../domain/enums';
import {
  ExtractedPayload,
  InboundWebhook,
  JsonObject,
  ProtocolAdapters,
  isJsonObject,
} from '../interfaces';
import { WebhookValidationError } from '../errors';

/**
 * Tag a raw payload with its transport by structure:
 * a string `status` is MCP, an object `status` is A2A.
 *
 * @throws WebhookValidationError when neither shape fits
 */
export function detectProtocol(raw: unknown): { protocol: Protocol; body: JsonObject } {
  if (!isJsonObject(raw)) {
    throw new WebhookValidationError('Webhook payload must be a JSON object', [
      `payload: expected object, received ${Array.isArray(raw) ? 'array' : raw === null ? 'null' : typeof raw}`,
    ]);
  }

  if (typeof raw.status === 'string') {
    return { protocol: Protocol.MCP, body: raw };
  }
  if (isJsonObject(raw.status)) {
    return { protocol: Protocol.A2A, body: raw };
  }

  throw new WebhookValidationError(
    'Webhook payload matches neither the MCP nor the A2A shape',
    ['status: expected a status string (MCP) or a status object (A2A)'],
  );
}

/**
 * Tag and validate a raw payload
 */
export function parseInboundWebhook(
  raw: unknown,
  adapters: ProtocolAdapters,
): InboundWebhook {
  const { protocol, body } = detectProtocol(raw);

  return protocol === Protocol.MCP
    ? { protocol, payload: adapters[Protocol.MCP].parse(body), raw: body }
    : { protocol, payload: adapters[Protocol.A2A].parse(body), raw: body };
}

export function readTaskId(inbound: InboundWebhook, adapters: ProtocolAdapters): string {
  return inbound.protocol === Protocol.MCP
    ? adapters[Protocol.MCP].getTaskId(inbound.payload)
    : adapters[Protocol.A2A].getTaskId(inbound.payload);
}

export function readRawStatus(inbound: InboundWebhook, adapters: ProtocolAdapters): string {
  return inbound.protocol === Protocol.MCP
    ? adapters[Protocol.MCP].getRawStatus(inbound.payload)
    : adapters[Protocol.A2A].getRawStatus(inbound.payload);
}

export function extractPayload(
  inbound: InboundWebhook,
  status: TaskStatus,
  adapters: ProtocolAdapters,
): ExtractedPayload {
  return inbound.protocol === Protocol.MCP
    ? adapters[Protocol.MCP].extract(inbound.payload, status)
    : adapters[Protocol.A2A].extract(inbound.payload, status);
}
