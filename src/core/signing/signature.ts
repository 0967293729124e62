import * as crypto from 'crypto';
import { JsonValue } from '../interfaces/common.types';
import { WebhookSignatureError } from '../errors';
import { canonicalJson } from './canonical-json';

export const SIGNATURE_HEADER = 'X-AdCP-Signature';
export const TIMESTAMP_HEADER = 'X-AdCP-Timestamp';

const SIGNATURE_PREFIX = 'sha256=';

/**
 * Options for signature verification
 */
export interface VerifySignatureOptions {
  /**
   * Timestamp the sender bound into the signature (X-AdCP-Timestamp)
   */
  timestamp?: string;

  /**
   * Reject timestamps further than this from now. Unset disables the check.
   */
  toleranceSeconds?: number;

  now?: () => Date;
}

/**
 * Message that gets signed: the canonical JSON, prefixed with
 * `{timestamp}.` when the sender binds a timestamp
 */
export function buildSigningMessage(payload: JsonValue, timestamp?: string): string {
  const body = canonicalJson(payload);
  return timestamp === undefined ? body : `${timestamp}.${body}`;
}

/**
 * HMAC-SHA256 hex digest of the signing message
 */
export function computeSignature(
  payload: JsonValue,
  secret: string,
  timestamp?: string,
): string {
  return crypto
    .createHmac('sha256', secret)
    .update(buildSigningMessage(payload, timestamp), 'utf8')
    .digest('hex');
}

/**
 * Verify a webhook signature against one or more secrets (rotation).
 * Accepts both `sha256=<hex>` and a bare hex digest.
 *
 * @throws WebhookSignatureError when no secret produces the signature
 */
export function verifySignature(
  payload: JsonValue,
  secrets: string | string[],
  signature: string,
  options: VerifySignatureOptions = {},
): void {
  const candidates = (Array.isArray(secrets) ? secrets : [secrets]).filter(
    (secret) => secret.length > 0,
  );
  if (candidates.length === 0) {
    throw new WebhookSignatureError('No webhook secret configured');
  }

  if (options.toleranceSeconds !== undefined) {
    assertFreshTimestamp(options.timestamp, options.toleranceSeconds, options.now);
  }

  const provided = stripPrefix(signature).toLowerCase();
  for (const secret of candidates) {
    const expected = computeSignature(payload, secret, options.timestamp);
    if (timingSafeEqual(expected, provided)) {
      return;
    }
  }

  throw new WebhookSignatureError('Webhook signature verification failed');
}

/**
 * Sending side: add X-AdCP-Signature and X-AdCP-Timestamp to a copy of
 * `headers`. The signature binds the timestamp to prevent replays.
 */
export function getAdcpSignedHeadersForWebhook(
  headers: Record<string, string>,
  secret: string,
  timestamp: string,
  payload: JsonValue,
): Record<string, string> {
  return {
    ...headers,
    [SIGNATURE_HEADER]: `${SIGNATURE_PREFIX}${computeSignature(payload, secret, timestamp)}`,
    [TIMESTAMP_HEADER]: timestamp,
  };
}

function stripPrefix(signature: string): string {
  const trimmed = signature.trim();
  return trimmed.toLowerCase().startsWith(SIGNATURE_PREFIX)
    ? trimmed.slice(SIGNATURE_PREFIX.length)
    : trimmed;
}

function assertFreshTimestamp(
  timestamp: string | undefined,
  toleranceSeconds: number,
  now: () => Date = () => new Date(),
): void {
  if (timestamp === undefined) {
    throw new WebhookSignatureError('Signature timestamp is required');
  }

  const signedAt = Date.parse(timestamp);
  if (Number.isNaN(signedAt)) {
    throw new WebhookSignatureError(`Invalid signature timestamp: ${timestamp}`);
  }

  if (Math.abs(now().getTime() - signedAt) > toleranceSeconds * 1000) {
    throw new WebhookSignatureError('Signature timestamp outside tolerance window');
  }
}

/**
 * Timing-safe string comparison
 */
function timingSafeEqual(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return crypto.timingSafeEqual(Buffer.from(a), Buffer.from(b));
}
