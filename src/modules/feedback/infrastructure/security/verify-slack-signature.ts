import type { SignatureRejectionReason } from '../../application/ports/metrics.port';
import { hmacSha256Hex, secureEquals } from './shared';

export const SLACK_SIGNATURE_VERSION = 'v0';
export const DEFAULT_SLACK_SIGNATURE_MAX_AGE_SECONDS = 300;

export interface SlackSignatureInput {
  rawBody: string;
  signature: string | undefined;
  timestamp: string | undefined;
  signingSecret: string;
  nowSeconds: number;
  maxAgeSeconds?: number;
}

export type SlackSignatureVerdict =
  | { valid: true }
  | { valid: false; reason: SignatureRejectionReason };

export function computeSlackSignature(
  signingSecret: string,
  timestamp: string,
  rawBody: string,
): string {
  const base = `${SLACK_SIGNATURE_VERSION}:${timestamp}:${rawBody}`;
  return `${SLACK_SIGNATURE_VERSION}=${hmacSha256Hex(signingSecret, base)}`;
}

/**
 * Checks a Slack request signature and the freshness of its timestamp.
 * The timestamp must be an integer number of seconds within `maxAgeSeconds` of `nowSeconds`,
 * in either direction.
 */
export function evaluateSlackSignature(input: SlackSignatureInput): SlackSignatureVerdict {
  const signature = input.signature?.trim();
  const timestamp = input.timestamp?.trim();

  if (!signature || !timestamp) {
    return { valid: false, reason: 'missing_headers' };
  }

  if (!/^\d+$/.test(timestamp)) {
    return { valid: false, reason: 'stale_timestamp' };
  }

  const maxAgeSeconds = input.maxAgeSeconds ?? DEFAULT_SLACK_SIGNATURE_MAX_AGE_SECONDS;
  if (Math.abs(input.nowSeconds - Number(timestamp)) > maxAgeSeconds) {
    return { valid: false, reason: 'stale_timestamp' };
  }

  const expected = computeSlackSignature(input.signingSecret, timestamp, input.rawBody);
  if (!secureEquals(signature, expected)) {
    return { valid: false, reason: 'signature_mismatch' };
  }

  return { valid: true };
}

export function verifySlackSignature(input: SlackSignatureInput): boolean {
  return evaluateSlackSignature(input).valid;
}
