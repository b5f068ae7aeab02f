import { collapseWhitespace } from '../../../../common/utils/text-normalize.utils';
import { isRecord } from '../../../../common/utils/object.utils';
import type { ExtractedMetadata } from '../session';

const TICKET_ID_PATTERN = /\bticket(?:\s*id)?\s*(?::|#|=)\s*#?([A-Za-z0-9][A-Za-z0-9_-]*)/i;
const CORRELATION_ID_PATTERN =
  /\b(?:session|correlation)\s*id\s*(?::|#|=)\s*([A-Za-z0-9][A-Za-z0-9_-]*)/i;

/**
 * Pulls optional identifiers out of a resolution message, e.g.
 * "Issue resolved. Ticket ID: SUP-1042 Session ID: 9f2c".
 * Missing identifiers are simply left out.
 */
export function extractResolutionMetadata(text: string): ExtractedMetadata {
  const normalized = collapseWhitespace(text);
  const ticketId = TICKET_ID_PATTERN.exec(normalized)?.[1];
  const correlationId = CORRELATION_ID_PATTERN.exec(normalized)?.[1];

  return {
    ...(ticketId ? { ticketId } : {}),
    ...(correlationId ? { correlationId } : {}),
  };
}

export function encodeMetadataValue(metadata: ExtractedMetadata): string {
  return JSON.stringify({
    ...(metadata.ticketId ? { ticketId: metadata.ticketId } : {}),
    ...(metadata.correlationId ? { correlationId: metadata.correlationId } : {}),
  });
}

export function decodeMetadataValue(value: unknown): ExtractedMetadata {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return {};
  }

  if (!isRecord(parsed)) {
    return {};
  }

  const ticketId = typeof parsed.ticketId === 'string' ? parsed.ticketId : undefined;
  const correlationId =
    typeof parsed.correlationId === 'string' ? parsed.correlationId : undefined;

  return {
    ...(ticketId ? { ticketId } : {}),
    ...(correlationId ? { correlationId } : {}),
  };
}

export function mergeMetadata(
  current: ExtractedMetadata,
  incoming: ExtractedMetadata,
): ExtractedMetadata {
  return {
    ...current,
    ...(incoming.ticketId ? { ticketId: incoming.ticketId } : {}),
    ...(incoming.correlationId ? { correlationId: incoming.correlationId } : {}),
  };
}
