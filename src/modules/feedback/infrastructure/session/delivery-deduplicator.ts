import { Injectable, Optional } from '@nestjs/common';
import type { EventDeduplicationPort } from '../../application/ports/event-deduplication.port';

const DEFAULT_RETENTION_MS = 3_600_000;
const MAX_TRACKED_DELIVERIES = 10_000;

type Clock = () => number;

/**
 * Remembers Events API `event_id`s so a redelivered event is acknowledged without being
 * routed twice. Entries are kept for an hour, oldest evicted first once the cap is reached.
 */
@Injectable()
export class DeliveryDeduplicator implements EventDeduplicationPort {
  private readonly seen = new Map<string, number>();

  constructor(
    @Optional()
    private readonly clock: Clock = Date.now,
  ) {}

  /** Returns true the first time an id is seen within the retention window. */
  markFirstDelivery(eventId: string): boolean {
    const now = this.clock();
    const seenAt = this.seen.get(eventId);
    if (seenAt !== undefined && now - seenAt < DEFAULT_RETENTION_MS) {
      return false;
    }

    this.seen.delete(eventId);
    this.seen.set(eventId, now);
    this.evictOverflow(now);
    return true;
  }

  /** Drops an id so a redelivery of an event that failed to process is routed again. */
  forget(eventId: string): void {
    this.seen.delete(eventId);
  }

  private evictOverflow(now: number): void {
    for (const [eventId, seenAt] of this.seen) {
      if (this.seen.size <= MAX_TRACKED_DELIVERIES && now - seenAt < DEFAULT_RETENTION_MS) {
        break;
      }
      this.seen.delete(eventId);
    }
  }
}
