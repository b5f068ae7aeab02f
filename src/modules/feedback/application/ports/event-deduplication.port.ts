/**
 * Tracks Events API deliveries already routed, keyed by Slack's `event_id`.
 */
export interface EventDeduplicationPort {
  /** True the first time an id is seen inside the retention window. */
  markFirstDelivery(eventId: string): boolean;
  forget(eventId: string): void;
}
