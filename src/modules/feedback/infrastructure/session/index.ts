export { DeliveryDeduplicator } from './delivery-deduplicator';
export { InMemorySessionStore } from './in-memory-session.store';
