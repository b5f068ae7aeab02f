import { DeliveryDeduplicator } from '@/modules/feedback/infrastructure/session';

describe('DeliveryDeduplicator', () => {
  it('reports only the first delivery of an event id', () => {
    const deduplicator = new DeliveryDeduplicator(() => 0);

    expect(deduplicator.markFirstDelivery('Ev1')).toBe(true);
    expect(deduplicator.markFirstDelivery('Ev1')).toBe(false);
    expect(deduplicator.markFirstDelivery('Ev2')).toBe(true);
  });

  it('accepts the id again once the retention window passed', () => {
    let now = 0;
    const deduplicator = new DeliveryDeduplicator(() => now);

    deduplicator.markFirstDelivery('Ev1');
    now = 3_600_000;

    expect(deduplicator.markFirstDelivery('Ev1')).toBe(true);
  });

  it('forgets ids whose processing failed', () => {
    const deduplicator = new DeliveryDeduplicator(() => 0);

    deduplicator.markFirstDelivery('Ev1');
    deduplicator.forget('Ev1');

    expect(deduplicator.markFirstDelivery('Ev1')).toBe(true);
  });
});
