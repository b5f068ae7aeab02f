import type { ConfigService } from '@nestjs/config';
import type { FeedbackSession } from '@/modules/feedback/domain/session';
import { InMemorySessionStore } from '@/modules/feedback/infrastructure/session';

describe('InMemorySessionStore', () => {
  const ttlMs = 120_000;

  function buildStore(clock: () => number = Date.now): InMemorySessionStore {
    return new InMemorySessionStore(buildConfigService({ FEEDBACK_SESSION_TTL_MS: ttlMs }), clock);
  }

  it('creates and mutates sessions through upsert', () => {
    const store = buildStore();

    store.upsert('U1:T1', (current) => current ?? buildSession('U1:T1'));
    const updated = store.upsert('U1:T1', (current) => ({
      ...(current ?? buildSession('U1:T1')),
      rating: 4,
    }));

    expect(updated.rating).toBe(4);
    expect(store.get('U1:T1')?.rating).toBe(4);
    expect(store.get('U2:T1')).toBeUndefined();
  });

  it('expires sessions after the ttl measured from the last write', () => {
    let now = 1_000_000;
    const store = buildStore(() => now);

    store.upsert('U1:T1', () => buildSession('U1:T1'));

    now += ttlMs - 1;
    expect(store.get('U1:T1')).toBeDefined();

    store.upsert('U1:T1', (current) => ({ ...(current ?? buildSession('U1:T1')), rating: 2 }));
    now += ttlMs - 1;
    expect(store.get('U1:T1')?.rating).toBe(2);

    now += 1;
    expect(store.get('U1:T1')).toBeUndefined();
  });

  it('sweeps expired entries lazily on write', () => {
    let now = 0;
    const store = buildStore(() => now);

    store.upsert('U1:T1', () => buildSession('U1:T1'));
    store.upsert('U2:T1', () => buildSession('U2:T1'));
    expect(store.size()).toBe(2);

    now += ttlMs;
    store.upsert('U3:T1', () => buildSession('U3:T1'));

    expect(store.size()).toBe(1);
  });

  it('removes sessions', () => {
    const store = buildStore();
    store.upsert('U1:T1', () => buildSession('U1:T1'));

    store.remove('U1:T1');

    expect(store.get('U1:T1')).toBeUndefined();
  });

  it('runs tasks for the same key one after another', async () => {
    const store = buildStore();
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = store.runExclusive('U1:T1', async () => {
      order.push('first:start');
      await firstGate;
      order.push('first:end');
      return 'first';
    });
    const second = store.runExclusive('U1:T1', async () => {
      order.push('second:start');
      return 'second';
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(order).toEqual(['first:start']);

    releaseFirst();

    await expect(first).resolves.toBe('first');
    await expect(second).resolves.toBe('second');
    expect(order).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not block other keys', async () => {
    const store = buildStore();
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const blocked = store.runExclusive('U1:T1', async () => {
      await firstGate;
      return 'blocked';
    });

    await expect(store.runExclusive('U2:T1', async () => 'free')).resolves.toBe('free');

    releaseFirst();
    await expect(blocked).resolves.toBe('blocked');
  });

  it('keeps the chain alive after a failing task', async () => {
    const store = buildStore();

    const failing = store.runExclusive('U1:T1', async () => {
      throw new Error('slack down');
    });
    const next = store.runExclusive('U1:T1', async () => 'recovered');

    await expect(failing).rejects.toThrow('slack down');
    await expect(next).resolves.toBe('recovered');
  });
});

function buildSession(key: string): FeedbackSession {
  const [userId, threadTs] = key.split(':');
  return {
    sessionId: `session-${key}`,
    key,
    userId,
    channelId: 'C100',
    threadTs,
    stage: 'prompted',
    submitted: false,
    extractedMetadata: {},
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
  };
}

function buildConfigService(values: Record<string, unknown>): ConfigService {
  return {
    get: (key: string) => values[key],
  } as unknown as ConfigService;
}
