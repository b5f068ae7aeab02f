import { UnauthorizedException, type ExecutionContext } from '@nestjs/common';
import type { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import type { MetricsPort } from '@/modules/feedback/application/ports/metrics.port';
import {
  computeSlackSignature,
  SlackSignatureGuard,
  SlackSignatureValidationService,
} from '@/modules/feedback/infrastructure/security';

describe('SlackSignatureGuard', () => {
  const originalConsoleWarn = console.warn;
  const nowMs = 1_700_000_000_000;
  const rawBody = 'payload=%7B%22type%22%3A%22block_actions%22%7D';

  beforeEach(() => {
    console.warn = jest.fn();
  });

  afterEach(() => {
    console.warn = originalConsoleWarn;
  });

  function buildGuard(values: Record<string, unknown> = { SLACK_SIGNING_SECRET: 'test-secret' }): {
    guard: SlackSignatureGuard;
    metrics: MetricsPort;
  } {
    const metrics = buildMetrics();
    const service = new SlackSignatureValidationService(
      buildConfigService(values),
      metrics,
      () => nowMs,
    );
    return { guard: new SlackSignatureGuard(service), metrics };
  }

  it('lets signed requests through and marks them verified', () => {
    const { guard } = buildGuard();
    const request = buildRequest({
      rawBody,
      headers: {
        'X-Slack-Request-Timestamp': '1700000000',
        'X-Slack-Signature': computeSlackSignature('test-secret', '1700000000', rawBody),
      },
    });

    expect(guard.canActivate(buildContext(request))).toBe(true);
    expect(request.slackSignature).toEqual({ verified: true, timestamp: '1700000000' });
  });

  it('rejects a bad signature with 401 and counts it', () => {
    const { guard, metrics } = buildGuard();
    const request = buildRequest({
      rawBody,
      headers: {
        'X-Slack-Request-Timestamp': '1700000000',
        'X-Slack-Signature': computeSlackSignature('other-secret', '1700000000', rawBody),
      },
    });

    expectUnauthorized(() => guard.canActivate(buildContext(request)));
    expect(metrics.incrementSignatureRejected).toHaveBeenCalledWith('signature_mismatch');
    expect(request.slackSignature).toBeUndefined();
  });

  it('rejects replayed requests', () => {
    const { guard, metrics } = buildGuard();
    const staleTimestamp = String(nowMs / 1000 - 301);
    const request = buildRequest({
      rawBody,
      headers: {
        'X-Slack-Request-Timestamp': staleTimestamp,
        'X-Slack-Signature': computeSlackSignature('test-secret', staleTimestamp, rawBody),
      },
    });

    expectUnauthorized(() => guard.canActivate(buildContext(request)));
    expect(metrics.incrementSignatureRejected).toHaveBeenCalledWith('stale_timestamp');
  });

  it('rejects requests without signature headers', () => {
    const { guard, metrics } = buildGuard();

    expectUnauthorized(() => guard.canActivate(buildContext(buildRequest({ rawBody, headers: {} }))));
    expect(metrics.incrementSignatureRejected).toHaveBeenCalledWith('missing_headers');
  });

  it('rejects everything when no signing secret is configured', () => {
    const { guard } = buildGuard({});
    const request = buildRequest({
      rawBody,
      headers: {
        'X-Slack-Request-Timestamp': '1700000000',
        'X-Slack-Signature': computeSlackSignature('', '1700000000', rawBody),
      },
    });

    expectUnauthorized(() => guard.canActivate(buildContext(request)));
  });
});

function buildMetrics(): MetricsPort {
  return {
    incrementWebhookDelivery: jest.fn(),
    incrementSignatureRejected: jest.fn(),
    incrementSessionStarted: jest.fn(),
    incrementFeedbackSubmitted: jest.fn(),
    incrementSubmissionRejected: jest.fn(),
    incrementStaleAction: jest.fn(),
    observeSubmissionLatency: jest.fn(),
  };
}

function buildConfigService(values: Record<string, unknown>): ConfigService {
  return {
    get: (key: string) => values[key],
  } as unknown as ConfigService;
}

function buildRequest(input: { rawBody?: string; headers: Record<string, string> }): Request {
  const normalizedHeaders = new Map(
    Object.entries(input.headers).map(([key, value]) => [key.toLowerCase(), value]),
  );

  return {
    path: '/slack/interactions',
    rawBody: input.rawBody,
    header: (name: string) => normalizedHeaders.get(name.toLowerCase()),
  } as unknown as Request;
}

function buildContext(request: Request): ExecutionContext {
  return {
    switchToHttp: () => ({
      getRequest: () => request,
    }),
  } as unknown as ExecutionContext;
}

function expectUnauthorized(fn: () => unknown): void {
  try {
    fn();
    throw new Error('Expected UnauthorizedException');
  } catch (error: unknown) {
    expect(error).toBeInstanceOf(UnauthorizedException);
    if (error instanceof UnauthorizedException) {
      expect(error.message).toBe('invalid signature');
    }
  }
}
