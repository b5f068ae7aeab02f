import type { ConfigService } from '@nestjs/config';
import type { FeedbackRepositoryPort } from '@/modules/feedback/application/ports/feedback-repository.port';
import type { MetricsPort } from '@/modules/feedback/application/ports/metrics.port';
import type {
  PostedMessage,
  PostMessageInput,
  SlackApiPort,
  UpdateMessageInput,
} from '@/modules/feedback/application/ports/slack-api.port';
import { FeedbackWorkflowService } from '@/modules/feedback/application/use-cases/feedback-workflow/feedback-workflow.service';
import { SubmitFeedbackUseCase } from '@/modules/feedback/application/use-cases/submit-feedback/submit-feedback.use-case';
import type { FeedbackRecord } from '@/modules/feedback/domain/feedback-record';
import type { ActionEvent, FeedbackAction, MessageEvent } from '@/modules/feedback/domain/slack-events';
import { InMemorySessionStore } from '@/modules/feedback/infrastructure/session';

export class FakeSlackApi implements SlackApiPort {
  readonly posted: PostMessageInput[] = [];
  readonly updated: UpdateMessageInput[] = [];
  readonly getUserDisplayName = jest.fn(async (userId: string) =>
    userId === 'U1' ? 'Ada L' : userId,
  );
  readonly getChannelName = jest.fn(async (channelId: string) =>
    channelId === 'C100' ? 'support' : channelId,
  );
  failUpdates = false;
  private sequence = 0;

  async postMessage(input: PostMessageInput): Promise<PostedMessage> {
    this.posted.push(input);
    this.sequence += 1;
    return { channel: input.channel, ts: `1700000100.00000${this.sequence}` };
  }

  async updateMessage(input: UpdateMessageInput): Promise<void> {
    if (this.failUpdates) {
      throw new Error('message_not_found');
    }
    this.updated.push(input);
  }
}

export class InMemoryFeedbackRepository implements FeedbackRepositoryPort {
  readonly records: FeedbackRecord[] = [];
  readonly saveFeedback = jest.fn(async (record: FeedbackRecord) => {
    if (this.records.some((existing) => existing.id === record.id)) {
      return { created: false };
    }
    this.records.push(record);
    return { created: true };
  });

  async listFeedback(input: { limit: number }): Promise<FeedbackRecord[]> {
    return [...this.records].reverse().slice(0, input.limit);
  }
}

export function buildMetrics(): MetricsPort {
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

export function buildConfigService(values: Record<string, unknown> = {}): ConfigService {
  const merged: Record<string, unknown> = {
    FEEDBACK_RATING_MIN: 1,
    FEEDBACK_RATING_MAX: 5,
    FEEDBACK_SESSION_TTL_MS: 86_400_000,
    FEEDBACK_TRIGGER_PHRASE: 'feedback please',
    FEEDBACK_RESOLUTION_PHRASE: 'issue resolved',
    ...values,
  };

  return {
    get: (key: string) => merged[key],
  } as unknown as ConfigService;
}

export function buildWorkflow(): {
  workflow: FeedbackWorkflowService;
  store: InMemorySessionStore;
  slackApi: FakeSlackApi;
  repository: InMemoryFeedbackRepository;
  metrics: MetricsPort;
} {
  const configService = buildConfigService();
  const store = new InMemorySessionStore(configService);
  const slackApi = new FakeSlackApi();
  const repository = new InMemoryFeedbackRepository();
  const metrics = buildMetrics();
  const submitFeedback = new SubmitFeedbackUseCase(
    store,
    repository,
    slackApi,
    metrics,
    configService,
  );

  return {
    workflow: new FeedbackWorkflowService(store, slackApi, metrics, submitFeedback, configService),
    store,
    slackApi,
    repository,
    metrics,
  };
}

export function buildMessage(overrides: Partial<MessageEvent> = {}): MessageEvent {
  return {
    kind: 'message',
    eventId: 'Ev1',
    channelId: 'C100',
    userId: 'U1',
    text: 'feedback please',
    ts: 'T1',
    threadTs: 'T1',
    ...overrides,
  };
}

export function buildAction(
  action: FeedbackAction,
  overrides: Partial<Omit<ActionEvent, 'action'>> = {},
): ActionEvent {
  return {
    kind: 'action',
    userId: 'U1',
    userName: 'ada.l',
    channelId: 'C100',
    threadTs: 'T1',
    messageTs: '1700000100.000009',
    action,
    ...overrides,
  };
}
