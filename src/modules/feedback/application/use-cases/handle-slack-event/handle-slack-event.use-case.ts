import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '../../../../../common/utils/logger';
import { containsNormalizedPhrase } from '../../../../../common/utils/text-normalize.utils';
import type { EventDeduplicationPort } from '../../ports/event-deduplication.port';
import type { MetricsPort } from '../../ports/metrics.port';
import { EVENT_DEDUPLICATION_PORT, METRICS_PORT } from '../../ports/tokens';
import { extractResolutionMetadata } from '../../../domain/resolution-metadata';
import type { ExtractedMetadata } from '../../../domain/session';
import { parseSlackEventEnvelope, type MessageEvent } from '../../../domain/slack-events';
import { FeedbackWorkflowService } from '../feedback-workflow/feedback-workflow.service';

const DEFAULT_TRIGGER_PHRASE = 'feedback please';
const DEFAULT_RESOLUTION_PHRASE = 'issue resolved';

export type SlackEventResponse = { challenge: string } | { status: 'ok' };

const OK: SlackEventResponse = { status: 'ok' };

@Injectable()
export class HandleSlackEventUseCase {
  private readonly logger = createLogger(HandleSlackEventUseCase.name);
  private readonly triggerPhrase: string;
  private readonly resolutionPhrase: string;

  constructor(
    private readonly workflow: FeedbackWorkflowService,
    @Inject(EVENT_DEDUPLICATION_PORT)
    private readonly deduplicator: EventDeduplicationPort,
    @Inject(METRICS_PORT)
    private readonly metricsPort: MetricsPort,
    configService: ConfigService,
  ) {
    this.triggerPhrase =
      configService.get<string>('FEEDBACK_TRIGGER_PHRASE') ?? DEFAULT_TRIGGER_PHRASE;
    this.resolutionPhrase =
      configService.get<string>('FEEDBACK_RESOLUTION_PHRASE') ?? DEFAULT_RESOLUTION_PHRASE;
  }

  async execute(input: {
    body: unknown;
    requestId?: string;
    retryNum?: number;
  }): Promise<SlackEventResponse> {
    const envelope = parseSlackEventEnvelope(input.body);

    switch (envelope.kind) {
      case 'challenge':
        this.metricsPort.incrementWebhookDelivery('challenge');
        this.logger.slack('slack_url_verification', {
          event: 'slack_url_verification',
          request_id: input.requestId,
        });
        return { challenge: envelope.token };

      case 'ignored':
        this.metricsPort.incrementWebhookDelivery('ignored');
        this.logger.slack('slack_event_ignored', {
          event: 'slack_event_ignored',
          reason: envelope.reason,
          event_id: envelope.eventId ?? null,
          request_id: input.requestId,
        });
        return OK;

      case 'message':
        return this.handleMessage(envelope, input);
    }
  }

  private async handleMessage(
    message: MessageEvent,
    input: { requestId?: string; retryNum?: number },
  ): Promise<SlackEventResponse> {
    if (message.eventId && !this.deduplicator.markFirstDelivery(message.eventId)) {
      this.metricsPort.incrementWebhookDelivery('duplicate');
      this.logger.slack('slack_event_duplicate', {
        event: 'slack_event_duplicate',
        event_id: message.eventId,
        retry_num: input.retryNum ?? null,
        request_id: input.requestId,
      });
      return OK;
    }

    this.metricsPort.incrementWebhookDelivery('message');

    const metadata = this.detectTrigger(message.text);
    if (!metadata) {
      return OK;
    }

    try {
      await this.workflow.onTrigger(message, metadata);
    } catch (error: unknown) {
      if (message.eventId) {
        this.deduplicator.forget(message.eventId);
      }
      throw error;
    }

    return OK;
  }

  /**
   * Resolution messages carry ticket/correlation ids; plain trigger messages start a session
   * without metadata. Returns undefined when the text matches neither phrase.
   */
  private detectTrigger(text: string): ExtractedMetadata | undefined {
    if (containsNormalizedPhrase(text, this.resolutionPhrase)) {
      return extractResolutionMetadata(text);
    }

    if (containsNormalizedPhrase(text, this.triggerPhrase)) {
      return {};
    }

    return undefined;
  }
}
