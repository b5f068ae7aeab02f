import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ALREADY_SUBMITTED_MESSAGE,
  FORM_EXPIRED_MESSAGE,
  RATING_REQUIRED_MESSAGE,
} from '../../../../../common/constants/error-messages.constants';
import { createLogger } from '../../../../../common/utils/logger';
import type { FeedbackRepositoryPort } from '../../ports/feedback-repository.port';
import type { MetricsPort } from '../../ports/metrics.port';
import type { SessionStorePort } from '../../ports/session-store.port';
import type { SlackApiPort } from '../../ports/slack-api.port';
import {
  FEEDBACK_REPOSITORY_PORT,
  METRICS_PORT,
  SESSION_STORE_PORT,
  SLACK_API_PORT,
} from '../../ports/tokens';
import type { FeedbackRecord } from '../../../domain/feedback-record';
import { isRatingInRange, type RatingRange } from '../../../domain/rating';
import type { FeedbackSession } from '../../../domain/session';
import type { ActionEvent } from '../../../domain/slack-events';
import {
  buildFeedbackConfirmationMessage,
  buildFeedbackThankYouMessage,
} from '../../../domain/slack-blocks';
import { resolveRatingRange, SILENT_ACK, type InteractionReply } from '../shared';

/**
 * Closes a feedback session: persists exactly one record, marks the session submitted,
 * then replaces the form with a static confirmation and thanks the user in the thread.
 *
 * Callers must hold the session lock (`SessionStorePort.runExclusive`) for `key`.
 */
@Injectable()
export class SubmitFeedbackUseCase {
  private readonly logger = createLogger(SubmitFeedbackUseCase.name);
  private readonly ratingRange: RatingRange;

  constructor(
    @Inject(SESSION_STORE_PORT)
    private readonly sessionStore: SessionStorePort,
    @Inject(FEEDBACK_REPOSITORY_PORT)
    private readonly feedbackRepository: FeedbackRepositoryPort,
    @Inject(SLACK_API_PORT)
    private readonly slackApi: SlackApiPort,
    @Inject(METRICS_PORT)
    private readonly metricsPort: MetricsPort,
    configService: ConfigService,
  ) {
    this.ratingRange = resolveRatingRange(configService);
  }

  async execute(input: { key: string; event: ActionEvent }): Promise<InteractionReply> {
    const startedAt = Date.now();
    const session = this.sessionStore.get(input.key);

    if (!session) {
      this.metricsPort.incrementSubmissionRejected('session_not_found');
      this.logger.feedback('feedback_submit_without_session', {
        event: 'feedback_submit_without_session',
        session_key: input.key,
        channel_id: input.event.channelId,
      });
      return { text: FORM_EXPIRED_MESSAGE };
    }

    if (session.submitted) {
      this.metricsPort.incrementSubmissionRejected('already_submitted');
      this.logger.feedback('feedback_duplicate_submit', {
        event: 'feedback_duplicate_submit',
        session_id: session.sessionId,
        session_key: input.key,
      });
      return { text: ALREADY_SUBMITTED_MESSAGE };
    }

    const rating = session.rating;
    if (rating === undefined || !isRatingInRange(rating, this.ratingRange)) {
      this.metricsPort.incrementSubmissionRejected('rating_required');
      this.logger.feedback('feedback_submit_without_rating', {
        event: 'feedback_submit_without_rating',
        session_id: session.sessionId,
      });
      return { text: RATING_REQUIRED_MESSAGE };
    }

    const [userName, channelName] = await Promise.all([
      this.lookupName('users.info', session.userId, (id) => this.slackApi.getUserDisplayName(id)),
      this.lookupName('conversations.info', session.channelId, (id) =>
        this.slackApi.getChannelName(id),
      ),
    ]);

    const submittedAt = new Date().toISOString();
    const record = buildRecord(session, { rating, userName, channelName, submittedAt });

    const { created } = await this.feedbackRepository.saveFeedback(record);
    if (!created) {
      this.logger.warn('feedback_record_already_stored', {
        event: 'feedback_record_already_stored',
        session_id: session.sessionId,
      });
    }

    this.sessionStore.upsert(input.key, (current) => ({
      ...(current ?? session),
      stage: 'submitted',
      submitted: true,
      submittedAt,
      updatedAt: submittedAt,
    }));

    this.metricsPort.incrementFeedbackSubmitted(rating);
    this.metricsPort.observeSubmissionLatency((Date.now() - startedAt) / 1000);
    this.logger.feedback('feedback_submitted', {
      event: 'feedback_submitted',
      session_id: session.sessionId,
      channel_id: session.channelId,
      thread_ts: session.threadTs,
      rating,
      has_comments: record.comments.length > 0,
      has_ticket_id: record.ticketId !== undefined,
      created,
    });

    await this.notify(session, record, input.event.messageTs);

    return SILENT_ACK;
  }

  private async lookupName(
    operation: string,
    id: string,
    lookup: (id: string) => Promise<string>,
  ): Promise<string> {
    try {
      return await lookup(id);
    } catch (error: unknown) {
      this.logger.warn('slack_lookup_failed', {
        event: 'slack_lookup_failed',
        operation,
        id,
        error_type: error instanceof Error ? error.name : 'UnknownError',
        error_message: error instanceof Error ? error.message : String(error),
      });
      return id;
    }
  }

  private async notify(
    session: FeedbackSession,
    record: FeedbackRecord,
    actionMessageTs: string | undefined,
  ): Promise<void> {
    const formTs = session.formMessageTs ?? actionMessageTs;

    if (formTs) {
      const confirmation = buildFeedbackConfirmationMessage({
        rating: record.rating,
        comments: record.comments,
        ratingRange: this.ratingRange,
      });

      try {
        await this.slackApi.updateMessage({
          channel: session.channelId,
          ts: formTs,
          text: confirmation.text,
          blocks: confirmation.blocks,
        });
      } catch (error: unknown) {
        this.logNotifierFailure('chat.update', session, error);
      }
    }

    const thankYou = buildFeedbackThankYouMessage({ userId: session.userId });
    try {
      await this.slackApi.postMessage({
        channel: session.channelId,
        threadTs: session.threadTs,
        text: thankYou.text,
      });
    } catch (error: unknown) {
      this.logNotifierFailure('chat.postMessage', session, error);
    }
  }

  private logNotifierFailure(operation: string, session: FeedbackSession, error: unknown): void {
    this.logger.error(
      'feedback_notifier_failed',
      error instanceof Error ? error : undefined,
      {
        event: 'feedback_notifier_failed',
        operation,
        session_id: session.sessionId,
        channel_id: session.channelId,
      },
    );
  }
}

function buildRecord(
  session: FeedbackSession,
  input: { rating: number; userName: string; channelName: string; submittedAt: string },
): FeedbackRecord {
  return {
    id: session.sessionId,
    channelId: session.channelId,
    channelName: input.channelName,
    threadTs: session.threadTs,
    userId: session.userId,
    userName: input.userName,
    rating: input.rating,
    comments: session.comments?.trim() ?? '',
    ...(session.extractedMetadata.ticketId
      ? { ticketId: session.extractedMetadata.ticketId }
      : {}),
    ...(session.extractedMetadata.correlationId
      ? { correlationId: session.extractedMetadata.correlationId }
      : {}),
    submittedAt: input.submittedAt,
  };
}
