import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import {
  ALREADY_SUBMITTED_MESSAGE,
  RATING_OUT_OF_RANGE_MESSAGE,
} from '../../../../../common/constants/error-messages.constants';
import { createLogger } from '../../../../../common/utils/logger';
import type { MetricsPort } from '../../ports/metrics.port';
import type { SessionStorePort } from '../../ports/session-store.port';
import type { SlackApiPort } from '../../ports/slack-api.port';
import { METRICS_PORT, SESSION_STORE_PORT, SLACK_API_PORT } from '../../ports/tokens';
import { parseRating, type RatingRange } from '../../../domain/rating';
import { mergeMetadata } from '../../../domain/resolution-metadata';
import {
  buildSessionKey,
  type ExtractedMetadata,
  type FeedbackSession,
  type SessionStage,
} from '../../../domain/session';
import {
  buildFeedbackFormMessage,
  buildFeedbackPromptMessage,
  FEEDBACK_COMMENT_MAX_LENGTH,
} from '../../../domain/slack-blocks';
import type { ActionEvent, FeedbackAction, MessageEvent } from '../../../domain/slack-events';
import { resolveRatingRange, SILENT_ACK, type InteractionReply } from '../shared';
import { SubmitFeedbackUseCase } from '../submit-feedback/submit-feedback.use-case';

export type TriggerOutcome = 'prompted' | 'skipped_submitted';

type SessionAction = Exclude<FeedbackAction, { type: 'unrecognized' }>;

/**
 * Per-thread feedback state machine: prompted -> form_displayed -> submitted.
 * Every transition for a session key runs inside the store's per-key lock.
 */
@Injectable()
export class FeedbackWorkflowService {
  private readonly logger = createLogger(FeedbackWorkflowService.name);
  private readonly ratingRange: RatingRange;

  constructor(
    @Inject(SESSION_STORE_PORT)
    private readonly sessionStore: SessionStorePort,
    @Inject(SLACK_API_PORT)
    private readonly slackApi: SlackApiPort,
    @Inject(METRICS_PORT)
    private readonly metricsPort: MetricsPort,
    private readonly submitFeedback: SubmitFeedbackUseCase,
    configService: ConfigService,
  ) {
    this.ratingRange = resolveRatingRange(configService);
  }

  async onTrigger(
    message: MessageEvent,
    metadata: ExtractedMetadata = {},
  ): Promise<TriggerOutcome> {
    const key = buildSessionKey({ userId: message.userId, threadTs: message.threadTs });

    return this.sessionStore.runExclusive(key, async () => {
      const existing = this.sessionStore.get(key);

      if (existing?.submitted) {
        this.logger.feedback('feedback_trigger_skipped', {
          event: 'feedback_trigger_skipped',
          session_id: existing.sessionId,
          reason: 'already_submitted',
        });
        return 'skipped_submitted';
      }

      const prompt = buildFeedbackPromptMessage({
        metadata: mergeMetadata(existing?.extractedMetadata ?? {}, metadata),
      });
      const posted = await this.slackApi.postMessage({
        channel: message.channelId,
        threadTs: message.threadTs,
        text: prompt.text,
        blocks: prompt.blocks,
      });

      const session = this.sessionStore.upsert(key, (current) =>
        current
          ? touch(current, { promptMessageTs: posted.ts })
          : createSession({
              key,
              userId: message.userId,
              channelId: message.channelId,
              threadTs: message.threadTs,
              stage: 'prompted',
              metadata,
              promptMessageTs: posted.ts,
            }),
      );

      if (!existing) {
        this.metricsPort.incrementSessionStarted();
      }

      this.logger.feedback('feedback_prompt_posted', {
        event: 'feedback_prompt_posted',
        session_id: session.sessionId,
        channel_id: message.channelId,
        thread_ts: message.threadTs,
        reprompt: existing !== undefined,
      });

      return 'prompted';
    });
  }

  async onAction(event: ActionEvent): Promise<InteractionReply> {
    const action = event.action;

    if (action.type === 'unrecognized') {
      this.logger.debug('feedback_action_unrecognized', {
        event: 'feedback_action_unrecognized',
        action_id: action.actionId,
      });
      return SILENT_ACK;
    }

    const key = buildSessionKey({ userId: event.userId, threadTs: event.threadTs });
    return this.sessionStore.runExclusive(key, () => this.applyAction(key, event, action));
  }

  private async applyAction(
    key: string,
    event: ActionEvent,
    action: SessionAction,
  ): Promise<InteractionReply> {
    switch (action.type) {
      case 'show_form':
        return this.showForm(key, event, action.metadata);
      case 'rating_selected':
        return this.selectRating(key, action.value);
      case 'comment_entered':
        return this.enterComment(key, action.text);
      case 'submit':
        return this.submitFeedback.execute({ key, event });
    }
  }

  private async showForm(
    key: string,
    event: ActionEvent,
    metadata: ExtractedMetadata,
  ): Promise<InteractionReply> {
    const existing = this.sessionStore.get(key);

    if (existing?.submitted) {
      this.logger.feedback('feedback_form_skipped', {
        event: 'feedback_form_skipped',
        session_id: existing.sessionId,
        reason: 'already_submitted',
      });
      return { text: ALREADY_SUBMITTED_MESSAGE };
    }

    // One live form per session: the finalizer only closes the form at formMessageTs.
    if (existing?.stage === 'form_displayed' && existing.formMessageTs) {
      this.sessionStore.upsert(key, (current) =>
        touch(current ?? existing, {
          extractedMetadata: mergeMetadata(existing.extractedMetadata, metadata),
        }),
      );
      this.logger.feedback('feedback_form_already_displayed', {
        event: 'feedback_form_already_displayed',
        session_id: existing.sessionId,
        form_message_ts: existing.formMessageTs,
      });
      return SILENT_ACK;
    }

    const form = buildFeedbackFormMessage({
      userName: event.userName,
      ratingRange: this.ratingRange,
    });
    const posted = await this.slackApi.postMessage({
      channel: event.channelId,
      threadTs: event.threadTs,
      text: form.text,
      blocks: form.blocks,
    });

    const session = this.sessionStore.upsert(key, (current) =>
      current
        ? touch(current, {
            stage: 'form_displayed',
            formMessageTs: posted.ts,
            extractedMetadata: mergeMetadata(current.extractedMetadata, metadata),
          })
        : createSession({
            key,
            userId: event.userId,
            channelId: event.channelId,
            threadTs: event.threadTs,
            stage: 'form_displayed',
            metadata,
            formMessageTs: posted.ts,
          }),
    );

    if (!existing) {
      this.metricsPort.incrementSessionStarted();
    }

    this.logger.feedback('feedback_form_posted', {
      event: 'feedback_form_posted',
      session_id: session.sessionId,
      channel_id: event.channelId,
      thread_ts: event.threadTs,
    });

    return SILENT_ACK;
  }

  private async selectRating(key: string, value: string): Promise<InteractionReply> {
    const session = this.resolveEditableSession(key, 'rating_selected');
    if (!session) {
      return SILENT_ACK;
    }

    const rating = parseRating(value, this.ratingRange);
    if (rating === undefined) {
      this.logger.feedback('feedback_rating_rejected', {
        event: 'feedback_rating_rejected',
        session_id: session.sessionId,
        value,
      });
      return { text: RATING_OUT_OF_RANGE_MESSAGE };
    }

    this.sessionStore.upsert(key, (current) => touch(current ?? session, { rating }));
    return SILENT_ACK;
  }

  private async enterComment(key: string, text: string): Promise<InteractionReply> {
    const session = this.resolveEditableSession(key, 'comment_entered');
    if (!session) {
      return SILENT_ACK;
    }

    const comments = Array.from(text).slice(0, FEEDBACK_COMMENT_MAX_LENGTH).join('');
    this.sessionStore.upsert(key, (current) => touch(current ?? session, { comments }));
    return SILENT_ACK;
  }

  private resolveEditableSession(
    key: string,
    actionType: 'rating_selected' | 'comment_entered',
  ): FeedbackSession | undefined {
    const session = this.sessionStore.get(key);

    if (!session) {
      this.metricsPort.incrementStaleAction(actionType);
      this.logger.feedback('feedback_action_without_session', {
        event: 'feedback_action_without_session',
        action: actionType,
        session_key: key,
      });
      return undefined;
    }

    if (session.submitted) {
      this.logger.feedback('feedback_action_after_submit', {
        event: 'feedback_action_after_submit',
        action: actionType,
        session_id: session.sessionId,
      });
      return undefined;
    }

    return session;
  }
}

function createSession(input: {
  key: string;
  userId: string;
  channelId: string;
  threadTs: string;
  stage: SessionStage;
  metadata: ExtractedMetadata;
  promptMessageTs?: string;
  formMessageTs?: string;
}): FeedbackSession {
  const now = new Date().toISOString();

  return {
    sessionId: randomUUID(),
    key: input.key,
    userId: input.userId,
    channelId: input.channelId,
    threadTs: input.threadTs,
    stage: input.stage,
    submitted: false,
    extractedMetadata: mergeMetadata({}, input.metadata),
    ...(input.promptMessageTs ? { promptMessageTs: input.promptMessageTs } : {}),
    ...(input.formMessageTs ? { formMessageTs: input.formMessageTs } : {}),
    createdAt: now,
    updatedAt: now,
  };
}

function touch(session: FeedbackSession, changes: Partial<FeedbackSession>): FeedbackSession {
  return {
    ...session,
    ...changes,
    updatedAt: new Date().toISOString(),
  };
}
