import { Module } from '@nestjs/common';
import { FeedbackQueryController } from './controllers/feedback-query.controller';
import { MetricsController } from './controllers/metrics.controller';
import { SlackEventsController } from './controllers/slack-events.controller';
import { SlackInteractionsController } from './controllers/slack-interactions.controller';
import {
  EVENT_DEDUPLICATION_PORT,
  FEEDBACK_REPOSITORY_PORT,
  METRICS_PORT,
  SESSION_STORE_PORT,
  SLACK_API_PORT,
} from './application/ports/tokens';
import {
  FeedbackWorkflowService,
  HandleSlackEventUseCase,
  HandleSlackInteractionUseCase,
  ListFeedbackUseCase,
  SubmitFeedbackUseCase,
} from './application/use-cases';
import { PrometheusMetricsAdapter } from './infrastructure/adapters/metrics';
import { SlackWebApiAdapter } from './infrastructure/adapters/slack-web-api';
import {
  PgFeedbackRepository,
  pgPoolFactory,
  PgPoolProvider,
} from './infrastructure/repositories';
import { SlackSignatureGuard, SlackSignatureValidationService } from './infrastructure/security';
import { DeliveryDeduplicator, InMemorySessionStore } from './infrastructure/session';

@Module({
  controllers: [
    SlackEventsController,
    SlackInteractionsController,
    FeedbackQueryController,
    MetricsController,
  ],
  providers: [
    SlackSignatureGuard,
    SlackSignatureValidationService,
    HandleSlackEventUseCase,
    HandleSlackInteractionUseCase,
    FeedbackWorkflowService,
    SubmitFeedbackUseCase,
    ListFeedbackUseCase,
    InMemorySessionStore,
    DeliveryDeduplicator,
    SlackWebApiAdapter,
    PrometheusMetricsAdapter,
    PgPoolProvider,
    pgPoolFactory,
    PgFeedbackRepository,
    {
      provide: SESSION_STORE_PORT,
      useExisting: InMemorySessionStore,
    },
    {
      provide: EVENT_DEDUPLICATION_PORT,
      useExisting: DeliveryDeduplicator,
    },
    {
      provide: SLACK_API_PORT,
      useExisting: SlackWebApiAdapter,
    },
    {
      provide: METRICS_PORT,
      useExisting: PrometheusMetricsAdapter,
    },
    {
      provide: FEEDBACK_REPOSITORY_PORT,
      useExisting: PgFeedbackRepository,
    },
  ],
})
export class FeedbackModule {}
