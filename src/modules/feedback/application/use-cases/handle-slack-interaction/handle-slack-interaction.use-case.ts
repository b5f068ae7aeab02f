import { Inject, Injectable } from '@nestjs/common';
import { createLogger } from '../../../../../common/utils/logger';
import type { MetricsPort } from '../../ports/metrics.port';
import { METRICS_PORT } from '../../ports/tokens';
import { parseSlackInteraction } from '../../../domain/slack-events';
import { FeedbackWorkflowService } from '../feedback-workflow/feedback-workflow.service';
import { SILENT_ACK, type InteractionReply } from '../shared';

@Injectable()
export class HandleSlackInteractionUseCase {
  private readonly logger = createLogger(HandleSlackInteractionUseCase.name);

  constructor(
    private readonly workflow: FeedbackWorkflowService,
    @Inject(METRICS_PORT)
    private readonly metricsPort: MetricsPort,
  ) {}

  async execute(input: { payload: unknown; requestId?: string }): Promise<InteractionReply> {
    const interaction = parseSlackInteraction(input.payload);

    if (interaction.kind === 'ignored') {
      this.metricsPort.incrementWebhookDelivery('ignored');
      this.logger.slack('slack_interaction_ignored', {
        event: 'slack_interaction_ignored',
        reason: interaction.reason,
        request_id: input.requestId,
      });
      return SILENT_ACK;
    }

    this.metricsPort.incrementWebhookDelivery('action');
    this.logger.slack('slack_action_received', {
      event: 'slack_action_received',
      action: interaction.action.type,
      channel_id: interaction.channelId,
      thread_ts: interaction.threadTs,
      request_id: input.requestId,
    });

    return this.workflow.onAction(interaction);
  }
}
