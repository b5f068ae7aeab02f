export { FeedbackWorkflowService, type TriggerOutcome } from './feedback-workflow/feedback-workflow.service';
export {
  HandleSlackEventUseCase,
  type SlackEventResponse,
} from './handle-slack-event/handle-slack-event.use-case';
export { HandleSlackInteractionUseCase } from './handle-slack-interaction/handle-slack-interaction.use-case';
export { ListFeedbackUseCase, type ListFeedbackResponse } from './list-feedback/list-feedback.use-case';
export { SubmitFeedbackUseCase } from './submit-feedback/submit-feedback.use-case';
export { SILENT_ACK, type InteractionReply } from './shared';
