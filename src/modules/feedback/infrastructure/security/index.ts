export { SlackSignatureGuard } from './slack-signature.guard';
export {
  SLACK_SIGNATURE_HEADER,
  SLACK_TIMESTAMP_HEADER,
  SlackSignatureValidationService,
} from './slack-signature-validation.service';
export {
  computeSlackSignature,
  evaluateSlackSignature,
  verifySlackSignature,
} from './verify-slack-signature';
export type { SlackSignatureInput, SlackSignatureVerdict } from './verify-slack-signature';
