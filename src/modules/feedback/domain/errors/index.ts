export {
  ExternalServiceError,
  type ExternalServiceErrorContext,
  type ExternalServiceName,
} from './external-service.error';
export { InvalidSlackPayloadError } from './invalid-slack-payload.error';
