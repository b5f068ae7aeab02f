/**
 * Raised when a signed delivery does not have the shape Slack documents for it.
 */
export class InvalidSlackPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSlackPayloadError';
  }
}
