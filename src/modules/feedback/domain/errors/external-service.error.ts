export type ExternalServiceName = 'slack' | 'persistence';

export interface ExternalServiceErrorContext {
  service: ExternalServiceName;
  operation: string;
}

/**
 * Thrown when a collaborator outside the process (Slack Web API, database) fails.
 * `errorCode` separates transport failures from an explicit error reported by the service.
 */
export class ExternalServiceError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: 'network' | 'timeout' | 'http' | 'api',
    public readonly context: ExternalServiceErrorContext,
    public readonly responseBody?: unknown,
  ) {
    super(message);
    this.name = 'ExternalServiceError';
  }
}
