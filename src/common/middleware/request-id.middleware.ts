import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';

const REQUEST_ID_HEADER = 'x-request-id';
const SLACK_RETRY_NUM_HEADER = 'x-slack-retry-num';

/**
 * Tags every request with a request id (echoed back in the response) and records
 * Slack's retry counter when the platform is redelivering an event.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const headerValue = req.header(REQUEST_ID_HEADER);
  const requestId = headerValue && headerValue.trim().length > 0 ? headerValue.trim() : randomUUID();

  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  const retryHeader = req.header(SLACK_RETRY_NUM_HEADER);
  const retryNum = retryHeader ? Number.parseInt(retryHeader, 10) : Number.NaN;
  if (Number.isInteger(retryNum) && retryNum > 0) {
    req.slackRetryNum = retryNum;
  }

  next();
}
