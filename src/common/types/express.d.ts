import 'express';

declare module 'express-serve-static-core' {
  interface Request {
    rawBody?: string;
    requestId?: string;
    slackRetryNum?: number;
    slackSignature?: {
      verified: true;
      timestamp: string;
    };
  }
}
