import { Inject, Injectable, Optional, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { INVALID_SIGNATURE_MESSAGE } from '../../../../common/constants/error-messages.constants';
import { createLogger } from '../../../../common/utils/logger';
import type { MetricsPort } from '../../application/ports/metrics.port';
import { METRICS_PORT } from '../../application/ports/tokens';
import {
  DEFAULT_SLACK_SIGNATURE_MAX_AGE_SECONDS,
  evaluateSlackSignature,
} from './verify-slack-signature';

export const SLACK_SIGNATURE_HEADER = 'x-slack-signature';
export const SLACK_TIMESTAMP_HEADER = 'x-slack-request-timestamp';

type Clock = () => number;

export interface SlackSignatureValidationResult {
  verified: true;
  timestamp: string;
}

@Injectable()
export class SlackSignatureValidationService {
  private readonly logger = createLogger(SlackSignatureValidationService.name);

  constructor(
    private readonly configService: ConfigService,
    @Inject(METRICS_PORT) private readonly metrics: MetricsPort,
    @Optional() private readonly clock: Clock = Date.now,
  ) {}

  validateRequest(request: Request): SlackSignatureValidationResult {
    const signingSecret = String(this.configService.get<string>('SLACK_SIGNING_SECRET') ?? '').trim();
    if (signingSecret.length === 0) {
      this.logger.security('slack_signature_secret_missing', {
        event: 'slack_signature_secret_missing',
        path: request.path,
      });
      throw new UnauthorizedException(INVALID_SIGNATURE_MESSAGE);
    }

    const signature = request.header(SLACK_SIGNATURE_HEADER);
    const timestamp = request.header(SLACK_TIMESTAMP_HEADER);

    const verdict = evaluateSlackSignature({
      rawBody: typeof request.rawBody === 'string' ? request.rawBody : '',
      signature,
      timestamp,
      signingSecret,
      nowSeconds: Math.floor(this.clock() / 1000),
      maxAgeSeconds:
        this.configService.get<number>('SLACK_SIGNATURE_MAX_AGE_SECONDS') ??
        DEFAULT_SLACK_SIGNATURE_MAX_AGE_SECONDS,
    });

    if (!verdict.valid) {
      this.metrics.incrementSignatureRejected(verdict.reason);
      this.logger.security('slack_signature_rejected', {
        event: 'slack_signature_rejected',
        reason: verdict.reason,
        path: request.path,
        request_id: request.requestId,
        retry_num: request.slackRetryNum ?? null,
      });
      throw new UnauthorizedException(INVALID_SIGNATURE_MESSAGE);
    }

    return { verified: true, timestamp: timestamp?.trim() ?? '' };
  }
}
