import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import type { Request } from 'express';
import { INVALID_PAYLOAD_MESSAGE } from '../../../common/constants/error-messages.constants';
import { createLogger } from '../../../common/utils/logger';
import { HandleSlackInteractionUseCase } from '../application/use-cases/handle-slack-interaction/handle-slack-interaction.use-case';
import type { InteractionReply } from '../application/use-cases/shared';
import { InvalidSlackPayloadError } from '../domain/errors';
import { SlackSignatureGuard } from '../infrastructure/security/slack-signature.guard';

@Controller('slack')
export class SlackInteractionsController {
  private readonly logger = createLogger(SlackInteractionsController.name);

  constructor(private readonly handleSlackInteraction: HandleSlackInteractionUseCase) {}

  /**
   * Slack posts interactivity callbacks form-encoded, with the JSON document in `payload`.
   */
  @Post('interactions')
  @HttpCode(200)
  @UseGuards(SlackSignatureGuard)
  async receiveInteraction(
    @Req() request: Request,
    @Body('payload') rawPayload: unknown,
  ): Promise<InteractionReply> {
    const payload = this.parsePayload(request, rawPayload);

    try {
      return await this.handleSlackInteraction.execute({
        payload,
        requestId: request.requestId,
      });
    } catch (error: unknown) {
      if (error instanceof InvalidSlackPayloadError) {
        throw this.rejection(request, error.message);
      }

      throw error;
    }
  }

  private parsePayload(request: Request, rawPayload: unknown): unknown {
    if (typeof rawPayload !== 'string' || rawPayload.trim().length === 0) {
      throw this.rejection(request, 'missing payload field');
    }

    try {
      return JSON.parse(rawPayload);
    } catch {
      throw this.rejection(request, 'payload is not valid JSON');
    }
  }

  private rejection(request: Request, reason: string): BadRequestException {
    this.logger.warn('slack_interaction_rejected', {
      event: 'slack_interaction_rejected',
      request_id: request.requestId,
      reason,
    });
    return new BadRequestException(INVALID_PAYLOAD_MESSAGE);
  }
}
