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
import {
  HandleSlackEventUseCase,
  type SlackEventResponse,
} from '../application/use-cases/handle-slack-event/handle-slack-event.use-case';
import { InvalidSlackPayloadError } from '../domain/errors';
import { SlackSignatureGuard } from '../infrastructure/security/slack-signature.guard';

@Controller('slack')
export class SlackEventsController {
  private readonly logger = createLogger(SlackEventsController.name);

  constructor(private readonly handleSlackEvent: HandleSlackEventUseCase) {}

  @Post('events')
  @HttpCode(200)
  @UseGuards(SlackSignatureGuard)
  async receiveEvent(@Req() request: Request, @Body() body: unknown): Promise<SlackEventResponse> {
    try {
      return await this.handleSlackEvent.execute({
        body,
        requestId: request.requestId,
        retryNum: request.slackRetryNum,
      });
    } catch (error: unknown) {
      if (error instanceof InvalidSlackPayloadError) {
        this.logger.warn('slack_event_rejected', {
          event: 'slack_event_rejected',
          request_id: request.requestId,
          reason: error.message,
        });
        throw new BadRequestException(INVALID_PAYLOAD_MESSAGE);
      }

      throw error;
    }
  }
}
