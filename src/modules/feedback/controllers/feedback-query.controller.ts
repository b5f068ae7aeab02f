import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { createLogger } from '../../../common/utils/logger';
import {
  ListFeedbackUseCase,
  type ListFeedbackResponse,
} from '../application/use-cases/list-feedback/list-feedback.use-case';
import { ListFeedbackQueryDto } from '../dto/list-feedback-query.dto';

@Controller('feedback')
export class FeedbackQueryController {
  private readonly logger = createLogger(FeedbackQueryController.name);

  constructor(private readonly listFeedback: ListFeedbackUseCase) {}

  @Get()
  @UseGuards(ThrottlerGuard)
  async list(@Query() query: ListFeedbackQueryDto): Promise<ListFeedbackResponse> {
    const response = await this.listFeedback.execute({ limit: query.limit });

    this.logger.http('feedback_listed', {
      event: 'feedback_listed',
      requested_limit: query.limit ?? null,
      returned: response.feedback.length,
    });

    return response;
  }
}
