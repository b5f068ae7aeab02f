import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { FeedbackRepositoryPort } from '../../ports/feedback-repository.port';
import { FEEDBACK_REPOSITORY_PORT } from '../../ports/tokens';
import type { FeedbackRecord } from '../../../domain/feedback-record';

const DEFAULT_QUERY_LIMIT = 100;
const MAX_QUERY_LIMIT = 500;

export interface ListFeedbackResponse {
  feedback: FeedbackRecord[];
}

@Injectable()
export class ListFeedbackUseCase {
  private readonly defaultLimit: number;

  constructor(
    @Inject(FEEDBACK_REPOSITORY_PORT)
    private readonly feedbackRepository: FeedbackRepositoryPort,
    configService: ConfigService,
  ) {
    this.defaultLimit = configService.get<number>('FEEDBACK_QUERY_LIMIT') ?? DEFAULT_QUERY_LIMIT;
  }

  async execute(input: { limit?: number }): Promise<ListFeedbackResponse> {
    const limit = Math.min(MAX_QUERY_LIMIT, Math.max(1, input.limit ?? this.defaultLimit));
    const feedback = await this.feedbackRepository.listFeedback({ limit });
    return { feedback };
  }
}
