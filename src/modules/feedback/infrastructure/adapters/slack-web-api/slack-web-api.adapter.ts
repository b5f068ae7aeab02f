import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isRecord, readRecord } from '../../../../../common/utils/object.utils';
import { createLogger } from '../../../../../common/utils/logger';
import {
  firstNonEmptyString,
  resolveOptionalString,
} from '../../../../../common/utils/string.utils';
import type {
  PostedMessage,
  PostMessageInput,
  SlackApiPort,
  UpdateMessageInput,
} from '../../../application/ports/slack-api.port';
import { ExternalServiceError } from '../../../domain/errors';
import { fetchWithTimeout, parseJsonResponse } from '../shared';
import {
  SLACK_METHOD_CONVERSATIONS_INFO,
  SLACK_METHOD_POST_MESSAGE,
  SLACK_METHOD_UPDATE_MESSAGE,
  SLACK_METHOD_USERS_INFO,
} from './endpoints';

const DEFAULT_BASE_URL = 'https://slack.com/api';
const DEFAULT_TIMEOUT_MS = 5000;

type SlackCall =
  | { httpMethod: 'GET'; query: Record<string, string> }
  | { httpMethod: 'POST'; body: Record<string, unknown> };

@Injectable()
export class SlackWebApiAdapter implements SlackApiPort {
  private readonly logger = createLogger(SlackWebApiAdapter.name);
  private readonly baseUrl: string;
  private readonly botToken: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = (
      this.configService.get<string>('SLACK_API_BASE_URL') ?? DEFAULT_BASE_URL
    ).replace(/\/+$/, '');
    this.botToken = String(this.configService.get<string>('SLACK_BOT_TOKEN') ?? '').trim();
    this.timeoutMs = this.configService.get<number>('SLACK_API_TIMEOUT_MS') ?? DEFAULT_TIMEOUT_MS;
  }

  async postMessage(input: PostMessageInput): Promise<PostedMessage> {
    const body = await this.call(SLACK_METHOD_POST_MESSAGE, {
      httpMethod: 'POST',
      body: {
        channel: input.channel,
        text: input.text,
        ...(input.threadTs ? { thread_ts: input.threadTs } : {}),
        ...(input.blocks ? { blocks: input.blocks } : {}),
      },
    });

    const ts = resolveOptionalString(body.ts);
    if (!ts) {
      throw new ExternalServiceError(
        `Slack ${SLACK_METHOD_POST_MESSAGE} returned no message ts`,
        200,
        'api',
        { service: 'slack', operation: SLACK_METHOD_POST_MESSAGE },
        body,
      );
    }

    return {
      channel: resolveOptionalString(body.channel) ?? input.channel,
      ts,
    };
  }

  async updateMessage(input: UpdateMessageInput): Promise<void> {
    await this.call(SLACK_METHOD_UPDATE_MESSAGE, {
      httpMethod: 'POST',
      body: {
        channel: input.channel,
        ts: input.ts,
        text: input.text,
        blocks: input.blocks ?? [],
      },
    });
  }

  async getUserDisplayName(userId: string): Promise<string> {
    const body = await this.call(SLACK_METHOD_USERS_INFO, {
      httpMethod: 'GET',
      query: { user: userId },
    });

    const user = readRecord(body, 'user') ?? {};
    const profile = readRecord(user, 'profile') ?? {};

    return (
      firstNonEmptyString(profile.display_name, profile.real_name, user.real_name, user.name) ??
      userId
    );
  }

  async getChannelName(channelId: string): Promise<string> {
    const body = await this.call(SLACK_METHOD_CONVERSATIONS_INFO, {
      httpMethod: 'GET',
      query: { channel: channelId },
    });

    const channel = readRecord(body, 'channel') ?? {};
    return resolveOptionalString(channel.name) ?? channelId;
  }

  private async call(method: string, request: SlackCall): Promise<Record<string, unknown>> {
    const context = { service: 'slack' as const, operation: method };
    const startedAt = Date.now();
    const url =
      request.httpMethod === 'GET'
        ? `${this.baseUrl}/${method}?${new URLSearchParams(request.query).toString()}`
        : `${this.baseUrl}/${method}`;

    let response: Response;
    try {
      response = await fetchWithTimeout(
        url,
        request.httpMethod === 'GET'
          ? {
              method: 'GET',
              headers: { Authorization: `Bearer ${this.botToken}` },
            }
          : {
              method: 'POST',
              headers: {
                Authorization: `Bearer ${this.botToken}`,
                'Content-Type': 'application/json; charset=utf-8',
              },
              body: JSON.stringify(request.body),
            },
        this.timeoutMs,
      );
    } catch (error: unknown) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ExternalServiceError(`Slack ${method} timeout`, 0, 'timeout', context);
      }

      throw new ExternalServiceError(`Slack ${method} network error`, 0, 'network', context);
    }

    const body = await parseJsonResponse(response);

    if (!response.ok) {
      throw new ExternalServiceError(
        `Slack ${method} HTTP ${response.status}`,
        response.status,
        'http',
        context,
        body,
      );
    }

    if (!isRecord(body) || body.ok !== true) {
      const slackError = isRecord(body) ? resolveOptionalString(body.error) : undefined;
      throw new ExternalServiceError(
        `Slack ${method} failed: ${slackError ?? 'unknown_error'}`,
        response.status,
        'api',
        context,
        body,
      );
    }

    this.logger.performance(`slack ${method}`, startedAt, { method });
    return body;
  }
}
