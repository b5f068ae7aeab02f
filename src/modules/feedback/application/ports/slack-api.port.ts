import type { SlackBlock } from '../../domain/slack-blocks';

export interface PostMessageInput {
  channel: string;
  threadTs?: string;
  text: string;
  blocks?: SlackBlock[];
}

export interface UpdateMessageInput {
  channel: string;
  ts: string;
  text: string;
  blocks?: SlackBlock[];
}

export interface PostedMessage {
  channel: string;
  ts: string;
}

/**
 * Outbound calls to the Slack Web API. Implementations throw ExternalServiceError on failure.
 */
export interface SlackApiPort {
  postMessage(input: PostMessageInput): Promise<PostedMessage>;
  updateMessage(input: UpdateMessageInput): Promise<void>;
  getUserDisplayName(userId: string): Promise<string>;
  getChannelName(channelId: string): Promise<string>;
}
