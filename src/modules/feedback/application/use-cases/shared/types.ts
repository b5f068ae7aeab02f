/**
 * Body returned to Slack for an interactivity callback. An empty object acknowledges
 * silently; `text` carries a message meant for the user who clicked.
 */
export interface InteractionReply {
  text?: string;
}

export const SILENT_ACK: InteractionReply = Object.freeze({});
