export const SLACK_METHOD_POST_MESSAGE = 'chat.postMessage';
export const SLACK_METHOD_UPDATE_MESSAGE = 'chat.update';
export const SLACK_METHOD_USERS_INFO = 'users.info';
export const SLACK_METHOD_CONVERSATIONS_INFO = 'conversations.info';
