export { SlackWebApiAdapter } from './slack-web-api.adapter';
export {
  SLACK_METHOD_CONVERSATIONS_INFO,
  SLACK_METHOD_POST_MESSAGE,
  SLACK_METHOD_UPDATE_MESSAGE,
  SLACK_METHOD_USERS_INFO,
} from './endpoints';
