export const PG_POOL = Symbol('PG_POOL');
export const SLACK_API_PORT = Symbol('SLACK_API_PORT');
export const FEEDBACK_REPOSITORY_PORT = Symbol('FEEDBACK_REPOSITORY_PORT');
export const SESSION_STORE_PORT = Symbol('SESSION_STORE_PORT');
export const METRICS_PORT = Symbol('METRICS_PORT');
export const EVENT_DEDUPLICATION_PORT = Symbol('EVENT_DEDUPLICATION_PORT');
