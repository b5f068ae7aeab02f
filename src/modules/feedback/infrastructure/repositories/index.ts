export { PgFeedbackRepository } from './pg-feedback.repository';
export { PgPoolProvider, pgPoolFactory } from './pg-pool.provider';
