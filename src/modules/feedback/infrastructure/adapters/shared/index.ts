export { fetchWithTimeout, parseJsonResponse } from './http-client';
