export { hmacSha256Hex, secureEquals } from './crypto-helpers';
