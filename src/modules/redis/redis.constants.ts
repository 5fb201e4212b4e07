/**
 * Redis injection token
 */
export const REDIS_CLIENT = 'REDIS_CLIENT';

export const DEFAULT_REDIS_URL = 'redis://localhost:6379';
export const DEFAULT_COMMAND_TIMEOUT_MS = 2000;
