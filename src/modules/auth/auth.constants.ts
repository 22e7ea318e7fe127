export const SESSION_COOKIE_NAME = 'sid';
export const SESSION_KEY_PREFIX = 'auth:session:';
export const DEFAULT_SESSION_TTL_SECONDS = 60 * 60 * 24 * 7;
