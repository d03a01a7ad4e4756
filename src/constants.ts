/**
 * Application constants
 */

export const SERVER_NAME = 'care-mcp-server';
export const SERVER_VERSION = '0.1.0';

export const TIME = {
  MS_PER_SECOND: 1000,
  MS_PER_MINUTE: 60000,
} as const;

/**
 * Per-call network timeouts. Each network call applies its own limit.
 */
export const TIMEOUTS = {
  SCHEMA_FETCH_MS: 30000,
  AUTH_MS: 30000,
  TOOL_CALL_MS: 60000,
} as const;

export const HTTP_STATUS = {
  OK: 200,
  MULTIPLE_CHOICES: 300,
} as const;

/**
 * HTTP methods that become tools, in enumeration order
 */
export const TOOL_METHODS = ['get', 'post', 'put', 'patch', 'delete'] as const;

/**
 * Methods that carry a JSON request body
 */
export const BODY_METHODS: ReadonlySet<string> = new Set(['POST', 'PUT', 'PATCH']);

/**
 * Longest response body excerpt placed in a failure envelope
 */
export const ERROR_DETAIL_MAX_LENGTH = 500;

export const CARE_API_PATHS = {
  SCHEMA: '/api/schema/',
  LOGIN: '/api/v1/auth/login',
  TOKEN_REFRESH: '/api/v1/auth/token/refresh',
} as const;

export const DEFAULT_BASE_URL = 'https://careapi.ohc.network';

/**
 * Token is renewed this long before its reported expiry
 */
export const TOKEN_EXPIRY_SKEW_MS = 5 * TIME.MS_PER_MINUTE;

export const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;
