export const SERVICE_NAME = 'spoke-ledger';

export const DEFAULT_PORT = 9100;
export const DEFAULT_HEALTH_CHECK_INTERVAL = 30_000; // 30 seconds
export const DEFAULT_LOG_LEVEL = 'info';

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

export const SERVICE_ERROR_CODES = {
  INVALID_REQUEST: 'InvalidRequest',
  INVALID_API_KEY: 'InvalidApiKey',
  INTERNAL_ERROR: 'InternalError',
} as const;
