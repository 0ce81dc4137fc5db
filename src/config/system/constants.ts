export const SERVICE_NAME = 'Citeline API';
export const SERVICE_VERSION = '0.1.0';

export const RATE_LIMIT_ALLOWLIST = ['127.0.0.1'];

export const SEARCH_ROUTE_RATE_LIMIT = { max: 30, timeWindow: '1 minute' };

export const HEALTH_CHECK_TIMEOUT_MS = 2_000;

export const SEARCH_LOG_MEMORY_SIZE = 200;
