import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Fetching
  CONCURRENT_REQUESTS: parseInt(process.env.CONCURRENT_REQUESTS || '10', 10),
  REQUESTS_PER_SECOND: parseInt(process.env.REQUESTS_PER_SECOND || '5', 10),
  CONNECTION_TIMEOUT: parseInt(process.env.CONNECTION_TIMEOUT || '30000', 10), // 30s per request
  USER_AGENT: process.env.USER_AGENT || 'Mozilla/5.0 (compatible; GovSiteMapper/1.0)',
  REQUEST_JITTER_MAX: parseInt(process.env.REQUEST_JITTER_MAX || '500', 10),

  // Resilience
  MAX_RETRIES: parseInt(process.env.MAX_RETRIES || '3', 10),
  RETRY_BACKOFF_BASE: parseInt(process.env.RETRY_BACKOFF_BASE || '1000', 10), // 2^attempt * base
  RATE_LIMITED_BACKOFF: parseInt(process.env.RATE_LIMITED_BACKOFF || '5000', 10), // wait after a 429
  RATE_LIMITED_BACKOFF_STEP: parseInt(process.env.RATE_LIMITED_BACKOFF_STEP || '2000', 10), // added per retry

  // Mapping
  TEST_MODE_PAGE_LIMIT: parseInt(process.env.TEST_MODE_PAGE_LIMIT || '30', 10),
  MAX_LINK_DEPTH: parseInt(process.env.MAX_LINK_DEPTH || '10', 10),
  GOV_DOMAIN_SUFFIXES: (process.env.GOV_DOMAIN_SUFFIXES || '.df.gov.br')
    .split(',')
    .map((suffix) => suffix.trim())
    .filter((suffix) => suffix.length > 0),
  ROOT_LABEL: process.env.ROOT_LABEL || 'Raiz',

  // Export
  OUTPUT_DIR: process.env.OUTPUT_DIR || 'output',
  CSV_FORMULA_SEPARATOR: process.env.CSV_FORMULA_SEPARATOR || ';',
} as const;

export default env;
