/**
 * Application Constants
 */

export const DEFAULT_VALUES = {
  PORT: 8000,
  HOST: '0.0.0.0',
  ENVIRONMENT: 'development',
  LOG_LEVEL: 'info',
  RPC_URL: 'https://api.mainnet-beta.solana.com',
  RPC_TIMEOUT: 10000,
  PERFORMANCE_SAMPLE_COUNT: 30,
  BLOCK_HEIGHT_DELAY_MS: 50,
  CORS_ORIGIN: '*',
} as const;

export const LAMPORTS_PER_SOL = 1_000_000_000;

// System Program: busiest account on the chain, used to sample recent traffic
export const SYSTEM_PROGRAM_ADDRESS = '11111111111111111111111111111111';

export const FEED_LIMITS = {
  MIN: 1,
  MAX: 20,
  DEFAULT: 10,
} as const;

export const SEARCH_LIMITS = {
  QUERY_MIN_LENGTH: 2,
  SIGNATURE_MIN_LENGTH: 80,
  SIGNATURE_MAX_LENGTH: 100,
  ADDRESS_SIGNATURE_COUNT: 5,
} as const;

export const MAX_PERFORMANCE_SAMPLES = 720;

export const TRANSACTION_FETCH_OPTIONS = {
  encoding: 'json',
  maxSupportedTransactionVersion: 0,
} as const;

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
} as const;
