// API Configuration
export const API_BASE_URL = 'https://api.strata.dev/';
export const API_TIMEOUT = 30000; // 30 seconds
export const MAX_RETRIES = 3;
export const RETRY_DELAY = 1000; // 1 second

export const SDK_VERSION = '0.1.0';

// Page size used by every manager's list()
export const DEFAULT_PAGE_LIMIT = 128;

// Logging
export const DEBUG = /^(true|1)$/i.test(process.env.STRATA_DEBUG ?? '');

// Draft States
export enum DraftState {
  OPEN = 'OPEN',
  CLOSED = 'CLOSED',
  COMMITTED = 'COMMITTED'
}
