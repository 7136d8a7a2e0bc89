import * as dotenv from 'dotenv';
import { API_BASE_URL, API_TIMEOUT, MAX_RETRIES, RETRY_DELAY } from './constants';
import { ConfigurationError } from './errors';
import { PlatformParams, StrataConfig } from './types';

function readNumber(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigurationError(`Invalid platform URL "${url}"`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`Platform URL must use http or https, got "${url}"`);
  }
  // Routes are joined relative to the base, so it must end with a slash.
  return parsed.href.endsWith('/') ? parsed.href : `${parsed.href}/`;
}

/**
 * Merge explicit parameters over the STRATA_* environment (a local .env file
 * is loaded first) and validate the result.
 */
export function resolveConfig(params: PlatformParams = {}): StrataConfig {
  dotenv.config();

  const accessKey = params.accessKey || process.env.STRATA_ACCESS_KEY || '';
  const owner = params.owner || process.env.STRATA_OWNER || '';

  if (!accessKey) {
    throw new ConfigurationError('Access key is required. Set STRATA_ACCESS_KEY environment variable or pass accessKey in config.');
  }
  if (!owner) {
    throw new ConfigurationError('Owner is required. Set STRATA_OWNER environment variable or pass owner in config.');
  }

  return {
    accessKey,
    owner,
    url: normalizeUrl(params.url || process.env.STRATA_URL || API_BASE_URL),
    timeout: params.timeout ?? readNumber('STRATA_TIMEOUT', process.env.STRATA_TIMEOUT, API_TIMEOUT),
    maxRetries: params.maxRetries ?? readNumber('STRATA_MAX_RETRIES', process.env.STRATA_MAX_RETRIES, MAX_RETRIES),
    retryDelay: params.retryDelay ?? RETRY_DELAY,
  };
}
