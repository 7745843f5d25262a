import type { ScannerConfig } from '../scanner/ScannerConfig.js';
import { ScannerConfigDefaults } from '../scanner/ScannerConfig.js';
import { toError } from '../utils/text.js';
import { sleep } from '../utils/timers.js';

/**
 * Retry configuration
 */
export interface RetryConfig {
  maxRetries: number;
  delayMs: number;
}

/**
 * Get retry config from environment or config
 */
export function getRetryConfig(
  provider: string,
  config: Pick<ScannerConfig, 'retryMaxRetries' | 'retryDelayMs'>
): RetryConfig {
  const prefix = provider.toUpperCase().replace(/-/g, '_');

  const maxRetries =
    envInt(`${prefix}_RETRY_MAX_RETRIES`) ??
    config.retryMaxRetries ??
    ScannerConfigDefaults.DEFAULT_RETRY_MAX_RETRIES;

  const delayMs =
    envInt(`${prefix}_RETRY_DELAY_MS`) ??
    config.retryDelayMs ??
    ScannerConfigDefaults.DEFAULT_RETRY_DELAY_MS;

  return { maxRetries, delayMs };
}

function envInt(key: string): number | undefined {
  const value = process.env[key];
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Execute a function with retry logic and exponential backoff.
 * An aborted signal stops further attempts.
 */
export async function withRetry<T>(
  config: RetryConfig,
  fn: () => Promise<T>,
  onRetry?: (attempt: number, error: Error) => void,
  signal?: AbortSignal
): Promise<T> {
  let lastError: Error = new Error('No attempt made');
  const maxRetries = Math.max(0, config.maxRetries);

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn();
    } catch (error) {
      lastError = toError(error);

      if (attempt < maxRetries && !signal?.aborted) {
        onRetry?.(attempt + 1, lastError);
        await sleep(config.delayMs * Math.pow(2, attempt), signal);
      }
    }
  }

  throw lastError;
}
