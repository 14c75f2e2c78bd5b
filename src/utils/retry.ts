import type { Logger } from '../logger.js';
import { errMsg } from './error.js';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 2). Total attempts = maxRetries + 1. */
  maxRetries?: number;
  /** Delay between attempts in ms (default: 0). */
  delayMs?: number;
  /** Logger instance for retry/error messages. */
  log: Logger;
  /** Label for log messages (e.g. 'connect', 'status query'). */
  label: string;
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (err: unknown) => boolean;
}

/**
 * Execute an async function with retries. Rethrows the last error once
 * every attempt has failed.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const maxRetries = opts.maxRetries ?? 2;
  const delayMs = opts.delayMs ?? 0;

  for (let attempt = 0; ; attempt++) {
    if (attempt > 0) {
      opts.log.info(`Retrying ${opts.label} (${attempt}/${maxRetries})...`);
    }

    try {
      return await fn();
    } catch (err) {
      opts.log.error(`${opts.label} failed: ${errMsg(err)}`);
      if (attempt >= maxRetries || (opts.shouldRetry && !opts.shouldRetry(err))) throw err;
    }

    if (delayMs > 0) await new Promise((r) => setTimeout(r, delayMs));
  }
}
