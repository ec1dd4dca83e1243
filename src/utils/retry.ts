/**
 * Retry utility for handling transient failures
 */

import logger from './logger.js';
import { getErrorCode, getErrorMessage } from './error-helper.js';
import { TimeoutError, isTransportError } from '../errors/streamer-errors.js';

export interface RetryOptions {
  /** Maximum number of retry attempts (not including the initial attempt) */
  maxAttempts?: number;
  /** Initial delay between retries in milliseconds */
  initialDelay?: number;
  /** Maximum delay between retries in milliseconds */
  maxDelay?: number;
  /** Exponential backoff factor (e.g., 2 = double the delay each time) */
  backoffFactor?: number;
  /** Optional timeout for each attempt in milliseconds */
  timeout?: number;
  /** Function to determine if an error is retryable */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each retry attempt */
  onRetry?: (error: unknown, attempt: number) => void;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'timeout' | 'onRetry'>> = {
  maxAttempts: 3,
  initialDelay: 100,
  maxDelay: 5000,
  backoffFactor: 2,
  isRetryable
};

const RETRYABLE_SOCKET_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENETUNREACH', 'EHOSTUNREACH', 'EPIPE'];

/**
 * Network-level failures can succeed on a later attempt; device faults and
 * unreadable responses cannot.
 */
export function isRetryable(error: unknown): boolean {
  if (isTransportError(error)) {
    return error.retryable;
  }

  if (error instanceof TimeoutError) {
    return true;
  }

  const code = getErrorCode(error);
  if (code && RETRYABLE_SOCKET_CODES.includes(code)) {
    return true;
  }

  return getErrorMessage(error).toLowerCase().includes('socket hang up');
}

/**
 * Delay before retry number `attempt` (1-based)
 */
export function backoffDelay(attempt: number, initialDelay: number, maxDelay: number, backoffFactor = 2): number {
  return Math.min(initialDelay * Math.pow(backoffFactor, Math.max(0, attempt - 1)), maxDelay);
}

/**
 * Sleep for the specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function with timeout
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Execute an async function with retry logic
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions,
  operation = 'operation'
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxAttempts; attempt++) {
    try {
      if (opts.timeout) {
        return await withTimeout(fn, opts.timeout, operation);
      } else {
        return await fn();
      }
    } catch (error) {
      lastError = error;

      if (attempt === opts.maxAttempts || !opts.isRetryable(error)) {
        throw error;
      }

      logger.debug(
        `Retry attempt ${attempt + 1}/${opts.maxAttempts} for ${operation} after error:`,
        getErrorMessage(error)
      );

      if (opts.onRetry) {
        opts.onRetry(error, attempt + 1);
      }

      await sleep(backoffDelay(attempt + 1, opts.initialDelay, opts.maxDelay, opts.backoffFactor));
    }
  }

  // Unreachable: the last attempt either returns or throws
  throw lastError;
}

/**
 * Retry options for fetching device and service descriptions
 */
export const DESCRIPTION_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 250,
  maxDelay: 2000,
  backoffFactor: 2
};
