import type pino from 'pino';
import { LlmError } from '@scholar/shared/src/utils/errors.js';

const MAX_TRANSIENT_RETRIES = 3;
const BASE_DELAY_MS = 1000;

const TRANSIENT_PATTERNS = [
  '429',
  'rate limit',
  'too many requests',
  '500',
  '502',
  '503',
  'internal server error',
  'bad gateway',
  'service unavailable',
  'econnreset',
  'etimedout',
  'timeout',
  'network',
  'socket hang up',
  'econnrefused',
];

function readStatusCode(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode = readStatusCode(error);
  if (statusCode !== undefined && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((pattern) => message.includes(pattern));
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function computeBackoffMs(attempt: number, baseDelayMs = BASE_DELAY_MS): number {
  const exponential = baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * baseDelayMs;
  return exponential + jitter;
}

export interface RetryOptions {
  readonly operationName: string;
  readonly log: pino.Logger;
  readonly maxRetries?: number;
  readonly baseDelayMs?: number;
}

/**
 * Runs `operation`, retrying transient provider failures with exponential
 * backoff. Permanent failures and exhausted retries surface as LlmError.
 */
export async function retryOnTransientError<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { operationName, log, maxRetries = MAX_TRANSIENT_RETRIES, baseDelayMs = BASE_DELAY_MS } =
    options;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isTransientError(error)) {
        throw new LlmError(`${operationName} failed: ${lastError.message}`, false, lastError);
      }

      log.warn(
        { attempt: attempt + 1, maxRetries, error: lastError.message },
        `Transient error in ${operationName}, retrying`,
      );

      if (attempt < maxRetries - 1) {
        await sleep(computeBackoffMs(attempt, baseDelayMs));
      }
    }
  }

  throw new LlmError(
    `${operationName} failed after ${String(maxRetries)} retries: ${lastError?.message ?? 'unknown error'}`,
    true,
    lastError,
  );
}
