import pRetry, { AbortError } from "p-retry";
import { logger } from "./cliHelper";

/**
 * General utility functions for the role tracker.
 * This module provides common helper functions used across the application.
 *
 * @module helpers
 */

export const MAX_RETRIES = 5;
export const RETRY_DELAY = 30000; // 30 seconds

export const time = {
  milliseconds: {
    second: 1000
  }
}

/**
 * Creates a promise that resolves after a specified delay.
 * Used to pace calls against upstream rate limits.
 *
 * @param ms - The number of milliseconds to delay
 * @returns A promise that resolves after the specified delay
 */
export const delay = (ms: number): Promise<void> => {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Type guard to check if value is a non-empty string
 * @param value - Value to check
 * @returns True if value is a non-empty string
 */
export const isNonEmptyString = (value: unknown): value is string => {
  return typeof value === 'string' && value.length > 0;
};

/**
 * Type guard for plain JSON objects
 */
export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
};

export interface RetryOptions {
  /** Total number of attempts, including the first one */
  attempts?: number;
  /** Fixed delay between attempts */
  delayMs?: number;
  /** Label used in log lines */
  label?: string;
  /** No further attempt is made once this is aborted */
  signal?: AbortSignal;
  /** Failures for which this returns false are rethrown at once */
  retryable?: (error: Error) => boolean;
}

/**
 * Runs an operation until it succeeds or the attempt ceiling is reached.
 * The delay between attempts is fixed; the last error is rethrown.
 *
 * @param operation - Function to call until succesful
 * @returns A promise that is the operation response sent in
 */
export const retryOperation = async <T>(
  operation: () => Promise<T>,
  {
    attempts = MAX_RETRIES,
    delayMs = RETRY_DELAY,
    label = 'Operation',
    signal,
    retryable = () => true
  }: RetryOptions = {}
): Promise<T> => {
  return pRetry(async () => {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof Error && (signal?.aborted || !retryable(error))) {
        // p-retry rejects with the wrapped error and stops
        throw new AbortError(error);
      }
      throw error;
    }
  }, {
    retries: Math.max(attempts - 1, 0),
    factor: 1,
    minTimeout: delayMs,
    maxTimeout: delayMs,
    randomize: false,
    onFailedAttempt: (error) => {
      if (error.retriesLeft > 0) {
        logger.warning(`${label} failed, retrying (${error.attemptNumber}/${attempts}) in ${delayMs}ms... ${error.message}`);
      }
    }
  });
}
