import pRetry from "p-retry";
import { AgentRuntimeError, type ErrorKind } from "./errors.js";

export interface RetryOptions {
  /** Attempts after the first one; 0 runs `fn` once with no retry wrapper */
  maxRetries?: number;
  /** First backoff delay in ms, doubled per attempt (default: 500) */
  baseDelayMs?: number;
  /** Backoff ceiling in ms (default: 5000) */
  maxDelayMs?: number;
  /** Called before each retry with the error that caused it */
  onRetry?: (error: Error, attempt: number) => void;
}

// Retrying these cannot change the outcome.
const PERMANENT_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  "UNKNOWN_TOOL",
  "INVALID_ARGUMENTS",
  "DUPLICATE_TOOL_NAME",
  "INVALID_TOOL_SPEC",
  "UNKNOWN_AGENT_KIND",
  "CONFIG_INVALID",
]);

/**
 * Transient unless it is a runtime error of a permanent kind.
 */
export function isRetryable(error: unknown): boolean {
  return !(error instanceof AgentRuntimeError && PERMANENT_KINDS.has(error.kind));
}

/**
 * Run `fn` with exponential backoff. The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? 0;
  if (maxRetries <= 0) {
    return fn();
  }

  return pRetry(fn, {
    retries: maxRetries,
    minTimeout: options.baseDelayMs ?? 500,
    maxTimeout: options.maxDelayMs ?? 5_000,
    factor: 2,
    randomize: true,
    shouldRetry: (error) => isRetryable(error),
    onFailedAttempt: (error) => {
      if (error.retriesLeft > 0 && isRetryable(error)) {
        options.onRetry?.(error, error.attemptNumber);
      }
    },
  });
}
