import axios from 'axios';
import { RetryPolicy } from '../../config/audit.config';
import { toError } from '../base/errors';

/**
 * Result of a single HTTP attempt, as seen by the retry state machine
 */
export type AttemptOutcome =
  | { kind: 'success' }
  | { kind: 'transient'; error: Error; status?: number }
  | { kind: 'rate-limited'; error: Error; retryAfterSeconds?: number }
  | { kind: 'fatal'; error: Error; status?: number };

export type RetryReason = 'transient' | 'rate-limited';

/**
 * attempting(n) -> succeeded | waiting(n) -> attempting(n + 1) | failed(n)
 * Attempts are 1-based.
 */
export type FetchAttemptState =
  | { kind: 'attempting'; attempt: number }
  | { kind: 'waiting'; attempt: number; delayMs: number; reason: RetryReason; error: Error }
  | { kind: 'succeeded'; attempt: number }
  | {
      kind: 'failed';
      attempt: number;
      error: Error;
      status?: number;
      exhausted: boolean;
      rateLimited: boolean;
    };

export const initialAttemptState: FetchAttemptState = { kind: 'attempting', attempt: 1 };

/**
 * Delay before the retry that follows a failed attempt
 */
export function backoffDelayMs(
  policy: RetryPolicy,
  attempt: number,
  reason: RetryReason,
  retryAfterSeconds?: number
): number {
  const retryIndex = Math.max(0, attempt - 1);
  if (reason === 'rate-limited') {
    const base = retryAfterSeconds ?? policy.rateLimitDefaultSeconds;
    return base * Math.pow(2, retryIndex) * 1000;
  }
  return (Math.pow(policy.transientBaseSeconds, retryIndex) + policy.transientOffsetSeconds) * 1000;
}

export function nextAttemptState(
  policy: RetryPolicy,
  attempt: number,
  outcome: AttemptOutcome
): FetchAttemptState {
  switch (outcome.kind) {
    case 'success':
      return { kind: 'succeeded', attempt };

    case 'fatal':
      return {
        kind: 'failed',
        attempt,
        error: outcome.error,
        status: outcome.status,
        exhausted: false,
        rateLimited: false
      };

    case 'transient':
    case 'rate-limited': {
      const rateLimited = outcome.kind === 'rate-limited';
      if (attempt >= policy.maxAttempts) {
        return {
          kind: 'failed',
          attempt,
          error: outcome.error,
          status: outcome.kind === 'rate-limited' ? 429 : outcome.status,
          exhausted: true,
          rateLimited
        };
      }
      const delayMs = backoffDelayMs(
        policy,
        attempt,
        outcome.kind,
        outcome.kind === 'rate-limited' ? outcome.retryAfterSeconds : undefined
      );
      return { kind: 'waiting', attempt, delayMs, reason: outcome.kind, error: outcome.error };
    }
  }
}

export function resumeAfterWait(state: Extract<FetchAttemptState, { kind: 'waiting' }>): FetchAttemptState {
  return { kind: 'attempting', attempt: state.attempt + 1 };
}

/**
 * Retry-After is either delta-seconds or an HTTP-date
 */
export function parseRetryAfter(value: unknown, now: Date = new Date()): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, Math.ceil((date - now.getTime()) / 1000));
}

/**
 * Case-insensitive header lookup over plain objects and AxiosHeaders alike
 */
export function getHeaderValue(headers: unknown, name: string): unknown {
  if (!headers || typeof headers !== 'object') {
    return undefined;
  }
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

/**
 * Map a thrown request error onto the retry taxonomy
 */
export function classifyFailure(error: unknown, now: Date = new Date()): AttemptOutcome {
  const err = toError(error);

  if (!axios.isAxiosError(error)) {
    return { kind: 'fatal', error: err };
  }

  const response = error.response;
  if (!response) {
    // Network failure or timeout
    return { kind: 'transient', error: err };
  }

  const status = response.status;
  if (status === 429) {
    return {
      kind: 'rate-limited',
      error: err,
      retryAfterSeconds: parseRetryAfter(getHeaderValue(response.headers, 'Retry-After'), now)
    };
  }
  if (status === 408 || status >= 500) {
    return { kind: 'transient', error: err, status };
  }
  return { kind: 'fatal', error: err, status };
}
