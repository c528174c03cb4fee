/**
 * Retrieval Policy
 *
 * Pure transition function of the pagination loop. Given the session state
 * and the outcome of one page attempt it returns the next state and the
 * action the controller must take. No I/O happens here.
 */

import { uniformDelay } from '../utils/delay.js';
import type { StopReason } from '../types/index.js';
import type { PageFetchError } from '../utils/errors.js';
import type { PageResult } from './types.js';

export interface RetrievalState {
  /** Next page to fetch, 1-based */
  page: number;
  consecutiveFailures: number;
  /** Captured from the first page only */
  totalCount: number | null;
  requestsIssued: number;
  pagesFetched: number;
}

export type RetrievalAction =
  | { type: 'sleep'; durationMs: number }
  | { type: 'continue' }
  | { type: 'stop'; reason: StopReason };

export interface RetrievalPolicy {
  maxPages?: number;
  maxConsecutiveFailures: number;
  minDelayMs: number;
  maxDelayMs: number;
  httpErrorDelayMs: number;
  connectionErrorDelayMs: number;
  timeoutDelayMs: number;
  requestErrorDelayMs: number;
  random: () => number;
}

export interface Transition {
  state: RetrievalState;
  action: RetrievalAction;
}

export function initialState(): RetrievalState {
  return {
    page: 1,
    consecutiveFailures: 0,
    totalCount: null,
    requestsIssued: 0,
    pagesFetched: 0,
  };
}

/**
 * Page ceiling check, made before each request
 */
export function exceedsPageLimit(state: RetrievalState, policy: RetrievalPolicy): boolean {
  return policy.maxPages !== undefined && state.page > policy.maxPages;
}

function sleepOrContinue(durationMs: number): RetrievalAction {
  return durationMs > 0 ? { type: 'sleep', durationMs } : { type: 'continue' };
}

function countFailure(state: RetrievalState, policy: RetrievalPolicy, delayMs: number): Transition {
  const next = { ...state, consecutiveFailures: state.consecutiveFailures + 1 };

  if (next.consecutiveFailures >= policy.maxConsecutiveFailures) {
    return { state: next, action: { type: 'stop', reason: 'too-many-failures' } };
  }

  return { state: next, action: sleepOrContinue(delayMs) };
}

function onFailure(state: RetrievalState, error: PageFetchError, policy: RetrievalPolicy): Transition {
  switch (error.code) {
    case 'HTTP_ERROR':
      return countFailure(state, policy, policy.httpErrorDelayMs);
    case 'REQUEST_ERROR':
      return countFailure(state, policy, policy.requestErrorDelayMs);
    case 'CONNECTION_ERROR':
      return { state, action: sleepOrContinue(policy.connectionErrorDelayMs) };
    case 'TIMEOUT':
      return { state, action: sleepOrContinue(policy.timeoutDelayMs) };
    case 'MALFORMED_RESPONSE':
      return { state, action: { type: 'stop', reason: 'malformed-response' } };
    case 'DECODE_ERROR':
      return { state, action: { type: 'stop', reason: 'decode-error' } };
  }
}

function onPage(state: RetrievalState, items: unknown[], totalCount: number, policy: RetrievalPolicy): Transition {
  const fetched: RetrievalState = {
    ...state,
    consecutiveFailures: 0,
    pagesFetched: state.pagesFetched + 1,
    totalCount: state.totalCount ?? (state.page === 1 ? totalCount : null),
  };

  if (items.length === 0) {
    const reason: StopReason = fetched.page === 1 && fetched.totalCount === 0 ? 'no-reviews' : 'completed';
    return { state: fetched, action: { type: 'stop', reason } };
  }

  return {
    state: { ...fetched, page: fetched.page + 1 },
    action: sleepOrContinue(uniformDelay(policy.minDelayMs, policy.maxDelayMs, policy.random)),
  };
}

/**
 * Advance the session by one page attempt
 */
export function nextStep(state: RetrievalState, outcome: PageResult, policy: RetrievalPolicy): Transition {
  const attempted: RetrievalState = { ...state, requestsIssued: state.requestsIssued + 1 };

  if (outcome.ok) {
    return onPage(attempted, outcome.items, outcome.totalCount, policy);
  }
  return onFailure(attempted, outcome.error, policy);
}
