import { describe, it, expect } from 'vitest';
import { exceedsPageLimit, initialState, nextStep } from '../../src/scraper/retrieval-policy.js';
import type { RetrievalPolicy, RetrievalState } from '../../src/scraper/retrieval-policy.js';
import {
  ConnectionError,
  DecodeError,
  GenericRequestError,
  MalformedResponseError,
  RequestTimeoutError,
  TransientHttpError,
} from '../../src/utils/errors.js';
import { failure, page, rawReviews } from '../helpers.js';

const policy: RetrievalPolicy = {
  maxConsecutiveFailures: 3,
  minDelayMs: 1000,
  maxDelayMs: 2000,
  httpErrorDelayMs: 3000,
  connectionErrorDelayMs: 10000,
  timeoutDelayMs: 5000,
  requestErrorDelayMs: 5000,
  random: () => 0.5,
};

function stateAt(overrides: Partial<RetrievalState>): RetrievalState {
  return { ...initialState(), ...overrides };
}

describe('initialState', () => {
  it('starts on page 1 with nothing recorded', () => {
    expect(initialState()).toEqual({
      page: 1,
      consecutiveFailures: 0,
      totalCount: null,
      requestsIssued: 0,
      pagesFetched: 0,
    });
  });
});

describe('nextStep', () => {
  it('advances one page and sleeps a delay drawn from the range after a non-empty page', () => {
    const { state, action } = nextStep(initialState(), page(rawReviews(10), 42), policy);

    expect(state).toEqual({ page: 2, consecutiveFailures: 0, totalCount: 42, requestsIssued: 1, pagesFetched: 1 });
    expect(action).toEqual({ type: 'sleep', durationMs: 1500 });
  });

  it('resets the failure counter on a successful page', () => {
    const { state } = nextStep(stateAt({ page: 4, consecutiveFailures: 2, totalCount: 50 }), page(rawReviews(3), 50), policy);

    expect(state.consecutiveFailures).toBe(0);
    expect(state.page).toBe(5);
  });

  it('keeps the total captured from the first page', () => {
    const { state } = nextStep(stateAt({ page: 2, totalCount: 20 }), page(rawReviews(10), 99), policy);

    expect(state.totalCount).toBe(20);
  });

  it('stops with completed when a later page is empty', () => {
    const { state, action } = nextStep(stateAt({ page: 3, totalCount: 20 }), page([], 20), policy);

    expect(action).toEqual({ type: 'stop', reason: 'completed' });
    expect(state.page).toBe(3);
  });

  it('stops with no-reviews when the first page is empty and reports zero', () => {
    const { action } = nextStep(initialState(), page([], 0), policy);

    expect(action).toEqual({ type: 'stop', reason: 'no-reviews' });
  });

  it('treats an empty first page with a nonzero total as completion', () => {
    const { action } = nextStep(initialState(), page([], 12), policy);

    expect(action).toEqual({ type: 'stop', reason: 'completed' });
  });

  it('keeps going when the first page reports zero but carries reviews', () => {
    const { state, action } = nextStep(initialState(), page(rawReviews(2), 0), policy);

    expect(state.page).toBe(2);
    expect(action.type).toBe('sleep');
  });

  it('retries the same page after an HTTP error and counts it', () => {
    const { state, action } = nextStep(initialState(), failure(new TransientHttpError(502)), policy);

    expect(state).toEqual({ page: 1, consecutiveFailures: 1, totalCount: null, requestsIssued: 1, pagesFetched: 0 });
    expect(action).toEqual({ type: 'sleep', durationMs: 3000 });
  });

  it('retries the same page after a generic request error and counts it', () => {
    const { state, action } = nextStep(stateAt({ page: 2 }), failure(new GenericRequestError('socket hang up')), policy);

    expect(state.page).toBe(2);
    expect(state.consecutiveFailures).toBe(1);
    expect(action).toEqual({ type: 'sleep', durationMs: 5000 });
  });

  it('stops once countable failures reach the ceiling', () => {
    const { state, action } = nextStep(stateAt({ consecutiveFailures: 2 }), failure(new TransientHttpError(500)), policy);

    expect(state.consecutiveFailures).toBe(3);
    expect(action).toEqual({ type: 'stop', reason: 'too-many-failures' });
  });

  it('does not count timeouts or connection errors', () => {
    const afterTimeout = nextStep(stateAt({ consecutiveFailures: 2 }), failure(new RequestTimeoutError('timeout')), policy);
    const afterConnection = nextStep(
      stateAt({ consecutiveFailures: 2 }),
      failure(new ConnectionError('connect ECONNREFUSED')),
      policy
    );

    expect(afterTimeout.state.consecutiveFailures).toBe(2);
    expect(afterTimeout.action).toEqual({ type: 'sleep', durationMs: 5000 });
    expect(afterConnection.state.consecutiveFailures).toBe(2);
    expect(afterConnection.action).toEqual({ type: 'sleep', durationMs: 10000 });
  });

  it('stops immediately on a malformed envelope or a decode failure', () => {
    expect(nextStep(initialState(), failure(new MalformedResponseError('no result')), policy).action).toEqual({
      type: 'stop',
      reason: 'malformed-response',
    });
    expect(nextStep(initialState(), failure(new DecodeError('Unexpected token <')), policy).action).toEqual({
      type: 'stop',
      reason: 'decode-error',
    });
  });

  it('continues without sleeping when the delay range is zero', () => {
    const { action } = nextStep(initialState(), page(rawReviews(1), 1), { ...policy, minDelayMs: 0, maxDelayMs: 0 });

    expect(action).toEqual({ type: 'continue' });
  });
});

describe('exceedsPageLimit', () => {
  it('never trips without a ceiling', () => {
    expect(exceedsPageLimit(stateAt({ page: 500 }), policy)).toBe(false);
  });

  it('trips only past the ceiling', () => {
    expect(exceedsPageLimit(stateAt({ page: 2 }), { ...policy, maxPages: 2 })).toBe(false);
    expect(exceedsPageLimit(stateAt({ page: 3 }), { ...policy, maxPages: 2 })).toBe(true);
  });
});
