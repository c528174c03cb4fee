/**
 * Retrieval Controller
 *
 * Drives the pagination loop for one POI: fetch a page, parse its reviews,
 * apply the retrieval policy, pace, repeat. Page-level failures never escape;
 * the run always resolves with the records collected so far and the reason
 * it stopped.
 */

import { config } from '../config/index.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/delay.js';
import { errorMessage } from '../utils/errors.js';
import type { PageRequest, RetrievalOptions, RetrievalResult, ReviewRecord, StopReason } from '../types/index.js';
import { HttpPageFetcher, classifyRequestError } from './page-fetcher.js';
import { parseReview } from './review-parser.js';
import { exceedsPageLimit, initialState, nextStep } from './retrieval-policy.js';
import type { RetrievalPolicy, RetrievalState, Transition } from './retrieval-policy.js';
import type { PageFetcher, PageResult } from './types.js';

export type RetrievalLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export interface RetrievalDependencies {
  fetcher?: PageFetcher;
  logger?: RetrievalLogger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

/**
 * Resolve run options against configured defaults
 */
export function buildPolicy(options: RetrievalOptions = {}, random: () => number = Math.random): RetrievalPolicy {
  const { backoff } = config.retrieval;

  return {
    maxPages: options.maxPages,
    maxConsecutiveFailures: options.maxConsecutiveFailures ?? config.retrieval.maxConsecutiveFailures,
    minDelayMs: options.minDelayMs ?? config.retrieval.minDelayMs,
    maxDelayMs: options.maxDelayMs ?? config.retrieval.maxDelayMs,
    httpErrorDelayMs: backoff.httpErrorMs,
    connectionErrorDelayMs: backoff.connectionErrorMs,
    timeoutDelayMs: backoff.timeoutMs,
    requestErrorDelayMs: backoff.requestErrorMs,
    random,
  };
}

async function fetchSafely(fetcher: PageFetcher, request: PageRequest): Promise<PageResult> {
  try {
    return await fetcher.fetchPage(request);
  } catch (error) {
    return { ok: false, error: classifyRequestError(error) };
  }
}

/**
 * Parse every item of a page independently, appending what parses
 */
function appendReviews(records: ReviewRecord[], items: unknown[], page: number, logger: RetrievalLogger): number {
  let added = 0;

  for (const item of items) {
    try {
      const record = parseReview(item, {
        onFieldError: (fieldError) => {
          logger.debug({ page, field: fieldError.field, reason: fieldError.message }, 'Review field fell back to default');
        },
      });
      records.push(record);
      added++;
    } catch (error) {
      logger.warn({ page, error: errorMessage(error) }, 'Dropped unreadable review');
    }
  }

  return added;
}

function logTransition(
  logger: RetrievalLogger,
  before: RetrievalState,
  outcome: PageResult,
  { state, action }: Transition
): void {
  const page = before.page;

  if (outcome.ok) {
    if (page === 1 && before.totalCount === null) {
      logger.info({ page, totalCount: outcome.totalCount }, 'API reported total review count');
      if (outcome.totalCount === 0 && outcome.items.length > 0) {
        logger.warn({ page, items: outcome.items.length }, 'Reported total is 0 but page has reviews, continuing');
      }
    }
    if (action.type === 'stop') {
      logger.info(
        { page, reason: action.reason },
        action.reason === 'no-reviews' ? 'POI has no reviews' : 'Page returned no reviews, retrieval complete'
      );
    }
    return;
  }

  const { error } = outcome;
  const context = {
    page,
    code: error.code,
    error: error.message,
    consecutiveFailures: state.consecutiveFailures,
  };

  switch (error.code) {
    case 'HTTP_ERROR':
      logger.error({ ...context, status: error.status }, 'Review page request failed');
      break;
    case 'CONNECTION_ERROR':
      logger.error(context, 'Connection error, retrying same page');
      break;
    case 'TIMEOUT':
      logger.error(context, 'Review page request timed out, retrying same page');
      break;
    case 'REQUEST_ERROR':
      logger.error(context, 'Review page request raised an error');
      break;
    case 'MALFORMED_RESPONSE':
      logger.warn(context, 'Response has unexpected shape, stopping');
      break;
    case 'DECODE_ERROR':
      logger.error(context, 'Response body is not valid JSON, stopping');
      break;
  }

  if (action.type === 'stop' && action.reason === 'too-many-failures') {
    logger.error({ page, consecutiveFailures: state.consecutiveFailures }, 'Too many consecutive failures, stopping');
  }
}

/**
 * Retrieve every review of one POI
 */
export async function retrieveReviews(
  poiId: string,
  options: RetrievalOptions = {},
  deps: RetrievalDependencies = {}
): Promise<RetrievalResult> {
  const {
    fetcher = new HttpPageFetcher(),
    logger = defaultLogger,
    sleep = defaultSleep,
    random = Math.random,
  } = deps;
  const { signal } = options;
  const pageSize = options.pageSize ?? config.api.pageSize;
  const policy = buildPolicy(options, random);
  const records: ReviewRecord[] = [];
  let state = initialState();

  logger.info(
    {
      poiId,
      pageSize,
      maxPages: policy.maxPages ?? null,
      delayRangeMs: [policy.minDelayMs, policy.maxDelayMs],
    },
    'Starting review retrieval'
  );

  const run = async (): Promise<StopReason> => {
    while (true) {
      if (signal?.aborted) {
        return 'cancelled';
      }
      if (exceedsPageLimit(state, policy)) {
        logger.info({ maxPages: policy.maxPages }, 'Reached page limit');
        return 'max-pages';
      }

      logger.info({ page: state.page }, 'Fetching review page');
      const outcome = await fetchSafely(fetcher, { poiId, pageIndex: state.page, pageSize });

      if (outcome.ok && outcome.items.length > 0) {
        const added = appendReviews(records, outcome.items, state.page, logger);
        logger.info({ page: state.page, added, collected: records.length }, 'Review page processed');
      }

      const transition = nextStep(state, outcome, policy);
      logTransition(logger, state, outcome, transition);
      state = transition.state;

      const { action } = transition;
      if (action.type === 'stop') {
        return action.reason;
      }
      if (action.type === 'sleep') {
        if (signal?.aborted) {
          return 'cancelled';
        }
        logger.debug({ delayMs: Math.round(action.durationMs) }, 'Waiting before next request');
        await sleep(action.durationMs, signal);
      }
    }
  };

  const stopReason = await run();

  logger.info(
    {
      poiId,
      collected: records.length,
      stopReason,
      requestsIssued: state.requestsIssued,
      pagesFetched: state.pagesFetched,
    },
    'Review retrieval finished'
  );

  return {
    poiId,
    records,
    totalCount: state.totalCount,
    stopReason,
    requestsIssued: state.requestsIssued,
    pagesFetched: state.pagesFetched,
    consecutiveFailures: state.consecutiveFailures,
  };
}
