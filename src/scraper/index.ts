/**
 * Scraper Module
 *
 * Paginated review retrieval and the POI id lookup
 */

export {
  HttpPageFetcher,
  buildPageRequestBody,
  classifyRequestError,
  interpretResponse,
  type HttpPageFetcherOptions,
} from './page-fetcher.js';

export { parseReview, extractField, REVIEW_FIELDS, ANONYMOUS_AUTHOR } from './review-parser.js';
export type { FieldSpec, ReviewFieldTable, ParseOptions } from './review-parser.js';

export { initialState, nextStep, exceedsPageLimit } from './retrieval-policy.js';
export type { RetrievalState, RetrievalAction, RetrievalPolicy, Transition } from './retrieval-policy.js';

export { retrieveReviews, buildPolicy } from './retrieval-controller.js';
export type { RetrievalDependencies, RetrievalLogger } from './retrieval-controller.js';

export { resolvePoiId, parsePoiId, extractPageIdFromUrl, extractPoiIdFromHtml } from './poi-resolver.js';
export type { ResolveOptions } from './poi-resolver.js';

export type { PageFetcher, PageResult, ReviewPageBody } from './types.js';
