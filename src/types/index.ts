/**
 * Core types for the review harvester
 */

/**
 * One normalized review row
 */
export interface ReviewRecord {
  author: string;
  date: string;
  content: string;
  location: string;
  score: number | string;
  tags: string;
  usefulCount: number;
  commentId: number | string;
  imageCount: number;
  replyCount: number;
  identity: string;
}

export interface PageRequest {
  poiId: string;
  pageIndex: number;
  pageSize: number;
}

/**
 * Why a retrieval run ended
 */
export type StopReason =
  | 'completed'
  | 'no-reviews'
  | 'max-pages'
  | 'too-many-failures'
  | 'malformed-response'
  | 'decode-error'
  | 'cancelled';

export interface RetrievalOptions {
  /** Stop before fetching a page beyond this index; unbounded when unset */
  maxPages?: number;
  pageSize?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  maxConsecutiveFailures?: number;
  signal?: AbortSignal;
}

export interface RetrievalResult {
  poiId: string;
  records: ReviewRecord[];
  /** Total reported by the first page; informational only */
  totalCount: number | null;
  stopReason: StopReason;
  requestsIssued: number;
  pagesFetched: number;
  consecutiveFailures: number;
}

export interface ReviewStatistics {
  totalReviews: number;
  apiReportedTotal: number | null;
  averageScore: number | null;
  maxScore: number | null;
  minScore: number | null;
  totalUseful: number;
  averageUseful: number;
}

export interface PipelineResult {
  poiId: string;
  collected: number;
  stopReason: StopReason;
  outputFile: string | null;
  statistics: ReviewStatistics | null;
  durationMs: number;
}
