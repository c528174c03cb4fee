/**
 * Main Pipeline
 *
 * Orchestrates one harvesting run:
 * 1. Resolve the POI id (or validate the one given)
 * 2. Retrieve every review page
 * 3. Save the reviews as CSV
 * 4. Report statistics
 */

import { config } from './config/index.js';
import { resolvePoiId, parsePoiId, retrieveReviews } from './scraper/index.js';
import type { RetrievalDependencies } from './scraper/index.js';
import { writeReviewsCsv, defaultOutputPath, computeStatistics } from './export/index.js';
import { logger } from './utils/logger.js';
import type { PipelineResult, ReviewStatistics } from './types/index.js';

/**
 * Pipeline options
 */
export interface PipelineOptions {
  /** Known POI id; skips the sight page lookup */
  poiId?: string;
  /** Sight page URL to resolve when no POI id is given */
  url?: string;
  maxPages?: number;
  output?: string;
  minDelayMs?: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
}

export interface PipelineDependencies {
  resolve?: (url: string) => Promise<string>;
  retrieval?: RetrievalDependencies;
  now?: () => Date;
}

function logStatistics(statistics: ReviewStatistics): void {
  const round = (value: number | null): number | null => (value === null ? null : Math.round(value * 100) / 100);

  logger.info(
    {
      totalReviews: statistics.totalReviews,
      apiReportedTotal: statistics.apiReportedTotal,
      averageScore: round(statistics.averageScore),
      maxScore: statistics.maxScore,
      minScore: statistics.minScore,
      totalUseful: statistics.totalUseful,
      averageUseful: round(statistics.averageUseful),
    },
    'Review statistics'
  );
}

/**
 * Run the full pipeline for one POI
 */
export async function runReviewPipeline(
  options: PipelineOptions = {},
  deps: PipelineDependencies = {}
): Promise<PipelineResult> {
  const { resolve = resolvePoiId, now = () => new Date() } = deps;
  const startTime = Date.now();

  let poiId: string;
  if (options.poiId !== undefined) {
    poiId = parsePoiId(options.poiId);
    logger.info({ poiId }, 'Using given POI id');
  } else {
    poiId = await resolve(options.url ?? config.api.defaultSightUrl);
  }

  logger.info(
    {
      poiId,
      url: options.url ?? null,
      maxPages: options.maxPages ?? null,
      delayRangeMs: [
        options.minDelayMs ?? config.retrieval.minDelayMs,
        options.maxDelayMs ?? config.retrieval.maxDelayMs,
      ],
    },
    'Starting review harvest'
  );

  const retrieval = await retrieveReviews(
    poiId,
    {
      maxPages: options.maxPages,
      minDelayMs: options.minDelayMs,
      maxDelayMs: options.maxDelayMs,
      signal: options.signal,
    },
    deps.retrieval
  );

  let outputFile: string | null = null;
  let statistics: ReviewStatistics | null = null;

  if (retrieval.records.length > 0) {
    const target = options.output ?? defaultOutputPath(poiId, config.output.dir, now());
    outputFile = await writeReviewsCsv(retrieval.records, target);

    statistics = computeStatistics(retrieval.records, retrieval.totalCount);
    if (statistics) {
      logStatistics(statistics);
    }
  } else {
    logger.warn(
      {
        poiId,
        stopReason: retrieval.stopReason,
        possibleCauses: ['POI has no reviews', 'POI id is wrong', 'Network problems'],
      },
      'No reviews collected'
    );
  }

  return {
    poiId,
    collected: retrieval.records.length,
    stopReason: retrieval.stopReason,
    outputFile,
    statistics,
    durationMs: Date.now() - startTime,
  };
}
