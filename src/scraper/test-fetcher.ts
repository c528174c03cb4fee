/**
 * Page Fetcher Smoke Script
 *
 * Fetches the first review page of a POI against the live API and prints the
 * parsed reviews. Not part of the test suite.
 *
 * Run with: npx tsx src/scraper/test-fetcher.ts <poiId>
 */

import { HttpPageFetcher } from './page-fetcher.js';
import { parsePoiId } from './poi-resolver.js';
import { parseReview } from './review-parser.js';
import { logger } from '../utils/logger.js';

async function testFetcher(): Promise<void> {
  const poiId = parsePoiId(process.argv[2] ?? '');
  const fetcher = new HttpPageFetcher();

  logger.info({ poiId }, 'Fetching first review page');
  const result = await fetcher.fetchPage({ poiId, pageIndex: 1, pageSize: 10 });

  if (!result.ok) {
    logger.error({ code: result.error.code, error: result.error.message }, 'Page fetch failed');
    process.exitCode = 1;
    return;
  }

  logger.info({ totalCount: result.totalCount, items: result.items.length }, 'Page fetched');

  for (const item of result.items.slice(0, 5)) {
    const review = parseReview(item);
    logger.info({
      author: review.author,
      date: review.date,
      score: review.score,
      content: review.content.slice(0, 60) + (review.content.length > 60 ? '...' : ''),
    });
  }

  logger.info('=== Page Fetcher Test Complete ===');
}

testFetcher().catch((error: unknown) => {
  logger.fatal({ error }, 'Test failed');
  process.exit(1);
});
