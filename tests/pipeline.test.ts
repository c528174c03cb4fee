import { afterEach, describe, it, expect, vi } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runReviewPipeline } from '../src/pipeline.js';
import { ConfigurationError, ResolutionError } from '../src/utils/errors.js';
import type { PageResult } from '../src/scraper/types.js';
import { ScriptedFetcher, page, rawReview, silentLogger } from './helpers.js';

function retrievalDeps(script: PageResult[]) {
  const fetcher = new ScriptedFetcher(script);
  return {
    fetcher,
    retrieval: { fetcher, logger: silentLogger, sleep: async () => {}, random: () => 0 },
  };
}

describe('runReviewPipeline', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('retrieves, saves and summarizes the reviews of a given POI', async () => {
    dir = await mkdtemp(join(tmpdir(), 'pipeline-'));
    const output = join(dir, 'reviews.csv');
    const { fetcher, retrieval } = retrievalDeps([
      page([rawReview({ commentId: 1, score: 5, usefulCount: 4 }), rawReview({ commentId: 2, score: 3, usefulCount: 0 })], 2),
      page([], 2),
    ]);
    const resolve = vi.fn(async () => '0');

    const result = await runReviewPipeline({ poiId: '42', output, minDelayMs: 0, maxDelayMs: 0 }, { resolve, retrieval });

    expect(resolve).not.toHaveBeenCalled();
    expect(fetcher.requests.map((request) => request.poiId)).toEqual(['42', '42']);
    expect(result).toMatchObject({
      poiId: '42',
      collected: 2,
      stopReason: 'completed',
      outputFile: output,
      statistics: {
        totalReviews: 2,
        apiReportedTotal: 2,
        averageScore: 4,
        maxScore: 5,
        minScore: 3,
        totalUseful: 4,
        averageUseful: 2,
      },
    });
    const lines = (await readFile(output, 'utf-8')).trimEnd().split('\n');
    expect(lines).toHaveLength(3);
  });

  it('resolves the POI id from the sight page URL', async () => {
    const { fetcher, retrieval } = retrievalDeps([page([], 0)]);
    const resolve = vi.fn(async () => '49958175');

    const result = await runReviewPipeline(
      { url: 'https://you.ctrip.com/sight/longnan2424/4383341.html' },
      { resolve, retrieval }
    );

    expect(resolve).toHaveBeenCalledWith('https://you.ctrip.com/sight/longnan2424/4383341.html');
    expect(fetcher.requests[0]?.poiId).toBe('49958175');
    expect(result.poiId).toBe('49958175');
  });

  it('saves nothing when no reviews were collected', async () => {
    dir = await mkdtemp(join(tmpdir(), 'pipeline-'));
    const { retrieval } = retrievalDeps([page([], 0)]);

    const result = await runReviewPipeline({ poiId: '42', output: join(dir, 'reviews.csv') }, { retrieval });

    expect(result).toMatchObject({ collected: 0, stopReason: 'no-reviews', outputFile: null, statistics: null });
    expect(await readdir(dir)).toEqual([]);
  });

  it('stops before retrieval on an invalid POI id', async () => {
    const { fetcher, retrieval } = retrievalDeps([page([], 0)]);

    await expect(runReviewPipeline({ poiId: 'abc' }, { retrieval })).rejects.toBeInstanceOf(ConfigurationError);
    expect(fetcher.requests).toHaveLength(0);
  });

  it('propagates a failed lookup', async () => {
    const { fetcher, retrieval } = retrievalDeps([page([], 0)]);
    const resolve = vi.fn(async () => {
      throw new ResolutionError('No poiId found');
    });

    await expect(runReviewPipeline({ url: 'https://you.ctrip.com/sight/x/1.html' }, { resolve, retrieval })).rejects.toThrow(
      'No poiId found'
    );
    expect(fetcher.requests).toHaveLength(0);
  });
});
