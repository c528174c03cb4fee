import pino from 'pino';
import type { PageFetcher, PageResult } from '../src/scraper/types.js';
import type { PageRequest } from '../src/types/index.js';
import type { PageFetchError } from '../src/utils/errors.js';

export const silentLogger = pino({ level: 'silent' });

/**
 * A raw review payload shaped like the API's items
 */
export function rawReview(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    commentId: 101,
    userInfo: { userNick: 'Traveller', identitiesName: 'Gold member' },
    publishTypeTag: '2024-05-01 12:30',
    content: 'Lovely gardens',
    ipLocatedName: 'Shanghai',
    score: 5,
    recommendItems: ['Scenery', 'Quiet'],
    usefulCount: 3,
    images: [{ url: 'a.jpg' }, { url: 'b.jpg' }],
    replyCount: 1,
    ...overrides,
  };
}

export function rawReviews(count: number, firstId = 1): Array<Record<string, unknown>> {
  return Array.from({ length: count }, (_, index) => rawReview({ commentId: firstId + index }));
}

export function page(items: unknown[], totalCount: number): PageResult {
  return { ok: true, items, totalCount };
}

export function failure(error: PageFetchError): PageResult {
  return { ok: false, error };
}

/**
 * Replays a fixed sequence of page results, one per request
 */
export class ScriptedFetcher implements PageFetcher {
  readonly requests: PageRequest[] = [];
  private readonly script: Array<PageResult | Error>;

  constructor(script: Array<PageResult | Error>) {
    this.script = [...script];
  }

  async fetchPage(request: PageRequest): Promise<PageResult> {
    this.requests.push(request);
    const next = this.script.shift();
    if (next === undefined) {
      throw new Error(`No scripted response left for page ${request.pageIndex}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}
