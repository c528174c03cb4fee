/**
 * Scraper Types
 */

import type { PageRequest } from '../types/index.js';
import type { PageFetchError } from '../utils/errors.js';

/**
 * Outcome of a single page request
 */
export type PageResult =
  | { ok: true; items: unknown[]; totalCount: number }
  | { ok: false; error: PageFetchError };

/**
 * Issues one request per page, without retrying
 */
export interface PageFetcher {
  fetchPage(request: PageRequest): Promise<PageResult>;
}

/**
 * Request body understood by the review endpoint
 */
export interface ReviewPageBody {
  arg: {
    channelType: number;
    collapseType: number;
    commentTagId: number;
    pageIndex: number;
    pageSize: number;
    poiId: number;
    sourceType: number;
    sortType: number;
    starType: number;
  };
  head: {
    cid: string;
    ctok: string;
    cver: string;
    lang: string;
    sid: string;
    syscode: string;
    auth: string;
    xsid: string;
    extension: string[];
  };
}
