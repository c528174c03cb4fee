/**
 * POI Resolver
 *
 * The numeric id in a sight page URL is a page id, not the POI id the review
 * API expects. The real id is embedded in the page HTML as `"poiId": <digits>`.
 * One request, no retry: a failure here ends the run.
 */

import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError, ResolutionError, errorMessage } from '../utils/errors.js';

const PAGE_ID_PATTERN = /\/(\d+)\.html/;
const POI_ID_PATTERN = /"poiId"\s*:\s*(\d+)/;

export interface ResolveOptions {
  client?: AxiosInstance;
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * Extract the page id from a sight URL such as `/sight/city12/4383341.html`
 */
export function extractPageIdFromUrl(url: string): string | null {
  return PAGE_ID_PATTERN.exec(url)?.[1] ?? null;
}

/**
 * Find the POI id inside sight page HTML
 */
export function extractPoiIdFromHtml(html: string): string | null {
  return POI_ID_PATTERN.exec(html)?.[1] ?? null;
}

/**
 * Validate a POI id given directly by the user
 */
export function parsePoiId(value: string): string {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigurationError(`POI id must be a string of digits, got "${value}"`);
  }
  return trimmed;
}

/**
 * Fetch a sight page and read its POI id
 *
 * @throws ResolutionError when the URL, the request or the page content does not yield an id
 */
export async function resolvePoiId(pageUrl: string, options: ResolveOptions = {}): Promise<string> {
  const pageId = extractPageIdFromUrl(pageUrl);
  if (pageId === null) {
    throw new ResolutionError(`URL does not look like a sight page: ${pageUrl}`);
  }

  const client = options.client ?? axios.create();
  logger.info({ url: pageUrl, pageId }, 'Resolving POI id from sight page');

  let response: AxiosResponse<unknown>;
  try {
    response = await client.get<unknown>(pageUrl, {
      headers: {
        'User-Agent': options.userAgent ?? config.api.userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
        'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
      },
      timeout: options.timeoutMs ?? config.api.timeoutMs,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  } catch (error) {
    logger.error({ url: pageUrl, error: errorMessage(error) }, 'Sight page request failed');
    throw new ResolutionError(`Sight page request failed: ${errorMessage(error)}`, { cause: error });
  }

  if (response.status !== 200) {
    logger.error({ url: pageUrl, status: response.status }, 'Sight page request failed');
    throw new ResolutionError(`Sight page request failed with status ${response.status}`);
  }

  const html = typeof response.data === 'string' ? response.data : '';
  const poiId = extractPoiIdFromHtml(html);
  if (poiId === null) {
    logger.error({ url: pageUrl }, 'No poiId found in sight page');
    throw new ResolutionError(`No poiId found in ${pageUrl}`);
  }

  logger.info({ url: pageUrl, poiId }, 'Resolved POI id');
  return poiId;
}
