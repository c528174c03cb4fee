/**
 * Review Page Fetcher
 *
 * Sends one POST per page to the review endpoint and maps the transport and
 * protocol result to a PageResult. Retries and pacing belong to the controller.
 */

import axios, { isAxiosError } from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { config } from '../config/index.js';
import {
  ConnectionError,
  DecodeError,
  GenericRequestError,
  MalformedResponseError,
  RequestTimeoutError,
  TransientHttpError,
  errorMessage,
} from '../utils/errors.js';
import type { PageFetchError } from '../utils/errors.js';
import { isRecord } from '../utils/guards.js';
import type { PageRequest } from '../types/index.js';
import type { PageFetcher, PageResult, ReviewPageBody } from './types.js';

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ECONNABORTED']);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'ERR_NETWORK',
]);

export interface HttpPageFetcherOptions {
  endpoint?: string;
  origin?: string;
  userAgent?: string;
  timeoutMs?: number;
  client?: AxiosInstance;
}

/**
 * Build the request body for one page
 */
export function buildPageRequestBody(request: PageRequest): ReviewPageBody {
  return {
    arg: {
      channelType: 2,
      collapseType: 0,
      commentTagId: 0,
      pageIndex: request.pageIndex,
      pageSize: request.pageSize,
      poiId: Number.parseInt(request.poiId, 10),
      sourceType: 3,
      sortType: 1,
      starType: 0,
    },
    head: {
      ...config.api.head,
      extension: [],
    },
  };
}

/**
 * Map a thrown request error to its page-level error class
 */
export function classifyRequestError(error: unknown): PageFetchError {
  if (isAxiosError(error) && error.code) {
    if (TIMEOUT_CODES.has(error.code)) {
      return new RequestTimeoutError(error.message, { cause: error });
    }
    if (CONNECTION_CODES.has(error.code)) {
      return new ConnectionError(error.message, { cause: error });
    }
  }

  return new GenericRequestError(errorMessage(error), { cause: error });
}

/**
 * Interpret the status and raw body of a completed response
 */
export function interpretResponse(status: number, body: unknown): PageResult {
  if (status < 200 || status >= 300) {
    return { ok: false, error: new TransientHttpError(status) };
  }

  let payload: unknown = body;
  if (typeof body === 'string') {
    try {
      payload = JSON.parse(body);
    } catch (error) {
      return { ok: false, error: new DecodeError(errorMessage(error), { cause: error }) };
    }
  }

  const envelope = isRecord(payload) ? payload.result : undefined;
  if (!isRecord(envelope)) {
    return { ok: false, error: new MalformedResponseError('Response has no result envelope') };
  }

  // A null list marks the end of the data, same as a missing one
  const items = envelope.items ?? [];
  const { totalCount } = envelope;
  if (!Array.isArray(items)) {
    return { ok: false, error: new MalformedResponseError('result.items is not an array') };
  }

  return {
    ok: true,
    items,
    totalCount: typeof totalCount === 'number' && Number.isFinite(totalCount) ? totalCount : 0,
  };
}

export class HttpPageFetcher implements PageFetcher {
  private readonly client: AxiosInstance;
  private readonly endpoint: string;
  private readonly origin: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;

  constructor(options: HttpPageFetcherOptions = {}) {
    this.client = options.client ?? axios.create();
    this.endpoint = options.endpoint ?? config.api.reviewUrl;
    this.origin = options.origin ?? config.api.sightOrigin;
    this.userAgent = options.userAgent ?? config.api.userAgent;
    this.timeoutMs = options.timeoutMs ?? config.api.timeoutMs;
  }

  async fetchPage(request: PageRequest): Promise<PageResult> {
    let response: AxiosResponse<unknown>;

    try {
      response = await this.client.post<unknown>(this.endpoint, buildPageRequestBody(request), {
        headers: this.buildHeaders(request.poiId),
        timeout: this.timeoutMs,
        responseType: 'text',
        // Keep the raw text so decode failures stay distinguishable
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
        transitional: { clarifyTimeoutError: true },
      });
    } catch (error) {
      return { ok: false, error: classifyRequestError(error) };
    }

    return interpretResponse(response.status, response.data);
  }

  private buildHeaders(poiId: string): Record<string, string> {
    return {
      'User-Agent': this.userAgent,
      Accept: 'application/json, text/javascript, */*; q=0.01',
      'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
      'Content-Type': 'application/json',
      Origin: this.origin,
      Referer: `${this.origin}/sight/0/${poiId}.html`,
    };
  }
}
