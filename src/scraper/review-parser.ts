/**
 * Review Parser
 *
 * Maps a raw review payload to a ReviewRecord through a declarative field
 * table. A field that cannot be read or coerced falls back to its default;
 * only a payload that is not an object at all is rejected.
 */

import { FieldExtractionError, MalformedReviewError, errorMessage } from '../utils/errors.js';
import { isRecord } from '../utils/guards.js';
import type { ReviewRecord } from '../types/index.js';

export const ANONYMOUS_AUTHOR = 'anonymous';

/**
 * How one record field is read from the raw payload
 */
export interface FieldSpec<T> {
  /** Key path into the raw payload */
  path: readonly string[];
  fallback: T;
  /** Throws when the value has an unexpected shape */
  coerce: (value: unknown) => T;
}

export type ReviewFieldTable = { readonly [K in keyof ReviewRecord]: FieldSpec<ReviewRecord[K]> };

export interface ParseOptions {
  onFieldError?: (error: FieldExtractionError) => void;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  throw new TypeError(`expected text, got ${describe(value)}`);
}

function firstToken(value: unknown): string {
  return toText(value).trim().split(/\s+/)[0] ?? '';
}

function toScore(value: unknown): number | string {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') return value;
  throw new TypeError(`expected score, got ${describe(value)}`);
}

function toCount(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  throw new TypeError(`expected non-negative count, got ${describe(value)}`);
}

function toIdentifier(value: unknown): number | string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  throw new TypeError(`expected identifier, got ${describe(value)}`);
}

function joinTags(value: unknown): string {
  if (!Array.isArray(value)) {
    throw new TypeError(`expected tag list, got ${describe(value)}`);
  }
  return value.map(toText).join(',');
}

function toLength(value: unknown): number {
  if (!Array.isArray(value)) {
    throw new TypeError(`expected list, got ${describe(value)}`);
  }
  return value.length;
}

export const REVIEW_FIELDS: ReviewFieldTable = {
  author: { path: ['userInfo', 'userNick'], fallback: ANONYMOUS_AUTHOR, coerce: toText },
  date: { path: ['publishTypeTag'], fallback: '', coerce: firstToken },
  content: { path: ['content'], fallback: '', coerce: toText },
  location: { path: ['ipLocatedName'], fallback: '', coerce: toText },
  score: { path: ['score'], fallback: '', coerce: toScore },
  tags: { path: ['recommendItems'], fallback: '', coerce: joinTags },
  usefulCount: { path: ['usefulCount'], fallback: 0, coerce: toCount },
  commentId: { path: ['commentId'], fallback: '', coerce: toIdentifier },
  imageCount: { path: ['images'], fallback: 0, coerce: toLength },
  replyCount: { path: ['replyCount'], fallback: 0, coerce: toCount },
  identity: { path: ['userInfo', 'identitiesName'], fallback: '', coerce: toText },
};

/**
 * Walk a key path. Missing or null steps yield undefined; stepping into a
 * non-object throws.
 */
function readPath(source: Record<string, unknown>, path: readonly string[]): unknown {
  let current: unknown = source;

  for (const key of path) {
    if (current === undefined || current === null) {
      return undefined;
    }
    if (!isRecord(current)) {
      throw new TypeError(`cannot read "${key}" from ${describe(current)}`);
    }
    current = current[key];
  }

  return current;
}

/**
 * Read one field, falling back to its default on any failure
 */
export function extractField<T>(
  raw: Record<string, unknown>,
  field: string,
  spec: FieldSpec<T>,
  options: ParseOptions = {}
): T {
  try {
    const value = readPath(raw, spec.path);
    if (value === undefined || value === null) {
      return spec.fallback;
    }
    return spec.coerce(value);
  } catch (error) {
    options.onFieldError?.(new FieldExtractionError(field, errorMessage(error)));
    return spec.fallback;
  }
}

/**
 * Parse one raw review payload
 *
 * @throws MalformedReviewError when the payload is not an object
 */
export function parseReview(raw: unknown, options: ParseOptions = {}): ReviewRecord {
  if (!isRecord(raw)) {
    throw new MalformedReviewError(`Review payload is ${describe(raw)}, expected object`);
  }

  const payload = raw;
  const field = <K extends keyof ReviewRecord>(key: K): ReviewRecord[K] =>
    extractField(payload, key, REVIEW_FIELDS[key], options);

  return {
    author: field('author'),
    date: field('date'),
    content: field('content'),
    location: field('location'),
    score: field('score'),
    tags: field('tags'),
    usefulCount: field('usefulCount'),
    commentId: field('commentId'),
    imageCount: field('imageCount'),
    replyCount: field('replyCount'),
    identity: field('identity'),
  };
}
