/**
 * CSV Sink
 *
 * Writes review records with a fixed column order. The file starts with a
 * UTF-8 byte order mark so spreadsheet tools keep non-ASCII text intact.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { logger } from '../utils/logger.js';
import type { ReviewRecord } from '../types/index.js';

export const CSV_COLUMNS: ReadonlyArray<keyof ReviewRecord> = [
  'author',
  'date',
  'score',
  'content',
  'location',
  'tags',
  'usefulCount',
  'replyCount',
  'imageCount',
  'identity',
  'commentId',
];

const BOM = '\uFEFF';

/**
 * Quote a value when it holds a delimiter, quote or line break
 */
export function escapeCsvValue(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Serialize records; a column appears only if some record carries the field
 */
export function toCsv(records: readonly ReviewRecord[]): string {
  const columns = CSV_COLUMNS.filter((column) => records.some((record) => column in record));
  const header = columns.join(',');
  const rows = records.map((record) => columns.map((column) => escapeCsvValue(record[column])).join(','));
  return [header, ...rows].join('\n') + '\n';
}

/**
 * Default output path: comments_<poiId>_<YYYYMMDD_HHMMSS>.csv
 */
export function defaultOutputPath(poiId: string, outputDir: string, now: Date = new Date()): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return join(outputDir, `comments_${poiId}_${stamp}.csv`);
}

/**
 * Write records to a CSV file
 *
 * @returns the absolute path written, or null when there was nothing to save
 */
export async function writeReviewsCsv(records: readonly ReviewRecord[], filePath: string): Promise<string | null> {
  if (records.length === 0) {
    logger.warn('No reviews to save');
    return null;
  }

  const absolutePath = resolve(filePath);

  try {
    await mkdir(dirname(absolutePath), { recursive: true });
    await writeFile(absolutePath, BOM + toCsv(records), 'utf-8');
  } catch (error) {
    logger.error({ error, file: absolutePath }, 'Failed to save reviews');
    throw error;
  }

  logger.info({ file: absolutePath, rows: records.length }, 'Reviews saved');
  return absolutePath;
}
