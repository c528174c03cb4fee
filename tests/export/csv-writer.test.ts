import { afterEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { defaultOutputPath, escapeCsvValue, toCsv, writeReviewsCsv } from '../../src/export/csv-writer.js';
import type { ReviewRecord } from '../../src/types/index.js';

const HEADER = 'author,date,score,content,location,tags,usefulCount,replyCount,imageCount,identity,commentId';

function record(overrides: Partial<ReviewRecord> = {}): ReviewRecord {
  return {
    author: 'Traveller',
    date: '2024-05-01',
    content: 'Lovely, quiet',
    location: '上海',
    score: 5,
    tags: 'Scenery,Quiet',
    usefulCount: 3,
    commentId: 101,
    imageCount: 2,
    replyCount: 1,
    identity: '',
    ...overrides,
  };
}

describe('escapeCsvValue', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvValue('plain')).toBe('plain');
    expect(escapeCsvValue(4.5)).toBe('4.5');
  });

  it('quotes delimiters, quotes and line breaks', () => {
    expect(escapeCsvValue('a,b')).toBe('"a,b"');
    expect(escapeCsvValue('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvValue('line one\nline two')).toBe('"line one\nline two"');
  });
});

describe('toCsv', () => {
  it('writes the columns in fixed order', () => {
    expect(toCsv([record()])).toBe(`${HEADER}\nTraveller,2024-05-01,5,"Lovely, quiet",上海,"Scenery,Quiet",3,1,2,,101\n`);
  });

  it('writes one row per record in order', () => {
    const lines = toCsv([record({ commentId: 1 }), record({ commentId: 2 })]).trimEnd().split('\n');

    expect(lines).toHaveLength(3);
    expect(lines[1]?.endsWith(',1')).toBe(true);
    expect(lines[2]?.endsWith(',2')).toBe(true);
  });
});

describe('defaultOutputPath', () => {
  it('stamps the POI id and local time into the file name', () => {
    expect(defaultOutputPath('42', 'out', new Date(2024, 0, 5, 7, 8, 9))).toBe(
      join('out', 'comments_42_20240105_070809.csv')
    );
  });
});

describe('writeReviewsCsv', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('writes a BOM-prefixed UTF-8 file', async () => {
    dir = await mkdtemp(join(tmpdir(), 'reviews-'));
    const target = join(dir, 'nested', 'reviews.csv');

    const written = await writeReviewsCsv([record()], target);

    expect(written).toBe(target);
    const content = await readFile(target, 'utf-8');
    expect(content).toBe(`\uFEFF${HEADER}\nTraveller,2024-05-01,5,"Lovely, quiet",上海,"Scenery,Quiet",3,1,2,,101\n`);
  });

  it('writes nothing for an empty record set', async () => {
    dir = await mkdtemp(join(tmpdir(), 'reviews-'));
    const target = join(dir, 'empty.csv');

    await expect(writeReviewsCsv([], target)).resolves.toBeNull();
    await expect(stat(target)).rejects.toThrow();
  });
});
