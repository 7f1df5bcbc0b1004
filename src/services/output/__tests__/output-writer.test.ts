import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { formatMetadata, formatVerses, OutputWriter } from '../output-writer.js';
import { WriteError } from '../../../lib/errors/bridge-errors.js';
import type { SlideFields } from '../../slides/slide.types.js';

const AMAZING_GRACE: SlideFields = {
  title: 'Amazing Grace',
  authors: ['John Newton'],
  ccli: '12345',
  verses: [['Amazing grace, how sweet the sound']],
};

describe('formatMetadata', () => {
  it('puts the quoted title, authors and CCLI number on fixed lines', () => {
    assert.strictEqual(formatMetadata(AMAZING_GRACE), '"Amazing Grace" - John Newton\nCCLI Song #12345');
  });

  it('joins several authors with commas', () => {
    const text = formatMetadata({ title: 'Hymn', authors: ['A. Writer', 'B. Composer'], verses: [] });
    assert.strictEqual(text, '"Hymn" - A. Writer, B. Composer');
  });

  it('is empty for a slide without metadata', () => {
    assert.strictEqual(formatMetadata({ title: '', authors: [], verses: [] }), '');
  });
});

describe('formatVerses', () => {
  it('joins every line of every block without a trailing newline', () => {
    assert.strictEqual(formatVerses([['one', 'two'], ['three']]), 'one\ntwo\nthree');
  });
});

describe('OutputWriter', () => {
  let dir: string;
  let titleFile: string;
  let verseFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bridge-output-'));
    titleFile = join(dir, 'title.txt');
    verseFile = join(dir, 'verse.txt');
  });

  it('overwrites both files completely', async () => {
    await writeFile(titleFile, 'a much longer previous title that must disappear');
    await writeFile(verseFile, 'previous verse\nsecond line');

    await new OutputWriter({ titleFile, verseFile }).write(AMAZING_GRACE);

    assert.strictEqual(await readFile(titleFile, 'utf8'), '"Amazing Grace" - John Newton\nCCLI Song #12345');
    assert.strictEqual(await readFile(verseFile, 'utf8'), 'Amazing grace, how sweet the sound');
  });

  it('produces identical files when the same slide is written twice', async () => {
    const writer = new OutputWriter({ titleFile, verseFile });

    await writer.write(AMAZING_GRACE);
    const first = [await readFile(titleFile), await readFile(verseFile)];
    await writer.write(AMAZING_GRACE);
    const second = [await readFile(titleFile), await readFile(verseFile)];

    assert.deepStrictEqual(second, first);
  });

  it('clears both files', async () => {
    const writer = new OutputWriter({ titleFile, verseFile });
    await writer.write(AMAZING_GRACE);
    await writer.clear();

    assert.strictEqual(await readFile(titleFile, 'utf8'), '');
    assert.strictEqual(await readFile(verseFile, 'utf8'), '');
  });

  it('raises WriteError naming the path that failed', async () => {
    const missing = join(dir, 'missing-dir', 'verse.txt');
    const writer = new OutputWriter({ titleFile, verseFile: missing });

    await assert.rejects(writer.write(AMAZING_GRACE), (err: unknown) => {
      assert.ok(err instanceof WriteError);
      assert.strictEqual(err.path, missing);
      assert.strictEqual(err.code, 'WRITE_FAILED');
      return true;
    });
    // The other file is still written
    assert.strictEqual(await readFile(titleFile, 'utf8'), '"Amazing Grace" - John Newton\nCCLI Song #12345');
  });
});
