import { describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';
import { SlideProcessor, type SlideSink, type SlideSource } from '../slide-processor.js';
import { FetchError, WriteError } from '../../../lib/errors/bridge-errors.js';
import { parseXml } from '../../../lib/xml/xml-tree.js';
import { AMAZING_GRACE, songSlideXml } from '../../../../tests/helpers/opensong-fixtures.js';
import type { SlideDocument, SlideFields } from '../slide.types.js';

function sourceOf(xmlBySlide: Record<string, string>): SlideSource {
  return {
    fetch: async (slideId: string): Promise<SlideDocument> => {
      const xml = xmlBySlide[slideId];
      if (xml === undefined) throw new FetchError(`Unexpected HTTP status 404 for slide ${slideId}`, slideId, 404);
      return { slideId, root: parseXml(xml) };
    }
  };
}

describe('SlideProcessor', () => {
  it('writes the extracted fields and reports them', async () => {
    const written: SlideFields[] = [];
    const sink: SlideSink = { write: async (fields) => { written.push(fields); } };
    const processor = new SlideProcessor(sourceOf({ '42': songSlideXml(AMAZING_GRACE, '42') }), sink);

    const outcome = await processor.process('42');

    assert.strictEqual(outcome.status, 'written');
    assert.deepStrictEqual(written, [{
      title: 'Amazing Grace',
      authors: ['John Newton'],
      ccli: '12345',
      verses: [['Amazing grace, how sweet the sound']],
    }]);
  });

  it('drops the slide without writing when the fetch fails', async () => {
    const write = mock.fn(async (_fields: SlideFields) => {});
    const processor = new SlideProcessor(sourceOf({}), { write });

    const outcome = await processor.process('7');

    assert.strictEqual(outcome.status, 'dropped');
    assert.ok(outcome.status === 'dropped' && outcome.error instanceof FetchError);
    assert.strictEqual(write.mock.callCount(), 0);
  });

  it('drops the slide without writing when extraction fails', async () => {
    const write = mock.fn(async (_fields: SlideFields) => {});
    const processor = new SlideProcessor(sourceOf({ '3': '<response><error/></response>' }), { write });

    const outcome = await processor.process('3');

    assert.strictEqual(outcome.status, 'dropped');
    assert.strictEqual(write.mock.callCount(), 0);
  });

  it('reports a write failure instead of throwing', async () => {
    const failure = new WriteError('Cannot write /readonly/title.txt: EACCES', '/readonly/title.txt');
    const processor = new SlideProcessor(
      sourceOf({ '42': songSlideXml(AMAZING_GRACE, '42') }),
      { write: async () => { throw failure; } }
    );

    const outcome = await processor.process('42');

    assert.deepStrictEqual(outcome, { status: 'dropped', slideId: '42', error: failure });
  });

  it('keeps working after a failed slide', async () => {
    const write = mock.fn(async (_fields: SlideFields) => {});
    const processor = new SlideProcessor(sourceOf({ '2': songSlideXml(AMAZING_GRACE, '2') }), { write });

    await processor.process('1');
    const outcome = await processor.process('2');

    assert.strictEqual(outcome.status, 'written');
    assert.strictEqual(write.mock.callCount(), 1);
  });
});
