/**
 * One fetch → extract → write cycle for a slide change.
 * Failures are logged and reported as a dropped outcome, never thrown.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import { ExtractionError, FetchError, WriteError } from '../../lib/errors/bridge-errors.js';
import { extractSlideFields } from './slide-extractor.js';
import type { SlideDocument, SlideFields, SlideId } from './slide.types.js';

export interface SlideSource {
  fetch(slideId: SlideId): Promise<SlideDocument>;
}

export interface SlideSink {
  write(fields: SlideFields): Promise<void>;
}

export type ProcessOutcome =
  | { status: 'written'; slideId: SlideId; fields: SlideFields }
  | { status: 'dropped'; slideId: SlideId; error: unknown };

export class SlideProcessor {
  constructor(
    private readonly source: SlideSource,
    private readonly sink: SlideSink,
    private readonly extract: (document: SlideDocument) => SlideFields = extractSlideFields
  ) {}

  async process(slideId: SlideId): Promise<ProcessOutcome> {
    const startTime = Date.now();

    try {
      const document = await this.source.fetch(slideId);
      const fields = this.extract(document);
      await this.sink.write(fields);

      logger.info({
        event: 'slide_processed',
        slideId,
        title: fields.title,
        verseCount: fields.verses.length,
        durationMs: Date.now() - startTime
      }, 'Slide written to output files');

      return { status: 'written', slideId, fields };
    } catch (error) {
      this.logFailure(slideId, error);
      return { status: 'dropped', slideId, error };
    }
  }

  private logFailure(slideId: SlideId, error: unknown): void {
    if (error instanceof FetchError) {
      logger.warn({ event: 'slide_fetch_failed', slideId, statusCode: error.statusCode, err: error }, 'Slide fetch failed, notification dropped');
    } else if (error instanceof ExtractionError) {
      logger.warn({ event: 'slide_extraction_failed', slideId, err: error }, 'Slide content malformed, notification dropped');
    } else if (error instanceof WriteError) {
      logger.error({ event: 'slide_write_failed', slideId, path: error.path, err: error }, 'Output write failed, notification dropped');
    } else {
      logger.error({ event: 'slide_processing_failed', slideId, err: error }, 'Unexpected error processing slide, notification dropped');
    }
  }
}
