/**
 * OpenSong REST client for slide content
 *
 * GET <base>/presentation/slide/<id> returns the slide as XML. No retry here:
 * a failed fetch drops the notification.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import { FetchError, errorMessage } from '../../lib/errors/bridge-errors.js';
import { parseXml } from '../../lib/xml/xml-tree.js';
import { fetchTextWithTimeout } from '../../utils/fetch-with-timeout.js';
import type { SlideDocument, SlideId } from './slide.types.js';

export interface SlideFetcherConfig {
  /** e.g. http://localhost:8082 */
  baseUrl: string;
  timeoutMs: number;
}

const BODY_LOG_LIMIT = 512;

export class SlideFetcher {
  constructor(private readonly config: SlideFetcherConfig) {}

  slideUrl(slideId: SlideId): string {
    return `${this.config.baseUrl}/presentation/slide/${encodeURIComponent(slideId)}`;
  }

  async fetch(slideId: SlideId): Promise<SlideDocument> {
    const url = this.slideUrl(slideId);

    let status: number;
    let body: string;
    try {
      ({ status, body } = await fetchTextWithTimeout(
        url,
        { method: 'GET', headers: { Accept: 'application/xml, text/xml' } },
        { timeoutMs: this.config.timeoutMs, stage: 'slide_fetch' }
      ));
    } catch (err) {
      throw new FetchError(`Request for slide ${slideId} failed: ${errorMessage(err)}`, slideId, undefined, { cause: err });
    }

    if (status < 200 || status >= 300) {
      logger.info({
        event: 'slide_fetch_unexpected_status',
        slideId,
        status,
        body: body.slice(0, BODY_LOG_LIMIT)
      }, 'Received unexpected HTTP status code');
      throw new FetchError(`Unexpected HTTP status ${status} for slide ${slideId}`, slideId, status);
    }

    try {
      return { slideId, root: parseXml(body) };
    } catch (err) {
      throw new FetchError(`Slide ${slideId} response is not valid XML: ${errorMessage(err)}`, slideId, status, { cause: err });
    }
  }
}
