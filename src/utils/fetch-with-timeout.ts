/**
 * Fetch with Timeout Utility
 *
 * Wraps native fetch with an AbortController so a stalled OpenSong server
 * cannot hang the event loop. The timeout covers the headers and the whole
 * body; the timer is cleared in `finally` once the body has been read.
 */

import { logger } from '../lib/logger/structured-logger.js';

export type FetchErrorKind = 'TIMEOUT' | 'ABORT' | 'DNS_FAIL' | 'NETWORK_ERROR';

export interface FetchWithTimeoutConfig {
  timeoutMs: number;
  stage?: string;
}

export interface TextResponse {
  status: number;
  body: string;
}

export class UpstreamRequestError extends Error {
  constructor(
    message: string,
    public readonly errorKind: FetchErrorKind,
    public readonly host: string,
    public readonly durationMs: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'UpstreamRequestError';
  }
}

function classify(err: unknown, timedOut: boolean): FetchErrorKind {
  if (timedOut) return 'TIMEOUT';
  if (err instanceof Error && err.name === 'AbortError') return 'ABORT';
  // undici reports the socket failure on `cause`
  const detail = err instanceof Error && err.cause instanceof Error
    ? `${err.message} ${err.cause.message}`
    : String(err);
  if (detail.includes('ENOTFOUND') || detail.includes('getaddrinfo')) return 'DNS_FAIL';
  return 'NETWORK_ERROR';
}

export async function fetchTextWithTimeout(
  url: string,
  options: RequestInit,
  config: FetchWithTimeoutConfig
): Promise<TextResponse> {
  const controller = new AbortController();
  const startTime = Date.now();
  const { host, pathname } = new URL(url);
  let timedOut = false;

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  logger.debug({
    event: 'http_request',
    method: options.method || 'GET',
    host,
    path: pathname,
    timeoutMs: config.timeoutMs,
    stage: config.stage || 'unknown'
  }, '[FETCH] Outbound request');

  try {
    const response = await fetch(url, { ...options, signal: controller.signal });
    const body = await response.text();

    logger.debug({
      event: 'http_response',
      host,
      path: pathname,
      status: response.status,
      bytes: body.length,
      durationMs: Date.now() - startTime
    }, '[FETCH] Response received');

    return { status: response.status, body };
  } catch (err) {
    const durationMs = Date.now() - startTime;
    const errorKind = classify(err, timedOut);
    const reason = err instanceof Error ? err.message : String(err);

    throw new UpstreamRequestError(
      `${errorKind.toLowerCase().replace('_', ' ')} after ${durationMs}ms requesting ${host}${pathname}: ${reason}`,
      errorKind,
      host,
      durationMs,
      { cause: err }
    );
  } finally {
    clearTimeout(timeoutId);
  }
}
