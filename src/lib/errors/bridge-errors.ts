/**
 * Bridge error taxonomy
 *
 * ConfigError is fatal at startup. ConnectError is recovered by the reconnect
 * loop; FetchError, ExtractionError and WriteError drop the current slide.
 */

export type BridgeErrorCode =
  | 'CONFIG_INVALID'
  | 'CONNECT_FAILED'
  | 'FETCH_FAILED'
  | 'EXTRACTION_FAILED'
  | 'WRITE_FAILED';

export class BridgeError extends Error {
  constructor(
    public readonly code: BridgeErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BridgeError';
  }
}

export class ConfigError extends BridgeError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigError';
  }
}

export class ConnectError extends BridgeError {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown }
  ) {
    super('CONNECT_FAILED', message, options);
    this.name = 'ConnectError';
  }
}

export class FetchError extends BridgeError {
  constructor(
    message: string,
    public readonly slideId: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super('FETCH_FAILED', message, options);
    this.name = 'FetchError';
  }
}

export class ExtractionError extends BridgeError {
  constructor(
    message: string,
    public readonly slideId: string
  ) {
    super('EXTRACTION_FAILED', message);
    this.name = 'ExtractionError';
  }
}

export class WriteError extends BridgeError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super('WRITE_FAILED', message, options);
    this.name = 'WriteError';
  }
}

/**
 * Message of anything thrown, for log fields
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
