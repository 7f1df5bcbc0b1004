/**
 * OpenSong Connection Manager
 *
 * Owns the WebSocket lifecycle: connect, subscribe, react to slide changes,
 * reconnect. States: DISCONNECTED → CONNECTING → SUBSCRIBED → DISCONNECTED.
 *
 * Reconnection Policy:
 * - Fixed delay between attempts, no backoff growth, no attempt limit
 *   (OpenSong is expected to come back eventually)
 * - The same delay follows a remote close or socket error
 *
 * Frames are handled strictly one at a time in receipt order: a frame is not
 * looked at until the previous fetch/extract/write cycle has finished.
 */

import { WebSocket, type ClientOptions, type RawData } from 'ws';
import { logger } from '../../lib/logger/structured-logger.js';
import { ConnectError, errorMessage } from '../../lib/errors/bridge-errors.js';
import { isAbortError, sleep } from '../../lib/reliability/sleep.js';
import type { ProcessOutcome } from '../../services/slides/slide-processor.js';
import type { SlideId } from '../../services/slides/slide.types.js';
import { parseNotification, type Notification, type StatusNotification } from './opensong-protocol.js';

export type ConnectionState = 'DISCONNECTED' | 'CONNECTING' | 'SUBSCRIBED';

export interface ConnectionManagerConfig {
  /** e.g. ws://localhost:8082/ws */
  wsUrl: string;
  subscribePath: string;
  retryDelayMs: number;
  connectTimeoutMs: number;
}

export interface SlideHandler {
  process(slideId: SlideId): Promise<ProcessOutcome>;
}

export interface ConnectionCallbacks {
  onStateChange?(state: ConnectionState, previous: ConnectionState): void;
  onNotification?(notification: Notification): void;
  onSlideProcessed?(outcome: ProcessOutcome): void;
}

export type SocketFactory = (url: string, options: ClientOptions) => WebSocket;

const defaultSocketFactory: SocketFactory = (url, options) => new WebSocket(url, options);

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export class ConnectionManager {
  private state: ConnectionState = 'DISCONNECTED';
  private socket?: WebSocket;
  private lastSlideId: SlideId | undefined;
  private connectAttempts = 0;
  private readonly stopController = new AbortController();

  constructor(
    private readonly config: ConnectionManagerConfig,
    private readonly slides: SlideHandler,
    private readonly callbacks: ConnectionCallbacks = {},
    private readonly createSocket: SocketFactory = defaultSocketFactory
  ) {}

  getState(): ConnectionState {
    return this.state;
  }

  /** Connection attempts made since run() started */
  getConnectAttempts(): number {
    return this.connectAttempts;
  }

  /**
   * Connect and keep reconnecting until stop() is called.
   * Only errors thrown by callbacks outside a frame escape this loop.
   */
  async run(): Promise<void> {
    const { signal } = this.stopController;

    while (!signal.aborted) {
      try {
        await this.runSession();
      } catch (err) {
        if (!(err instanceof ConnectError)) throw err;
        logger.warn({
          event: 'ws_connect_failed',
          url: err.url,
          attempt: this.connectAttempts,
          retryDelayMs: this.config.retryDelayMs,
          error: err.message
        }, '[WS] Connection failed, retrying');
      }

      this.setState('DISCONNECTED');
      if (signal.aborted) break;

      try {
        await sleep(this.config.retryDelayMs, signal);
      } catch (err) {
        if (isAbortError(err)) break;
        throw err;
      }
    }

    this.setState('DISCONNECTED');
    logger.info({ event: 'ws_manager_stopped', attempts: this.connectAttempts }, '[WS] Connection manager stopped');
  }

  /**
   * Stop reconnecting and close the live socket.
   * An in-flight slide cycle finishes; queued frames are skipped.
   */
  stop(): void {
    if (this.stopController.signal.aborted) return;
    this.stopController.abort();
    this.socket?.close(1000, 'shutdown');
  }

  /**
   * One connection from handshake to close. Resolves once the socket has
   * closed and every received frame has been handled; rejects with
   * ConnectError when the handshake fails.
   */
  private runSession(): Promise<void> {
    const { wsUrl, subscribePath, connectTimeoutMs } = this.config;

    this.connectAttempts++;
    this.lastSlideId = undefined;
    this.setState('CONNECTING');

    return new Promise<void>((resolve, reject) => {
      let socket: WebSocket;
      try {
        socket = this.createSocket(wsUrl, { handshakeTimeout: connectTimeoutMs });
      } catch (err) {
        reject(new ConnectError(`Cannot connect to ${wsUrl}: ${errorMessage(err)}`, wsUrl, { cause: err }));
        return;
      }

      this.socket = socket;
      let opened = false;
      let lastError: Error | undefined;
      let frames: Promise<void> = Promise.resolve();

      socket.on('open', () => {
        opened = true;
        logger.info({ event: 'ws_connected', url: wsUrl, attempt: this.connectAttempts }, `[WS] Connected to '${wsUrl}'`);

        socket.send(subscribePath, (err) => {
          if (err) {
            logger.warn({ event: 'ws_subscribe_failed', path: subscribePath, error: err.message }, '[WS] Subscription send failed');
          }
        });
        this.setState('SUBSCRIBED');
        logger.info({ event: 'ws_subscribed', path: subscribePath }, '[WS] Sent presentation subscription');
      });

      socket.on('message', (data: RawData, isBinary: boolean) => {
        if (isBinary) {
          logger.debug({ event: 'ws_binary_ignored' }, '[WS] Ignoring binary frame');
          return;
        }
        const raw = rawDataToString(data);
        frames = frames.then(() => this.handleFrame(raw));
      });

      socket.on('error', (err: Error) => {
        lastError = err;
        if (opened) {
          logger.warn({ event: 'ws_error', error: err.message }, '[WS] Socket error');
        }
      });

      socket.on('close', (code: number, reason: Buffer) => {
        if (this.socket === socket) this.socket = undefined;

        if (!opened) {
          const detail = lastError?.message ?? `closed with code ${code}`;
          reject(new ConnectError(`Cannot connect to ${wsUrl}: ${detail}`, wsUrl, { cause: lastError }));
          return;
        }

        logger.info({
          event: 'ws_disconnected',
          code,
          reason: reason.toString(),
          error: lastError?.message
        }, '[WS] Disconnected from websocket');
        this.setState('DISCONNECTED');

        frames.then(resolve, reject);
      });
    });
  }

  private async handleFrame(raw: string): Promise<void> {
    if (this.stopController.signal.aborted) return;

    try {
      const notification = parseNotification(raw);
      this.callbacks.onNotification?.(notification);
      await this.handleNotification(notification);
    } catch (err) {
      logger.error({ event: 'ws_frame_failed', err }, '[WS] Failed to handle frame, continuing');
    }
  }

  private async handleNotification(notification: Notification): Promise<void> {
    switch (notification.kind) {
      case 'ack':
        logger.info({ event: 'ws_ack' }, 'Client is connected and OpenSong is running');
        return;
      case 'already_subscribed':
        logger.info({ event: 'ws_already_subscribed' }, 'Client is already subscribed, waiting for new messages');
        return;
      case 'unknown':
        logger.info({ event: 'ws_unknown_message', raw: notification.raw.slice(0, 200) }, 'Received unknown message');
        return;
      case 'status':
        await this.handleStatus(notification);
        return;
    }
  }

  private async handleStatus(status: StatusNotification): Promise<void> {
    if (!status.running) {
      logger.info({ event: 'presentation_not_running' }, 'Presentation is not running');
      return;
    }

    if (status.slideId === this.lastSlideId) {
      logger.debug({ event: 'slide_unchanged', slideId: status.slideId }, 'Slide remains unchanged');
      return;
    }

    logger.info({
      event: 'slide_changed',
      from: this.lastSlideId ?? null,
      to: status.slideId ?? null
    }, 'Presentation moved to a new slide');
    this.lastSlideId = status.slideId;

    if (status.slideId === undefined) return;

    const outcome = await this.slides.process(status.slideId);
    this.callbacks.onSlideProcessed?.(outcome);
  }

  private setState(next: ConnectionState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    logger.debug({ event: 'ws_state', from: previous, to: next }, '[WS] State change');
    this.callbacks.onStateChange?.(next, previous);
  }
}
