/**
 * Reconnecting client socket for the overlay.
 *
 * The underlying connection comes from a SocketFactory so the same state
 * machine runs over the browser WebSocket or over `ws` in Node.
 *
 *   disconnected → connecting → open → (closed by peer) → reconnecting → connecting …
 *   close() from any state → closed (terminal)
 */

import { parseInboundMessage, type InboundMessage } from './messages';
import { errorMessage, type Logger } from '../utils/log';

export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: unknown): void;
  onClose(code: number, reason: string): void;
  onError(message: string): void;
}

export interface SocketConnection {
  readonly isOpen: boolean;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketConnection;

export type SocketState = 'disconnected' | 'connecting' | 'open' | 'reconnecting' | 'closed';

export interface RetryPolicy {
  initialDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY = {
  initialDelayMs: 1000,
  factor: 1.5,
  maxDelayMs: 10_000,
} as const satisfies RetryPolicy;

export interface OverlaySocketOptions {
  url: string;
  token?: string;
  factory: SocketFactory;
  logger: Logger;
  onMessage(message: InboundMessage, socket: OverlaySocket): void;
  onStateChange?(state: SocketState): void;
  retry?: RetryPolicy;
}

/** Socket factory over the browser's global WebSocket. */
export const browserSocketFactory: SocketFactory = (url, handlers) => {
  const socket = new WebSocket(url);
  socket.addEventListener('open', () => handlers.onOpen());
  socket.addEventListener('message', (event) => handlers.onMessage(event.data));
  socket.addEventListener('error', () => handlers.onError('socket error'));
  socket.addEventListener('close', (event) => handlers.onClose(event.code, event.reason));
  return {
    get isOpen() {
      return socket.readyState === WebSocket.OPEN;
    },
    send: (data) => socket.send(data),
    close: (code, reason) => socket.close(code, reason),
  };
};

export class OverlaySocket {
  private readonly retry: RetryPolicy;
  private connection: SocketConnection | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private currentState: SocketState = 'disconnected';
  private delay: number;

  constructor(private readonly options: OverlaySocketOptions) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.delay = this.retry.initialDelayMs;
  }

  get state(): SocketState {
    return this.currentState;
  }

  /** Delay the next reconnect attempt will wait. */
  get nextRetryDelay(): number {
    return this.delay;
  }

  connect(): void {
    if (this.currentState === 'closed' || this.currentState === 'connecting' || this.currentState === 'open') return;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.setState('connecting');
    const handlers: SocketHandlers = {
      onOpen: () => {
        if (this.currentState === 'closed') return;
        this.delay = this.retry.initialDelayMs;
        this.setState('open');
        const token = this.options.token;
        this.send(token ? { type: 'ready', version: 1, token, overlay: 'gacha' } : { type: 'ready', version: 1, overlay: 'gacha' });
      },
      onMessage: (data) => this.handleFrame(data),
      onError: (message) => {
        this.options.logger.warn('Socket error', message);
        this.connection?.close();
      },
      onClose: (code, reason) => {
        this.connection = null;
        if (this.currentState === 'closed') return;
        this.scheduleReconnect(`closed (${code}${reason ? ` ${reason}` : ''})`);
      },
    };
    try {
      this.connection = this.options.factory(this.options.url, handlers);
    } catch (err) {
      this.connection = null;
      this.scheduleReconnect(errorMessage(err));
    }
  }

  /** Serialize and send; returns false when the socket is not open. */
  send(payload: object): boolean {
    const connection = this.connection;
    if (!connection || !connection.isOpen) return false;
    try {
      connection.send(JSON.stringify(payload));
      return true;
    } catch (err) {
      this.options.logger.warn('Failed to send message to host', errorMessage(err));
      return false;
    }
  }

  /** Close for good; no further reconnects. */
  close(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.setState('closed');
    const connection = this.connection;
    this.connection = null;
    connection?.close(1000, 'Overlay closed');
  }

  private handleFrame(data: unknown): void {
    const message = parseInboundMessage(data);
    if (message.type === 'malformed') {
      this.options.logger.warn('Dropped malformed frame', message.reason);
      return;
    }
    this.options.onMessage(message, this);
  }

  private scheduleReconnect(reason: string): void {
    const delay = this.delay;
    this.delay = Math.min(this.retry.maxDelayMs, this.delay * this.retry.factor);
    this.options.logger.warn(`Socket ${reason}, retrying in ${delay}ms`);
    this.setState('reconnecting');
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private setState(state: SocketState): void {
    if (this.currentState === state) return;
    this.currentState = state;
    this.options.onStateChange?.(state);
  }
}
