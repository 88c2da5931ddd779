/**
 * Overlay Bridge Server: host-side broadcaster for gacha triggers.
 *
 * Overlays connect over WebSocket and receive `gacha_pulls` / `clear`
 * envelopes. With a token configured, a client only receives broadcasts
 * after a `ready` carrying that token. Binds to localhost unless told otherwise.
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { createLogger, errorMessage, type Logger } from '../utils/log';

export const DEFAULT_BRIDGE_HOST = '127.0.0.1';
export const DEFAULT_BRIDGE_PORT = 17890;
export const DEFAULT_BRIDGE_PATH = '/gacha';

/** Close code sent to clients presenting a wrong token. */
export const CLOSE_UNAUTHORIZED = 4003;
export const CLOSE_POLICY_VIOLATION = 1008;
export const CLOSE_GOING_AWAY = 1001;

export interface BridgeOptions {
  host?: string;
  /** 0 picks an ephemeral port. */
  port?: number;
  path?: string;
  token?: string;
  logger?: Logger;
}

export interface BroadcastPullsInput {
  userId: string;
  totalPulls: number;
  pulls: readonly object[];
  displayName?: string;
  setName?: string;
}

export interface BridgeClientInfo {
  authenticated: boolean;
  connectedAt: number;
  lastPongAt: number | null;
}

export interface BridgeServer {
  wss: WebSocketServer;
  /** Resolves with the bound port once listening. */
  listening: Promise<number>;
  readonly url: string;
  clients(): BridgeClientInfo[];
  broadcastPulls(input: BroadcastPullsInput): Promise<boolean>;
  broadcastClear(): Promise<boolean>;
  shutdown(): Promise<void>;
}

function normalizePath(raw: string | undefined): string {
  const trimmed = raw?.trim() || DEFAULT_BRIDGE_PATH;
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

function requestPath(url: string | undefined): string {
  if (!url) return '/';
  const query = url.indexOf('?');
  return query >= 0 ? url.slice(0, query) : url;
}

export function startBridgeServer(options: BridgeOptions = {}): BridgeServer {
  const host = options.host?.trim() || DEFAULT_BRIDGE_HOST;
  const path = normalizePath(options.path);
  const token = options.token?.trim() ?? '';
  const log = options.logger ?? createLogger('bridge');
  const state = new Map<WebSocket, BridgeClientInfo>();

  const wss = new WebSocketServer({
    port: options.port ?? DEFAULT_BRIDGE_PORT,
    host,
    perMessageDeflate: false,
    maxPayload: 65_536,
    clientTracking: true,
  });

  let boundPort = options.port ?? DEFAULT_BRIDGE_PORT;
  const listening = new Promise<number>((resolve, reject) => {
    wss.once('listening', () => {
      const address = wss.address();
      boundPort = typeof address === 'string' ? boundPort : address.port;
      log.info(`listening on ws://${host}:${boundPort}${path}`);
      resolve(boundPort);
    });
    wss.on('error', (err) => {
      log.error('server error:', err.message);
      reject(err);
    });
  });

  wss.on('connection', (ws, req) => {
    req.socket.setNoDelay(true);
    const peer = `${req.socket.remoteAddress ?? 'unknown'}:${req.socket.remotePort ?? ''}`;

    if (requestPath(req.url) !== path) {
      log.warn(`rejecting client on ${requestPath(req.url)}`);
      ws.close(CLOSE_POLICY_VIOLATION, 'Invalid overlay path');
      return;
    }

    const info: BridgeClientInfo = { authenticated: token === '', connectedAt: Date.now(), lastPongAt: null };
    state.set(ws, info);
    log.info(`overlay connected from ${peer}`);
    void sendJson(ws, { type: 'hello', version: 1, requiresAuth: token !== '' });

    ws.on('message', (data: RawData) => {
      let msg: unknown;
      try {
        msg = JSON.parse(data.toString());
      } catch (err) {
        log.warn('malformed JSON from overlay:', errorMessage(err));
        return;
      }
      if (typeof msg !== 'object' || msg === null || Array.isArray(msg)) return;
      dispatch(ws, info, new Map(Object.entries(msg)));
    });

    ws.on('close', () => {
      state.delete(ws);
      log.info(`overlay disconnected: ${peer}`);
    });
    ws.on('error', (err) => {
      log.error('connection error:', err.message);
      state.delete(ws);
    });
  });

  function dispatch(ws: WebSocket, info: BridgeClientInfo, msg: Map<string, unknown>): void {
    switch (msg.get('type')) {
      case 'ready': {
        if (info.authenticated) return;
        const provided = msg.get('token');
        if (typeof provided !== 'string' || provided.trim() !== token) {
          void sendJson(ws, { type: 'error', code: 'unauthorized' });
          ws.close(CLOSE_UNAUTHORIZED, 'Invalid token');
          return;
        }
        info.authenticated = true;
        void sendJson(ws, { type: 'ready_ack' });
        log.info('overlay authenticated');
        return;
      }
      case 'ping':
        void sendJson(ws, { type: 'pong', ts: msg.get('ts') });
        return;
      case 'pong':
        info.lastPongAt = Date.now();
        return;
      default:
        return;
    }
  }

  function sendJson(ws: WebSocket, payload: object): Promise<boolean> {
    return new Promise((resolve) => {
      if (ws.readyState !== WebSocket.OPEN) {
        resolve(false);
        return;
      }
      ws.send(JSON.stringify(payload), (err) => {
        if (err) log.warn('send failed:', err.message);
        resolve(!err);
      });
    });
  }

  async function broadcast(envelope: object): Promise<boolean> {
    if (state.size === 0) {
      log.debug('no overlay clients connected; skipping broadcast');
      return false;
    }
    const recipients = [...state].filter(([, info]) => info.authenticated).map(([ws]) => ws);
    if (recipients.length === 0) {
      log.warn('overlay clients connected, but none authenticated');
      return false;
    }
    const results = await Promise.all(recipients.map((ws) => sendJson(ws, envelope)));
    recipients.forEach((ws, index) => {
      if (!results[index]) {
        state.delete(ws);
        ws.terminate();
      }
    });
    const delivered = results.filter(Boolean).length;
    if (delivered === 0) log.warn('broadcast failed; no overlay accepted the payload');
    return delivered > 0;
  }

  function broadcastPulls(input: BroadcastPullsInput): Promise<boolean> {
    return broadcast({
      type: 'gacha_pulls',
      payload: {
        userId: input.userId,
        totalPulls: input.totalPulls,
        pulls: input.pulls,
        timestamp: Date.now() / 1000,
        displayName: input.displayName ?? '',
        setName: input.setName ?? '',
      },
    });
  }

  function broadcastClear(): Promise<boolean> {
    return broadcast({ type: 'clear' });
  }

  function shutdown(): Promise<void> {
    log.info('shutting down...');
    wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.close(CLOSE_GOING_AWAY, 'Server shutting down');
      }
    });
    state.clear();
    return new Promise((resolve, reject) => {
      wss.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        log.info('closed');
        resolve();
      });
    });
  }

  return {
    wss,
    listening,
    get url() {
      return `ws://${host}:${boundPort}${path}`;
    },
    clients: () => [...state.values()].map((info) => ({ ...info })),
    broadcastPulls,
    broadcastClear,
    shutdown,
  };
}
