/**
 * Socket endpoint configuration, read from the overlay page's query string.
 *
 *   ?wsHost=127.0.0.1&wsPort=17890&wsPath=/gacha&wsSecure=0&wsToken=...
 *   ?wsUrl=wss://example.test/gacha   (overrides everything above)
 */

export const DEFAULT_SOCKET_PORT = 17890;
export const DEFAULT_SOCKET_PATH = '/gacha';
const FALLBACK_HOST = '127.0.0.1';

export interface ConnectionConfig {
  /** Explicit endpoint; '' when the URL is built from the parts below. */
  url: string;
  host: string;
  port: number;
  path: string;
  secure: boolean;
  token: string;
}

/** Where the overlay page itself is served from. */
export interface PageLocation {
  hostname: string;
  protocol: string;
}

export function normalizeSocketPath(raw: string | null | undefined): string {
  const trimmed = raw?.trim();
  if (!trimmed) return DEFAULT_SOCKET_PATH;
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/** "1", "true", "yes" are true; anything else set is false; unset uses the fallback. */
export function parseBooleanParam(raw: string | null | undefined, fallback: boolean): boolean {
  if (raw === null || raw === undefined || raw === '') return fallback;
  const normalized = raw.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
}

export function readConnectionConfig(params: URLSearchParams, page: PageLocation): ConnectionConfig {
  const defaultHost = page.hostname || FALLBACK_HOST;
  const portParam = params.get('wsPort')?.trim();
  const port = portParam && !Number.isNaN(Number(portParam)) ? Number(portParam) : DEFAULT_SOCKET_PORT;
  return {
    url: params.get('wsUrl')?.trim() ?? '',
    host: params.get('wsHost')?.trim() || defaultHost,
    port,
    path: normalizeSocketPath(params.get('wsPath')),
    secure: parseBooleanParam(params.get('wsSecure'), page.protocol === 'https:'),
    token: params.get('wsToken')?.trim() ?? '',
  };
}

export function buildSocketUrl(config: ConnectionConfig): string {
  if (config.url) return config.url;
  const protocol = config.secure ? 'wss' : 'ws';
  const port = config.port ? `:${config.port}` : '';
  return `${protocol}://${config.host}${port}${config.path}`;
}
