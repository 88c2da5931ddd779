/**
 * Inbound socket frames: parsing and normalization.
 *
 * Hosts spell the same metadata several ways. Each field is resolved as the
 * first non-empty candidate in a fixed preference list; the lists below are
 * the contract with existing hosts, keep their order.
 */

import { resolveImageSource } from '../engine/assets';
import { formatSetName } from '../engine/format';
import type { BatchMeta, PullRecord } from '../engine/types';

export interface PullsMessage {
  type: 'gacha_pulls';
  pulls: PullRecord[];
  meta: BatchMeta;
}

export type InboundMessage =
  | PullsMessage
  | { type: 'clear' }
  | { type: 'ping'; ts: unknown }
  | { type: 'unknown'; rawType: unknown }
  | { type: 'malformed'; reason: string };

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(source: unknown, key: string): unknown {
  return isObject(source) ? source[key] : undefined;
}

function firstNonEmpty(candidates: readonly unknown[]): string {
  for (const candidate of candidates) {
    if (typeof candidate === 'string' && candidate.trim().length > 0) {
      return candidate.trim();
    }
  }
  return '';
}

/** Decode a text frame. Never throws; bad input comes back as 'malformed'. */
export function parseInboundMessage(raw: unknown): InboundMessage {
  if (typeof raw !== 'string' || raw.length === 0) {
    return { type: 'malformed', reason: 'empty or non-text frame' };
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    return { type: 'malformed', reason: err instanceof Error ? err.message : String(err) };
  }
  if (!isObject(data)) {
    return { type: 'malformed', reason: 'frame is not a JSON object' };
  }
  switch (data.type) {
    case 'gacha_pulls':
      return parsePullsMessage(data);
    case 'clear':
      return { type: 'clear' };
    case 'ping':
      return { type: 'ping', ts: data.ts };
    default:
      return { type: 'unknown', rawType: data.type };
  }
}

function parsePullsMessage(data: JsonObject): PullsMessage {
  const payload: JsonObject = isObject(data.payload) ? data.payload : isObject(data.data) ? data.data : {};
  const rawPulls = Array.isArray(payload.pulls) ? payload.pulls : Array.isArray(data.pulls) ? data.pulls : [];
  const pulls = rawPulls.filter(isObject).map(normalizePull);
  const user = payload.user;

  const displayName = firstNonEmpty([
    payload.displayName,
    payload.display_name,
    payload.userDisplayName,
    payload.user_name,
    field(user, 'displayName'),
    field(user, 'display_name'),
    user,
  ]);
  const userId = firstNonEmpty([payload.userId, payload.user_id, field(user, 'id')]);
  const rawTotal = Number(payload.totalPulls ?? payload.total_pulls);
  const totalPulls = Number.isFinite(rawTotal) && rawTotal > 0 ? rawTotal : pulls.length;
  const setName = firstNonEmpty([
    payload.setName,
    payload.set_name,
    payload.set,
    data.setName,
    data.set_name,
    data.set,
  ]);

  return {
    type: 'gacha_pulls',
    pulls,
    meta: { totalPulls, displayName, userId, setName: formatSetName(setName) },
  };
}

/** Wire pull → PullRecord. Missing fields get safe defaults. */
export function normalizePull(raw: JsonObject): PullRecord {
  const level = Number(raw.level);
  const revealTime = raw.revealTime;
  const record: PullRecord = {
    name: typeof raw.name === 'string' ? raw.name : '',
    rarity: typeof raw.rarity === 'string' ? raw.rarity : '',
    isShiny: Boolean(raw.is_shiny ?? raw.isShiny),
    level: Number.isFinite(level) ? Math.max(0, Math.trunc(level)) : 0,
    imageRef: resolveImageSource(raw),
  };
  return typeof revealTime === 'number' && Number.isFinite(revealTime) ? { ...record, revealTime } : record;
}
