/**
 * Display formatting for names, set labels and levels.
 */

import type { LevelMeta } from './types';

/** "fire_imp-king" → "Fire Imp King". Empty input reads "Unknown". */
export function formatName(raw: unknown): string {
  if (raw === null || raw === undefined || raw === '') return 'Unknown';
  const formatted = String(raw)
    .replace(/[-_]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/\b\w/g, (char) => char.toUpperCase());
  return formatted || 'Unknown';
}

/** Same as formatName, but an empty set stays empty. */
export function formatSetName(raw: unknown): string {
  if (raw === null || raw === undefined || raw === '') return '';
  return formatName(raw);
}

/** Current level and the level shown after the pop (one higher). */
export function resolveLevelMeta(level: number): LevelMeta {
  const current = Number.isFinite(level) ? Math.max(0, Math.trunc(level)) : 0;
  return {
    currentText: String(current),
    finalText: String(current + 1),
  };
}

/** Banner pull count: "1 pull", "10 pulls", or "rolling now" when unknown. */
export function formatPullCount(totalPulls: number): string {
  if (!Number.isFinite(totalPulls) || totalPulls <= 0) return 'rolling now';
  return `${totalPulls} ${totalPulls === 1 ? 'pull' : 'pulls'}`;
}
