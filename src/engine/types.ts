/**
 * Core overlay types: pull records, batch metadata, slots, entry state.
 *
 * Everything the animation core passes between its modules. No pixi, no DOM.
 */

/** The five canonical rarity tiers, lowest first. */
export const RARITY_TIERS = ['common', 'uncommon', 'rare', 'epic', 'legendary'] as const;

export type RarityTier = (typeof RARITY_TIERS)[number];

/**
 * A resolved rarity key. Known aliases collapse to a tier; anything else is
 * passed through lower-cased, so this is wider than RarityTier.
 */
export type RarityKey = RarityTier | (string & {});

export function isRarityTier(key: string): key is RarityTier {
  return (RARITY_TIERS as readonly string[]).includes(key);
}

/** One pull as the overlay sees it, after wire normalization. */
export interface PullRecord {
  readonly name: string;
  /** Raw rarity token from the host (N/R/SR/SSR/UR or long form). */
  readonly rarity: string;
  readonly isShiny: boolean;
  /** Non-negative integer level before this pull. */
  readonly level: number;
  /** Resolved or relative image locator; '' means no image. */
  readonly imageRef: string;
  /** Explicit reveal delay override in ms. */
  readonly revealTime?: number;
}

/** Shared, read-only metadata for every batch of one trigger. */
export interface BatchMeta {
  readonly totalPulls: number;
  readonly displayName: string;
  readonly userName?: string;
  readonly userId: string;
  readonly setName: string;
}

/** Horizontal placement of one entry in a batch. */
export interface Slot {
  /** Pixel offset from center. */
  readonly offset: number;
  /** Left-to-right position index. */
  readonly order: number;
}

/** Clip-backed stages, in play order. */
export type ClipStage = 'drop' | 'conversion' | 'opening';

/**
 * Per-entry lifecycle. Transitions only move forward through this list;
 * conversion is skipped for common, non-shiny pulls.
 */
export const ENTRY_STAGES = [
  'idle',
  'drop',
  'conversion',
  'primed',
  'opening',
  'front',
  'fading',
  'removed',
] as const;

export type EntryStage = (typeof ENTRY_STAGES)[number];

export interface CardMetrics {
  startScale: number;
  /** Start scale before priming shrank it into the behind layer. */
  readonly baseStartScale: number;
  readonly targetScale: number;
  startY: number;
  targetY: number;
}

export interface StarMetrics {
  readonly startScale: number;
  readonly targetScale: number;
}

export interface StarDurations {
  readonly rotation: number;
  readonly pulse: number;
}

export interface LevelMeta {
  readonly currentText: string;
  readonly finalText: string;
}

/** Card layer: primed cards sit behind the video stack, revealed ones in front. */
export type CardLayer = 'behind' | 'front';

/** Mutable animation state owned by exactly one entry animator. */
export interface EntryState {
  stage: EntryStage;
  /** Clip currently shown in the video stack, if any. */
  activeClip: ClipStage | null;
  layer: CardLayer;
  metrics: CardMetrics;
  labelOpacity: number;
  star: StarMetrics | null;
  starDurations: StarDurations | null;
  badgePopped: boolean;
}
