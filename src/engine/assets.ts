/**
 * Asset Resolver: maps a pull's rarity and shininess to file paths.
 *
 * Pure functions. Unknown rarities never fail: they pass through for
 * clip lookup and fall back to the common tier for stars and badges.
 */

import { DEFAULT_OVERLAY_CONFIG, type AssetConfig } from './config';
import { isRarityTier, type PullRecord, type RarityKey, type RarityTier } from './types';

const RARITY_ALIASES: Readonly<Record<string, RarityTier>> = {
  UR: 'legendary',
  SSR: 'epic',
  SR: 'rare',
  R: 'uncommon',
  N: 'common',
  LEGENDARY: 'legendary',
  EPIC: 'epic',
  RARE: 'rare',
  UNCOMMON: 'uncommon',
  COMMON: 'common',
};

const STAR_FILES: Readonly<Record<RarityTier, string>> = {
  common: 'star_yellow.svg',
  uncommon: 'star_green.svg',
  rare: 'star_blue.svg',
  epic: 'star_purple.svg',
  legendary: 'star_orange.svg',
};

const SHINY_STAR_FILE = 'star_prismatic.svg';
const SHINY_BADGE_FILE = 'badge_shiny.png';
const SHINY_CLIP_NAME = 'shiny';

export interface StageClips {
  drop: string;
  /** Null when the pull has no conversion stage. */
  conversion: string | null;
  opening: string;
}

/** Canonical rarity key: known short/long tokens map to a tier, others pass through lower-cased. */
export function resolveRarityKey(raw: unknown): RarityKey {
  if (!raw) return 'common';
  const normalized = String(raw).trim().toUpperCase();
  if (!normalized) return 'common';
  return RARITY_ALIASES[normalized] ?? normalized.toLowerCase();
}

/** Join asset segments under the configured root, trimming stray separators. */
export function buildAssetPath(assets: AssetConfig, folder: string, ...segments: string[]): string {
  return [assets.root, folder, ...segments]
    .filter((segment) => segment.length > 0)
    .map((segment) => segment.replace(/^[\\/]+|[\\/]+$/g, ''))
    .join('/');
}

function imagePath(assets: AssetConfig, fileName: string): string {
  return buildAssetPath(assets, assets.imagesRoot, fileName);
}

function animationPath(assets: AssetConfig, ...segments: string[]): string {
  return buildAssetPath(assets, assets.animationRoot, ...segments);
}

function tierOrCommon(rarity: RarityKey): RarityTier {
  const normalized = rarity.trim().toLowerCase();
  return isRarityTier(normalized) ? normalized : 'common';
}

export function resolveStarAsset(
  rarity: RarityKey,
  isShiny: boolean,
  assets: AssetConfig = DEFAULT_OVERLAY_CONFIG.assets,
): string {
  if (isShiny) return imagePath(assets, SHINY_STAR_FILE);
  return imagePath(assets, STAR_FILES[tierOrCommon(rarity)]);
}

export function resolveBadgeAsset(
  rarity: RarityKey,
  isShiny: boolean,
  assets: AssetConfig = DEFAULT_OVERLAY_CONFIG.assets,
): string {
  if (isShiny) return imagePath(assets, SHINY_BADGE_FILE);
  return imagePath(assets, `badge_${tierOrCommon(rarity)}.png`);
}

/**
 * Clip for each stage. Common, non-shiny pulls get no conversion clip:
 * their conversion stage is a no-op.
 */
export function resolveStageClips(
  rarity: RarityKey,
  isShiny: boolean,
  assets: AssetConfig = DEFAULT_OVERLAY_CONFIG.assets,
): StageClips {
  const drop = animationPath(assets, assets.dropFile);
  const clipName = isShiny ? SHINY_CLIP_NAME : rarity;
  const file = `${clipName}.${assets.clipExtension}`;
  return {
    drop,
    conversion: !isShiny && rarity === 'common' ? null : animationPath(assets, 'conversion', file),
    opening: animationPath(assets, 'opening', file),
  };
}

/** Wire fields that may locate a pull's card image. */
export interface ImageFields {
  image_path?: unknown;
  imagePath?: unknown;
  image_url?: unknown;
  image?: unknown;
  set?: unknown;
  set_name?: unknown;
  rarity?: unknown;
}

function nonEmptyString(value: unknown): string {
  return typeof value === 'string' && value.length > 0 ? value : '';
}

/**
 * Card image locator. An explicit path wins (separators normalized);
 * otherwise `../<set>/<rarity>/<image>`; '' when nothing is resolvable.
 */
export function resolveImageSource(fields: ImageFields): string {
  const direct = nonEmptyString(fields.image_path) || nonEmptyString(fields.imagePath) || nonEmptyString(fields.image_url);
  if (direct) return direct.replace(/\\/g, '/');
  const image = nonEmptyString(fields.image);
  if (!image) return '';
  const setName = nonEmptyString(fields.set) || nonEmptyString(fields.set_name) || 'default';
  const rarity = (nonEmptyString(fields.rarity) || 'common').toLowerCase();
  return `../${setName}/${rarity}/${image}`;
}

/** True when the pull plays a conversion clip. */
export function isConversionEligible(record: Pick<PullRecord, 'rarity' | 'isShiny'>): boolean {
  return record.isShiny || resolveRarityKey(record.rarity) !== 'common';
}
