/**
 * Overlay Configuration: timing, geometry and asset constants.
 *
 * Every magic number the choreography uses lives here. Durations are in
 * milliseconds, offsets in pixels, scales are unitless multipliers.
 */

export interface BatchConfig {
  /** Entries animated together; longer triggers are split. */
  maxVisible: number;
  horizontalSpacing: number;
}

export interface StageTimingConfig {
  dropStaggerMs: number;
  openingStaggerMs: number;
  /** Pause after the drop stage, only when some entry converts. */
  dropFreezeMs: number;
  conversionChainDelayMs: number;
  /** Extra hold before priming when every entry is common and non-shiny. */
  commonOnlyOpeningDelayMs: number;
  cardPrimeHoldMs: number;
  cardRevealDelayMs: number;
  stageHandoffDelayMs: number;
  openingPromotionDelayMs: number;
  openingRevealProgress: number;
  openingRevealTimeoutMs: number;
  silhouetteDelayMs: number;
  batchHoldMs: number;
  fadeSteps: number;
  frameDelayMs: number;
}

export interface CardConfig {
  targetScale: number;
  startRatio: number;
  multiStartRatio: number;
  minStartScale: number;
  maxScale: number;
  startY: number;
  targetY: number;
  behindScaleMult: number;
  behindCenterRatio: number;
  promotionTargetRatio: number;
  /** Used when the video stack measures shorter than this. */
  placementFallbackPx: number;
  centerOffsetPx: number;
  riseDurationMs: number;
  silhouetteDurationMs: number;
  labelFadeDurationMs: number;
  /** Asset scale for 3+ entry batches. */
  assetScaleByCount: Readonly<Record<number, number>>;
}

export interface StarConfig {
  startScaleRatio: number;
  targetScaleMult: number;
  maxScale: number;
  growDurationMs: number;
  rotationDurationMs: number;
  pulseDurationMs: number;
  verticalOffsetPx: number;
  jitterRatio: number;
}

export interface BadgeConfig {
  hiddenScale: number;
  overshootScale: number;
  settleScale: number;
  overshootMs: number;
  settleMs: number;
}

export interface LevelConfig {
  initialHoldMs: number;
  popDurationMs: number;
  peakScale: number;
}

export interface MediaConfig {
  /** Bound on waiting for a clip's first data or an image load. */
  readyTimeoutMs: number;
  startTimeoutMs: number;
  defaultTimeoutMs: number;
  /** Poll interval for progress gating, alongside timeupdate. */
  progressPollMs: number;
  muted: boolean;
}

export interface AssetConfig {
  root: string;
  animationRoot: string;
  imagesRoot: string;
  dropFile: string;
  clipExtension: string;
}

export interface OverlayConfig {
  batch: BatchConfig;
  timing: StageTimingConfig;
  card: CardConfig;
  star: StarConfig;
  badge: BadgeConfig;
  level: LevelConfig;
  media: MediaConfig;
  assets: AssetConfig;
  debug: boolean;
}

export const DEFAULT_OVERLAY_CONFIG = {
  batch: {
    maxVisible: 4,
    horizontalSpacing: 450,
  },
  timing: {
    dropStaggerMs: 120,
    openingStaggerMs: 120,
    dropFreezeMs: 250,
    conversionChainDelayMs: 250,
    commonOnlyOpeningDelayMs: 250,
    cardPrimeHoldMs: 200,
    cardRevealDelayMs: 250,
    stageHandoffDelayMs: 50,
    openingPromotionDelayMs: 350,
    openingRevealProgress: 0.15,
    openingRevealTimeoutMs: 1500,
    silhouetteDelayMs: 250,
    batchHoldMs: 3000,
    fadeSteps: 20,
    frameDelayMs: 20,
  },
  card: {
    targetScale: 0.85,
    startRatio: 0.28,
    multiStartRatio: 0.22,
    minStartScale: 0.18,
    maxScale: 1.2,
    startY: 0,
    targetY: -360,
    behindScaleMult: 0.65,
    behindCenterRatio: 0.5,
    promotionTargetRatio: 0.75,
    placementFallbackPx: 320,
    centerOffsetPx: -30,
    riseDurationMs: 650,
    silhouetteDurationMs: 480,
    labelFadeDurationMs: 320,
    assetScaleByCount: { 1: 1, 2: 1, 3: 0.92, 4: 0.9 },
  },
  star: {
    startScaleRatio: 0.22,
    targetScaleMult: 2.8,
    maxScale: 4.5,
    growDurationMs: 420,
    rotationDurationMs: 14000,
    pulseDurationMs: 1800,
    verticalOffsetPx: -30,
    jitterRatio: 0.15,
  },
  badge: {
    hiddenScale: 0.05,
    overshootScale: 1.2,
    settleScale: 1,
    overshootMs: 130,
    settleMs: 90,
  },
  level: {
    initialHoldMs: 500,
    popDurationMs: 420,
    peakScale: 1.8,
  },
  media: {
    readyTimeoutMs: 10000,
    startTimeoutMs: 1000,
    defaultTimeoutMs: 25000,
    progressPollMs: 33,
    muted: false,
  },
  assets: {
    root: 'assets',
    animationRoot: 'animations',
    imagesRoot: 'images',
    dropFile: 'drop.webm',
    clipExtension: 'webm',
  },
  debug: false,
} as const satisfies OverlayConfig;

export type OverlayConfigOverrides = {
  [K in keyof OverlayConfig]?: OverlayConfig[K] extends object ? Partial<OverlayConfig[K]> : OverlayConfig[K];
};

/** Merge per-group overrides over the defaults. Rejects nonsensical batch sizes. */
export function resolveOverlayConfig(overrides: OverlayConfigOverrides = {}): OverlayConfig {
  const config: OverlayConfig = {
    batch: { ...DEFAULT_OVERLAY_CONFIG.batch, ...overrides.batch },
    timing: { ...DEFAULT_OVERLAY_CONFIG.timing, ...overrides.timing },
    card: { ...DEFAULT_OVERLAY_CONFIG.card, ...overrides.card },
    star: { ...DEFAULT_OVERLAY_CONFIG.star, ...overrides.star },
    badge: { ...DEFAULT_OVERLAY_CONFIG.badge, ...overrides.badge },
    level: { ...DEFAULT_OVERLAY_CONFIG.level, ...overrides.level },
    media: { ...DEFAULT_OVERLAY_CONFIG.media, ...overrides.media },
    assets: { ...DEFAULT_OVERLAY_CONFIG.assets, ...overrides.assets },
    debug: overrides.debug ?? DEFAULT_OVERLAY_CONFIG.debug,
  };
  const { maxVisible } = config.batch;
  if (!Number.isInteger(maxVisible) || maxVisible < 1 || maxVisible > 4) {
    throw new Error(`batch.maxVisible must be an integer in 1-4, got ${maxVisible}`);
  }
  return config;
}
