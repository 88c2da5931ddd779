/**
 * EntryAnimator: one pull's full visual lifecycle.
 *
 * Owns the entry's layered node tree:
 *
 *   gacha-chain (slot-offset, opacity)
 *   ├── video-stack: drop / conversion / opening clips
 *   └── card-rig (card-scale, card-translateY, silhouette-strength)
 *       ├── gacha-star-wrapper → gacha-star-rotator → gacha-star
 *       ├── gacha-card-frame → gacha-card, rarity-badge → rarity-badge-image
 *       └── label-stack (label-opacity) → gacha-name, gacha-level
 *
 * Stage order is monotonic (see ENTRY_STAGES). Every public step is a no-op
 * once the tree has been detached, so a cleared stage never stalls.
 */

import type { OverlayConfig } from './config';
import {
  resolveBadgeAsset,
  resolveRarityKey,
  resolveStageClips,
  resolveStarAsset,
  type StageClips,
} from './assets';
import { formatName, resolveLevelMeta } from './format';
import { MediaGate, loadImage } from './media-gate';
import {
  ENTRY_STAGES,
  type CardLayer,
  type CardMetrics,
  type ClipStage,
  type EntryStage,
  type EntryState,
  type LevelMeta,
  type PullRecord,
  type RarityKey,
  type Slot,
  type StarMetrics,
} from './types';
import type { ImageNode, SceneBackend, SceneNode, TextNode, VideoNode } from '../scene/types';
import type { Logger } from '../utils/log';
import { applyJitter, clamp, sleep, type RandomSource } from '../utils/timing';

const CLIP_STAGES: readonly ClipStage[] = ['drop', 'conversion', 'opening'];

export interface EntryHooks {
  onStage?(entry: EntryAnimator, stage: EntryStage): void;
  onClip?(entry: EntryAnimator, stage: ClipStage, src: string): void;
}

export interface EntryAnimatorDeps {
  scene: SceneBackend;
  config: OverlayConfig;
  logger: Logger;
  random?: RandomSource;
  hooks?: EntryHooks;
}

interface EntryNodes {
  root: SceneNode;
  videoStack: SceneNode;
  videos: Record<ClipStage, VideoNode>;
  cardRig: SceneNode;
  cardFrame: SceneNode;
  cardImage: ImageNode;
  labels: SceneNode;
  name: TextNode;
  levelNumber: TextNode;
  starWrapper: SceneNode;
  starRotator: SceneNode;
  starImage: ImageNode;
  badge: SceneNode;
  badgeImage: ImageNode;
}

export class EntryAnimator {
  readonly rarityKey: RarityKey;
  readonly levelMeta: LevelMeta;
  readonly clips: StageClips;
  readonly state: EntryState;
  /** Resolves once card, star and badge images loaded, failed or timed out. Never rejects. */
  readonly ready: Promise<void>;

  private readonly nodes: EntryNodes;
  private readonly gates: Record<ClipStage, MediaGate>;
  private readonly scene: SceneBackend;
  private readonly config: OverlayConfig;
  private readonly logger: Logger;
  private readonly hooks: EntryHooks;

  constructor(
    readonly record: PullRecord,
    readonly slot: Slot,
    batchSize: number,
    host: SceneNode,
    deps: EntryAnimatorDeps,
  ) {
    this.scene = deps.scene;
    this.config = deps.config;
    this.logger = deps.logger;
    this.hooks = deps.hooks ?? {};

    this.rarityKey = resolveRarityKey(record.rarity);
    this.levelMeta = resolveLevelMeta(record.level);
    this.clips = resolveStageClips(this.rarityKey, record.isShiny, this.config.assets);

    const metrics = this.computeCardMetrics(batchSize);
    this.state = {
      stage: 'idle',
      activeClip: null,
      layer: 'behind',
      metrics,
      labelOpacity: 0,
      star: null,
      starDurations: null,
      badgePopped: false,
    };

    this.nodes = this.buildTree(host);
    this.gates = {
      drop: this.createGate('drop'),
      conversion: this.createGate('conversion'),
      opening: this.createGate('opening'),
    };
    for (const stage of CLIP_STAGES) {
      this.nodes.videos[stage].setSource(this.clips[stage]);
    }
    this.logger.debug('Entry mounted', { order: slot.order, rarity: this.rarityKey, clips: this.clips });

    const starReady = this.configureStar(deps.random ?? Math.random);
    const { readyTimeoutMs } = this.config.media;
    this.ready = Promise.all([
      loadImage(this.nodes.cardImage.element, readyTimeoutMs, this.logger),
      starReady,
      loadImage(this.nodes.badgeImage.element, readyTimeoutMs, this.logger),
    ]).then(() => undefined);
  }

  get order(): number {
    return this.slot.order;
  }

  get stage(): EntryStage {
    return this.state.stage;
  }

  /** True once the entry's tree has been torn down. */
  get detached(): boolean {
    return this.nodes.root.destroyed;
  }

  get hasConversionClip(): boolean {
    return this.clips.conversion !== null;
  }

  get rootNode(): SceneNode {
    return this.nodes.root;
  }

  // ──────────────────────────────────────────────────────
  // Stages
  // ──────────────────────────────────────────────────────

  async playDrop(delayMs: number): Promise<void> {
    if (!this.advance('drop')) return;
    await this.playClip('drop', delayMs, true);
  }

  async playConversion(delayMs: number): Promise<void> {
    if (!this.clips.conversion) {
      this.logger.debug('Conversion skipped (no clip)', { order: this.order });
      return;
    }
    if (!this.advance('conversion')) return;
    await this.playClip('conversion', delayMs, true);
  }

  /** Park the card behind the video stack, shrunk and silhouetted. */
  prime(): void {
    if (this.detached || !this.advance('primed')) return;
    const { card } = this.config;
    const metrics = this.state.metrics;
    const stackHeight = Math.max(this.scene.measureHeight(this.nodes.videoStack), card.placementFallbackPx);
    const centerRatio = clamp(card.behindCenterRatio, 0, 1);
    const promotionRatio = clamp(card.promotionTargetRatio, 0, 1);
    metrics.startY = -stackHeight * centerRatio - card.centerOffsetPx;
    metrics.targetY = -stackHeight * promotionRatio - card.centerOffsetPx;
    metrics.startScale = clamp(metrics.baseStartScale * card.behindScaleMult, card.minStartScale, metrics.targetScale);

    const rig = this.nodes.cardRig;
    rig.setParam('card-translateY', metrics.startY);
    rig.setParam('card-scale', metrics.startScale);
    rig.setParam('silhouette-strength', 1);
    rig.setFlag('is-hidden', true);
    rig.setFlag('is-stealthed', true);
    this.setLayer('behind');
  }

  /** Enter the opening stage: unhide the primed card and let it fade in next frame. */
  async fadeInBackdrop(): Promise<void> {
    if (this.detached || !this.advance('opening')) return;
    const rig = this.nodes.cardRig;
    rig.setFlag('is-stealthed', true);
    rig.setFlag('is-hidden', false);
    await this.scene.nextFrame();
    rig.setFlag('is-stealthed', false);
  }

  async playOpening(delayMs: number): Promise<void> {
    if (delayMs > 0) await sleep(delayMs);
    await this.playClip('opening', 0, false);
  }

  /**
   * Wait until the card may come forward: the opening clip reaching the
   * reveal progress ratio, or `fallbackDelayMs` when the clip never starts
   * or never reports a duration.
   */
  async waitForRevealCue(fallbackDelayMs: number): Promise<void> {
    const { timing, media } = this.config;
    const delay = Math.max(0, fallbackDelayMs);
    const gate = this.gates.opening;
    await gate.waitForStart(media.startTimeoutMs);
    if (timing.stageHandoffDelayMs > 0) await sleep(timing.stageHandoffDelayMs);
    const progress = clamp(timing.openingRevealProgress, 0.05, 0.95);
    const timeout = Math.max(timing.openingRevealTimeoutMs, delay);
    const durationKnown = await gate.waitForDurationKnown(media.startTimeoutMs);
    const hitProgress = durationKnown ? await gate.waitForProgress(progress, timeout) : false;
    if (!hitProgress && delay > 0) await sleep(delay);
    if (timing.openingPromotionDelayMs > 0) await sleep(timing.openingPromotionDelayMs);
  }

  /** Bring the card to the front layer. */
  promote(): void {
    if (this.detached || !this.advance('front')) return;
    this.nodes.cardRig.setFlag('is-hidden', false);
    this.setLayer('front');
  }

  /** Silhouette hold, rise tween, badge pop, level pop. */
  async finishReveal(): Promise<void> {
    if (this.detached) return;
    const { silhouetteDelayMs } = this.config.timing;
    if (silhouetteDelayMs > 0) await sleep(silhouetteDelayMs);
    await this.tweenCard();
    await this.popBadge();
    await this.animateLevel();
  }

  setOpacity(value: number): void {
    if (this.state.stage !== 'fading' && !this.advance('fading')) return;
    this.nodes.root.setParam('opacity', clamp(value, 0, 1));
    this.nodes.root.setData('state', 'fading');
  }

  /** Stop and release every clip, then detach the tree. */
  remove(): void {
    if (this.state.stage === 'removed') return;
    for (const stage of CLIP_STAGES) {
      const video = this.nodes.videos[stage];
      video.media.pause();
      video.setSource(null);
    }
    this.nodes.root.destroy();
    this.advance('removed');
  }

  // ──────────────────────────────────────────────────────
  // Reveal pieces
  // ──────────────────────────────────────────────────────

  async tweenCard(): Promise<void> {
    if (this.detached) return;
    const { card, star } = this.config;
    const metrics = this.state.metrics;
    const riseMs = Math.max(100, card.riseDurationMs);
    const silhouetteMs = Math.max(50, card.silhouetteDurationMs);
    const labelMs = Math.max(50, card.labelFadeDurationMs);
    const rig = this.nodes.cardRig;

    rig.setParam('card-scale', metrics.startScale);
    rig.setParam('card-translateY', metrics.startY);
    rig.setParam('silhouette-strength', 1);
    this.setLabelOpacity(0);

    const settled = sleep(riseMs + 50);
    await this.scene.nextFrame();
    rig.setParam('card-scale', metrics.targetScale, riseMs);
    rig.setParam('card-translateY', metrics.targetY, riseMs);
    rig.setParam('silhouette-strength', 0, silhouetteMs);
    this.setLabelOpacity(1, labelMs);
    if (this.state.star) {
      const scale = clamp(this.state.star.targetScale, 0.05, star.maxScale);
      this.nodes.starWrapper.setParam('star-scale', scale, Math.max(100, star.growDurationMs));
    }
    await settled;
  }

  /** Overshoot to 120% then settle at 100%. Runs once per entry. */
  async popBadge(): Promise<void> {
    if (this.detached || this.state.badgePopped) return;
    this.state.badgePopped = true;
    const { badge } = this.config;
    const node = this.nodes.badge;
    node.setFlag('is-visible', true);
    node.setFlag('is-stealthed', false);
    await this.scene.nextFrame();
    node.setParam('badge-scale', badge.overshootScale, badge.overshootMs);
    await sleep(badge.overshootMs);
    node.setParam('badge-scale', badge.settleScale, badge.settleMs);
    await sleep(badge.settleMs);
  }

  /** Hold, show level + 1 in the upgraded state, then clear the pop. */
  async animateLevel(): Promise<void> {
    if (this.detached) return;
    const { level } = this.config;
    const numberNode = this.nodes.levelNumber;
    if (level.initialHoldMs > 0) await sleep(level.initialHoldMs);
    numberNode.text = this.levelMeta.finalText;
    numberNode.setFlag('is-upgraded', true);
    numberNode.setFlag('pop', true);
    await sleep(level.popDurationMs);
    numberNode.setFlag('pop', false);
  }

  // ──────────────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────────────

  private async playClip(stage: ClipStage, delayMs: number, holdFinalFrame: boolean): Promise<void> {
    const video = this.nodes.videos[stage];
    const src = video.source;
    if (!src) {
      this.logger.warn('Stage skipped (missing video)', { stage, order: this.order });
      return;
    }
    if (delayMs > 0) await sleep(delayMs);
    const gate = this.gates[stage];
    await gate.ensureReady(this.config.media.readyTimeoutMs);
    if (this.detached) return;

    this.setActiveClip(stage);
    video.media.currentTime = 0;
    this.hooks.onClip?.(this, stage, src);
    this.logger.debug('Stage play start', { stage, src, delayMs });
    const started = gate.waitForStart(this.config.media.startTimeoutMs);
    await gate.safePlay();
    await started;
    await gate.waitForEnd(this.config.media.defaultTimeoutMs);
    if (holdFinalFrame) {
      video.media.pause();
      this.logger.debug('Stage hold final frame', { stage });
    } else {
      this.clearClip(stage);
    }
  }

  private setActiveClip(stage: ClipStage): void {
    if (this.state.activeClip === stage) return;
    if (this.state.activeClip) this.clearClip(this.state.activeClip, false);
    this.nodes.videos[stage].setFlag('is-active', true);
    this.state.activeClip = stage;
  }

  private clearClip(stage: ClipStage, resetActive = true): void {
    const video = this.nodes.videos[stage];
    video.setFlag('is-active', false);
    video.media.pause();
    if (resetActive && this.state.activeClip === stage) {
      this.state.activeClip = null;
    }
  }

  /** Move forward in the stage list; backwards or repeated moves are refused. */
  private advance(next: EntryStage): boolean {
    if (this.state.stage === 'removed') return false;
    const current = ENTRY_STAGES.indexOf(this.state.stage);
    const target = ENTRY_STAGES.indexOf(next);
    if (target <= current) {
      this.logger.warn('Refusing stage transition', { order: this.order, from: this.state.stage, to: next });
      return false;
    }
    this.state.stage = next;
    this.hooks.onStage?.(this, next);
    return true;
  }

  private setLayer(layer: CardLayer): void {
    this.state.layer = layer;
    this.nodes.cardRig.setData('layer', layer);
  }

  private setLabelOpacity(value: number, durationMs = 0): void {
    const clamped = clamp(value, 0, 1);
    if (Math.abs(clamped - this.state.labelOpacity) < 0.02) return;
    this.state.labelOpacity = clamped;
    this.nodes.labels.setParam('label-opacity', clamped, durationMs);
  }

  private computeCardMetrics(batchSize: number): CardMetrics {
    const { card } = this.config;
    const assetScale = clamp(this.resolveAssetScale(batchSize), 0.5, 1);
    const baseTarget = clamp(card.targetScale, 0.2, card.maxScale);
    const targetScale = clamp(baseTarget * assetScale, 0.2, card.maxScale);
    const ratio = batchSize > 1 ? card.multiStartRatio : card.startRatio;
    const startScale = clamp(targetScale * ratio, card.minStartScale, targetScale);
    return {
      startScale,
      baseStartScale: startScale,
      targetScale,
      startY: card.startY,
      targetY: card.targetY,
    };
  }

  private resolveAssetScale(batchSize: number): number {
    if (batchSize <= 2) return 1;
    const table = this.config.card.assetScaleByCount;
    const direct = table[batchSize] ?? table[this.config.batch.maxVisible];
    return typeof direct === 'number' && Number.isFinite(direct) ? direct : 1;
  }

  private computeStarMetrics(): StarMetrics {
    const { star, card } = this.config;
    const base = Math.max(0.2, this.state.metrics.targetScale || card.targetScale);
    const startScale = clamp(base * star.startScaleRatio, 0.05, base * 0.9);
    const targetScale = Math.min(Math.max(startScale * 1.2, base * star.targetScaleMult), star.maxScale);
    return { startScale, targetScale };
  }

  private configureStar(random: RandomSource): Promise<void> {
    const { star } = this.config;
    const jitter = clamp(star.jitterRatio, 0, 0.9);
    const rotation = applyJitter(Math.max(1, star.rotationDurationMs), jitter, random);
    const pulse = applyJitter(Math.max(50, star.pulseDurationMs), jitter, random);
    this.state.starDurations = { rotation, pulse };
    this.state.star = this.computeStarMetrics();

    const wrapper = this.nodes.starWrapper;
    wrapper.setFlag('is-hidden', false);
    wrapper.setParam('star-offset', star.verticalOffsetPx);
    wrapper.setParam('star-scale', this.state.star.startScale);
    wrapper.setParam('star-grow-duration', Math.max(100, star.growDurationMs));
    wrapper.setParam('star-rotation-duration', rotation);
    wrapper.setParam('star-pulse-duration', pulse);
    this.nodes.starRotator.setParam('star-rotation-phase', random() * rotation);
    return loadImage(this.nodes.starImage.element, this.config.media.readyTimeoutMs, this.logger);
  }

  private createGate(stage: ClipStage): MediaGate {
    const media = this.nodes.videos[stage].media;
    media.addEventListener('error', () => {
      if (!media.src) return;
      this.logger.warn(`Video error on ${stage}`, { src: media.src });
    });
    return new MediaGate(media, { progressPollMs: this.config.media.progressPollMs, logger: this.logger });
  }

  private buildTree(host: SceneNode): EntryNodes {
    const { scene, record } = this;
    const { config } = this;
    const isShiny = record.isShiny;

    const root = scene.createNode('gacha-chain');
    root.setParam('slot-offset', this.slot.offset);
    root.setData('rarity', this.rarityKey);

    const videoStack = scene.createNode('video-stack');
    const videos: Record<ClipStage, VideoNode> = {
      drop: scene.createVideo('drop', { muted: config.media.muted }),
      conversion: scene.createVideo('conversion', { muted: config.media.muted }),
      opening: scene.createVideo('opening', { muted: config.media.muted }),
    };
    videoStack.addChild(videos.drop, videos.conversion, videos.opening);

    const cardRig = scene.createNode('card-rig');
    cardRig.setFlag('is-hidden', true);
    cardRig.setData('layer', 'behind');
    cardRig.setParam('card-scale', this.state.metrics.startScale);
    cardRig.setParam('card-translateY', this.state.metrics.startY);
    cardRig.setParam('silhouette-strength', 1);

    const cardFrame = scene.createNode('gacha-card-frame');
    cardFrame.setFlag('is-shiny', isShiny);
    const cardImage = scene.createImage('gacha-card', record.imageRef);
    cardFrame.addChild(cardImage);

    const badge = scene.createNode('rarity-badge');
    badge.setData('rarity', isShiny ? 'shiny' : this.rarityKey);
    badge.setFlag('is-stealthed', true);
    badge.setParam('badge-scale', config.badge.hiddenScale);
    const badgeImage = scene.createImage('rarity-badge-image', resolveBadgeAsset(this.rarityKey, isShiny, config.assets));
    badge.addChild(badgeImage);
    cardFrame.addChild(badge);

    const labels = scene.createNode('label-stack');
    labels.setParam('label-opacity', 0);
    const name = scene.createText('gacha-name', formatName(record.name));
    const level = scene.createNode('gacha-level');
    const levelPrefix = scene.createText('level-prefix', 'Lv.');
    const levelNumber = scene.createText('level-number', this.levelMeta.currentText);
    levelNumber.setParam('level-peak-scale', config.level.peakScale);
    level.addChild(levelPrefix, levelNumber);
    labels.addChild(name, level);

    const starWrapper = scene.createNode('gacha-star-wrapper');
    starWrapper.setFlag('is-shiny', isShiny);
    const starRotator = scene.createNode('gacha-star-rotator');
    const starImage = scene.createImage('gacha-star', resolveStarAsset(this.rarityKey, isShiny, config.assets));
    starRotator.addChild(starImage);
    starWrapper.addChild(starRotator);

    cardRig.addChild(starWrapper, cardFrame, labels);
    root.addChild(videoStack, cardRig);
    host.addChild(root);

    return {
      root,
      videoStack,
      videos,
      cardRig,
      cardFrame,
      cardImage,
      labels,
      name,
      levelNumber,
      starWrapper,
      starRotator,
      starImage,
      badge,
      badgeImage,
    };
  }
}
