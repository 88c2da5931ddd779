/**
 * BatchSequencer: drives up to MAX_VISIBLE entry animators through the
 * shared stage order.
 *
 *   assets ready → drop (staggered) → [freeze → conversion (chained)]
 *   → [common-only hold] → prime → opening → hold → fade → remove
 *
 * Within the opening stage the backdrop fade, the staggered opening clips
 * and the reveal chain run concurrently. The reveal chain promotes cards in
 * ascending slot order whatever order their clips reach the cue in.
 */

import type { OverlayConfig } from './config';
import { isConversionEligible } from './assets';
import { EntryAnimator, type EntryHooks } from './EntryAnimator';
import { computeSlotOffsets } from './slot-layout';
import type { PullRecord } from './types';
import type { SceneBackend, SceneNode } from '../scene/types';
import type { Logger } from '../utils/log';
import { sleep, type RandomSource } from '../utils/timing';

export type BatchPhase =
  | 'assets-ready'
  | 'drop'
  | 'conversion'
  | 'common-hold'
  | 'primed'
  | 'opening'
  | 'revealed'
  | 'hold'
  | 'fading'
  | 'removed';

export interface BatchHooks extends EntryHooks {
  onPhase?(phase: BatchPhase, entries: readonly EntryAnimator[]): void;
}

export interface BatchSequencerDeps {
  scene: SceneBackend;
  config: OverlayConfig;
  logger: Logger;
  random?: RandomSource;
  hooks?: BatchHooks;
}

export class BatchSequencer {
  private readonly config: OverlayConfig;
  private readonly logger: Logger;
  private readonly hooks: BatchHooks;

  constructor(private readonly deps: BatchSequencerDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.hooks = deps.hooks ?? {};
  }

  /** Mount one animator per record under `host`, laid out by batch size. */
  mount(records: readonly PullRecord[], host: SceneNode): EntryAnimator[] {
    const { maxVisible, horizontalSpacing } = this.config.batch;
    if (records.length > maxVisible) {
      throw new Error(`Batch of ${records.length} exceeds the ${maxVisible} visible slots`);
    }
    const slots = computeSlotOffsets(records.length, horizontalSpacing, maxVisible);
    return records.map(
      (record, index) =>
        new EntryAnimator(record, slots[index], records.length, host, {
          scene: this.deps.scene,
          config: this.config,
          logger: this.logger,
          random: this.deps.random,
          hooks: this.hooks,
        }),
    );
  }

  /** Play the whole batch; resolves after every entry has been removed. */
  async run(entries: readonly EntryAnimator[]): Promise<void> {
    if (entries.length === 0) return;
    await Promise.all(entries.map((entry) => entry.ready));
    this.phase('assets-ready', entries);
    await this.runSequence(entries);
    this.phase('hold', entries);
    await sleep(this.config.timing.batchHoldMs);
    await this.fadeAndCleanup(entries);
  }

  private async runSequence(entries: readonly EntryAnimator[]): Promise<void> {
    this.logger.debug('Sequence start', { entries: entries.length });
    await this.runDropStage(entries);
    await this.runConversionStage(entries);
    if (this.shouldHoldBeforeOpening(entries)) {
      const hold = this.config.timing.commonOnlyOpeningDelayMs;
      this.logger.debug('Common-only hold', { hold });
      this.phase('common-hold', entries);
      await sleep(hold);
    }
    await this.primeCards(entries);
    await this.runOpeningStage(entries);
  }

  private async runDropStage(entries: readonly EntryAnimator[]): Promise<void> {
    this.phase('drop', entries);
    const stagger = Math.max(0, this.config.timing.dropStaggerMs);
    await Promise.all(entries.map((entry, index) => entry.playDrop(index * stagger)));
  }

  private async runConversionStage(entries: readonly EntryAnimator[]): Promise<void> {
    const eligible = entries.filter((entry) => isConversionEligible(entry.record));
    if (eligible.length === 0) {
      this.logger.debug('Conversion stage skipped (all entries common)');
      return;
    }
    const { dropFreezeMs, conversionChainDelayMs } = this.config.timing;
    if (dropFreezeMs > 0) await sleep(dropFreezeMs);
    this.phase('conversion', eligible);
    await Promise.all(eligible.map((entry, index) => entry.playConversion(index * conversionChainDelayMs)));
  }

  /** Only when every entry is common and non-shiny. */
  shouldHoldBeforeOpening(entries: readonly EntryAnimator[]): boolean {
    if (entries.length === 0 || this.config.timing.commonOnlyOpeningDelayMs <= 0) return false;
    return entries.every((entry) => entry.rarityKey === 'common' && !entry.record.isShiny);
  }

  private async primeCards(entries: readonly EntryAnimator[]): Promise<void> {
    for (const entry of entries) entry.prime();
    this.phase('primed', entries);
    const { cardPrimeHoldMs } = this.config.timing;
    if (cardPrimeHoldMs > 0) await sleep(cardPrimeHoldMs);
  }

  private async runOpeningStage(entries: readonly EntryAnimator[]): Promise<void> {
    const ordered = [...entries].sort((a, b) => a.order - b.order);
    this.phase('opening', ordered);
    const stagger = Math.max(0, this.config.timing.openingStaggerMs);
    const backdrop = Promise.all(ordered.map((entry) => entry.fadeInBackdrop()));
    const clips = ordered.map((entry, index) => entry.playOpening(index * stagger));
    const reveal = this.runRevealChain(ordered);
    await Promise.all([backdrop, ...clips, reveal]);
    this.phase('revealed', ordered);
  }

  /**
   * Each entry waits for its own cue, but is only promoted after the entry
   * to its left. The tween, badge and level pops then run independently.
   */
  private async runRevealChain(ordered: readonly EntryAnimator[]): Promise<void> {
    let previous: Promise<void> = Promise.resolve();
    const tasks = ordered.map((entry, index) => {
      const cue = entry.waitForRevealCue(this.revealDelay(entry, index));
      const promoted = Promise.all([cue, previous]).then(() => entry.promote());
      previous = promoted;
      return promoted.then(() => entry.finishReveal());
    });
    await Promise.all(tasks);
  }

  private revealDelay(entry: EntryAnimator, index: number): number {
    const { cardRevealDelayMs, openingStaggerMs } = this.config.timing;
    const custom = entry.record.revealTime;
    const base = typeof custom === 'number' && Number.isFinite(custom) ? Math.max(0, custom) : Math.max(0, cardRevealDelayMs);
    return base + index * Math.max(0, openingStaggerMs);
  }

  private async fadeAndCleanup(entries: readonly EntryAnimator[]): Promise<void> {
    const { fadeSteps, frameDelayMs } = this.config.timing;
    const steps = Math.max(1, fadeSteps);
    this.phase('fading', entries);
    for (let i = 0; i < steps; i += 1) {
      const remaining = 1 - (i + 1) / steps;
      for (const entry of entries) entry.setOpacity(remaining);
      await sleep(frameDelayMs);
    }
    for (const entry of entries) entry.remove();
    this.phase('removed', entries);
  }

  private phase(phase: BatchPhase, entries: readonly EntryAnimator[]): void {
    this.hooks.onPhase?.(phase, entries);
  }
}
