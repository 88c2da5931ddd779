/**
 * GachaEngine: the overlay's single owner of mutable state.
 *
 * Holds the playback queue, the active trigger's BatchMeta, the registry of
 * mounted entries and the banner chrome. The transport talks to an engine
 * instance; nothing lives in module-level singletons.
 */

import { resolveOverlayConfig, type OverlayConfig, type OverlayConfigOverrides } from './config';
import { BatchSequencer, type BatchPhase } from './BatchSequencer';
import type { EntryAnimator } from './EntryAnimator';
import { formatPullCount, formatSetName } from './format';
import { PlaybackQueue } from './PlaybackQueue';
import { chunkPulls } from './slot-layout';
import type { BatchMeta, ClipStage, EntryStage, PullRecord } from './types';
import type { SceneBackend, SceneNode, TextNode } from '../scene/types';
import { createLogger, type Logger } from '../utils/log';
import type { RandomSource } from '../utils/timing';

export type OverlayEvent =
  | { type: 'trigger-start'; meta: BatchMeta; batches: number[] }
  | { type: 'batch-phase'; batch: number; phase: BatchPhase; orders: number[] }
  | { type: 'entry-stage'; batch: number; order: number; stage: EntryStage }
  | { type: 'clip'; batch: number; order: number; stage: ClipStage; src: string }
  /** `completed` is false when clear() ran while the trigger played. */
  | { type: 'trigger-end'; completed: boolean }
  | { type: 'cleared' };

export type OverlayListener = (event: OverlayEvent) => void;

export interface GachaEngineOptions {
  scene: SceneBackend;
  config?: OverlayConfig | OverlayConfigOverrides;
  logger?: Logger;
  random?: RandomSource;
}

interface BannerNodes {
  banner: SceneNode;
  name: TextNode;
  pulls: TextNode;
  setBanner: SceneNode;
  setName: TextNode;
}

export class GachaEngine {
  readonly config: OverlayConfig;
  private readonly scene: SceneBackend;
  private readonly logger: Logger;
  private readonly queue: PlaybackQueue;
  private readonly sequencer: BatchSequencer;
  private readonly entryHost: SceneNode;
  private readonly chrome: BannerNodes;
  private readonly mounted = new Set<EntryAnimator>();
  private readonly listeners: OverlayListener[] = [];
  private meta: BatchMeta | null = null;
  private generation = 0;
  private batchIndex = 0;

  constructor(options: GachaEngineOptions) {
    this.scene = options.scene;
    this.config = resolveOverlayConfig(options.config);
    this.logger = options.logger ?? createLogger('overlay', { debug: this.config.debug });
    this.queue = new PlaybackQueue(this.logger);
    this.sequencer = new BatchSequencer({
      scene: this.scene,
      config: this.config,
      logger: this.logger,
      random: options.random,
      hooks: {
        onPhase: (phase, entries) =>
          this.emit({ type: 'batch-phase', batch: this.batchIndex, phase, orders: entries.map((e) => e.order) }),
        onStage: (entry, stage) =>
          this.emit({ type: 'entry-stage', batch: this.batchIndex, order: entry.order, stage }),
        onClip: (entry, stage, src) =>
          this.emit({ type: 'clip', batch: this.batchIndex, order: entry.order, stage, src }),
      },
    });
    this.entryHost = this.scene.createNode('gacha-stage-host');
    this.scene.root.addChild(this.entryHost);
    this.chrome = this.buildChrome();
  }

  /** Register a listener for lifecycle events (stages, clips, phases). */
  onEvent(listener: OverlayListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  get activeMeta(): BatchMeta | null {
    return this.meta;
  }

  get mountedEntries(): readonly EntryAnimator[] {
    return [...this.mounted];
  }

  get pendingTriggers(): number {
    return this.queue.pending;
  }

  /** Append a whole trigger to the playback chain. */
  enqueue(pulls: readonly PullRecord[], meta: Partial<BatchMeta> = {}): Promise<void> {
    return this.queue.enqueue(() => this.run(pulls, meta));
  }

  /** Resolves when every queued trigger has finished. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  /**
   * Detach every rendered entry and reset the banners now. Nothing in flight
   * is cancelled: pending waits of the running batch settle against the
   * detached tree, and the trigger's remaining batches still mount and play.
   */
  clear(): void {
    this.generation += 1;
    for (const entry of this.mounted) entry.remove();
    this.mounted.clear();
    for (const child of [...this.entryHost.children]) child.destroy();
    this.meta = null;
    this.updateBanner(null);
    this.emit({ type: 'cleared' });
  }

  private async run(pulls: readonly PullRecord[], rawMeta: Partial<BatchMeta>): Promise<void> {
    const records = pulls.filter(Boolean);
    if (records.length === 0) {
      this.clear();
      return;
    }
    const generation = this.generation;
    const meta = normalizeMeta(rawMeta, records.length);
    const batches = chunkPulls(records, this.config.batch.maxVisible);
    this.meta = meta;
    this.updateBanner(meta);
    this.emit({ type: 'trigger-start', meta, batches: batches.map((batch) => batch.length) });

    for (const [index, batch] of batches.entries()) {
      this.batchIndex = index;
      await this.animateBatch(batch);
    }

    // A clear() during the trigger already reset the banners.
    const completed = generation === this.generation;
    if (completed) {
      this.meta = null;
      this.updateBanner(null);
    }
    this.emit({ type: 'trigger-end', completed });
  }

  private async animateBatch(batch: readonly PullRecord[]): Promise<void> {
    for (const child of [...this.entryHost.children]) child.destroy();
    const entries = this.sequencer.mount(batch, this.entryHost);
    for (const entry of entries) this.mounted.add(entry);
    try {
      await this.sequencer.run(entries);
    } finally {
      for (const entry of entries) this.mounted.delete(entry);
    }
  }

  private buildChrome(): BannerNodes {
    const { scene } = this;
    const banner = scene.createNode('gacha-batch-banner');
    const name = scene.createText('banner-name');
    const pulls = scene.createText('banner-pulls');
    banner.addChild(scene.createText('banner-label', 'Now Summoning'), name, pulls);

    const setBanner = scene.createNode('gacha-set-banner');
    const setName = scene.createText('set-banner-name');
    setBanner.addChild(scene.createText('set-banner-prefix', 'Summoning From'), setName);

    scene.root.addChild(banner, setBanner);
    return { banner, name, pulls, setBanner, setName };
  }

  private updateBanner(meta: BatchMeta | null): void {
    const { banner, name, pulls, setBanner, setName } = this.chrome;

    const set = meta?.setName.trim() ?? '';
    setName.text = set;
    setBanner.setFlag('is-visible', set.length > 0);

    const displayName = (meta?.displayName || meta?.userName || meta?.userId || '').trim();
    if (!meta || !displayName) {
      name.text = '';
      pulls.text = '';
      banner.setFlag('is-visible', false);
      return;
    }
    name.text = displayName;
    pulls.text = formatPullCount(meta.totalPulls);
    banner.setFlag('is-visible', true);
  }

  private emit(event: OverlayEvent): void {
    for (const listener of this.listeners) listener(event);
  }
}

function normalizeMeta(meta: Partial<BatchMeta>, renderedCount: number): BatchMeta {
  const total = Number(meta.totalPulls);
  return {
    totalPulls: Number.isFinite(total) && total > 0 ? total : renderedCount,
    displayName: typeof meta.displayName === 'string' ? meta.displayName : '',
    userName: typeof meta.userName === 'string' ? meta.userName : '',
    userId: typeof meta.userId === 'string' ? meta.userId : '',
    setName: formatSetName(typeof meta.setName === 'string' ? meta.setName : ''),
  };
}
