/**
 * GachaEngine Tests
 *
 * Full triggers rehearsed on MemoryScene with fake timers. HeadlessMedia
 * drives the clips, so every stage waits on the same events a browser fires.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { OverlayEvent } from '../../src/engine/GachaEngine';
import { MemoryImageNode, MemoryTextNode, type MemoryNode } from '../../src/scene/MemoryScene';
import { BATCH_BUDGET_MS, createHarness, phasesOf, pull, stagesOf, videoNodes } from '../helpers/overlay-harness';

function textOf(root: MemoryNode, label: string): string {
  const node = root.find(label);
  if (!(node instanceof MemoryTextNode)) throw new Error(`no text node ${label}`);
  return node.text;
}

function imageSrc(root: MemoryNode, label: string): string {
  const node = root.find(label);
  if (!(node instanceof MemoryImageNode)) throw new Error(`no image node ${label}`);
  return node.element.src;
}

function clipsOf(events: readonly OverlayEvent[]): string[] {
  const clips: string[] = [];
  for (const event of events) {
    if (event.type === 'clip') clips.push(`${event.order}:${event.stage}:${event.src}`);
  }
  return clips;
}

describe('GachaEngine', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('single uncommon pull', () => {
    it('plays every stage in order and cleans up after the hold', async () => {
      const { engine, events, host, scene } = createHarness();
      const phaseTimes = new Map<string, number>();
      engine.onEvent((event) => {
        if (event.type === 'batch-phase') phaseTimes.set(event.phase, Date.now());
      });

      const done = engine.enqueue([pull({ name: 'fire_imp', rarity: 'uncommon', level: 2 })], {
        displayName: 'Tester',
        userId: 'user-1',
        totalPulls: 1,
        setName: 'ember_wilds',
      });
      await vi.advanceTimersByTimeAsync(1);

      expect(host.findAll('gacha-chain')).toHaveLength(1);
      expect(textOf(host, 'gacha-name')).toBe('Fire Imp');
      expect(textOf(host, 'level-number')).toBe('2');
      expect(imageSrc(host, 'gacha-star')).toBe('assets/images/star_green.svg');
      expect(imageSrc(host, 'rarity-badge-image')).toBe('assets/images/badge_uncommon.png');
      expect(textOf(scene.root, 'banner-name')).toBe('Tester');
      expect(textOf(scene.root, 'banner-pulls')).toBe('1 pull');
      expect(textOf(scene.root, 'set-banner-name')).toBe('Ember Wilds');
      expect(scene.root.find('gacha-batch-banner')?.hasFlag('is-visible')).toBe(true);

      const levelNode = host.find('level-number');
      await vi.advanceTimersByTimeAsync(BATCH_BUDGET_MS);
      await done;

      expect(levelNode instanceof MemoryTextNode ? levelNode.text : null).toBe('3');
      expect(levelNode?.hasFlag('is-upgraded')).toBe(true);
      expect(phasesOf(events)).toEqual([
        'assets-ready',
        'drop',
        'conversion',
        'primed',
        'opening',
        'revealed',
        'hold',
        'fading',
        'removed',
      ]);
      expect(clipsOf(events)).toEqual([
        '0:drop:assets/animations/drop.webm',
        '0:conversion:assets/animations/conversion/uncommon.webm',
        '0:opening:assets/animations/opening/uncommon.webm',
      ]);
      for (const stage of ['drop', 'conversion', 'primed', 'opening', 'front', 'fading', 'removed']) {
        expect(stagesOf(events, stage)).toEqual([0]);
      }

      const hold = phaseTimes.get('hold') ?? 0;
      expect((phaseTimes.get('fading') ?? 0) - hold).toBe(3000);
      expect((phaseTimes.get('removed') ?? 0) - (phaseTimes.get('fading') ?? 0)).toBe(400);

      expect(host.children).toHaveLength(0);
      expect(engine.mountedEntries).toHaveLength(0);
      expect(scene.root.find('gacha-batch-banner')?.hasFlag('is-visible')).toBe(false);
      expect(events.at(-1)).toEqual({ type: 'trigger-end', completed: true });
    });

    it('rises the card from its primed pose to the target pose', async () => {
      const { engine, scene, host } = createHarness();
      const done = engine.enqueue([pull({ rarity: 'rare' })]);
      await vi.advanceTimersByTimeAsync(BATCH_BUDGET_MS);
      await done;

      const rig = scene.bindings.filter((binding) => binding.node === 'card-rig');
      const rise = rig.filter((binding) => binding.durationMs === 650);
      expect(rise.map((binding) => binding.param)).toEqual(['card-scale', 'card-translateY']);
      expect(rise[0].value).toBeCloseTo(0.85);
      // Fallback stack height 320: -(320 * 0.75) - (-30)
      expect(rise[1].value).toBe(-210);
      expect(rig.find((binding) => binding.param === 'silhouette-strength' && binding.value === 0)?.durationMs).toBe(480);
      expect(host.children).toHaveLength(0);
    });
  });

  describe('batching', () => {
    it('splits a trigger into ceil(n / 4) batches with symmetric slots', async () => {
      const { engine, events, scene } = createHarness();
      const done = engine.enqueue(Array.from({ length: 6 }, () => pull()));
      await vi.advanceTimersByTimeAsync(3 * BATCH_BUDGET_MS);
      await done;

      expect(events[0]).toEqual({
        type: 'trigger-start',
        meta: { totalPulls: 6, displayName: '', userName: '', userId: '', setName: '' },
        batches: [4, 2],
      });
      expect(phasesOf(events).filter((phase) => phase === 'removed')).toHaveLength(2);
      const offsets = scene.bindings
        .filter((binding) => binding.node === 'gacha-chain' && binding.param === 'slot-offset')
        .map((binding) => binding.value);
      expect(offsets).toEqual([-675, -225, 225, 675, -360, 360]);
    });

    it('plays queued triggers back to back, never overlapping', async () => {
      const { engine, events } = createHarness();
      const first = engine.enqueue([pull()]);
      const second = engine.enqueue([pull({ rarity: 'epic' })]);
      expect(engine.pendingTriggers).toBe(2);

      await vi.advanceTimersByTimeAsync(3 * BATCH_BUDGET_MS);
      await Promise.all([first, second]);

      const lifecycle = events
        .filter((event) => event.type === 'trigger-start' || event.type === 'trigger-end')
        .map((event) => event.type);
      expect(lifecycle).toEqual(['trigger-start', 'trigger-end', 'trigger-start', 'trigger-end']);
      expect(engine.pendingTriggers).toBe(0);
    });
  });

  describe('conversion and the common-only hold', () => {
    it('skips conversion and holds before opening when every pull is common', async () => {
      const { engine, events } = createHarness();
      const done = engine.enqueue([pull(), pull({ rarity: 'N' })]);
      await vi.advanceTimersByTimeAsync(BATCH_BUDGET_MS);
      await done;

      expect(phasesOf(events)).toEqual([
        'assets-ready',
        'drop',
        'common-hold',
        'primed',
        'opening',
        'revealed',
        'hold',
        'fading',
        'removed',
      ]);
      expect(clipsOf(events).filter((clip) => clip.includes(':conversion:'))).toEqual([]);
    });

    it('converts only the eligible pulls of a mixed batch', async () => {
      const { engine, events } = createHarness();
      const done = engine.enqueue([pull(), pull({ rarity: 'SR' }), pull()]);
      await vi.advanceTimersByTimeAsync(BATCH_BUDGET_MS);
      await done;

      expect(phasesOf(events)).not.toContain('common-hold');
      expect(clipsOf(events).filter((clip) => clip.includes(':conversion:'))).toEqual([
        '1:conversion:assets/animations/conversion/rare.webm',
      ]);
    });

    it('treats a shiny common as conversion-eligible', async () => {
      const { engine, events } = createHarness();
      const done = engine.enqueue([pull({ isShiny: true })]);
      await vi.advanceTimersByTimeAsync(BATCH_BUDGET_MS);
      await done;

      expect(phasesOf(events)).not.toContain('common-hold');
      expect(clipsOf(events)).toContain('0:conversion:assets/animations/conversion/shiny.webm');
      expect(clipsOf(events)).toContain('0:opening:assets/animations/opening/shiny.webm');
    });
  });

  describe('reveal chain', () => {
    it('promotes cards left to right even when a later clip starts first', async () => {
      const { engine, events, host } = createHarness({
        clipProfile: (src) => (src.endsWith('opening/legendary.webm') ? { startDelayMs: 900 } : {}),
      });
      const playing: number[] = [];
      engine.onEvent((event) => {
        if (event.type !== 'batch-phase' || event.phase !== 'assets-ready') return;
        videoNodes(host, 'opening').forEach((video, order) => {
          video.media.addEventListener('playing', () => playing.push(order));
        });
      });

      const done = engine.enqueue([pull({ rarity: 'legendary' }), pull({ rarity: 'epic' }), pull({ rarity: 'rare' })]);
      await vi.advanceTimersByTimeAsync(BATCH_BUDGET_MS);
      await done;

      expect(playing).toEqual([1, 2, 0]);
      expect(stagesOf(events, 'front')).toEqual([0, 1, 2]);
    });

    it('falls back to the reveal delay when the opening clip never reports a duration', async () => {
      const { engine, events } = createHarness({
        clipProfile: (src) => (src.includes('/opening/') ? { reportDuration: false } : {}),
      });
      const done = engine.enqueue([pull({ rarity: 'epic' }), pull({ rarity: 'epic' })]);
      await vi.advanceTimersByTimeAsync(BATCH_BUDGET_MS);
      await done;

      expect(stagesOf(events, 'front')).toEqual([0, 1]);
      expect(events.at(-1)).toEqual({ type: 'trigger-end', completed: true });
    });

    it('still completes when autoplay is refused', async () => {
      const { engine, events, host } = createHarness({ clipProfile: () => ({ blockAutoplay: true }) });
      const done = engine.enqueue([pull({ rarity: 'rare' })]);
      // Each clip waits out its end timeout: three clips at 25s apiece.
      await vi.advanceTimersByTimeAsync(120_000);
      await done;

      expect(stagesOf(events, 'front')).toEqual([0]);
      expect(host.children).toHaveLength(0);
    });
  });

  describe('stalled and failing media', () => {
    it('moves on when a clip never buffers', async () => {
      const { engine, events } = createHarness({
        clipProfile: (src) => (src.endsWith('drop.webm') ? { loadDelayMs: 1e9 } : {}),
      });
      const first = engine.enqueue([pull({ rarity: 'rare' })]);
      const second = engine.enqueue([pull()]);
      await vi.advanceTimersByTimeAsync(4 * BATCH_BUDGET_MS);
      await Promise.all([first, second]);

      expect(events.filter((event) => event.type === 'trigger-end')).toEqual([
        { type: 'trigger-end', completed: true },
        { type: 'trigger-end', completed: true },
      ]);
      expect(stagesOf(events, 'front')).toEqual([0, 0]);
    });

    it('starts the batch once the card image load times out', async () => {
      const { engine, events } = createHarness({
        imageProfile: (src) => (src === 'cards/test.png' ? { loadDelayMs: 1e9 } : {}),
      });
      let readyAt = -1;
      engine.onEvent((event) => {
        if (event.type === 'batch-phase' && event.phase === 'assets-ready') readyAt = Date.now();
      });
      const start = Date.now();
      const done = engine.enqueue([pull()]);
      await vi.advanceTimersByTimeAsync(engine.config.media.readyTimeoutMs + BATCH_BUDGET_MS);
      await done;

      expect(readyAt).toBe(start + engine.config.media.readyTimeoutMs);
      expect(phasesOf(events).at(-1)).toBe('removed');
      expect(events.at(-1)).toEqual({ type: 'trigger-end', completed: true });
    });

    it('completes with a broken opening clip and a broken card image', async () => {
      const { engine, events, host } = createHarness({
        clipProfile: (src) => (src.includes('/opening/') ? { fail: true } : {}),
        imageProfile: (src) => (src === 'cards/test.png' ? { fail: true } : {}),
      });
      const done = engine.enqueue([pull({ rarity: 'epic' })]);
      // The failed opening clip waits out its 10s ready and 25s end timeouts.
      await vi.advanceTimersByTimeAsync(60_000);
      await done;

      expect(clipsOf(events)).toContain('0:opening:assets/animations/opening/epic.webm');
      expect(stagesOf(events, 'front')).toEqual([0]);
      expect(stagesOf(events, 'removed')).toEqual([0]);
      expect(host.children).toHaveLength(0);
      expect(events.at(-1)).toEqual({ type: 'trigger-end', completed: true });
    });
  });

  describe('clear()', () => {
    it('empties the stage mid-opening and lets the rest of the trigger play', async () => {
      const { engine, events, host, scene } = createHarness();
      const cleared = engine.enqueue(Array.from({ length: 6 }, () => pull({ rarity: 'rare' })), { displayName: 'Tester' });
      const next = engine.enqueue([pull()]);

      while (!phasesOf(events).includes('opening')) {
        await vi.advanceTimersByTimeAsync(50);
      }
      engine.clear();

      expect(host.children).toHaveLength(0);
      expect(engine.mountedEntries).toHaveLength(0);
      expect(engine.activeMeta).toBeNull();
      expect(scene.root.find('gacha-batch-banner')?.hasFlag('is-visible')).toBe(false);
      expect(events.at(-1)).toEqual({ type: 'cleared' });

      await vi.advanceTimersByTimeAsync(4 * BATCH_BUDGET_MS);
      await Promise.all([cleared, next]);

      const ends = events.filter((event) => event.type === 'trigger-end');
      expect(ends).toEqual([
        { type: 'trigger-end', completed: false },
        { type: 'trigger-end', completed: true },
      ]);
      const mounted = events.flatMap((event) =>
        event.type === 'batch-phase' && event.phase === 'assets-ready' ? [`${event.batch}:${event.orders.length}`] : [],
      );
      expect(mounted).toEqual(['0:4', '1:2', '0:1']);
      expect(host.children).toHaveLength(0);
    });

    it('an empty pull list clears the stage', async () => {
      const { engine, events } = createHarness();
      await engine.enqueue([]);
      expect(events).toEqual([{ type: 'cleared' }]);
    });
  });
});
