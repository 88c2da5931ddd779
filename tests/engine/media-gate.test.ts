/**
 * MediaGate Tests
 *
 * Drives HeadlessMedia with fake timers. Every wait must settle: true on the
 * awaited event, false (or void) on timeout, never a rejection.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MediaGate, loadImage } from '../../src/engine/media-gate';
import { HeadlessImage, HeadlessMedia, type HeadlessClipProfile } from '../../src/scene/headless-media';
import type { Logger } from '../../src/utils/log';

function loadedMedia(profile: Partial<HeadlessClipProfile> = {}): HeadlessMedia {
  const media = new HeadlessMedia(() => profile);
  media.src = 'assets/animations/test.webm';
  media.load();
  return media;
}

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    debug() {},
    info() {},
    warn(message) {
      warnings.push(message);
    },
    error() {},
  };
}

describe('MediaGate', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('ensureReady()', () => {
    it('resolves once data is loaded', async () => {
      const media = loadedMedia({ loadDelayMs: 40 });
      const gate = new MediaGate(media);
      let ready = false;
      void gate.ensureReady(10_000).then(() => {
        ready = true;
      });
      await vi.advanceTimersByTimeAsync(39);
      expect(ready).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      expect(ready).toBe(true);
    });

    it('resolves on a load error', async () => {
      const gate = new MediaGate(loadedMedia({ fail: true }));
      const ready = gate.ensureReady(10_000);
      await vi.advanceTimersByTimeAsync(10);
      await expect(ready).resolves.toBeUndefined();
    });

    it('resolves and warns when the data never arrives', async () => {
      const logger = recordingLogger();
      const gate = new MediaGate(loadedMedia({ loadDelayMs: 1e9 }), { logger });
      let ready = false;
      void gate.ensureReady(10_000).then(() => {
        ready = true;
      });
      await vi.advanceTimersByTimeAsync(9_999);
      expect(ready).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      expect(ready).toBe(true);
      expect(logger.warnings).toEqual(['Video not ready before timeout']);
    });
  });

  describe('waitForStart()', () => {
    it('is true when playback begins', async () => {
      const media = loadedMedia();
      const gate = new MediaGate(media);
      await vi.advanceTimersByTimeAsync(10);
      const started = gate.waitForStart(1000);
      await gate.safePlay();
      await vi.advanceTimersByTimeAsync(16);
      await expect(started).resolves.toBe(true);
    });

    it('is false when the clip never starts', async () => {
      const logger = recordingLogger();
      const media = loadedMedia({ stall: true });
      const gate = new MediaGate(media, { logger });
      await vi.advanceTimersByTimeAsync(10);
      const started = gate.waitForStart(1000);
      await gate.safePlay();
      await vi.advanceTimersByTimeAsync(1000);
      await expect(started).resolves.toBe(false);
      expect(logger.warnings).toEqual(['Video failed to start before timeout']);
    });
  });

  describe('waitForDurationKnown()', () => {
    it('is true once metadata reports a duration', async () => {
      const gate = new MediaGate(loadedMedia({ loadDelayMs: 30 }));
      const known = gate.waitForDurationKnown(1000);
      await vi.advanceTimersByTimeAsync(30);
      await expect(known).resolves.toBe(true);
    });

    it('is false for clips that never expose a duration', async () => {
      const gate = new MediaGate(loadedMedia({ reportDuration: false }));
      const known = gate.waitForDurationKnown(500);
      await vi.advanceTimersByTimeAsync(500);
      await expect(known).resolves.toBe(false);
    });
  });

  describe('waitForProgress()', () => {
    it('is true once currentTime / duration crosses the ratio', async () => {
      // 1000ms clip, 100ms timeupdates: 0.25 is crossed on the third update.
      const media = loadedMedia({ durationMs: 1000, timeUpdateMs: 100, startDelayMs: 0 });
      const gate = new MediaGate(media);
      await vi.advanceTimersByTimeAsync(10);
      await gate.safePlay();
      let hit: boolean | null = null;
      void gate.waitForProgress(0.25, 5000).then((value) => {
        hit = value;
      });
      await vi.advanceTimersByTimeAsync(200);
      expect(hit).toBeNull();
      await vi.advanceTimersByTimeAsync(100);
      expect(hit).toBe(true);
    });

    it('is true when the clip ends before the ratio', async () => {
      const media = loadedMedia({ durationMs: 200, timeUpdateMs: 100, startDelayMs: 0 });
      const gate = new MediaGate(media);
      await vi.advanceTimersByTimeAsync(10);
      await gate.safePlay();
      const hit = gate.waitForProgress(0.99, 5000);
      await vi.advanceTimersByTimeAsync(200);
      await expect(hit).resolves.toBe(true);
    });

    it('is false on timeout', async () => {
      const media = loadedMedia({ stall: true });
      const gate = new MediaGate(media);
      await vi.advanceTimersByTimeAsync(10);
      await gate.safePlay();
      const hit = gate.waitForProgress(0.5, 800);
      await vi.advanceTimersByTimeAsync(800);
      await expect(hit).resolves.toBe(false);
    });

    it('is false when the source is removed', async () => {
      const media = loadedMedia({ stall: true });
      const gate = new MediaGate(media);
      await vi.advanceTimersByTimeAsync(10);
      const hit = gate.waitForProgress(0.5, 10_000);
      media.removeAttribute('src');
      await expect(hit).resolves.toBe(false);
    });
  });

  describe('waitForEnd()', () => {
    it('resolves on ended', async () => {
      const media = loadedMedia({ durationMs: 300, timeUpdateMs: 100, startDelayMs: 0 });
      const gate = new MediaGate(media);
      await vi.advanceTimersByTimeAsync(10);
      await gate.safePlay();
      let ended = false;
      void gate.waitForEnd(25_000).then(() => {
        ended = true;
      });
      await vi.advanceTimersByTimeAsync(299);
      expect(ended).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      expect(ended).toBe(true);
    });

    it('resolves on timeout for a stalled clip', async () => {
      const media = loadedMedia({ stall: true });
      const gate = new MediaGate(media);
      await vi.advanceTimersByTimeAsync(10);
      await gate.safePlay();
      const ended = gate.waitForEnd(2000);
      await vi.advanceTimersByTimeAsync(2000);
      await expect(ended).resolves.toBeUndefined();
    });
  });

  describe('safePlay()', () => {
    it('logs a refused play() instead of throwing', async () => {
      const logger = recordingLogger();
      const gate = new MediaGate(loadedMedia({ blockAutoplay: true }), { logger });
      await vi.advanceTimersByTimeAsync(10);
      await expect(gate.safePlay()).resolves.toBeUndefined();
      expect(logger.warnings).toEqual(['Unable to autoplay video']);
    });
  });
});

describe('loadImage', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves immediately for an empty source', async () => {
    await expect(loadImage(new HeadlessImage(''), 1000)).resolves.toBeUndefined();
  });

  it('resolves on load', async () => {
    const image = new HeadlessImage('cards/a.png', () => ({ loadDelayMs: 20 }));
    const loaded = loadImage(image, 1000);
    await vi.advanceTimersByTimeAsync(20);
    await expect(loaded).resolves.toBeUndefined();
    expect(image.naturalWidth).toBe(512);
  });

  it('resolves and warns on error', async () => {
    const logger = recordingLogger();
    const loaded = loadImage(new HeadlessImage('cards/missing.png', () => ({ fail: true })), 1000, logger);
    await vi.advanceTimersByTimeAsync(5);
    await expect(loaded).resolves.toBeUndefined();
    expect(logger.warnings).toEqual(['Image failed to load']);
  });

  it('resolves and warns when the load stalls', async () => {
    const logger = recordingLogger();
    const image = new HeadlessImage('cards/slow.png', () => ({ loadDelayMs: 1e9 }));
    let loaded = false;
    void loadImage(image, 1000, logger).then(() => {
      loaded = true;
    });
    await vi.advanceTimersByTimeAsync(999);
    expect(loaded).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    expect(loaded).toBe(true);
    expect(logger.warnings).toEqual(['Image not loaded before timeout']);
  });
});
