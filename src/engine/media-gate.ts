/**
 * Media Readiness Gate: bounded waits over one playable media element.
 *
 * Media elements can silently stop firing events (corrupt file, decode
 * stall), so every wait here has a timeout and none of them reject. Removing
 * the source ('emptied') settles every pending wait at once.
 *
 * HTMLVideoElement satisfies MediaLike structurally; tests and headless
 * runs use HeadlessMedia.
 */

import { clamp } from '../utils/timing';
import { SILENT_LOGGER, errorMessage, type Logger } from '../utils/log';

/** HTMLMediaElement.HAVE_CURRENT_DATA */
export const HAVE_CURRENT_DATA = 2;

export type MediaEventName =
  | 'loadeddata'
  | 'loadedmetadata'
  | 'durationchange'
  | 'playing'
  | 'timeupdate'
  | 'ended'
  | 'emptied'
  | 'error';

/** The slice of HTMLMediaElement the gate relies on. */
export interface MediaLike {
  readonly readyState: number;
  readonly paused: boolean;
  readonly duration: number;
  currentTime: number;
  src: string;
  play(): Promise<void>;
  pause(): void;
  load(): void;
  removeAttribute(name: string): void;
  addEventListener(type: MediaEventName, listener: () => void, options?: { once?: boolean }): void;
  removeEventListener(type: MediaEventName, listener: () => void): void;
}

/** The slice of HTMLImageElement used for readiness. */
export interface ImageLike {
  readonly src: string;
  readonly complete: boolean;
  readonly naturalWidth: number;
  addEventListener(type: 'load' | 'error', listener: () => void): void;
  removeEventListener(type: 'load' | 'error', listener: () => void): void;
}

export interface MediaGateOptions {
  /** Poll interval backing waitForProgress. */
  progressPollMs?: number;
  logger?: Logger;
}

export class MediaGate {
  private readonly progressPollMs: number;
  private readonly logger: Logger;

  constructor(
    readonly media: MediaLike,
    options: MediaGateOptions = {},
  ) {
    this.progressPollMs = options.progressPollMs ?? 33;
    this.logger = options.logger ?? SILENT_LOGGER;
  }

  private get label(): string {
    return this.media.src;
  }

  /** Resolves once enough data is buffered to play, on error, or on timeout. */
  ensureReady(timeoutMs: number): Promise<void> {
    const { media } = this;
    return new Promise((resolve) => {
      if (media.readyState >= HAVE_CURRENT_DATA) {
        resolve();
        return;
      }
      let timer: ReturnType<typeof setTimeout> | null = null;
      const done = () => {
        media.removeEventListener('loadeddata', done);
        media.removeEventListener('error', done);
        media.removeEventListener('emptied', done);
        if (timer) clearTimeout(timer);
        resolve();
      };
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          this.logger.warn('Video not ready before timeout', { src: this.label, timeoutMs });
          done();
        }, timeoutMs);
      }
      media.addEventListener('loadeddata', done);
      media.addEventListener('error', done);
      media.addEventListener('emptied', done);
    });
  }

  /** True once playback visibly began; false when the timeout wins. */
  waitForStart(timeoutMs: number): Promise<boolean> {
    const { media } = this;
    return new Promise((resolve) => {
      if (!media.paused && media.currentTime > 0) {
        resolve(true);
        return;
      }
      let timer: ReturnType<typeof setTimeout> | null = null;
      const cleanup = () => {
        media.removeEventListener('playing', onStart);
        media.removeEventListener('loadeddata', onStart);
        media.removeEventListener('emptied', onEmptied);
        if (timer) clearTimeout(timer);
      };
      const onStart = () => {
        cleanup();
        this.logger.debug('Video started', { src: this.label });
        resolve(true);
      };
      const onEmptied = () => {
        cleanup();
        resolve(false);
      };
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          cleanup();
          this.logger.warn('Video failed to start before timeout', { src: this.label, timeoutMs });
          resolve(false);
        }, timeoutMs);
      }
      media.addEventListener('playing', onStart, { once: true });
      media.addEventListener('loadeddata', onStart, { once: true });
      media.addEventListener('emptied', onEmptied, { once: true });
    });
  }

  /** True once a finite, positive duration is known. */
  waitForDurationKnown(timeoutMs: number): Promise<boolean> {
    const { media } = this;
    return new Promise((resolve) => {
      if (hasDuration(media)) {
        resolve(true);
        return;
      }
      let timer: ReturnType<typeof setTimeout> | null = null;
      const cleanup = () => {
        media.removeEventListener('loadedmetadata', onMetadata);
        media.removeEventListener('durationchange', onMetadata);
        media.removeEventListener('emptied', onEmptied);
        if (timer) clearTimeout(timer);
      };
      const onMetadata = () => {
        if (!hasDuration(media)) return;
        cleanup();
        resolve(true);
      };
      const onEmptied = () => {
        cleanup();
        resolve(false);
      };
      media.addEventListener('loadedmetadata', onMetadata);
      media.addEventListener('durationchange', onMetadata);
      media.addEventListener('emptied', onEmptied);
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          cleanup();
          resolve(false);
        }, timeoutMs);
      }
    });
  }

  /**
   * True once currentTime / duration reaches `ratio` (clamped to [0, 0.99])
   * or the clip ends; false on timeout.
   */
  waitForProgress(ratio: number, timeoutMs: number): Promise<boolean> {
    const { media } = this;
    const target = clamp(ratio, 0, 0.99);
    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | null = null;
      let poller: ReturnType<typeof setInterval> | null = null;
      const cleanup = () => {
        media.removeEventListener('timeupdate', check);
        media.removeEventListener('ended', onEnded);
        media.removeEventListener('emptied', onEmptied);
        if (timer) clearTimeout(timer);
        if (poller) clearInterval(poller);
      };
      const reached = (): boolean => {
        if (!hasDuration(media)) return false;
        return media.currentTime / media.duration >= target;
      };
      function check(): void {
        if (!reached()) return;
        cleanup();
        resolve(true);
      }
      const onEnded = () => {
        cleanup();
        resolve(true);
      };
      const onEmptied = () => {
        cleanup();
        resolve(false);
      };
      if (reached()) {
        resolve(true);
        return;
      }
      media.addEventListener('timeupdate', check);
      media.addEventListener('ended', onEnded, { once: true });
      media.addEventListener('emptied', onEmptied, { once: true });
      poller = setInterval(check, this.progressPollMs);
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          cleanup();
          resolve(false);
        }, timeoutMs);
      }
    });
  }

  /** Resolves on natural end, error, source removal or timeout. */
  waitForEnd(timeoutMs: number): Promise<void> {
    const { media } = this;
    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | null = null;
      const onComplete = () => {
        media.removeEventListener('ended', onComplete);
        media.removeEventListener('error', onComplete);
        media.removeEventListener('emptied', onComplete);
        if (timer) clearTimeout(timer);
        this.logger.debug('Video ended', { src: this.label });
        resolve();
      };
      if (timeoutMs > 0) {
        timer = setTimeout(onComplete, timeoutMs);
      }
      media.addEventListener('ended', onComplete, { once: true });
      media.addEventListener('error', onComplete, { once: true });
      media.addEventListener('emptied', onComplete, { once: true });
    });
  }

  /** Start playback; a rejected play() (autoplay policy, decode error) is logged, not thrown. */
  async safePlay(): Promise<void> {
    try {
      await this.media.play();
    } catch (err) {
      this.logger.warn('Unable to autoplay video', { src: this.label, error: errorMessage(err) });
    }
  }
}

function hasDuration(media: MediaLike): boolean {
  return Number.isFinite(media.duration) && media.duration > 0;
}

/** Resolves when the image loads, fails or times out; a failure is logged, never thrown. */
export function loadImage(image: ImageLike, timeoutMs: number, logger: Logger = SILENT_LOGGER): Promise<void> {
  return new Promise((resolve) => {
    if (!image.src) {
      resolve();
      return;
    }
    if (image.complete && image.naturalWidth > 0) {
      resolve();
      return;
    }
    let timer: ReturnType<typeof setTimeout> | null = null;
    const cleanup = () => {
      image.removeEventListener('load', onLoad);
      image.removeEventListener('error', onError);
      if (timer) clearTimeout(timer);
    };
    const onLoad = () => {
      cleanup();
      resolve();
    };
    const onError = () => {
      cleanup();
      logger.warn('Image failed to load', { src: image.src });
      resolve();
    };
    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        cleanup();
        logger.warn('Image not loaded before timeout', { src: image.src, timeoutMs });
        resolve();
      }, timeoutMs);
    }
    image.addEventListener('load', onLoad);
    image.addEventListener('error', onError);
  });
}
