/**
 * HeadlessMedia / HeadlessImage: timer-driven stand-ins for video and image
 * elements, so the choreography runs without a browser.
 *
 * Each clip follows a profile: how long it takes to load, whether it reports
 * its duration, whether play() is refused, whether it stalls. Events fire
 * from setTimeout/setInterval, so fake timers drive them deterministically.
 */

import type { ImageLike, MediaEventName, MediaLike } from '../engine/media-gate';

export interface HeadlessClipProfile {
  /** Playback length. */
  durationMs: number;
  /** When false the element never exposes a finite duration. */
  reportDuration: boolean;
  loadDelayMs: number;
  /** Gap between play() and the 'playing' event. */
  startDelayMs: number;
  timeUpdateMs: number;
  /** Fire 'error' instead of loading. */
  fail: boolean;
  /** play() rejects, as under a strict autoplay policy. */
  blockAutoplay: boolean;
  /** Accept play() but never fire another event. */
  stall: boolean;
}

export const DEFAULT_CLIP_PROFILE: HeadlessClipProfile = {
  durationMs: 1200,
  reportDuration: true,
  loadDelayMs: 10,
  startDelayMs: 16,
  timeUpdateMs: 50,
  fail: false,
  blockAutoplay: false,
  stall: false,
};

export type ClipProfileResolver = (src: string) => Partial<HeadlessClipProfile>;

const HAVE_ENOUGH_DATA = 4;

export class HeadlessMedia extends EventTarget implements MediaLike {
  readyState = 0;
  paused = true;
  duration = Number.NaN;
  currentTime = 0;
  /** Number of play() calls that were accepted. */
  playCount = 0;

  private _src = '';
  private profile: HeadlessClipProfile = DEFAULT_CLIP_PROFILE;
  private loadTimer: ReturnType<typeof setTimeout> | null = null;
  private startTimer: ReturnType<typeof setTimeout> | null = null;
  private ticker: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly resolveProfile: ClipProfileResolver = () => ({})) {
    super();
  }

  get src(): string {
    return this._src;
  }

  set src(value: string) {
    this._src = value;
  }

  removeAttribute(name: string): void {
    if (name !== 'src' || !this._src) return;
    this._src = '';
    this.reset();
    this.emit('emptied');
  }

  load(): void {
    this.reset();
    if (!this._src) return;
    this.profile = { ...DEFAULT_CLIP_PROFILE, ...this.resolveProfile(this._src) };
    const { fail, loadDelayMs, reportDuration, durationMs } = this.profile;
    this.loadTimer = setTimeout(() => {
      this.loadTimer = null;
      if (fail) {
        this.emit('error');
        return;
      }
      if (reportDuration && durationMs > 0) {
        this.duration = durationMs / 1000;
        this.emit('loadedmetadata');
        this.emit('durationchange');
      }
      this.readyState = HAVE_ENOUGH_DATA;
      this.emit('loadeddata');
    }, loadDelayMs);
  }

  play(): Promise<void> {
    if (!this._src || this.profile.fail) {
      return Promise.reject(new Error('NotSupportedError: no playable source'));
    }
    if (this.profile.blockAutoplay) {
      return Promise.reject(new Error('NotAllowedError: play() blocked by autoplay policy'));
    }
    this.stopTimers();
    this.playCount += 1;
    this.paused = false;
    if (this.profile.stall) return Promise.resolve();
    const { startDelayMs, timeUpdateMs, durationMs } = this.profile;
    this.startTimer = setTimeout(() => {
      this.startTimer = null;
      this.emit('playing');
      this.ticker = setInterval(() => {
        this.currentTime = Math.min(durationMs / 1000, this.currentTime + timeUpdateMs / 1000);
        this.emit('timeupdate');
        if (this.currentTime * 1000 >= durationMs) {
          this.stopTimers();
          this.paused = true;
          this.emit('ended');
        }
      }, timeUpdateMs);
    }, startDelayMs);
    return Promise.resolve();
  }

  pause(): void {
    this.paused = true;
    this.stopTimers();
  }

  private emit(type: MediaEventName): void {
    this.dispatchEvent(new Event(type));
  }

  private stopTimers(): void {
    if (this.startTimer) clearTimeout(this.startTimer);
    if (this.ticker) clearInterval(this.ticker);
    this.startTimer = null;
    this.ticker = null;
  }

  private reset(): void {
    this.stopTimers();
    if (this.loadTimer) clearTimeout(this.loadTimer);
    this.loadTimer = null;
    this.readyState = 0;
    this.paused = true;
    this.duration = Number.NaN;
    this.currentTime = 0;
  }
}

export interface HeadlessImageProfile {
  loadDelayMs: number;
  fail: boolean;
}

export type ImageProfileResolver = (src: string) => Partial<HeadlessImageProfile>;

export class HeadlessImage extends EventTarget implements ImageLike {
  complete = false;
  naturalWidth = 0;

  constructor(
    readonly src: string,
    resolveProfile: ImageProfileResolver = () => ({}),
  ) {
    super();
    if (!src) return;
    const { loadDelayMs = 5, fail = false } = resolveProfile(src);
    setTimeout(() => {
      this.complete = true;
      if (fail) {
        this.dispatchEvent(new Event('error'));
        return;
      }
      this.naturalWidth = 512;
      this.dispatchEvent(new Event('load'));
    }, loadDelayMs);
  }
}
