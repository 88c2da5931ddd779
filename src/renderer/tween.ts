/**
 * Per-node value interpolation for the PixiJS backend.
 *
 * Each key holds a target and, while a binding with a duration is in flight,
 * the tween towards it. The scene advances every animating node once per
 * ticker frame.
 */

export type Easing = (t: number) => number;

/** cubic-bezier(0.22, 1, 0.36, 1)-like ease-out. */
export const easeOutCubic: Easing = (t) => 1 - Math.pow(1 - t, 3);

interface Tween {
  from: number;
  to: number;
  elapsedMs: number;
  durationMs: number;
}

export class TweenedValues<K extends string> {
  private readonly current = new Map<K, number>();
  private readonly targets = new Map<K, number>();
  private readonly tweens = new Map<K, Tween>();

  constructor(private readonly easing: Easing = easeOutCubic) {}

  get animating(): boolean {
    return this.tweens.size > 0;
  }

  has(key: K): boolean {
    return this.current.has(key);
  }

  /** Interpolated value this frame. */
  value(key: K): number | undefined {
    return this.current.get(key);
  }

  /** Last value asked for, whether or not the tween reached it. */
  target(key: K): number | undefined {
    return this.targets.get(key);
  }

  /** Returns true when a tween was started. */
  set(key: K, value: number, durationMs = 0): boolean {
    this.targets.set(key, value);
    const from = this.current.get(key);
    if (durationMs <= 0 || from === undefined || from === value) {
      this.tweens.delete(key);
      this.current.set(key, value);
      return false;
    }
    this.tweens.set(key, { from, to: value, elapsedMs: 0, durationMs });
    return true;
  }

  /** Step every tween; returns the keys whose value changed. */
  advance(deltaMs: number): K[] {
    const changed: K[] = [];
    for (const [key, tween] of this.tweens) {
      tween.elapsedMs = Math.min(tween.durationMs, tween.elapsedMs + deltaMs);
      const t = tween.elapsedMs / tween.durationMs;
      this.current.set(key, tween.from + (tween.to - tween.from) * this.easing(t));
      changed.push(key);
      if (t >= 1) this.tweens.delete(key);
    }
    return changed;
  }
}
