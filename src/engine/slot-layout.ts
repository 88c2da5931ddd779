import type { Slot } from './types';

/**
 * Horizontal offset multipliers per batch size. Symmetric around center and
 * strictly increasing in absolute value outward, so entries never overlap.
 */
export const SLOT_LAYOUTS: Readonly<Record<number, readonly number[]>> = {
  1: [0],
  2: [-0.8, 0.8],
  3: [-1, 0, 1],
  4: [-1.5, -0.5, 0.5, 1.5],
};

/** Pixel offsets and left-to-right order for a batch of `count` entries. */
export function computeSlotOffsets(count: number, spacing: number, maxVisible = 4): Slot[] {
  if (count <= 0) return [];
  const size = Math.max(1, Math.min(maxVisible, count));
  const layout = SLOT_LAYOUTS[size] ?? SLOT_LAYOUTS[4];
  return layout.slice(0, count).map((unit, order) => ({ offset: unit * spacing, order }));
}

/** Split a pull list into consecutive batches of at most `size`. */
export function chunkPulls<T>(source: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Batch size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < source.length; i += size) {
    chunks.push(source.slice(i, i + size));
  }
  return chunks;
}
