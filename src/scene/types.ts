/**
 * Scene contract between the animation core and a rendering backend.
 *
 * The core binds named animation parameters on nodes ("card-scale goes to
 * 0.85 over 650ms") and toggles flags; the backend decides how that turns
 * into pixels. PixiScene interpolates on the ticker; MemoryScene records
 * the values for headless runs.
 */

import type { ImageLike, MediaLike } from '../engine/media-gate';

/** Animation parameters the core binds. Offsets in px, durations in ms. */
export type AnimParam =
  | 'opacity'
  | 'slot-offset'
  | 'card-scale'
  | 'card-translateY'
  | 'silhouette-strength'
  | 'label-opacity'
  | 'star-scale'
  | 'star-offset'
  | 'star-grow-duration'
  | 'star-rotation-duration'
  | 'star-pulse-duration'
  | 'star-rotation-phase'
  | 'badge-scale'
  | 'level-peak-scale';

/** Boolean visual states. */
export type NodeFlag =
  | 'is-hidden'
  | 'is-stealthed'
  | 'is-visible'
  | 'is-active'
  | 'is-shiny'
  | 'is-upgraded'
  | 'pop';

export interface SceneNode {
  readonly label: string;
  readonly parent: SceneNode | null;
  readonly children: readonly SceneNode[];
  /** True once destroy() ran; further mutations are ignored. */
  readonly destroyed: boolean;
  addChild(...children: SceneNode[]): void;
  removeFromParent(): void;
  /** Detach, then release this node and its subtree. */
  destroy(): void;
  /** Bind a parameter; a positive duration asks the backend to interpolate. */
  setParam(name: AnimParam, value: number, durationMs?: number): void;
  getParam(name: AnimParam): number | undefined;
  setFlag(flag: NodeFlag, on: boolean): void;
  hasFlag(flag: NodeFlag): boolean;
  setData(key: string, value: string): void;
  getData(key: string): string | undefined;
}

export interface TextNode extends SceneNode {
  text: string;
}

export interface ImageNode extends SceneNode {
  readonly element: ImageLike;
}

export interface VideoNode extends SceneNode {
  readonly media: MediaLike;
  /** Current clip; '' when none is assigned. */
  readonly source: string;
  /** Assign a clip and start loading it; null clears the node. */
  setSource(src: string | null): void;
}

export interface VideoOptions {
  muted: boolean;
}

export interface SceneBackend {
  /** The stage every overlay element hangs off. */
  readonly root: SceneNode;
  createNode(label: string): SceneNode;
  createText(label: string, text?: string): TextNode;
  createImage(label: string, src: string): ImageNode;
  createVideo(label: string, options: VideoOptions): VideoNode;
  /** Rendered height in px; 0 when not measurable. */
  measureHeight(node: SceneNode): number;
  /** Resolves on the next render frame. */
  nextFrame(): Promise<void>;
}
