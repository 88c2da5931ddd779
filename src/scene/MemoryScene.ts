/**
 * MemoryScene: headless SceneBackend.
 *
 * Keeps the node tree, parameter values and flags in plain objects and logs
 * every parameter binding, so a full reveal can be rehearsed and inspected
 * without a canvas. No rendering, no PixiJS.
 */

import type {
  AnimParam,
  ImageNode,
  NodeFlag,
  SceneBackend,
  SceneNode,
  TextNode,
  VideoNode,
  VideoOptions,
} from './types';
import {
  HeadlessImage,
  HeadlessMedia,
  type ClipProfileResolver,
  type ImageProfileResolver,
} from './headless-media';

export interface ParamBinding {
  readonly node: string;
  readonly param: AnimParam;
  readonly value: number;
  readonly durationMs: number;
}

export interface MemorySceneOptions {
  clipProfile?: ClipProfileResolver;
  imageProfile?: ImageProfileResolver;
  /** Height reported for every measured node. */
  measuredHeight?: number;
  frameMs?: number;
}

export class MemoryNode implements SceneNode {
  parent: MemoryNode | null = null;
  children: MemoryNode[] = [];
  destroyed = false;

  private readonly params = new Map<AnimParam, number>();
  private readonly flags = new Set<NodeFlag>();
  private readonly data = new Map<string, string>();

  constructor(
    readonly label: string,
    protected readonly bindings: ParamBinding[],
  ) {}

  addChild(...children: SceneNode[]): void {
    for (const child of children) {
      if (!(child instanceof MemoryNode)) {
        throw new Error(`MemoryScene cannot adopt foreign node "${child.label}"`);
      }
      child.removeFromParent();
      child.parent = this;
      this.children.push(child);
    }
  }

  removeFromParent(): void {
    if (!this.parent) return;
    this.parent.children = this.parent.children.filter((child) => child !== this);
    this.parent = null;
  }

  destroy(): void {
    this.removeFromParent();
    for (const child of [...this.children]) child.destroy();
    this.children = [];
    this.destroyed = true;
  }

  setParam(name: AnimParam, value: number, durationMs = 0): void {
    if (this.destroyed) return;
    this.params.set(name, value);
    this.bindings.push({ node: this.label, param: name, value, durationMs });
  }

  getParam(name: AnimParam): number | undefined {
    return this.params.get(name);
  }

  setFlag(flag: NodeFlag, on: boolean): void {
    if (this.destroyed) return;
    if (on) this.flags.add(flag);
    else this.flags.delete(flag);
  }

  hasFlag(flag: NodeFlag): boolean {
    return this.flags.has(flag);
  }

  setData(key: string, value: string): void {
    if (this.destroyed) return;
    this.data.set(key, value);
  }

  getData(key: string): string | undefined {
    return this.data.get(key);
  }

  /** Depth-first search of the subtree, this node included. */
  findAll(label: string): MemoryNode[] {
    const found: MemoryNode[] = this.label === label ? [this] : [];
    for (const child of this.children) found.push(...child.findAll(label));
    return found;
  }

  find(label: string): MemoryNode | undefined {
    return this.findAll(label)[0];
  }
}

export class MemoryTextNode extends MemoryNode implements TextNode {
  text: string;

  constructor(label: string, bindings: ParamBinding[], text: string) {
    super(label, bindings);
    this.text = text;
  }
}

export class MemoryImageNode extends MemoryNode implements ImageNode {
  constructor(
    label: string,
    bindings: ParamBinding[],
    readonly element: HeadlessImage,
  ) {
    super(label, bindings);
  }
}

export class MemoryVideoNode extends MemoryNode implements VideoNode {
  readonly muted: boolean;

  constructor(
    label: string,
    bindings: ParamBinding[],
    readonly media: HeadlessMedia,
    options: VideoOptions,
  ) {
    super(label, bindings);
    this.muted = options.muted;
  }

  get source(): string {
    return this.media.src;
  }

  setSource(src: string | null): void {
    if (!src) {
      this.media.removeAttribute('src');
      return;
    }
    this.media.src = src.replace(/\\/g, '/');
    this.media.load();
  }

  override destroy(): void {
    this.media.pause();
    this.media.removeAttribute('src');
    super.destroy();
  }
}

export class MemoryScene implements SceneBackend {
  readonly root: MemoryNode;
  /** Every parameter binding made on any node, in order. */
  readonly bindings: ParamBinding[] = [];

  private readonly options: MemorySceneOptions;

  constructor(options: MemorySceneOptions = {}) {
    this.options = options;
    this.root = new MemoryNode('stage', this.bindings);
  }

  createNode(label: string): MemoryNode {
    return new MemoryNode(label, this.bindings);
  }

  createText(label: string, text = ''): MemoryTextNode {
    return new MemoryTextNode(label, this.bindings, text);
  }

  createImage(label: string, src: string): MemoryImageNode {
    return new MemoryImageNode(label, this.bindings, new HeadlessImage(src, this.options.imageProfile));
  }

  createVideo(label: string, options: VideoOptions): MemoryVideoNode {
    return new MemoryVideoNode(label, this.bindings, new HeadlessMedia(this.options.clipProfile), options);
  }

  measureHeight(_node: SceneNode): number {
    return this.options.measuredHeight ?? 0;
  }

  nextFrame(): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, this.options.frameMs ?? 16));
  }
}
