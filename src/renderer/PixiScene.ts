import {
  Container,
  ImageSource,
  Sprite,
  Text,
  Texture,
  VideoSource,
  type TextStyleOptions,
  type Ticker,
} from 'pixi.js';
import type { ImageLike, MediaLike } from '../engine/media-gate';
import type {
  AnimParam,
  ImageNode,
  NodeFlag,
  SceneBackend,
  SceneNode,
  TextNode,
  VideoNode,
  VideoOptions,
} from '../scene/types';
import { TweenedValues } from './tween';

// ──────────────────────────────────────────────────────────
// Palette and type
// ──────────────────────────────────────────────────────────

const TEXT_PRIMARY = '#ffffff';
const TEXT_UPGRADED = '#ffd45c';
const SHINY_CYCLE_MS = 2400;
const POP_TWEEN_MS = 140;
const STAR_PULSE_AMPLITUDE = 0.06;

const NAME_FONT: TextStyleOptions = {
  fontFamily: '"Exo 2", sans-serif',
  fontSize: 34,
  fontWeight: 'bold',
  fill: TEXT_PRIMARY,
  dropShadow: { color: '#000000', blur: 6, distance: 2 },
};

const LEVEL_FONT: TextStyleOptions = {
  fontFamily: '"Exo 2", sans-serif',
  fontSize: 26,
  fontWeight: 'bold',
  fill: TEXT_PRIMARY,
  dropShadow: { color: '#000000', blur: 4, distance: 2 },
};

const BANNER_FONT: TextStyleOptions = {
  fontFamily: '"Orbitron", sans-serif',
  fontSize: 28,
  fontWeight: 'bold',
  fill: TEXT_PRIMARY,
  letterSpacing: 2,
};

// ──────────────────────────────────────────────────────────
// Static layout by node label
// ──────────────────────────────────────────────────────────

interface NodeLayout {
  x?: number;
  y?: number;
  anchorX?: number;
  anchorY?: number;
  /** Fit loaded textures to this width, keeping aspect. */
  fitWidth?: number;
  zIndex?: number;
  font?: TextStyleOptions;
}

const LAYOUT: Readonly<Record<string, NodeLayout>> = {
  'video-stack': { zIndex: 1 },
  drop: { anchorX: 0.5, anchorY: 1, fitWidth: 520 },
  conversion: { anchorX: 0.5, anchorY: 1, fitWidth: 520 },
  opening: { anchorX: 0.5, anchorY: 1, fitWidth: 520 },
  'gacha-card': { anchorX: 0.5, anchorY: 0.5, fitWidth: 360 },
  'rarity-badge': { x: 140, y: -210 },
  'rarity-badge-image': { anchorX: 0.5, anchorY: 0.5, fitWidth: 96 },
  'label-stack': { y: 24, zIndex: 3 },
  'gacha-name': { anchorX: 0.5, anchorY: 0, font: NAME_FONT },
  'gacha-level': { y: 44 },
  'level-prefix': { x: -4, anchorX: 1, anchorY: 0, font: LEVEL_FONT },
  'level-number': { x: 4, anchorX: 0, anchorY: 0, font: LEVEL_FONT },
  'gacha-star': { anchorX: 0.5, anchorY: 0.5, fitWidth: 160 },
  'banner-label': { anchorX: 0.5, anchorY: 0, font: { ...BANNER_FONT, fontSize: 20 } },
  'banner-name': { y: 28, anchorX: 0.5, anchorY: 0, font: BANNER_FONT },
  'banner-pulls': { y: 64, anchorX: 0.5, anchorY: 0, font: { ...BANNER_FONT, fontSize: 18 } },
  'set-banner-prefix': { anchorX: 0.5, anchorY: 0, font: { ...BANNER_FONT, fontSize: 16 } },
  'set-banner-name': { y: 22, anchorX: 0.5, anchorY: 0, font: { ...BANNER_FONT, fontSize: 22 } },
};

/** Nodes that stay hidden until flagged 'is-visible'. */
const REVEAL_GATED = new Set(['gacha-batch-banner', 'gacha-set-banner', 'rarity-badge']);

const LAYER_Z: Readonly<Record<string, number>> = { behind: 0, front: 2 };

type TrackedValue = AnimParam | 'pop-scale';

/** Parameters that keep a node moving every frame once bound. */
const CONTINUOUS_PARAMS = new Set<AnimParam>(['star-pulse-duration', 'star-rotation-phase']);

function silhouetteTint(strength: number): number {
  const channel = Math.round(255 * (1 - Math.min(1, Math.max(0, strength))));
  return (channel << 16) | (channel << 8) | channel;
}

function shinyTint(clockMs: number): number {
  const hue = ((clockMs % SHINY_CYCLE_MS) / SHINY_CYCLE_MS) * 360;
  // Pastel hue wheel: full lightness with a soft saturation.
  const k = (n: number) => (n + hue / 30) % 12;
  const channel = (n: number) => Math.round(255 * (0.85 - 0.15 * Math.max(-1, Math.min(k(n) - 3, 9 - k(n), 1))));
  return (channel(0) << 16) | (channel(8) << 8) | channel(4);
}

// ──────────────────────────────────────────────────────────
// Nodes
// ──────────────────────────────────────────────────────────

export class PixiNode<V extends Container = Container> implements SceneNode {
  parent: PixiNode | null = null;
  children: PixiNode[] = [];
  destroyed = false;

  protected readonly values = new TweenedValues<TrackedValue>();
  private readonly flags = new Set<NodeFlag>();
  private readonly data = new Map<string, string>();
  /** Texture fit factor, applied under the animated scale. */
  protected fitScale = 1;
  private pulse = 1;

  constructor(
    readonly label: string,
    readonly view: V,
    protected readonly scene: PixiScene,
  ) {
    view.label = label;
    view.sortableChildren = true;
    const layout = LAYOUT[label];
    if (layout) {
      view.x = layout.x ?? 0;
      view.y = layout.y ?? 0;
      view.zIndex = layout.zIndex ?? 0;
    }
    this.refresh();
  }

  addChild(...children: SceneNode[]): void {
    for (const child of children) {
      const node = this.scene.adopt(child);
      node.removeFromParent();
      node.parent = this;
      this.children.push(node);
      this.view.addChild(node.view);
    }
  }

  removeFromParent(): void {
    if (!this.parent) return;
    this.parent.children = this.parent.children.filter((child) => child !== this);
    this.parent = null;
    this.view.removeFromParent();
  }

  destroy(): void {
    if (this.destroyed) return;
    this.removeFromParent();
    for (const child of [...this.children]) child.destroy();
    this.children = [];
    this.destroyed = true;
    this.scene.forget(this);
    this.release();
    this.view.destroy();
  }

  setParam(name: AnimParam, value: number, durationMs = 0): void {
    if (this.destroyed) return;
    const tweening = this.values.set(name, value, durationMs);
    if (tweening || CONTINUOUS_PARAMS.has(name)) this.scene.track(this);
    this.refresh();
  }

  getParam(name: AnimParam): number | undefined {
    return this.values.target(name);
  }

  setFlag(flag: NodeFlag, on: boolean): void {
    if (this.destroyed || this.flags.has(flag) === on) return;
    if (on) this.flags.add(flag);
    else this.flags.delete(flag);
    if (flag === 'pop') {
      const peak = this.values.target('level-peak-scale') ?? 1.2;
      if (!this.values.has('pop-scale')) this.values.set('pop-scale', 1);
      if (this.values.set('pop-scale', on ? peak : 1, POP_TWEEN_MS)) this.scene.track(this);
    }
    if (flag === 'is-shiny') this.scene.track(this);
    this.refresh();
  }

  hasFlag(flag: NodeFlag): boolean {
    return this.flags.has(flag);
  }

  setData(key: string, value: string): void {
    if (this.destroyed) return;
    this.data.set(key, value);
    if (key === 'layer') this.view.zIndex = LAYER_Z[value] ?? 0;
  }

  getData(key: string): string | undefined {
    return this.data.get(key);
  }

  /** Advance tweens and continuous motion; false once nothing is moving. */
  tick(deltaMs: number, clockMs: number): boolean {
    if (this.destroyed) return false;
    this.values.advance(deltaMs);
    const continuous = this.applyContinuous(clockMs);
    this.refresh();
    return this.values.animating || continuous;
  }

  /** Push the current values and flags onto the display object. */
  protected refresh(): void {
    const { view, values, flags } = this;
    const slot = values.value('slot-offset');
    if (slot !== undefined) view.x = slot;
    const y = values.value('card-translateY') ?? values.value('star-offset');
    if (y !== undefined) view.y = y;

    const baseScale = values.value('card-scale') ?? values.value('star-scale') ?? values.value('badge-scale') ?? 1;
    const scale = baseScale * (values.value('pop-scale') ?? 1) * this.pulse * this.fitScale;
    view.scale.set(scale, scale);

    const alpha = values.value('opacity') ?? values.value('label-opacity') ?? 1;
    view.alpha = flags.has('is-stealthed') ? 0 : alpha;

    const silhouette = values.value('silhouette-strength');
    if (silhouette !== undefined) view.tint = silhouetteTint(silhouette);

    let visible = !flags.has('is-hidden');
    if (REVEAL_GATED.has(this.label)) visible = visible && flags.has('is-visible');
    view.visible = visible && this.activeForDisplay();
  }

  protected activeForDisplay(): boolean {
    return true;
  }

  /** Release resources owned beside the display object. */
  protected release(): void {}

  private applyContinuous(clockMs: number): boolean {
    let moving = false;
    const pulseMs = this.values.value('star-pulse-duration');
    if (pulseMs && pulseMs > 0) {
      this.pulse = 1 + STAR_PULSE_AMPLITUDE * Math.sin((clockMs / pulseMs) * Math.PI * 2);
      moving = true;
    }
    const phase = this.values.value('star-rotation-phase');
    if (phase !== undefined) {
      const period = this.parent?.getParam('star-rotation-duration') ?? 0;
      if (period > 0) {
        this.view.rotation = (((clockMs + phase) % period) / period) * Math.PI * 2;
        moving = true;
      }
    }
    if (this.flags.has('is-shiny')) {
      this.view.tint = shinyTint(clockMs);
      moving = true;
    }
    return moving;
  }
}

export class PixiTextNode extends PixiNode<Text> implements TextNode {
  get text(): string {
    return this.view.text;
  }

  set text(value: string) {
    if (this.destroyed) return;
    this.view.text = value;
  }

  override setFlag(flag: NodeFlag, on: boolean): void {
    super.setFlag(flag, on);
    if (flag === 'is-upgraded' && !this.destroyed) {
      this.view.style.fill = on ? TEXT_UPGRADED : TEXT_PRIMARY;
    }
  }
}

function fitRatio(texture: Texture, label: string): number {
  const width = LAYOUT[label]?.fitWidth;
  if (!width || texture.width <= 0) return 1;
  return width / texture.width;
}

export class PixiImageNode extends PixiNode<Sprite> implements ImageNode {
  private readonly onLoad = () => {
    if (this.destroyed) return;
    this.view.texture = new Texture({ source: new ImageSource({ resource: this.image }) });
    this.fitScale = fitRatio(this.view.texture, this.label);
    this.refresh();
  };

  constructor(label: string, private readonly image: HTMLImageElement, scene: PixiScene) {
    super(label, new Sprite(Texture.EMPTY), scene);
    const layout = LAYOUT[label];
    this.view.anchor.set(layout?.anchorX ?? 0, layout?.anchorY ?? 0);
    image.addEventListener('load', this.onLoad);
  }

  get element(): ImageLike {
    return this.image;
  }

  protected override release(): void {
    this.image.removeEventListener('load', this.onLoad);
    if (this.view.texture !== Texture.EMPTY) this.view.texture.destroy(true);
  }
}

export class PixiVideoNode extends PixiNode<Sprite> implements VideoNode {
  private videoSource: VideoSource | null = null;
  private readonly onLoaded = () => {
    if (this.destroyed || this.videoSource) return;
    this.videoSource = new VideoSource({ resource: this.video, autoPlay: false, autoLoad: true });
    this.view.texture = new Texture({ source: this.videoSource });
    this.fitScale = fitRatio(this.view.texture, this.label);
    this.refresh();
  };

  constructor(label: string, private readonly video: HTMLVideoElement, scene: PixiScene) {
    super(label, new Sprite(Texture.EMPTY), scene);
    const layout = LAYOUT[label];
    this.view.anchor.set(layout?.anchorX ?? 0.5, layout?.anchorY ?? 1);
    video.addEventListener('loadeddata', this.onLoaded);
    this.refresh();
  }

  get media(): MediaLike {
    return this.video;
  }

  get source(): string {
    return this.video.getAttribute('src') ?? '';
  }

  setSource(src: string | null): void {
    if (this.destroyed) return;
    this.dropTexture();
    if (!src) {
      this.video.removeAttribute('src');
      this.video.load();
      return;
    }
    this.video.src = src;
    this.video.load();
  }

  protected override activeForDisplay(): boolean {
    return this.hasFlag('is-active');
  }

  protected override release(): void {
    this.video.removeEventListener('loadeddata', this.onLoaded);
    this.video.pause();
    this.dropTexture();
    this.video.removeAttribute('src');
    this.video.load();
  }

  private dropTexture(): void {
    if (!this.videoSource) return;
    const texture = this.view.texture;
    this.view.texture = Texture.EMPTY;
    texture.destroy(true);
    this.videoSource = null;
  }
}

// ──────────────────────────────────────────────────────────
// Scene
// ──────────────────────────────────────────────────────────

export interface PixiSceneOptions {
  ticker: Ticker;
  /** Defaults to document.createElement('video'). */
  createVideoElement?: () => HTMLVideoElement;
  /** Defaults to new Image(). */
  createImageElement?: () => HTMLImageElement;
}

/** SceneBackend over a PixiJS container tree, animated from the app ticker. */
export class PixiScene implements SceneBackend {
  readonly root: PixiNode;
  private readonly ticker: Ticker;
  private readonly nodes = new WeakSet<SceneNode>();
  private readonly animating = new Set<PixiNode>();
  private clockMs = 0;

  constructor(
    readonly stage: Container,
    private readonly options: PixiSceneOptions,
  ) {
    this.ticker = options.ticker;
    this.root = this.register(new PixiNode('stage', stage, this));
    this.ticker.add(this.update, this);
  }

  createNode(label: string): SceneNode {
    return this.register(new PixiNode(label, new Container(), this));
  }

  createText(label: string, text = ''): TextNode {
    const layout = LAYOUT[label];
    const view = new Text({ text, style: layout?.font ?? NAME_FONT });
    view.anchor.set(layout?.anchorX ?? 0, layout?.anchorY ?? 0);
    return this.register(new PixiTextNode(label, view, this));
  }

  createImage(label: string, src: string): ImageNode {
    const image = this.options.createImageElement?.() ?? new Image();
    image.crossOrigin = 'anonymous';
    image.decoding = 'async';
    const node = this.register(new PixiImageNode(label, image, this));
    image.src = src;
    return node;
  }

  createVideo(label: string, options: VideoOptions): VideoNode {
    const video = this.options.createVideoElement?.() ?? document.createElement('video');
    video.muted = options.muted;
    video.playsInline = true;
    video.preload = 'auto';
    video.crossOrigin = 'anonymous';
    return this.register(new PixiVideoNode(label, video, this));
  }

  measureHeight(node: SceneNode): number {
    const pixiNode = this.adopt(node);
    return pixiNode.destroyed ? 0 : pixiNode.view.getLocalBounds().height;
  }

  nextFrame(): Promise<void> {
    return new Promise((resolve) => {
      this.ticker.addOnce(() => resolve());
    });
  }

  /** Stop animating and release the whole tree. */
  destroy(): void {
    this.ticker.remove(this.update, this);
    for (const child of [...this.root.children]) child.destroy();
    this.animating.clear();
  }

  /** Narrow a SceneNode back to the PixiNode this scene created. */
  adopt(node: SceneNode): PixiNode {
    if (node instanceof PixiNode && this.nodes.has(node)) return node;
    throw new Error(`PixiScene cannot adopt foreign node "${node.label}"`);
  }

  track(node: PixiNode): void {
    this.animating.add(node);
  }

  forget(node: PixiNode): void {
    this.animating.delete(node);
  }

  private register<N extends PixiNode<Container>>(node: N): N {
    this.nodes.add(node);
    return node;
  }

  private update(ticker: Ticker): void {
    this.clockMs += ticker.deltaMS;
    for (const node of this.animating) {
      if (!node.tick(ticker.deltaMS, this.clockMs)) this.animating.delete(node);
    }
  }
}
