import { Application, type Container } from 'pixi.js';
import { DEFAULT_OVERLAY_CONFIG } from '../engine/config';
import { GachaEngine } from '../engine/GachaEngine';
import { createMessageRouter } from '../transport/message-router';
import { buildSocketUrl, parseBooleanParam, readConnectionConfig } from '../transport/connection-config';
import { OverlaySocket, browserSocketFactory } from '../transport/OverlaySocket';
import { createLogger } from '../utils/log';
import { PixiScene } from './PixiScene';

/** Where the entry row sits, as a fraction of the canvas height. */
const STAGE_BASELINE_RATIO = 0.78;
const BANNER_TOP_PX = 36;
const SET_BANNER_GAP_PX = 110;

export class RendererApp {
  private readonly app = new Application();
  private scene: PixiScene | null = null;
  private engine: GachaEngine | null = null;
  private socket: OverlaySocket | null = null;

  async init(): Promise<void> {
    const params = new URLSearchParams(window.location.search);
    const debug = parseBooleanParam(params.get('debug'), false);
    const muted = parseBooleanParam(params.get('muted'), DEFAULT_OVERLAY_CONFIG.media.muted);

    // Step 1: Init PixiJS Application (async in v8); transparent for the browser source
    await this.app.init({
      resizeTo: window,
      backgroundAlpha: 0,
      antialias: true,
      autoDensity: true,
      resolution: window.devicePixelRatio ?? 1,
    });
    document.body.appendChild(this.app.canvas);

    // Step 2: Scene backend and engine on the app stage
    const scene = new PixiScene(this.app.stage, { ticker: this.app.ticker });
    const engine = new GachaEngine({
      scene,
      config: { debug, media: { muted } },
      logger: createLogger('overlay', { debug }),
    });
    this.scene = scene;
    this.engine = engine;

    // Step 3: Keep the stage host and banners anchored as the window resizes
    this.layout();
    this.app.renderer.on('resize', () => this.layout());

    // Step 4: Host connection
    const socketLog = createLogger('socket', { debug });
    const connection = readConnectionConfig(params, window.location);
    const route = createMessageRouter(engine, socketLog);
    this.socket = new OverlaySocket({
      url: buildSocketUrl(connection),
      token: connection.token,
      factory: browserSocketFactory,
      logger: socketLog,
      onMessage: (message, socket) => route(message, socket),
      onStateChange: (state) => socketLog.debug('Socket state', state),
    });
    this.socket.connect();

    window.addEventListener('beforeunload', () => this.destroy());
  }

  destroy(): void {
    this.socket?.close();
    this.socket = null;
    this.engine?.clear();
    this.engine = null;
    this.scene?.destroy();
    this.scene = null;
  }

  private layout(): void {
    const { width, height } = this.app.screen;
    const place = (label: string, x: number, y: number) => {
      const node: Container | null = this.app.stage.getChildByLabel(label);
      if (!node) return;
      node.x = x;
      node.y = y;
    };
    place('gacha-stage-host', width / 2, height * STAGE_BASELINE_RATIO);
    place('gacha-batch-banner', width / 2, BANNER_TOP_PX);
    place('gacha-set-banner', width / 2, BANNER_TOP_PX + SET_BANNER_GAP_PX);
  }
}
