import { RendererApp } from './renderer/RendererApp';

async function main(): Promise<void> {
  const app = new RendererApp();
  await app.init();
}

main().catch((err: unknown) => console.error('[overlay] failed to start:', err));
