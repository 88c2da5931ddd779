import { DEFAULT_BRIDGE_PORT, startBridgeServer } from './bridge-server';
import { createLogger, errorMessage } from '../utils/log';

const log = createLogger('bridge', { debug: process.env.BRIDGE_DEBUG === '1' });

const port = parseInt(process.env.BRIDGE_PORT ?? String(DEFAULT_BRIDGE_PORT), 10);
if (!Number.isFinite(port) || port < 1 || port > 65535) {
  log.error(`Invalid port: ${process.env.BRIDGE_PORT}. Must be 1-65535.`);
  process.exit(1);
}

const bridge = startBridgeServer({
  host: process.env.BRIDGE_HOST,
  port,
  path: process.env.BRIDGE_PATH,
  token: process.env.BRIDGE_TOKEN,
  logger: log,
});

bridge.listening.catch((err: unknown) => {
  log.error('failed to start:', errorMessage(err));
  process.exit(1);
});

function stop(): void {
  setTimeout(() => process.exit(1), 5000).unref();
  bridge.shutdown().then(
    () => process.exit(0),
    (err: unknown) => {
      log.error('shutdown failed:', errorMessage(err));
      process.exit(1);
    },
  );
}

process.on('SIGINT', stop);
process.on('SIGTERM', stop);
