import 'reflect-metadata';

import { bootstrap } from './bootstrap';
import { parseCliArgs } from './cli/cli-options';

async function main(): Promise<void> {
  const app = await bootstrap(parseCliArgs());

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.error(`[fpv-bridge] ${signal} received, shutting down...`);
    app
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[fpv-bridge] shutdown failed', error);
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Fatal error starting FPV bridge', error);
  process.exit(1);
});
