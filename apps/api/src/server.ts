import 'dotenv/config';
import { createServer } from 'http';
import { buildApp } from './app.js';
import { loadRuntimeConfig } from './config/runtime.js';
import { createRuntime, shutdownRuntime } from './runtime.js';

async function main() {
  const config = loadRuntimeConfig();
  const runtime = createRuntime(config);

  await runtime.store.init();
  console.log(`[server] ${config.store.driver} store ready`);

  const app = buildApp(runtime, config);
  const httpServer = createServer(app);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await shutdownRuntime(runtime);
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown failed', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
