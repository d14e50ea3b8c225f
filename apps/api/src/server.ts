import 'dotenv/config';
import { buildApp, buildHttpServer } from './app.js';
import { loadConfig } from './config/app-config.js';
import { createContext } from './context.js';

async function main() {
  const config = loadConfig();
  const ctx = createContext(config);
  await ctx.start();

  const app = buildApp(ctx, { corsOrigin: config.corsOrigin });
  const { httpServer, wsGateway } = buildHttpServer(app, ctx);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port} (strategy=${config.scoring.strategy})`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    await wsGateway.close();
    httpServer.close();
    await ctx.close();
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
