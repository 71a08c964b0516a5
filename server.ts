import dotenv from 'dotenv';
import { createApp } from './src/app';
import { loadConfig } from './src/config';
import { createContext } from './src/context';

dotenv.config();

async function startServer() {
  const config = loadConfig();
  const ctx = createContext(config);
  const log = ctx.logger.child('server');

  log.info(`Server starting in ${config.env} mode`, { db: config.db.file, timezone: config.timezone });

  if (await ctx.ledger.seedDefaults(config.startingCash)) {
    log.info('New ledger seeded', { startingCash: config.startingCash });
  }

  const app = createApp(ctx);
  const server = app.listen(config.port, '0.0.0.0', () => {
    log.info(`Server running on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    log.info('Shutting down', { signal });
    server.close(() => {
      ctx.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  console.error('Server failed to start:', error);
  process.exit(1);
});
