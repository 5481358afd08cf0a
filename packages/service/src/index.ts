import 'dotenv/config';
import { pino } from 'pino';
import { serve } from '@hono/node-server';
import { loadConfig } from './config';
import { bootstrapMarket, loadMarketDefinition } from './bootstrap';
import { AccountStorage } from './storage';
import { HealthMonitor } from './health-monitor';
import { createLedgerAPI } from './api';

async function main() {
  const config = loadConfig();

  // Initialize logger
  const logger = pino({
    level: config.logLevel,
    transport: config.logPretty
      ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
      : undefined,
  });

  logger.info('Initializing spoke ledger service...');

  const definition = await loadMarketDefinition(config.reservesFile);
  const market = bootstrapMarket(definition, { logger, drawnRateBps: config.drawnRateBps });

  const storage = new AccountStorage();
  const monitor = new HealthMonitor(
    market.spoke,
    storage,
    { checkInterval: config.healthCheckInterval },
    logger.child({ module: 'health-monitor' })
  );

  const app = createLedgerAPI({
    market,
    storage,
    monitor,
    logger: logger.child({ module: 'api' }),
    apiKey: config.apiKey,
  });
  if (!config.apiKey) {
    logger.warn('LEDGER_API_KEY is not set, write routes are open');
  }

  logger.info(
    { port: config.port, reservesFile: config.reservesFile, healthCheckInterval: config.healthCheckInterval },
    'Starting spoke ledger service'
  );

  monitor.start();

  const server = serve({
    fetch: app.fetch,
    port: config.port,
  });

  logger.info({ port: config.port }, 'Spoke ledger API server started');

  // Graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down spoke ledger service...');
    monitor.stop();
    server.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Fatal error starting spoke ledger service:', error);
  process.exit(1);
});
