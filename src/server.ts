import { join } from 'path';

import { InterceptorAgent } from './agents/interceptor.js';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { EventLog } from './store/event-log.js';
import { ExchangeStore } from './store/exchange-store.js';

async function main() {
  const logger = createLogger({ name: 'ferry-capture' });
  const config = loadConfig();

  logger.info('Capture point starting...');

  const store = new ExchangeStore(config.shared_dir, {
    readRetries: config.interceptor.read_retries,
    readBackoffMs: config.interceptor.read_backoff_ms
  });
  await store.init();

  const events = new EventLog(join(store.logDir, 'interceptor.log'));
  const interceptor = new InterceptorAgent(store, events, logger, {
    responseTimeoutMs: config.interceptor.response_timeout_seconds * 1000,
    pollIntervalMs: config.interceptor.poll_interval_ms
  });

  const shutdown = new AbortController();
  const app = await buildApp({ config, store, interceptor, logger, shutdownSignal: shutdown.signal });

  const stop = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down...`);
    shutdown.abort();
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info({ shared_dir: config.shared_dir }, `Capture point listening on ${config.server.host}:${config.server.port}`);
  } catch (err) {
    logger.error(err);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
