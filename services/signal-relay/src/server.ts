import { loadConfig, ConfigError, type AppConfig } from './config.js';
import { createRelay } from './relay.js';
import { logger } from './logger.js';
import { logStartupBanner } from './utils/log-startup.js';

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logger.fatal(err instanceof ConfigError ? { issues: err.issues } : { err }, 'invalid environment');
  process.exit(1);
}

const relay = createRelay(config);
relay.start();

const server = relay.app.listen(config.port, () => {
  logger.info({ port: config.port }, 'signal-relay listening');
  // Print routes + bot check after listener is ready
  void logStartupBanner(config, relay);
});

// ---- global process error traps ----
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'uncaughtException');
  void shutdown(1);
});
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'unhandledRejection');
  void shutdown(1);
});

process.on('SIGINT', () => void shutdown(0));
process.on('SIGTERM', () => void shutdown(0));

let closing = false;
async function shutdown(code: number) {
  if (closing) return;
  closing = true;
  logger.info('shutting down...');
  setTimeout(() => process.exit(code || 1), 10_000).unref();
  server.close(() => {
    relay
      .stop()
      .catch((err) => logger.error({ err }, 'relay stop failed'))
      .finally(() => {
        logger.info('bye');
        process.exit(code);
      });
  });
}
