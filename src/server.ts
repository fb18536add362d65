import { ConfigError, loadConfig } from './config/index.js';
import { createApp } from './app/routes.js';
import { createPoster } from './app/createPoster.js';
import { logger } from './utils/logger.js';

process.on('unhandledRejection', err => {
  logger.error('unhandled_rejection', { err: String(err) });
});

process.on('uncaughtException', err => {
  logger.error('uncaught_exception', { err: String(err) });
});

function start(): void {
  const cfg = loadConfig();
  const { poster, publisher, store } = createPoster(cfg);

  if (!cfg.operatorToken) {
    logger.warn('operator_token_not_set', { reason: 'POST /run is open to anyone who can reach the port' });
  }

  const app = createApp({ poster, store, operatorToken: cfg.operatorToken });
  const host = '0.0.0.0';
  const server = app.listen(cfg.port, host, () => {
    logger.info('server_listening', { port: cfg.port, address: `${host}:${cfg.port}`, stateFile: store.path });
  });

  void publisher.checkConnection().then(info => {
    if (info.ok) logger.info('x_ready', { userId: info.me?.userId, username: info.me?.username });
    else logger.warn('x_not_ready', { error: info.error });
  });

  const shutdown = (signal: string) => {
    logger.info('shutting_down', { signal });
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  start();
} catch (err) {
  if (err instanceof ConfigError) {
    logger.error('config_error', { err: err.message });
    process.exit(1);
  }
  throw err;
}
