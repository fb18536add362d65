#!/usr/bin/env node
import { ConfigError, loadConfig } from './config/index.js';
import { createPoster, type PosterBundle } from './app/createPoster.js';
import { outcomeExitCode } from './scheduler/versePoster.js';
import { logger } from './utils/logger.js';

process.on('unhandledRejection', err => {
  logger.error('unhandled_rejection', { err: String(err) });
});

process.on('uncaughtException', err => {
  logger.error('uncaught_exception', { err: String(err) });
  process.exit(1);
});

async function bootstrap(): Promise<PosterBundle | null> {
  try {
    const cfg = loadConfig();
    const bundle = createPoster(cfg);
    if (cfg.xVerifyOnStart) {
      const info = await bundle.publisher.checkConnection();
      if (info.ok) logger.info('x_ready', { userId: info.me?.userId, username: info.me?.username });
      else logger.warn('x_not_ready', { error: info.error });
    }
    return bundle;
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('config_error', { err: err.message });
      return null;
    }
    throw err;
  }
}

async function main(): Promise<number> {
  const bundle = await bootstrap();
  if (!bundle) return 1;

  const outcome = await bundle.poster.runOnce();
  if (outcome.ok) {
    logger.info('run_completed', { reference: outcome.reference, postId: outcome.postId });
  } else if (outcome.status === 'skipped') {
    logger.info('run_skipped', { reason: outcome.reason, minutesRemaining: outcome.minutesRemaining });
  } else {
    logger.warn('run_completed_with_issues', { reason: outcome.reason, error: outcome.error });
  }
  return outcomeExitCode(outcome);
}

main().then(
  code => {
    process.exitCode = code;
  },
  err => {
    logger.error('run_crashed', { err: String(err) });
    process.exitCode = 1;
  }
);
