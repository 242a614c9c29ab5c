#!/usr/bin/env node
import { logger } from './logger';
import { run } from './modules/cli';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'weather-cli crashed');
    process.exitCode = 1;
  });
