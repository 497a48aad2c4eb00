#!/usr/bin/env node
import { loadConfig } from './config';
import logger from './logger';
import { runWarmCache } from './run';

runWarmCache(loadConfig()).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.error({ err }, 'Cache warming aborted');
    process.exitCode = 1;
  },
);
