#!/usr/bin/env node
import { runCli } from './index';
import { logger } from './logger';

runCli().catch((error: unknown) => {
  logger.error(
    { err: error instanceof Error ? error.message : String(error) },
    error instanceof Error ? error.name : 'Error'
  );
  process.exitCode = 1;
});
