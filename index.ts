#!/usr/bin/env node
import logger, { errorMessage } from './server/logger.js';
import { runCli } from './server/cli.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error({ err }, errorMessage(err));
    process.exitCode = 1;
  });
