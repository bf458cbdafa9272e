#!/usr/bin/env node
import { logger, LogLevel } from '../server/utils/logger';
import { runCli } from './program';
import { writeStderr } from './terminal';

logger.initialize(null, LogLevel.WARN);

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    writeStderr(message);
    process.exitCode = 2;
  });
