#!/usr/bin/env node
import {USAGE, parseConfig, wantsHelp} from '../config.js';
import {run} from '../bootstrap.js';
import {dumpLogsToConsole} from '../shared/utils/logger.js';

if (wantsHelp()) {
  process.stdout.write(USAGE);
  process.exit(0);
}

run(parseConfig())
  .then(() => {
    dumpLogsToConsole();
  })
  .catch((err) => {
    dumpLogsToConsole();
    console.error('Failed to start diff-review:', err instanceof Error ? err.stack ?? err.message : err);
    process.exit(1);
  });
