#!/usr/bin/env tsx

import { describeError } from '@amiwatch/contracts';
import { runCli } from './cli';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', describeError(error));
    process.exit(1);
  });
