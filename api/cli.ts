#!/usr/bin/env node

/**
 * seo-insight command line entry point
 */

import { getErrorMessage } from './lib/errors.js';
import { buildProgram } from './lib/cli.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.stderr.write(`${getErrorMessage(error)}\n`);
    process.exit(1);
  });
