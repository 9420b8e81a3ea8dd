#!/usr/bin/env node
import { createCli } from './cli.js';
import { reportError } from './lib/output-formatter.js';

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => reportError(error));
