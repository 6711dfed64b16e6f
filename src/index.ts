#!/usr/bin/env node
import { createRequire } from 'module';
import chalk from 'chalk';
import { runCLI } from './cli.js';
import { extractErrorMessage } from './utils/error-handler.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

runCLI({ version: pkg.version }).catch((error: unknown) => {
  console.error(chalk.red(extractErrorMessage(error)));
  process.exit(1);
});
