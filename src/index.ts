#!/usr/bin/env node
import 'dotenv/config';
import { buildCli } from './cli/commands.js';
import { ConfigurationError } from './control-plane/errors.js';
import { EXIT_CODES } from './ledger/ledger.js';

const program = buildCli();
program.parseAsync(process.argv).catch((err: Error) => {
  console.error(`legacy-convert: ${err.message}`);
  process.exit(err instanceof ConfigurationError ? EXIT_CODES.configuration : EXIT_CODES.unexpected);
});
