#!/usr/bin/env node
import 'dotenv/config';
import { buildCli } from './cli/commands.js';
import { errorMessage } from './control-plane/errors.js';

const program = buildCli();
program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`regaudit: ${errorMessage(err)}`);
  process.exit(1);
});
