#!/usr/bin/env node
import { createProgram } from './cli/program';
import { describeError } from './errors';

const program = createProgram({
  print: text => {
    process.stdout.write(`${text}\n`);
  }
});

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${describeError(error)}\n`);
  process.exitCode = 1;
});
