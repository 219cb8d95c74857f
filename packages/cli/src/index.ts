#!/usr/bin/env tsx
import { exitCodeFor } from '@cartwright/shared';
import { createProgram } from './program';
import { OutputRenderer } from './output';
import type { GlobalOptions } from './commands/carthage';

const program = createProgram();

program.parseAsync(process.argv).catch((error: unknown) => {
  const { json, verbose } = program.opts<GlobalOptions>();
  new OutputRenderer(Boolean(json)).renderError(error, Boolean(verbose));
  process.exit(exitCodeFor(error));
});
