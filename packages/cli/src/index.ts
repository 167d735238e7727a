#!/usr/bin/env node
// packages/cli/src/index.ts

import { createProgram } from './program.js';

const program = createProgram();

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});

export { program };
