// packages/cli/src/program.ts — Command registration

import { Command } from 'commander';

import { VERSION } from '@wfgraph/core';

import { inspectCommand } from './commands/inspect.js';
import type { InspectOptions } from './commands/inspect.js';
import { validateCommand } from './commands/validate.js';
import type { ValidateOptions } from './commands/validate.js';
import { collectDefine } from './utils.js';

/** Options shared by every command that runs the pipeline. */
function withPipelineOptions(command: Command): Command {
  return command
    .option('--conf <file>', 'Job configuration (YAML mapping of key: value)')
    .option('-D, --define <key=value>', 'Set a job configuration entry (repeatable)', collectDefine, [])
    .option('--no-fork-join', 'Skip fork/join validation')
    .option('--no-schema', 'Skip schema validation')
    .option('--json', 'Machine-readable JSON output', false);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('wfgraph')
    .description('Validate workflow definitions and compile them into execution graphs')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging');

  withPipelineOptions(
    program
      .command('validate')
      .description('Validate a workflow definition')
      .argument('<file>', 'Workflow definition file'),
  ).action(async (file: string, _opts: unknown, command: Command) => {
    await validateCommand(file, command.optsWithGlobals<ValidateOptions>());
  });

  withPipelineOptions(
    program
      .command('inspect')
      .description('Validate a workflow definition and list its nodes')
      .argument('<file>', 'Workflow definition file'),
  ).action(async (file: string, _opts: unknown, command: Command) => {
    await inspectCommand(file, command.optsWithGlobals<InspectOptions>());
  });

  return program;
}
