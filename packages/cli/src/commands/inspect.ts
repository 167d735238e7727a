// packages/cli/src/commands/inspect.ts

import chalk from 'chalk';

import { describeFailure, describeNodes, renderFailure, renderNodes } from '../render.js';
import { runPipeline } from '../utils.js';
import type { PipelineOptions } from '../utils.js';

export interface InspectOptions extends PipelineOptions {
  json: boolean;
}

export async function inspectCommand(file: string, options: InspectOptions): Promise<void> {
  try {
    const app = runPipeline(file, options);
    const rows = describeNodes(app);
    if (options.json) {
      console.log(JSON.stringify({ name: app.name, nodes: rows }, null, 2));
      return;
    }
    console.log(chalk.bold(app.name));
    console.log(renderNodes(rows));
  } catch (error) {
    console.error(renderFailure(describeFailure(error)));
    process.exit(1);
  }
}
