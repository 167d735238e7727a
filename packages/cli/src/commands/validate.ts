// packages/cli/src/commands/validate.ts — Compile a definition and report the first fault

import { describeFailure, renderFailure, renderSummary, summarize } from '../render.js';
import { runPipeline } from '../utils.js';
import type { PipelineOptions } from '../utils.js';

export interface ValidateOptions extends PipelineOptions {
  json: boolean;
}

export async function validateCommand(file: string, options: ValidateOptions): Promise<void> {
  try {
    const summary = summarize(runPipeline(file, options));
    console.log(options.json ? JSON.stringify(summary, null, 2) : renderSummary(summary));
  } catch (error) {
    const report = describeFailure(error);
    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.error(renderFailure(report));
    }
    process.exit(1);
  }
}
