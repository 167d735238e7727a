// packages/core/src/parser/index.ts -- barrel re-export

export { WorkflowParser } from './workflow-parser.js';
export type { WorkflowApp, WorkflowParserOptions } from './workflow-parser.js';
export { verifyParameters } from './parameters.js';
