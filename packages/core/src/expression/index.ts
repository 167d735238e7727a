// packages/core/src/expression/index.ts -- barrel re-export

export { createVariableResolver } from './resolver.js';
export type { ExpressionResolver } from './resolver.js';
