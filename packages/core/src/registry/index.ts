// packages/core/src/registry/index.ts -- barrel re-export

export { StaticActionRegistry, createActionRegistry } from './action-registry.js';
export type { ActionTypeRegistry } from './action-registry.js';
export { BUILTIN_ACTION_TYPES } from './builtin-actions.js';
