// packages/core/src/validation/index.ts -- barrel re-export

export { validateNodeName } from './identifiers.js';
export { validateStructure } from './structural.js';
export { validateForkJoin } from './fork-join.js';
