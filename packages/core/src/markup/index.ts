// packages/core/src/markup/index.ts -- barrel re-export

export {
  appendTextChild,
  childText,
  createElement,
  getAttribute,
  getChild,
  getChildren,
  requireAttribute,
} from './element.js';
export type { Element } from './element.js';
export { parseMarkup, serializeElement } from './xml.js';
export { ROOT_ELEMENT, createSchemaValidator, workflowSchema } from './schema.js';
export type { SchemaValidator } from './schema.js';
