// packages/core/src/graph/index.ts -- barrel re-export

export { WorkflowGraph } from './workflow-graph.js';
export { GraphBuilder, readGlobalSection } from './builder.js';
export type { GraphBuilderOptions } from './builder.js';
export { DefaultsResolver } from './defaults-resolver.js';
export type { SiteEndpoints } from './defaults-resolver.js';
export { readConfiguration, toConfigurationElement } from './configuration.js';
export { decodeGlobalDefaults, encodeGlobalDefaults } from './global-codec.js';
