// @wfgraph/core - Workflow definition compiler
// Markup -> graph build -> defaults resolution -> structural and fork/join validation

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Config
  LogLevel,
  ActionTypeDescriptor,
  SiteDefaults,
  ValidationConfig,
  SiteConfig,
  // Workflow
  NodeKind,
  StartNode,
  EndNode,
  KillNode,
  ActionNode,
  DecisionNode,
  ForkNode,
  JoinNode,
  WorkflowNode,
  GlobalDefaults,
  JobConfiguration,
  StructureReport,
} from './types/index.js';

export { ErrorCode } from './types/index.js';

// Utilities
export {
  ConfigError,
  WorkflowError,
  isWorkflowError,
  createLogger,
  silentLogger,
} from './utils/index.js';
export type { Logger, LogSink } from './utils/index.js';
export {
  START_NODE_NAME,
  MAX_NODE_NAME_LENGTH,
  GLOBAL_CONF_KEY,
  VALIDATE_FORK_JOIN_KEY,
  SITE_CONFIG_FILENAME,
} from './utils/constants.js';

// Configuration
export {
  DEFAULT_SITE_CONFIG,
  siteConfigSchema,
  validateSiteConfig,
  deepMerge,
  loadSiteConfig,
} from './config/index.js';
export type { SiteConfigInput } from './config/index.js';

// Markup
export {
  appendTextChild,
  childText,
  createElement,
  getAttribute,
  getChild,
  getChildren,
  requireAttribute,
  parseMarkup,
  serializeElement,
  ROOT_ELEMENT,
  createSchemaValidator,
  workflowSchema,
} from './markup/index.js';
export type { Element, SchemaValidator } from './markup/index.js';

// Action types
export { StaticActionRegistry, createActionRegistry, BUILTIN_ACTION_TYPES } from './registry/index.js';
export type { ActionTypeRegistry } from './registry/index.js';

// Expressions
export { createVariableResolver } from './expression/index.js';
export type { ExpressionResolver } from './expression/index.js';

// Graph
export {
  WorkflowGraph,
  GraphBuilder,
  readGlobalSection,
  DefaultsResolver,
  readConfiguration,
  toConfigurationElement,
  decodeGlobalDefaults,
  encodeGlobalDefaults,
} from './graph/index.js';
export type { GraphBuilderOptions, SiteEndpoints } from './graph/index.js';

// Validation
export { validateNodeName, validateStructure, validateForkJoin } from './validation/index.js';

// Parser
export { WorkflowParser, verifyParameters } from './parser/index.js';
export type { WorkflowApp, WorkflowParserOptions } from './parser/index.js';
