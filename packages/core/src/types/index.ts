// packages/core/src/types/index.ts -- barrel re-export

export type {
  LogLevel,
  ActionTypeDescriptor,
  SiteDefaults,
  ValidationConfig,
  SiteConfig,
} from './config.js';

export { ErrorCode } from './errors.js';

export type {
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
} from './workflow.js';
