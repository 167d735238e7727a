// packages/core/src/utils/index.ts -- barrel re-export

export { ConfigError, WorkflowError, isWorkflowError } from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel, LogSink } from './logger.js';
