// packages/core/src/utils/constants.ts — Shared names and limits

/** Reserved name of the start node; never a legal user node name. */
export const START_NODE_NAME = ':start:';

/** Longest accepted node name */
export const MAX_NODE_NAME_LENGTH = 128;

/** Job configuration key holding an encoded GlobalDefaults blob for child workflows */
export const GLOBAL_CONF_KEY = 'workflow.global.conf';

/** Job configuration key for the per-job fork/join switch */
export const VALIDATE_FORK_JOIN_KEY = 'workflow.validate.fork-join';

/** Site configuration file looked up in the project directory */
export const SITE_CONFIG_FILENAME = '.wfgraph.yml';

/** Element and attribute names of the definition language */
export const ELEMENT = {
  START: 'start',
  END: 'end',
  KILL: 'kill',
  ACTION: 'action',
  DECISION: 'decision',
  FORK: 'fork',
  JOIN: 'join',
  GLOBAL: 'global',
  PARAMETERS: 'parameters',
  CREDENTIALS: 'credentials',
  SLA_INFO: 'info',
  FORK_PATH: 'path',
  OK: 'ok',
  ERROR: 'error',
  SWITCH: 'switch',
  CASE: 'case',
  DEFAULT: 'default',
  MESSAGE: 'message',
  NAME_NODE: 'name-node',
  JOB_TRACKER: 'job-tracker',
  JOB_XML: 'job-xml',
  CONFIGURATION: 'configuration',
  PROPERTY: 'property',
  PROPERTY_NAME: 'name',
  PROPERTY_VALUE: 'value',
  PROPAGATE_CONFIGURATION: 'propagate-configuration',
} as const;

export const ATTRIBUTE = {
  NAME: 'name',
  TO: 'to',
  START: 'start',
  CRED: 'cred',
  RETRY_MAX: 'retry-max',
  RETRY_INTERVAL: 'retry-interval',
} as const;

/** Action types with their own endpoint rules in the defaults resolver */
export const SUB_WORKFLOW_ACTION = 'sub-workflow';
export const FS_ACTION = 'fs';
