// packages/core/src/types/errors.ts

export enum ErrorCode {
  SCHEMA_VIOLATION = 'SCHEMA_VIOLATION',
  MARKUP_PARSE_FAILURE = 'MARKUP_PARSE_FAILURE',
  UNKNOWN_ELEMENT = 'UNKNOWN_ELEMENT',
  DUPLICATE_NODE = 'DUPLICATE_NODE',
  INVALID_IDENTIFIER = 'INVALID_IDENTIFIER',
  INVALID_EXPRESSION = 'INVALID_EXPRESSION',
  DANGLING_TRANSITION = 'DANGLING_TRANSITION',
  CYCLE_DETECTED = 'CYCLE_DETECTED',
  UNSUPPORTED_ACTION_TYPE = 'UNSUPPORTED_ACTION_TYPE',
  MISSING_REQUIRED_DEFAULT = 'MISSING_REQUIRED_DEFAULT',
  UNBALANCED_FORK_JOIN_COUNT = 'UNBALANCED_FORK_JOIN_COUNT',
  FORK_DUPLICATE_TARGET = 'FORK_DUPLICATE_TARGET',
  JOIN_WITHOUT_FORK = 'JOIN_WITHOUT_FORK',
  JOIN_FORK_MISMATCH = 'JOIN_FORK_MISMATCH',
  ILLEGAL_NODE_REVISIT = 'ILLEGAL_NODE_REVISIT',
  PARALLEL_BRANCH_UNJOINED_END = 'PARALLEL_BRANCH_UNJOINED_END',
  PARAMETER_VERIFICATION_FAILURE = 'PARAMETER_VERIFICATION_FAILURE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
