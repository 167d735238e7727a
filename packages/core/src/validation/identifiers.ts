// packages/core/src/validation/identifiers.ts

import { ErrorCode } from '../types/errors.js';
import { MAX_NODE_NAME_LENGTH } from '../utils/constants.js';
import { WorkflowError } from '../utils/errors.js';

const NODE_NAME = /^[a-zA-Z_][-_a-zA-Z0-9]*$/;

export function validateNodeName(name: string): void {
  if (name.length > MAX_NODE_NAME_LENGTH) {
    throw new WorkflowError(
      ErrorCode.INVALID_IDENTIFIER,
      `Node name [${name}] is longer than ${MAX_NODE_NAME_LENGTH} characters`,
      name,
    );
  }
  if (!NODE_NAME.test(name)) {
    throw new WorkflowError(
      ErrorCode.INVALID_IDENTIFIER,
      `Node name [${name}] must start with a letter or '_' and contain only letters, digits, '-' or '_'`,
      name,
    );
  }
}
