// packages/core/src/parser/parameters.ts — <parameters> declarations against the job configuration

import { childText, getChild, getChildren } from '../markup/element.js';
import type { Element } from '../markup/element.js';
import { ErrorCode } from '../types/errors.js';
import type { JobConfiguration } from '../types/workflow.js';
import { ELEMENT } from '../utils/constants.js';
import { WorkflowError } from '../utils/errors.js';

/**
 * Fills declared parameters with their default values when the job configuration
 * does not set them, and fails listing every parameter left without a value.
 */
export function verifyParameters(root: Element, jobConf: JobConfiguration): void {
  const parameters = getChild(root, ELEMENT.PARAMETERS);
  if (!parameters) return;

  const missing: string[] = [];
  for (const property of getChildren(parameters, ELEMENT.PROPERTY)) {
    const name = childText(property, ELEMENT.PROPERTY_NAME)?.trim();
    if (!name) {
      throw new WorkflowError(
        ErrorCode.PARAMETER_VERIFICATION_FAILURE,
        'Parameter declaration has an empty name',
      );
    }
    if (jobConf.has(name)) continue;

    const fallback = childText(property, ELEMENT.PROPERTY_VALUE);
    if (fallback !== undefined) {
      jobConf.set(name, fallback);
    } else {
      missing.push(name);
    }
  }

  if (missing.length > 0) {
    throw new WorkflowError(
      ErrorCode.PARAMETER_VERIFICATION_FAILURE,
      `Missing value for parameter(s): ${missing.join(', ')}`,
    );
  }
}
