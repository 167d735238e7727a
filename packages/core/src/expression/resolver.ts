// packages/core/src/expression/resolver.ts

import type { JobConfiguration } from '../types/workflow.js';

/**
 * Resolves the expression language used by the retry attributes of action nodes.
 * Implementations throw a plain Error on failure; the graph builder reports it
 * as INVALID_EXPRESSION.
 */
export interface ExpressionResolver {
  resolve(expression: string, jobConf: JobConfiguration): string;
}

const REFERENCE = /\$\{([^}]*)\}/g;
const VARIABLE_NAME = /^[A-Za-z_][\w.-]*$/;

/**
 * Substitutes `${name}` references with job configuration values. Function calls
 * and other expression forms are rejected.
 */
export function createVariableResolver(): ExpressionResolver {
  return {
    resolve(expression: string, jobConf: JobConfiguration): string {
      if (expression.replace(REFERENCE, '').includes('${')) {
        throw new Error(`Unterminated expression in '${expression}'`);
      }
      return expression.replace(REFERENCE, (_match, raw: string) => {
        const name = raw.trim();
        if (!VARIABLE_NAME.test(name)) {
          throw new Error(`Unsupported expression '\${${raw}}'`);
        }
        const value = jobConf.get(name);
        if (value === undefined) {
          throw new Error(`Variable '${name}' is not defined`);
        }
        return value;
      });
    },
  };
}
