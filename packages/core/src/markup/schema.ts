// packages/core/src/markup/schema.ts — Structural schema for workflow definitions

import { z } from 'zod';
import { ErrorCode } from '../types/errors.js';
import { ATTRIBUTE, ELEMENT } from '../utils/constants.js';
import { WorkflowError } from '../utils/errors.js';
import type { Element } from './element.js';
import { parseMarkup } from './xml.js';

/**
 * Checks a raw definition before the graph builder sees it. Implementations
 * throw a SCHEMA_VIOLATION WorkflowError.
 */
export interface SchemaValidator {
  validate(definition: string): void;
}

export const ROOT_ELEMENT = 'workflow-app';

const elementSchema: z.ZodType<Element> = z.lazy(() =>
  z.object({
    name: z.string(),
    attributes: z.record(z.string(), z.string()),
    children: z.array(elementSchema),
    text: z.string(),
  }),
);

interface ChildRule {
  schema?: z.ZodTypeAny;
  min?: number;
  max?: number;
}

function withAttributes(required: readonly string[]) {
  return z.record(z.string(), z.string()).superRefine((attributes, ctx) => {
    for (const name of required) {
      if ((attributes[name] ?? '').trim() === '') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [name],
          message: `missing required attribute '${name}'`,
        });
      }
    }
  });
}

function withChildren(rules: Record<string, ChildRule>) {
  return z.array(elementSchema).superRefine((children, ctx) => {
    for (const [tag, rule] of Object.entries(rules)) {
      let count = 0;
      children.forEach((child, index) => {
        if (child.name !== tag) return;
        count++;
        if (!rule.schema) return;
        const result = rule.schema.safeParse(child);
        if (result.success) return;
        for (const issue of result.error.issues) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, ...issue.path],
            message: issue.message,
          });
        }
      });
      if (rule.min !== undefined && count < rule.min) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected at least ${rule.min} <${tag}>, found ${count}`,
        });
      }
      if (rule.max !== undefined && count > rule.max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected at most ${rule.max} <${tag}>, found ${count}`,
        });
      }
    }
  });
}

function elementOf(tag: string, attributes: readonly string[] = [], children?: Record<string, ChildRule>) {
  return z.object({
    name: z.literal(tag),
    attributes: withAttributes(attributes),
    children: children ? withChildren(children) : z.array(elementSchema),
    text: z.string(),
  });
}

const transitionSchema = (tag: string) => elementOf(tag, [ATTRIBUTE.TO]);

const propertySchema = elementOf(ELEMENT.PROPERTY, [], {
  [ELEMENT.PROPERTY_NAME]: { min: 1, max: 1 },
  [ELEMENT.PROPERTY_VALUE]: { max: 1 },
});

const configurationSchema = elementOf(ELEMENT.CONFIGURATION, [], {
  [ELEMENT.PROPERTY]: { schema: propertySchema },
});

const switchSchema = elementOf(ELEMENT.SWITCH, [], {
  [ELEMENT.CASE]: { schema: transitionSchema(ELEMENT.CASE) },
  [ELEMENT.DEFAULT]: { schema: transitionSchema(ELEMENT.DEFAULT), min: 1, max: 1 },
});

const NON_TYPE_ACTION_CHILDREN: ReadonlySet<string> = new Set<string>([
  ELEMENT.OK,
  ELEMENT.ERROR,
  ELEMENT.SLA_INFO,
  ELEMENT.CREDENTIALS,
]);

const actionSchema = elementOf(ELEMENT.ACTION, [ATTRIBUTE.NAME], {
  [ELEMENT.OK]: { schema: transitionSchema(ELEMENT.OK), min: 1, max: 1 },
  [ELEMENT.ERROR]: { schema: transitionSchema(ELEMENT.ERROR), min: 1, max: 1 },
}).superRefine((action, ctx) => {
  const types = action.children.filter((c) => !NON_TYPE_ACTION_CHILDREN.has(c.name));
  if (types.length !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['children'],
      message: `expected exactly one action type element, found ${types.length}`,
    });
  }
});

const NODE_SCHEMAS: ReadonlyMap<string, z.ZodTypeAny> = new Map<string, z.ZodTypeAny>([
  [ELEMENT.START, elementOf(ELEMENT.START, [ATTRIBUTE.TO])],
  [ELEMENT.END, elementOf(ELEMENT.END, [ATTRIBUTE.NAME])],
  [ELEMENT.KILL, elementOf(ELEMENT.KILL, [ATTRIBUTE.NAME], { [ELEMENT.MESSAGE]: { max: 1 } })],
  [
    ELEMENT.FORK,
    elementOf(ELEMENT.FORK, [ATTRIBUTE.NAME], {
      [ELEMENT.FORK_PATH]: { schema: elementOf(ELEMENT.FORK_PATH, [ATTRIBUTE.START]), min: 1 },
    }),
  ],
  [ELEMENT.JOIN, elementOf(ELEMENT.JOIN, [ATTRIBUTE.NAME, ATTRIBUTE.TO])],
  [
    ELEMENT.DECISION,
    elementOf(ELEMENT.DECISION, [ATTRIBUTE.NAME], {
      [ELEMENT.SWITCH]: { schema: switchSchema, min: 1, max: 1 },
    }),
  ],
  [ELEMENT.ACTION, actionSchema],
  [
    ELEMENT.GLOBAL,
    elementOf(ELEMENT.GLOBAL, [], {
      [ELEMENT.NAME_NODE]: { max: 1 },
      [ELEMENT.JOB_TRACKER]: { max: 1 },
      [ELEMENT.CONFIGURATION]: { schema: configurationSchema, max: 1 },
    }),
  ],
  [
    ELEMENT.PARAMETERS,
    elementOf(ELEMENT.PARAMETERS, [], { [ELEMENT.PROPERTY]: { schema: propertySchema } }),
  ],
  [ELEMENT.CREDENTIALS, elementOf(ELEMENT.CREDENTIALS)],
  [ELEMENT.SLA_INFO, elementOf(ELEMENT.SLA_INFO)],
]);

export const workflowSchema = elementOf(ROOT_ELEMENT, [ATTRIBUTE.NAME]).superRefine((root, ctx) => {
  let starts = 0;
  root.children.forEach((child, index) => {
    const schema = NODE_SCHEMAS.get(child.name);
    if (!schema) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['children', index],
        message: `unexpected element <${child.name}>`,
      });
      return;
    }
    if (child.name === ELEMENT.START) starts++;
    const result = schema.safeParse(child);
    if (result.success) return;
    for (const issue of result.error.issues) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['children', index, ...issue.path],
        message: issue.message,
      });
    }
  });
  if (starts !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['children'],
      message: `expected exactly one <start>, found ${starts}`,
    });
  }
});

/** Render an issue path against the element tree, e.g. `action[build].ok`. */
function describePath(root: Element, path: readonly (string | number)[]): string {
  const parts: string[] = [];
  let current: Element | undefined = root;
  for (let i = 0; i < path.length; i++) {
    const segment = path[i];
    if (segment === 'children' && typeof path[i + 1] === 'number' && current) {
      const next: Element | undefined = current.children[Number(path[i + 1])];
      if (next) {
        const name = next.attributes[ATTRIBUTE.NAME];
        parts.push(name ? `${next.name}[${name}]` : next.name);
      }
      current = next;
      i++;
    } else if (segment === 'attributes') {
      continue;
    } else if (segment !== 'children') {
      parts.push(`@${String(segment)}`);
    }
  }
  return parts.length > 0 ? parts.join('.') : root.name;
}

export function createSchemaValidator(): SchemaValidator {
  return {
    validate(definition: string): void {
      const root = parseMarkup(definition);
      const result = workflowSchema.safeParse(root);
      if (result.success) return;
      const issues = result.error.issues
        .map((i) => `${describePath(root, i.path)}: ${i.message}`)
        .join('; ');
      throw new WorkflowError(ErrorCode.SCHEMA_VIOLATION, `Schema violation: ${issues}`);
    },
  };
}
