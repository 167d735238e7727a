import { readFileSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import { createSchemaValidator } from '../../../src/markup/schema.js';
import { ErrorCode } from '../../../src/types/errors.js';
import { catchWorkflowError, workflowsDir } from '../../helpers/graphs.js';

const validator = createSchemaValidator();
const TAIL = '<kill name="fail"><message>Stopped</message></kill><end name="done"/>';

function definition(body: string): string {
  return `<workflow-app name="wf">${body}</workflow-app>`;
}

describe('createSchemaValidator', () => {
  it('accepts a complete definition', () => {
    const text = readFileSync(new URL('fork-join.xml', workflowsDir()), 'utf-8');
    expect(() => validator.validate(text)).not.toThrow();
  });

  it('requires ok and error in every action', () => {
    const error = catchWorkflowError(() =>
      validator.validate(definition(`<start to="a"/><action name="a"><email/><ok to="done"/></action>${TAIL}`)),
    );
    expect(error.code).toBe(ErrorCode.SCHEMA_VIOLATION);
    expect(error.message).toBe('Schema violation: action[a]: expected at least 1 <error>, found 0');
  });

  it('names the element and attribute that is missing', () => {
    const error = catchWorkflowError(() =>
      validator.validate(definition(`<start to="j"/><join name="j"/>${TAIL}`)),
    );
    expect(error.message).toBe("Schema violation: join[j].@to: missing required attribute 'to'");
  });

  it('requires exactly one start', () => {
    const error = catchWorkflowError(() =>
      validator.validate(definition(`<start to="done"/><start to="fail"/>${TAIL}`)),
    );
    expect(error.message).toBe('Schema violation: workflow-app: expected exactly one <start>, found 2');
  });

  it('rejects unexpected elements', () => {
    const error = catchWorkflowError(() => validator.validate(definition(`<start to="done"/><bogus/>${TAIL}`)));
    expect(error.message).toBe('Schema violation: bogus: unexpected element <bogus>');
  });

  it('requires a single action type element', () => {
    const error = catchWorkflowError(() =>
      validator.validate(
        definition(`<start to="a"/><action name="a"><email/><shell/><ok to="done"/><error to="fail"/></action>${TAIL}`),
      ),
    );
    expect(error.message).toBe('Schema violation: action[a]: expected exactly one action type element, found 2');
  });
});
