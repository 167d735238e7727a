// tests/program.test.ts — CLI command registration and option parsing tests

import { describe, expect, it } from 'vitest';
import { createProgram } from '../src/program.js';

function optionFlags(name: string): string[] {
  const command = createProgram().commands.find((c) => c.name() === name);
  return command ? command.options.map((o) => o.long ?? '') : [];
}

describe('wfgraph program', () => {
  it('registers validate and inspect', () => {
    expect(createProgram().commands.map((c) => c.name())).toEqual(['validate', 'inspect']);
  });

  it('gives both commands the pipeline options', () => {
    const expected = ['--conf', '--define', '--no-fork-join', '--no-schema', '--json'];
    expect(optionFlags('validate')).toEqual(expected);
    expect(optionFlags('inspect')).toEqual(expected);
  });

  it('rejects a define without a value separator', () => {
    const program = createProgram();
    program.exitOverride();
    program.configureOutput({ writeErr: () => {} });
    for (const command of program.commands) {
      command.exitOverride();
      command.configureOutput({ writeErr: () => {} });
    }
    expect(() => program.parse(['node', 'wfgraph', 'validate', 'wf.xml', '-D', 'novalue'])).toThrow(
      'Expected key=value, got "novalue"',
    );
  });
});
