// tests/render.test.ts — Result rendering

import { stripVTControlCharacters } from 'node:util';
import { ConfigError, ErrorCode, WorkflowError } from '@wfgraph/core';
import { describe, expect, it } from 'vitest';
import { describeFailure, renderFailure, renderNodes, renderSummary } from '../src/render.js';

describe('describeFailure', () => {
  it('keeps the code and node of workflow errors', () => {
    const report = describeFailure(new WorkflowError(ErrorCode.CYCLE_DETECTED, 'Cycle detected', 'a'));
    expect(report).toEqual({ valid: false, code: 'CYCLE_DETECTED', message: 'Cycle detected', node: 'a' });
  });

  it('labels configuration errors', () => {
    expect(describeFailure(new ConfigError('bad file')).code).toBe('CONFIG_ERROR');
  });

  it('falls back to a generic code', () => {
    expect(describeFailure(new Error('ENOENT')).code).toBe('ERROR');
    expect(describeFailure('boom').message).toBe('boom');
  });
});

describe('renderers', () => {
  it('renders a summary', () => {
    const text = renderSummary({ valid: true, name: 'wf', nodes: 7, reachable: 6, forks: ['split'], joins: [] });
    expect(stripVTControlCharacters(text).split('\n')).toEqual([
      '✓ wf is valid',
      '  Nodes:  7 (6 reachable)',
      '  Forks:  split',
      '  Joins:  none',
    ]);
  });

  it('renders a failure with its node', () => {
    const text = renderFailure({ valid: false, code: 'DANGLING_TRANSITION', message: 'No target', node: 'a' });
    expect(stripVTControlCharacters(text).split('\n')).toEqual(['✗ [DANGLING_TRANSITION] No target', '  Node: a']);
  });

  it('aligns node rows', () => {
    const text = renderNodes([
      { name: ':start:', kind: 'start', transitions: ['load'] },
      { name: 'load', kind: 'action', transitions: ['done', 'fail'] },
      { name: 'done', kind: 'end', transitions: [] },
    ]);
    expect(stripVTControlCharacters(text).split('\n')).toEqual([
      ':start:  start     -> load',
      'load     action    -> done, fail',
      'done     end       -> -',
    ]);
  });
});
