// tests/utils.test.ts — Job configuration loading and the pipeline entry point

import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ErrorCode, WorkflowError } from '@wfgraph/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { collectDefine, loadJobConf, runPipeline } from '../src/utils.js';
import type { PipelineOptions } from '../src/utils.js';

const TEST_DIR = join(tmpdir(), `wfgraph-cli-test-${Date.now()}`);
const WORKFLOWS = fileURLToPath(new URL('../../../workflows/', import.meta.url));

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function options(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
  return { define: [], forkJoin: true, schema: true, projectDir: TEST_DIR, ...overrides };
}

describe('collectDefine', () => {
  it('accumulates key=value pairs', () => {
    expect(collectDefine('b=2', collectDefine('a=1', []))).toEqual(['a=1', 'b=2']);
  });

  it('rejects values without a key', () => {
    expect(() => collectDefine('=1', [])).toThrow('Expected key=value, got "=1"');
  });
});

describe('loadJobConf', () => {
  it('reads scalar values from YAML and applies defines on top', () => {
    const confPath = join(TEST_DIR, 'job.yml');
    writeFileSync(confPath, 'inputDir: /data/in\nretries: 3\nstrict: true\n', 'utf-8');
    const jobConf = loadJobConf(confPath, ['retries=5', 'extra=a=b']);
    expect([...jobConf]).toEqual([
      ['inputDir', '/data/in'],
      ['retries', '5'],
      ['strict', 'true'],
      ['extra', 'a=b'],
    ]);
  });

  it('rejects nested values', () => {
    const confPath = join(TEST_DIR, 'job.yml');
    writeFileSync(confPath, 'paths:\n  - a\n', 'utf-8');
    expect(() => loadJobConf(confPath, [])).toThrow('Job configuration entry "paths" must be a scalar value');
  });

  it('works without a file', () => {
    expect([...loadJobConf(undefined, ['a=1'])]).toEqual([['a', '1']]);
  });
});

describe('runPipeline', () => {
  it('validates a workflow file', () => {
    const app = runPipeline(join(WORKFLOWS, 'fork-join.xml'), options({ define: ['inputDir=/in'] }));
    expect(app.name).toBe('fork-join-demo');
  });

  it('propagates workflow errors', () => {
    let caught: unknown;
    try {
      runPipeline(join(WORKFLOWS, 'unrelated-decisions.xml'), options());
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(WorkflowError);
    expect(caught instanceof WorkflowError ? caught.code : undefined).toBe(ErrorCode.ILLEGAL_NODE_REVISIT);
  });

  it('turns fork/join validation off with forkJoin: false', () => {
    const app = runPipeline(join(WORKFLOWS, 'unrelated-decisions.xml'), options({ forkJoin: false }));
    expect(app.structure.forks).toEqual(['split']);
  });

  it('reads the site file from the project directory', () => {
    writeFileSync(join(TEST_DIR, '.wfgraph.yml'), 'validation:\n  forkJoin: false\n', 'utf-8');
    expect(() => runPipeline(join(WORKFLOWS, 'unrelated-decisions.xml'), options())).not.toThrow();
  });
});
