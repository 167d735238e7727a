// tests/helpers/graphs.ts — Compact graph construction for validator tests

import { WorkflowGraph } from '../../src/graph/workflow-graph.js';
import type { ActionNode, WorkflowNode } from '../../src/types/workflow.js';
import { START_NODE_NAME } from '../../src/utils/constants.js';
import { WorkflowError } from '../../src/utils/errors.js';

export const start = (to: string): WorkflowNode => ({ kind: 'start', name: START_NODE_NAME, transitions: [to] });
export const end = (name: string): WorkflowNode => ({ kind: 'end', name, transitions: [] });
export const kill = (name: string): WorkflowNode => ({ kind: 'kill', name, transitions: [], message: 'killed' });
export const fork = (name: string, ...paths: string[]): WorkflowNode => ({ kind: 'fork', name, transitions: paths });
export const join = (name: string, to: string): WorkflowNode => ({ kind: 'join', name, transitions: [to] });

export const decision = (name: string, ...targets: string[]): WorkflowNode => ({
  kind: 'decision',
  name,
  transitions: targets,
  switchStatement: '<switch/>',
});

export const action = (name: string, ok: string, error: string, type = 'shell'): ActionNode => ({
  kind: 'action',
  name,
  transitions: [ok, error],
  conf: `<${type}/>`,
});

export function graphOf(...nodes: WorkflowNode[]): WorkflowGraph {
  const graph = new WorkflowGraph('test-workflow');
  for (const node of nodes) {
    graph.addNode(node);
  }
  return graph;
}

/** Runs `fn` and returns the WorkflowError it throws; fails the test otherwise. */
export function catchWorkflowError(fn: () => unknown): WorkflowError {
  try {
    fn();
  } catch (err) {
    if (err instanceof WorkflowError) return err;
    throw err;
  }
  throw new Error('Expected a WorkflowError to be thrown');
}

export function workflowsDir(): URL {
  return new URL('../../../../workflows/', import.meta.url);
}
