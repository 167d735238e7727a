// packages/core/src/validation/structural.ts — Name resolution, cycles and action typing

import type { WorkflowGraph } from '../graph/workflow-graph.js';
import { parseMarkup } from '../markup/xml.js';
import type { ActionTypeRegistry } from '../registry/action-registry.js';
import { ErrorCode } from '../types/errors.js';
import type { ActionNode, StructureReport, WorkflowNode } from '../types/workflow.js';
import { WorkflowError } from '../utils/errors.js';
import { validateNodeName } from './identifiers.js';

type VisitStatus = 'visiting' | 'visited';

interface Frame {
  node: WorkflowNode;
  next: number;
}

function actionType(node: ActionNode): string {
  try {
    return parseMarkup(node.conf).name;
  } catch (err) {
    throw new WorkflowError(
      ErrorCode.INTERNAL_ERROR,
      `Configuration of action [${node.name}] is not a readable document: ${err instanceof Error ? err.message : String(err)}`,
      node.name,
    );
  }
}

/**
 * Depth-first walk from the start node over an explicit stack. Proves every
 * reachable transition resolves, the reachable graph is acyclic, node names are
 * legal and action types are registered. Linear in nodes + edges.
 *
 * End and kill nodes terminate the walk without looking at transitions.
 */
export function validateStructure(graph: WorkflowGraph, registry: ActionTypeRegistry): StructureReport {
  const status = new Map<string, VisitStatus>();
  const report: StructureReport = { forks: [], joins: [], visitedCount: 0 };
  const stack: Frame[] = [];

  /** Returns whether the node's transitions still need walking. */
  const enter = (node: WorkflowNode): boolean => {
    report.visitedCount++;
    if (node.kind !== 'start') {
      validateNodeName(node.name);
    }
    switch (node.kind) {
      case 'action': {
        const type = actionType(node);
        if (!registry.isSupported(type)) {
          throw new WorkflowError(
            ErrorCode.UNSUPPORTED_ACTION_TYPE,
            `Action [${node.name}] uses unsupported action type [${type}]`,
            node.name,
          );
        }
        return true;
      }
      case 'fork':
        report.forks.push(node.name);
        return true;
      case 'join':
        report.joins.push(node.name);
        return true;
      case 'end':
      case 'kill':
        status.set(node.name, 'visited');
        return false;
      default:
        return true;
    }
  };

  const start = graph.start;
  status.set(start.name, 'visiting');
  if (enter(start)) {
    stack.push({ node: start, next: 0 });
  }

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.next >= frame.node.transitions.length) {
      status.set(frame.node.name, 'visited');
      stack.pop();
      continue;
    }

    const transition = frame.node.transitions[frame.next++];
    const target = graph.getNode(transition);
    if (!target) {
      throw new WorkflowError(
        ErrorCode.DANGLING_TRANSITION,
        `Node [${frame.node.name}] transitions to undefined node [${transition}]`,
        frame.node.name,
      );
    }

    const seen = status.get(target.name);
    if (seen === 'visiting') {
      const path = stack.map((f) => f.node.name);
      const cycle = [...path.slice(path.indexOf(target.name)), target.name];
      throw new WorkflowError(
        ErrorCode.CYCLE_DETECTED,
        `Cycle detected closing at node [${target.name}]: ${cycle.join(' -> ')}`,
        target.name,
      );
    }
    if (seen === 'visited') continue;

    status.set(target.name, 'visiting');
    if (enter(target)) {
      stack.push({ node: target, next: 0 });
    }
  }

  return report;
}
