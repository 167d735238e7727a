// packages/core/src/validation/fork-join.ts — Fork/join pairing and multiple-execution detection

import type { WorkflowGraph } from '../graph/workflow-graph.js';
import { ErrorCode } from '../types/errors.js';
import type { StructureReport, WorkflowNode } from '../types/workflow.js';
import { WorkflowError } from '../utils/errors.js';

/**
 * Walk state, allocated fresh for every validation call and threaded through
 * the tasks. Nothing here outlives the call.
 */
interface ForkJoinContext {
  /** Node names on the current branch, for cycle detection local to this pass. */
  path: string[];
  onPath: Set<string>;
  forks: string[];
  joins: string[];
  /** Nodes reached through a clean transition, with the top decision ancestor of that visit. */
  visitedClean: Map<string, string | null>;
  /** Joins already walked through at least once. */
  visitedJoins: Set<string>;
}

interface VisitTask {
  kind: 'visit';
  name: string;
  /** False once the branch went through an error transition or a join walked before. */
  okTo: boolean;
  /** Eldest decision node above this branch. */
  topDecision: string | null;
}

interface LeaveTask {
  kind: 'leave';
  name: string;
  after?: () => void;
}

type Task = VisitTask | LeaveTask;

function visit(name: string, okTo: boolean, topDecision: string | null): VisitTask {
  return { kind: 'visit', name, okTo, topDecision };
}

function distinct(names: readonly string[]): string[] {
  return [...new Set(names)];
}

/**
 * Proves that every fork is rejoined by its own join, that no branch ends the
 * workflow inside an open fork, and that no node would run more than once.
 *
 * Skipped when there are no forks; fails up front when the reachable fork and
 * join counts differ.
 */
export function validateForkJoin(graph: WorkflowGraph, structure: StructureReport): void {
  if (structure.forks.length !== structure.joins.length) {
    throw new WorkflowError(
      ErrorCode.UNBALANCED_FORK_JOIN_COUNT,
      `Workflow has ${structure.forks.length} fork node(s) but ${structure.joins.length} join node(s)`,
    );
  }
  if (structure.forks.length === 0) return;

  const ctx: ForkJoinContext = {
    path: [],
    onPath: new Set(),
    forks: [],
    joins: [],
    visitedClean: new Map(),
    visitedJoins: new Set(),
  };
  const tasks: Task[] = [visit(graph.start.name, true, null)];

  for (let task = tasks.pop(); task !== undefined; task = tasks.pop()) {
    if (task.kind === 'leave') {
      task.after?.();
      ctx.path.pop();
      ctx.onPath.delete(task.name);
      continue;
    }
    const scheduled = enterNode(graph, ctx, task);
    for (let i = scheduled.length - 1; i >= 0; i--) {
      tasks.push(scheduled[i]);
    }
  }
}

function resolveNode(graph: WorkflowGraph, ctx: ForkJoinContext, name: string): WorkflowNode {
  const node = graph.getNode(name);
  if (!node) {
    const from = ctx.path[ctx.path.length - 1];
    throw new WorkflowError(
      ErrorCode.DANGLING_TRANSITION,
      `Node [${from}] transitions to undefined node [${name}]`,
      from,
    );
  }
  return node;
}

/**
 * A node reached twice through clean transitions is legal only when both visits
 * sit under the same top decision: at runtime just one branch of that decision runs.
 */
function checkRevisit(ctx: ForkJoinContext, node: WorkflowNode, topDecision: string | null): void {
  if (!ctx.visitedClean.has(node.name)) {
    ctx.visitedClean.set(node.name, topDecision);
    return;
  }
  const prior = ctx.visitedClean.get(node.name) ?? null;
  if (prior === null || topDecision === null || prior !== topDecision) {
    throw new WorkflowError(
      ErrorCode.ILLEGAL_NODE_REVISIT,
      `Node [${node.name}] would execute more than once at runtime`,
      node.name,
    );
  }
}

function checkForkTargets(graph: WorkflowGraph, fork: WorkflowNode): void {
  const targets = fork.transitions;
  if (targets.length === distinct(targets).length) return;
  for (let i = 0; i < targets.length; i++) {
    const kind = graph.getNode(targets[i])?.kind;
    // Several paths may converge straight onto a join or a kill.
    if (kind === 'join' || kind === 'kill') continue;
    if (targets.indexOf(targets[i], i + 1) !== -1) {
      throw new WorkflowError(
        ErrorCode.FORK_DUPLICATE_TARGET,
        `Fork [${fork.name}] routes to node [${targets[i]}] more than once`,
        fork.name,
      );
    }
  }
}

/** Enters a node and returns the tasks to run next, in order: child visits, then the leave task. */
function enterNode(graph: WorkflowGraph, ctx: ForkJoinContext, task: VisitTask): Task[] {
  const node = resolveNode(graph, ctx, task.name);
  if (ctx.onPath.has(node.name)) {
    throw new WorkflowError(
      ErrorCode.CYCLE_DETECTED,
      `Cycle detected at node [${node.name}]: ${[...ctx.path, node.name].join(' -> ')}`,
      node.name,
    );
  }
  ctx.path.push(node.name);
  ctx.onPath.add(node.name);

  if (task.okTo && node.kind !== 'kill' && node.kind !== 'join' && node.kind !== 'end') {
    checkRevisit(ctx, node, task.topDecision);
  }

  const { okTo, topDecision } = task;
  const next: Task[] = [];
  let after: (() => void) | undefined;

  switch (node.kind) {
    case 'start':
      next.push(visit(node.transitions[0], okTo, topDecision));
      break;

    case 'action':
      next.push(visit(node.transitions[0], okTo, topDecision));
      // An error path may re-enter nodes the ok path already covered: only one of them runs.
      next.push(visit(node.transitions[1], false, topDecision));
      break;

    case 'decision': {
      const top = topDecision ?? node.name;
      for (const target of distinct(node.transitions)) {
        next.push(visit(target, okTo, top));
      }
      break;
    }

    case 'fork':
      ctx.forks.push(node.name);
      checkForkTargets(graph, node);
      for (const target of distinct(node.transitions)) {
        next.push(visit(target, okTo, topDecision));
      }
      after = () => {
        ctx.forks.pop();
        if (ctx.joins.length > 0) {
          ctx.joins.pop();
        }
      };
      break;

    case 'join': {
      const fork = ctx.forks[ctx.forks.length - 1];
      if (fork === undefined) {
        throw new WorkflowError(
          ErrorCode.JOIN_WITHOUT_FORK,
          `Join [${node.name}] has no matching fork`,
          node.name,
        );
      }
      if (ctx.forks.length > ctx.joins.length && ctx.joins[ctx.joins.length - 1] !== node.name) {
        ctx.joins.push(node.name);
      }
      const expected = ctx.joins[ctx.joins.length - 1];
      if (expected !== node.name) {
        throw new WorkflowError(
          ErrorCode.JOIN_FORK_MISMATCH,
          `Fork [${fork}] and join [${node.name}] are not a pair (join should have been [${expected}])`,
          node.name,
        );
      }
      ctx.joins.pop();
      ctx.forks.pop();
      // The continuation of a join is walked once per converging path; only the first walk is clean.
      const cleanContinuation = okTo && !ctx.visitedJoins.has(node.name);
      if (cleanContinuation) {
        ctx.visitedJoins.add(node.name);
      }
      next.push(visit(node.transitions[0], cleanContinuation, topDecision));
      after = () => {
        ctx.forks.push(fork);
        ctx.joins.push(node.name);
      };
      break;
    }

    case 'kill':
      break;

    case 'end':
      if (ctx.forks.length > 0) {
        const parent = ctx.path[ctx.path.length - 2];
        throw new WorkflowError(
          ErrorCode.PARALLEL_BRANCH_UNJOINED_END,
          `Node [${parent}] inside fork [${ctx.forks[ctx.forks.length - 1]}] goes to end node [${node.name}] without joining`,
          parent,
        );
      }
      break;

    default: {
      const unknown: never = node;
      throw new WorkflowError(
        ErrorCode.INTERNAL_ERROR,
        `Invalid node type for fork/join validation: ${JSON.stringify(unknown)}`,
      );
    }
  }

  next.push({ kind: 'leave', name: node.name, after });
  return next;
}
