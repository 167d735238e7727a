// packages/core/src/graph/workflow-graph.ts

import { ErrorCode } from '../types/errors.js';
import type { StartNode, WorkflowNode } from '../types/workflow.js';
import { START_NODE_NAME } from '../utils/constants.js';
import { WorkflowError } from '../utils/errors.js';

/**
 * Name-indexed node graph. Mutable while the pipeline builds and validates it;
 * `seal()` freezes every node and rejects further additions, after which the
 * graph can be shared by any number of readers.
 */
export class WorkflowGraph {
  private readonly nodes = new Map<string, WorkflowNode>();
  private startNode: StartNode | undefined;
  private sealed = false;

  constructor(public readonly name: string) {}

  addNode(node: WorkflowNode): void {
    if (this.sealed) {
      throw new WorkflowError(
        ErrorCode.INTERNAL_ERROR,
        `Workflow [${this.name}] is sealed; cannot add node [${node.name}]`,
        node.name,
      );
    }
    if (this.nodes.has(node.name)) {
      throw new WorkflowError(
        ErrorCode.DUPLICATE_NODE,
        `Node [${node.name}] is defined more than once`,
        node.name,
      );
    }
    this.nodes.set(node.name, node);
    if (node.kind === 'start') {
      this.startNode = node;
    }
  }

  getNode(name: string): WorkflowNode | undefined {
    return this.nodes.get(name);
  }

  hasStart(): boolean {
    return this.startNode !== undefined;
  }

  get start(): StartNode {
    if (!this.startNode) {
      throw new WorkflowError(ErrorCode.SCHEMA_VIOLATION, `Workflow [${this.name}] has no start node`);
    }
    return this.startNode;
  }

  get size(): number {
    return this.nodes.size;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /** Nodes in declaration order, start first. */
  list(): WorkflowNode[] {
    const start = this.nodes.get(START_NODE_NAME);
    const rest = [...this.nodes.values()].filter((n) => n.kind !== 'start');
    return start ? [start, ...rest] : rest;
  }

  seal(): this {
    for (const node of this.nodes.values()) {
      Object.freeze(node.transitions);
      Object.freeze(node);
    }
    this.sealed = true;
    return this;
  }
}
