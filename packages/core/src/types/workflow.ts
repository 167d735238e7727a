// packages/core/src/types/workflow.ts

/**
 * A workflow definition compiles into a graph of control and action nodes.
 * Transitions are stored as node names; the structural validator proves they resolve.
 */
export type NodeKind = 'start' | 'end' | 'kill' | 'action' | 'decision' | 'fork' | 'join';

interface NodeBase {
  name: string;
  transitions: readonly string[];
}

export interface StartNode extends NodeBase {
  kind: 'start';
}

export interface EndNode extends NodeBase {
  kind: 'end';
}

export interface KillNode extends NodeBase {
  kind: 'kill';
  message?: string;
}

export interface ActionNode extends NodeBase {
  kind: 'action';
  /** [ok, error] */
  transitions: readonly [string, string];
  /** Serialized action-type element, after defaults resolution. */
  conf: string;
  credential?: string;
  retryMax?: string;
  retryInterval?: string;
}

export interface DecisionNode extends NodeBase {
  kind: 'decision';
  /** Serialized switch element; predicates are evaluated by the runtime. */
  switchStatement: string;
}

export interface ForkNode extends NodeBase {
  kind: 'fork';
}

export interface JoinNode extends NodeBase {
  kind: 'join';
}

export type WorkflowNode =
  | StartNode
  | EndNode
  | KillNode
  | ActionNode
  | DecisionNode
  | ForkNode
  | JoinNode;

/**
 * Workflow-level defaults inherited by actions. Built from the `<global>` element
 * or decoded from a blob a parent workflow left in the job configuration.
 */
export interface GlobalDefaults {
  jobTracker?: string;
  nameNode?: string;
  jobXmls: string[];
  configuration?: Map<string, string>;
}

/** Job-level configuration: submitted properties plus defaults filled in by parameter verification. */
export type JobConfiguration = Map<string, string>;

export interface StructureReport {
  /** Reachable fork nodes, in discovery order. */
  forks: string[];
  /** Reachable join nodes, in discovery order. */
  joins: string[];
  visitedCount: number;
}
