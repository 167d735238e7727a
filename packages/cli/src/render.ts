// packages/cli/src/render.ts — Terminal rendering for validation results

import { ConfigError, isWorkflowError } from '@wfgraph/core';
import type { NodeKind, WorkflowApp } from '@wfgraph/core';
import chalk from 'chalk';

export interface ValidationSummary {
  valid: true;
  name: string;
  nodes: number;
  reachable: number;
  forks: string[];
  joins: string[];
}

export interface FailureReport {
  valid: false;
  code: string;
  message: string;
  node?: string;
}

export interface NodeRow {
  name: string;
  kind: NodeKind;
  transitions: string[];
}

const kindColors: Record<NodeKind, (text: string) => string> = {
  start: chalk.green,
  end: chalk.green,
  kill: chalk.red,
  action: chalk.blue,
  decision: chalk.yellow,
  fork: chalk.magenta,
  join: chalk.magenta,
};

export function summarize(app: WorkflowApp): ValidationSummary {
  return {
    valid: true,
    name: app.name,
    nodes: app.graph.size,
    reachable: app.structure.visitedCount,
    forks: [...app.structure.forks],
    joins: [...app.structure.joins],
  };
}

export function describeFailure(error: unknown): FailureReport {
  if (isWorkflowError(error)) {
    return { valid: false, code: error.code, message: error.message, node: error.nodeName };
  }
  if (error instanceof ConfigError) {
    return { valid: false, code: 'CONFIG_ERROR', message: error.message };
  }
  return {
    valid: false,
    code: 'ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}

export function describeNodes(app: WorkflowApp): NodeRow[] {
  return app.graph.list().map((node) => ({
    name: node.name,
    kind: node.kind,
    transitions: [...node.transitions],
  }));
}

export function renderSummary(summary: ValidationSummary): string {
  return [
    chalk.green(`✓ ${summary.name} is valid`),
    chalk.gray(`  Nodes:  ${summary.nodes} (${summary.reachable} reachable)`),
    chalk.gray(`  Forks:  ${summary.forks.join(', ') || 'none'}`),
    chalk.gray(`  Joins:  ${summary.joins.join(', ') || 'none'}`),
  ].join('\n');
}

export function renderFailure(report: FailureReport): string {
  const lines = [chalk.red(`✗ [${report.code}] ${report.message}`)];
  if (report.node !== undefined) {
    lines.push(chalk.gray(`  Node: ${report.node}`));
  }
  return lines.join('\n');
}

/** One line per node: padded name and kind, then the transition targets. */
export function renderNodes(rows: readonly NodeRow[]): string {
  const nameWidth = Math.max(0, ...rows.map((r) => r.name.length));
  return rows
    .map((row) => {
      const targets = row.transitions.length > 0 ? row.transitions.join(', ') : '-';
      return `${row.name.padEnd(nameWidth)}  ${kindColors[row.kind](row.kind.padEnd(8))}  -> ${targets}`;
    })
    .join('\n');
}
