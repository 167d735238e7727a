// packages/core/src/graph/builder.ts — Element tree -> unresolved WorkflowGraph

import type { ExpressionResolver } from '../expression/resolver.js';
import {
  childText,
  getAttribute,
  getChild,
  getChildren,
  requireAttribute,
} from '../markup/element.js';
import type { Element } from '../markup/element.js';
import { serializeElement } from '../markup/xml.js';
import { ErrorCode } from '../types/errors.js';
import type { ActionNode, DecisionNode, GlobalDefaults, JobConfiguration } from '../types/workflow.js';
import {
  ATTRIBUTE,
  ELEMENT,
  GLOBAL_CONF_KEY,
  START_NODE_NAME,
  SUB_WORKFLOW_ACTION,
} from '../utils/constants.js';
import { WorkflowError } from '../utils/errors.js';
import { readConfiguration } from './configuration.js';
import type { DefaultsResolver } from './defaults-resolver.js';
import { decodeGlobalDefaults, encodeGlobalDefaults } from './global-codec.js';
import { WorkflowGraph } from './workflow-graph.js';

export interface GraphBuilderOptions {
  resolver: DefaultsResolver;
  expressions: ExpressionResolver;
}

/** Per-call state; a builder instance can serve concurrent builds. */
interface BuildState {
  jobConf: JobConfiguration;
  siteConfiguration?: ReadonlyMap<string, string>;
  globals?: GlobalDefaults;
  globalsPropagated: boolean;
}

export function readGlobalSection(element: Element): GlobalDefaults {
  const configuration = getChild(element, ELEMENT.CONFIGURATION);
  return {
    jobTracker: childText(element, ELEMENT.JOB_TRACKER),
    nameNode: childText(element, ELEMENT.NAME_NODE),
    jobXmls: getChildren(element, ELEMENT.JOB_XML).map((e) => e.text),
    configuration: configuration ? readConfiguration(configuration) : undefined,
  };
}

/**
 * Builds one node per declared element. Transitions stay as names here; the
 * structural validator proves they resolve. Action-type elements are run through
 * the defaults resolver before they become node configuration.
 */
export class GraphBuilder {
  constructor(private readonly options: GraphBuilderOptions) {}

  build(
    root: Element,
    jobConf: JobConfiguration,
    siteConfiguration?: ReadonlyMap<string, string>,
  ): WorkflowGraph {
    const graph = new WorkflowGraph(requireAttribute(root, ATTRIBUTE.NAME));
    const inherited = jobConf.get(GLOBAL_CONF_KEY);
    const state: BuildState = {
      jobConf,
      siteConfiguration,
      globals: inherited !== undefined ? decodeGlobalDefaults(inherited) : undefined,
      globalsPropagated: false,
    };

    for (const element of root.children) {
      switch (element.name) {
        case ELEMENT.START:
          graph.addNode({
            kind: 'start',
            name: START_NODE_NAME,
            transitions: [requireAttribute(element, ATTRIBUTE.TO)],
          });
          break;
        case ELEMENT.END:
          graph.addNode({ kind: 'end', name: requireAttribute(element, ATTRIBUTE.NAME), transitions: [] });
          break;
        case ELEMENT.KILL:
          graph.addNode({
            kind: 'kill',
            name: requireAttribute(element, ATTRIBUTE.NAME),
            message: childText(element, ELEMENT.MESSAGE),
            transitions: [],
          });
          break;
        case ELEMENT.FORK:
          graph.addNode({
            kind: 'fork',
            name: requireAttribute(element, ATTRIBUTE.NAME),
            transitions: getChildren(element, ELEMENT.FORK_PATH).map((p) =>
              requireAttribute(p, ATTRIBUTE.START),
            ),
          });
          break;
        case ELEMENT.JOIN:
          graph.addNode({
            kind: 'join',
            name: requireAttribute(element, ATTRIBUTE.NAME),
            transitions: [requireAttribute(element, ATTRIBUTE.TO)],
          });
          break;
        case ELEMENT.DECISION:
          graph.addNode(this.buildDecision(element));
          break;
        case ELEMENT.ACTION:
          graph.addNode(this.buildAction(element, state));
          break;
        case ELEMENT.GLOBAL:
          this.applyGlobalSection(element, state);
          break;
        case ELEMENT.SLA_INFO:
        case ELEMENT.CREDENTIALS:
        case ELEMENT.PARAMETERS:
          break;
        default:
          throw new WorkflowError(
            ErrorCode.UNKNOWN_ELEMENT,
            `Invalid workflow element [${element.name}]`,
          );
      }
    }

    if (!graph.hasStart()) {
      throw new WorkflowError(ErrorCode.SCHEMA_VIOLATION, `Workflow [${graph.name}] has no <start>`);
    }
    return graph;
  }

  private buildDecision(element: Element): DecisionNode {
    const name = requireAttribute(element, ATTRIBUTE.NAME);
    const eSwitch = getChild(element, ELEMENT.SWITCH);
    const eDefault = eSwitch ? getChild(eSwitch, ELEMENT.DEFAULT) : undefined;
    if (!eSwitch || !eDefault) {
      throw new WorkflowError(
        ErrorCode.SCHEMA_VIOLATION,
        `Decision [${name}] needs a <switch> with a <default>`,
        name,
      );
    }
    const transitions = getChildren(eSwitch, ELEMENT.CASE).map((c) => requireAttribute(c, ATTRIBUTE.TO));
    transitions.push(requireAttribute(eDefault, ATTRIBUTE.TO));
    return { kind: 'decision', name, transitions, switchStatement: serializeElement(eSwitch) };
  }

  private buildAction(element: Element, state: BuildState): ActionNode {
    const name = requireAttribute(element, ATTRIBUTE.NAME);
    let okTo: string | undefined;
    let errorTo: string | undefined;
    let actionConf: Element | undefined;

    for (const child of element.children) {
      switch (child.name) {
        case ELEMENT.OK:
          okTo = requireAttribute(child, ATTRIBUTE.TO);
          break;
        case ELEMENT.ERROR:
          errorTo = requireAttribute(child, ATTRIBUTE.TO);
          break;
        case ELEMENT.SLA_INFO:
        case ELEMENT.CREDENTIALS:
          break;
        default:
          this.propagateGlobals(child, state);
          this.options.resolver.resolve(child, state.globals, state.siteConfiguration, name);
          actionConf = child;
      }
    }

    if (!actionConf) {
      throw new WorkflowError(ErrorCode.SCHEMA_VIOLATION, `Action [${name}] has no action type element`, name);
    }
    if (okTo === undefined || errorTo === undefined) {
      throw new WorkflowError(
        ErrorCode.SCHEMA_VIOLATION,
        `Action [${name}] needs both <ok> and <error> transitions`,
        name,
      );
    }

    return {
      kind: 'action',
      name,
      transitions: [okTo, errorTo],
      conf: serializeElement(actionConf),
      credential: getAttribute(element, ATTRIBUTE.CRED),
      retryMax: this.resolveRetry(element, ATTRIBUTE.RETRY_MAX, name, state.jobConf),
      retryInterval: this.resolveRetry(element, ATTRIBUTE.RETRY_INTERVAL, name, state.jobConf),
    };
  }

  /**
   * A sub-workflow asking for propagated configuration gets the current
   * GlobalDefaults through the job configuration, encoded once per parse.
   */
  private propagateGlobals(actionType: Element, state: BuildState): void {
    if (state.globalsPropagated || !state.globals) return;
    if (actionType.name !== SUB_WORKFLOW_ACTION) return;
    if (!getChild(actionType, ELEMENT.PROPAGATE_CONFIGURATION)) return;
    state.jobConf.set(GLOBAL_CONF_KEY, encodeGlobalDefaults(state.globals));
    state.globalsPropagated = true;
  }

  /**
   * The section first inherits from a parent workflow's blob, if one was handed
   * down, and then becomes the GlobalDefaults for the actions that follow it.
   */
  private applyGlobalSection(element: Element, state: BuildState): void {
    const inherited = state.jobConf.get(GLOBAL_CONF_KEY);
    if (inherited !== undefined) {
      this.options.resolver.resolve(element, decodeGlobalDefaults(inherited));
    }
    state.globals = readGlobalSection(element);
  }

  private resolveRetry(
    element: Element,
    attribute: string,
    nodeName: string,
    jobConf: JobConfiguration,
  ): string | undefined {
    const raw = getAttribute(element, attribute);
    if (raw === undefined || raw === '') return undefined;
    try {
      return this.options.expressions.resolve(raw, jobConf);
    } catch (err) {
      throw new WorkflowError(
        ErrorCode.INVALID_EXPRESSION,
        `Action [${nodeName}] has an invalid ${attribute} value: ${err instanceof Error ? err.message : String(err)}`,
        nodeName,
      );
    }
  }
}
