// packages/core/src/graph/defaults-resolver.ts

import { appendTextChild, getChild, getChildren } from '../markup/element.js';
import type { Element } from '../markup/element.js';
import type { ActionTypeRegistry } from '../registry/action-registry.js';
import { ErrorCode } from '../types/errors.js';
import type { GlobalDefaults } from '../types/workflow.js';
import { ELEMENT, FS_ACTION, SUB_WORKFLOW_ACTION } from '../utils/constants.js';
import { WorkflowError } from '../utils/errors.js';
import { copyInto, readConfiguration, toConfigurationElement } from './configuration.js';

export interface SiteEndpoints {
  nameNode?: string;
  jobTracker?: string;
}

function normalize(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Injects inherited values into an action-type element (or the `<global>` element)
 * before it is frozen into node configuration.
 *
 * Endpoints: local value > GlobalDefaults > site default; types that require
 * endpoints fail when all three are missing. `sub-workflow`, `fs` and `<global>`
 * never fail, and `fs` only receives a name-node.
 *
 * Configuration: default layer (site, then caller defaults) < GlobalDefaults < local,
 * merged key by key; global job-xml entries not already present are appended
 * after the local ones.
 */
export class DefaultsResolver {
  private readonly site: SiteEndpoints;

  constructor(
    private readonly registry: ActionTypeRegistry,
    site: SiteEndpoints = {},
  ) {
    this.site = { nameNode: normalize(site.nameNode), jobTracker: normalize(site.jobTracker) };
  }

  resolve(
    element: Element,
    globals: GlobalDefaults | undefined,
    siteConfiguration?: ReadonlyMap<string, string>,
    nodeName?: string,
  ): void {
    const type = element.name;
    const isGlobal = type === ELEMENT.GLOBAL;
    const isSubWorkflow = type === SUB_WORKFLOW_ACTION;
    const isFs = type === FS_ACTION;

    const descriptor = this.registry.get(type);
    if (!descriptor && !isGlobal) {
      throw new WorkflowError(
        ErrorCode.UNSUPPORTED_ACTION_TYPE,
        `Action type [${type}] is not supported`,
        nodeName,
      );
    }

    if (isGlobal || isSubWorkflow || isFs || descriptor?.requiresEndpoints) {
      const exempt = isGlobal || isSubWorkflow || isFs;
      this.fillEndpoint(element, ELEMENT.NAME_NODE, globals?.nameNode, this.site.nameNode, exempt, nodeName);
      if (!isFs) {
        this.fillEndpoint(
          element,
          ELEMENT.JOB_TRACKER,
          globals?.jobTracker,
          this.site.jobTracker,
          isGlobal || isSubWorkflow,
          nodeName,
        );
      }
    }

    if (isGlobal || descriptor?.supportsConfiguration) {
      this.mergeJobXmls(element, globals);
      this.mergeConfiguration(element, globals, siteConfiguration);
    }
  }

  private fillEndpoint(
    element: Element,
    field: string,
    inherited: string | undefined,
    siteDefault: string | undefined,
    exempt: boolean,
    nodeName: string | undefined,
  ): void {
    if (getChild(element, field)) return;
    const value = inherited ?? siteDefault;
    if (value !== undefined) {
      appendTextChild(element, field, value);
    } else if (!exempt) {
      throw new WorkflowError(
        ErrorCode.MISSING_REQUIRED_DEFAULT,
        `No ${field} defined for action type [${element.name}]`,
        nodeName,
      );
    }
  }

  private mergeJobXmls(element: Element, globals: GlobalDefaults | undefined): void {
    if (!globals) return;
    const local = new Set(getChildren(element, ELEMENT.JOB_XML).map((e) => e.text));
    for (const jobXml of globals.jobXmls) {
      if (local.has(jobXml)) continue;
      appendTextChild(element, ELEMENT.JOB_XML, jobXml);
      local.add(jobXml);
    }
  }

  private mergeConfiguration(
    element: Element,
    globals: GlobalDefaults | undefined,
    siteConfiguration: ReadonlyMap<string, string> | undefined,
  ): void {
    const merged = new Map<string, string>();
    if (siteConfiguration) copyInto(merged, siteConfiguration);
    if (globals?.configuration) copyInto(merged, globals.configuration);

    const index = element.children.findIndex((c) => c.name === ELEMENT.CONFIGURATION);
    if (index >= 0) {
      copyInto(merged, readConfiguration(element.children[index]));
      element.children[index] = toConfigurationElement(merged);
    } else {
      element.children.push(toConfigurationElement(merged));
    }
  }
}
