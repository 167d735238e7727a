// packages/core/src/parser/workflow-parser.ts — Definition text -> validated, sealed WorkflowApp

import { DEFAULT_SITE_CONFIG } from '../config/defaults.js';
import { createVariableResolver } from '../expression/resolver.js';
import type { ExpressionResolver } from '../expression/resolver.js';
import { GraphBuilder } from '../graph/builder.js';
import { copyInto } from '../graph/configuration.js';
import { DefaultsResolver } from '../graph/defaults-resolver.js';
import type { WorkflowGraph } from '../graph/workflow-graph.js';
import type { SchemaValidator } from '../markup/schema.js';
import { parseMarkup } from '../markup/xml.js';
import { createActionRegistry } from '../registry/action-registry.js';
import type { ActionTypeRegistry } from '../registry/action-registry.js';
import type { SiteConfig } from '../types/config.js';
import type { JobConfiguration, StructureReport } from '../types/workflow.js';
import { VALIDATE_FORK_JOIN_KEY } from '../utils/constants.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { validateForkJoin } from '../validation/fork-join.js';
import { validateStructure } from '../validation/structural.js';
import { verifyParameters } from './parameters.js';

export interface WorkflowParserOptions {
  /** Runs before anything else when given. */
  schema?: SchemaValidator;
  /** Defaults to the built-in types plus the site config's extra actions. */
  registry?: ActionTypeRegistry;
  siteConfig?: SiteConfig;
  expressions?: ExpressionResolver;
  logger?: Logger;
}

/** A validated workflow, ready to hand to an execution engine. */
export interface WorkflowApp {
  name: string;
  definition: string;
  graph: WorkflowGraph;
  structure: StructureReport;
}

/** Only `true` and `false` are read; anything else keeps the fallback. */
function readFlag(jobConf: JobConfiguration, key: string, fallback: boolean): boolean {
  const raw = jobConf.get(key)?.trim().toLowerCase();
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  return fallback;
}

/**
 * Compiles workflow definitions. Holds only configuration; every call gets its
 * own build and validation state, so one parser can serve concurrent callers.
 */
export class WorkflowParser {
  private readonly site: SiteConfig;
  private readonly registry: ActionTypeRegistry;
  private readonly builder: GraphBuilder;
  private readonly schema?: SchemaValidator;
  private readonly logger: Logger;

  constructor(options: WorkflowParserOptions = {}) {
    this.site = options.siteConfig ?? DEFAULT_SITE_CONFIG;
    this.registry = options.registry ?? createActionRegistry(this.site.actions);
    this.schema = options.schema;
    this.logger = options.logger ?? silentLogger;
    this.builder = new GraphBuilder({
      resolver: new DefaultsResolver(this.registry, this.site.defaults),
      expressions: options.expressions ?? createVariableResolver(),
    });
  }

  /**
   * Runs the whole pipeline. The job configuration is read for parameters, the
   * fork/join switch and an inherited global blob, and receives parameter
   * defaults and the blob handed to sub-workflows. `configDefault` is the lowest
   * layer of every action's configuration, above the site configuration only.
   *
   * @throws WorkflowError on the first fault; no partial result is returned.
   */
  validateAndParse(
    definition: string,
    jobConf: JobConfiguration,
    configDefault?: ReadonlyMap<string, string>,
  ): WorkflowApp {
    if (this.schema) {
      this.schema.validate(definition);
      this.logger.debug('Schema validation passed');
    }

    const root = parseMarkup(definition);
    verifyParameters(root, jobConf);

    const defaultConfiguration = new Map(Object.entries(this.site.defaults.configuration));
    if (configDefault) copyInto(defaultConfiguration, configDefault);
    const graph = this.builder.build(root, jobConf, defaultConfiguration);
    this.logger.debug(`Built workflow [${graph.name}] with ${graph.size} node(s)`);

    const structure = validateStructure(graph, this.registry);
    this.logger.debug(
      `Structure valid: ${structure.visitedCount} reachable node(s), ${structure.forks.length} fork(s), ${structure.joins.length} join(s)`,
    );

    if (readFlag(jobConf, VALIDATE_FORK_JOIN_KEY, true) && this.site.validation.forkJoin) {
      validateForkJoin(graph, structure);
      this.logger.debug('Fork/join validation passed');
    } else {
      this.logger.debug('Fork/join validation disabled');
    }

    return { name: graph.name, definition, graph: graph.seal(), structure };
  }
}
