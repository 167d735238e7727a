// packages/core/src/types/config.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ActionTypeDescriptor {
  type: string;
  /** Needs name-node and job-tracker; resolution fails when none can be found. */
  requiresEndpoints: boolean;
  /** Inherits job-xml and configuration from the global section and site defaults. */
  supportsConfiguration: boolean;
}

export interface SiteDefaults {
  nameNode?: string;
  jobTracker?: string;
  configuration: Record<string, string>;
}

export interface ValidationConfig {
  forkJoin: boolean;
}

/**
 * Process-wide settings, loaded from `.wfgraph.yml` on top of DEFAULT_SITE_CONFIG.
 */
export interface SiteConfig {
  defaults: SiteDefaults;
  validation: ValidationConfig;
  actions: ActionTypeDescriptor[];
  logLevel: LogLevel;
}
