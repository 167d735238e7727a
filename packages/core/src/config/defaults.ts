// packages/core/src/config/defaults.ts

import type { SiteConfig } from '../types/config.js';

export const DEFAULT_SITE_CONFIG: SiteConfig = {
  defaults: {
    configuration: {},
  },
  validation: {
    forkJoin: true,
  },
  actions: [],
  logLevel: 'info',
};
