// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_SITE_CONFIG } from './defaults.js';
export { siteConfigSchema, validateSiteConfig } from './schema.js';
export type { SiteConfigInput } from './schema.js';
export { deepMerge, loadSiteConfig } from './loader.js';
