// packages/core/src/registry/builtin-actions.ts

import type { ActionTypeDescriptor } from '../types/config.js';

export const BUILTIN_ACTION_TYPES: readonly ActionTypeDescriptor[] = [
  { type: 'map-reduce', requiresEndpoints: true, supportsConfiguration: true },
  { type: 'pig', requiresEndpoints: true, supportsConfiguration: true },
  { type: 'hive', requiresEndpoints: true, supportsConfiguration: true },
  { type: 'hive2', requiresEndpoints: true, supportsConfiguration: true },
  { type: 'sqoop', requiresEndpoints: true, supportsConfiguration: true },
  { type: 'shell', requiresEndpoints: true, supportsConfiguration: true },
  { type: 'java', requiresEndpoints: true, supportsConfiguration: true },
  { type: 'spark', requiresEndpoints: true, supportsConfiguration: true },
  { type: 'distcp', requiresEndpoints: true, supportsConfiguration: true },
  { type: 'fs', requiresEndpoints: false, supportsConfiguration: true },
  { type: 'sub-workflow', requiresEndpoints: false, supportsConfiguration: false },
  { type: 'email', requiresEndpoints: false, supportsConfiguration: false },
  { type: 'ssh', requiresEndpoints: false, supportsConfiguration: false },
];
