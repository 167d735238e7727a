import { describe, expect, it } from 'vitest';
import { createActionRegistry } from '../../../src/registry/action-registry.js';

describe('createActionRegistry', () => {
  it('knows the built-in action types', () => {
    const registry = createActionRegistry();
    expect(registry.isSupported('map-reduce')).toBe(true);
    expect(registry.isSupported('teleport')).toBe(false);
    expect(registry.get('fs')).toEqual({ type: 'fs', requiresEndpoints: false, supportsConfiguration: true });
    expect(registry.list()).toHaveLength(13);
  });

  it('lets extra descriptors replace built-ins', () => {
    const registry = createActionRegistry([
      { type: 'email', requiresEndpoints: true, supportsConfiguration: false },
      { type: 'teleport', requiresEndpoints: false, supportsConfiguration: true },
    ]);
    expect(registry.get('email')?.requiresEndpoints).toBe(true);
    expect(registry.isSupported('teleport')).toBe(true);
    expect(registry.list()).toHaveLength(14);
  });
});
