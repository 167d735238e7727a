// packages/core/src/registry/action-registry.ts — Which action types exist and what they inherit

import type { ActionTypeDescriptor } from '../types/config.js';
import { BUILTIN_ACTION_TYPES } from './builtin-actions.js';

export interface ActionTypeRegistry {
  get(type: string): ActionTypeDescriptor | undefined;
  isSupported(type: string): boolean;
  list(): ActionTypeDescriptor[];
}

/**
 * Registry over a fixed set of descriptors. Extra descriptors (from the site
 * configuration) replace built-ins of the same type.
 */
export class StaticActionRegistry implements ActionTypeRegistry {
  private readonly descriptors = new Map<string, ActionTypeDescriptor>();

  constructor(descriptors: Iterable<ActionTypeDescriptor>) {
    for (const descriptor of descriptors) {
      this.descriptors.set(descriptor.type, { ...descriptor });
    }
  }

  get(type: string): ActionTypeDescriptor | undefined {
    return this.descriptors.get(type);
  }

  isSupported(type: string): boolean {
    return this.descriptors.has(type);
  }

  list(): ActionTypeDescriptor[] {
    return [...this.descriptors.values()];
  }
}

export function createActionRegistry(extra: readonly ActionTypeDescriptor[] = []): StaticActionRegistry {
  return new StaticActionRegistry([...BUILTIN_ACTION_TYPES, ...extra]);
}
