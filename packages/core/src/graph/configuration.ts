// packages/core/src/graph/configuration.ts — <configuration> element <-> ordered string map

import { childText, createElement, getChildren } from '../markup/element.js';
import type { Element } from '../markup/element.js';
import { ErrorCode } from '../types/errors.js';
import { ELEMENT } from '../utils/constants.js';
import { WorkflowError } from '../utils/errors.js';

/**
 * Read `property/name` + `property/value` pairs in document order. Properties
 * without a value are skipped; a property without a name is malformed.
 */
export function readConfiguration(element: Element): Map<string, string> {
  const configuration = new Map<string, string>();
  for (const property of getChildren(element, ELEMENT.PROPERTY)) {
    const name = childText(property, ELEMENT.PROPERTY_NAME);
    if (name === undefined || name === '') {
      throw new WorkflowError(
        ErrorCode.MARKUP_PARSE_FAILURE,
        `Error while processing <${element.name}>: property without a name`,
      );
    }
    const value = childText(property, ELEMENT.PROPERTY_VALUE);
    if (value !== undefined) {
      configuration.set(name, value);
    }
  }
  return configuration;
}

export function toConfigurationElement(configuration: ReadonlyMap<string, string>): Element {
  const element = createElement(ELEMENT.CONFIGURATION);
  for (const [name, value] of configuration) {
    element.children.push(
      createElement(ELEMENT.PROPERTY, {
        children: [
          createElement(ELEMENT.PROPERTY_NAME, { text: name }),
          createElement(ELEMENT.PROPERTY_VALUE, { text: value }),
        ],
      }),
    );
  }
  return element;
}

/** Copy every entry of `source` into `target`, overriding existing keys. */
export function copyInto(target: Map<string, string>, source: ReadonlyMap<string, string>): void {
  for (const [name, value] of source) {
    target.set(name, value);
  }
}
