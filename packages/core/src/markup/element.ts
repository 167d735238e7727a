// packages/core/src/markup/element.ts — Element tree produced by the markup boundary

import { ErrorCode } from '../types/errors.js';
import { WorkflowError } from '../utils/errors.js';

/**
 * Mutable element tree. The defaults resolver edits action elements in place
 * before they are serialized into node configuration.
 */
export interface Element {
  name: string;
  attributes: Record<string, string>;
  children: Element[];
  /** Direct text content, trimmed. Empty when the element only holds children. */
  text: string;
}

export function createElement(
  name: string,
  options: { attributes?: Record<string, string>; text?: string; children?: Element[] } = {},
): Element {
  return {
    name,
    attributes: options.attributes ?? {},
    children: options.children ?? [],
    text: options.text ?? '',
  };
}

export function getChild(parent: Element, name: string): Element | undefined {
  return parent.children.find((c) => c.name === name);
}

export function getChildren(parent: Element, name: string): Element[] {
  return parent.children.filter((c) => c.name === name);
}

export function childText(parent: Element, name: string): string | undefined {
  return getChild(parent, name)?.text;
}

export function getAttribute(element: Element, name: string): string | undefined {
  return Object.hasOwn(element.attributes, name) ? element.attributes[name] : undefined;
}

/**
 * Read an attribute the definition language requires. A missing or blank value
 * is reported as a schema violation, so parsing without a schema validator fails
 * the same way.
 */
export function requireAttribute(element: Element, name: string): string {
  const value = getAttribute(element, name);
  if (value === undefined || value.trim() === '') {
    const owner = getAttribute(element, 'name');
    throw new WorkflowError(
      ErrorCode.SCHEMA_VIOLATION,
      `Element <${element.name}>${owner ? ` [${owner}]` : ''} is missing required attribute '${name}'`,
      owner,
    );
  }
  return value;
}

export function appendTextChild(parent: Element, name: string, text: string): Element {
  const child = createElement(name, { text });
  parent.children.push(child);
  return child;
}
