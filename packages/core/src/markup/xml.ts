// packages/core/src/markup/xml.ts — Markup text <-> Element tree

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { ErrorCode } from '../types/errors.js';
import { WorkflowError } from '../utils/errors.js';
import type { Element } from './element.js';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;
  for (const [key, value] of Object.entries(raw)) {
    if (key === '') continue;
    attributes[key] = String(value);
  }
  return attributes;
}

function collectText(entries: unknown): string {
  if (!Array.isArray(entries)) return '';
  const parts: string[] = [];
  for (const entry of entries) {
    if (isRecord(entry) && TEXT_KEY in entry) {
      parts.push(String(entry[TEXT_KEY]));
    }
  }
  return parts.join('').trim();
}

function toElements(entries: unknown): Element[] {
  if (!Array.isArray(entries)) return [];
  const elements: Element[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY || key === TEXT_KEY) continue;
      elements.push({
        name: key,
        attributes: toAttributes(entry[ATTRIBUTES_KEY]),
        children: toElements(value),
        text: collectText(value),
      });
    }
  }
  return elements;
}

/**
 * Parse a workflow definition into its root element. Malformed markup raises
 * MARKUP_PARSE_FAILURE with the position reported by the validator.
 */
export function parseMarkup(text: string): Element {
  const check = XMLValidator.validate(text);
  if (check !== true) {
    const { msg, line, col } = check.err;
    throw new WorkflowError(
      ErrorCode.MARKUP_PARSE_FAILURE,
      `Malformed definition at line ${line}, column ${col}: ${msg}`,
    );
  }

  const parsed: unknown = parser.parse(text);
  const roots = toElements(parsed);
  if (roots.length !== 1) {
    throw new WorkflowError(
      ErrorCode.MARKUP_PARSE_FAILURE,
      `Definition must have exactly one root element, found ${roots.length}`,
    );
  }
  return roots[0];
}

function toOrdered(element: Element): Record<string, unknown> {
  const content: Record<string, unknown>[] = [];
  if (element.text !== '') {
    content.push({ [TEXT_KEY]: element.text });
  }
  for (const child of element.children) {
    content.push(toOrdered(child));
  }
  const node: Record<string, unknown> = { [element.name]: content };
  if (Object.keys(element.attributes).length > 0) {
    node[ATTRIBUTES_KEY] = { ...element.attributes };
  }
  return node;
}

export function serializeElement(element: Element): string {
  const markup: string = builder.build([toOrdered(element)]);
  return markup.trim();
}
