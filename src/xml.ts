/**
 * XML document handling for catalog responses
 *
 * - validates and parses response text into an ordered node tree
 * - finds the first element with a given tag name (document order)
 * - reads text children of an element
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { CatalogParseError } from './errors.js';
import type { CatalogElement, CatalogNode } from './types.js';

const TEXT_KEY = '#text';
const ATTRIBUTES_KEY = ':@';

// preserveOrder keeps siblings in document order; tag values stay strings.
// htmlEntities also decodes numeric character references (&#45; &#xE9;)
export function makeXmlParser() {
  return new XMLParser({
    preserveOrder: true,
    ignoreAttributes: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    htmlEntities: true,
    textNodeName: TEXT_KEY
  });
}

const parser = makeXmlParser();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNodes(raw: unknown): CatalogNode[] {
  if (!Array.isArray(raw)) return [];
  const entries: unknown[] = raw;
  const nodes: CatalogNode[] = [];

  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        nodes.push({ kind: 'text', value: String(value) });
      } else {
        nodes.push({ kind: 'element', name: key, children: toNodes(value) });
      }
    }
  }

  return nodes;
}

/**
 * Parse a response body into top-level nodes.
 * Throws CatalogParseError when the text is not well-formed.
 */
export function parseDocument(xml: string, url: string): CatalogNode[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new CatalogParseError(url, validation.err.msg, validation.err.line);
  }
  return toNodes(parser.parse(xml));
}

/**
 * First element named `name`, searching depth-first in document order
 */
export function findFirstElement(nodes: CatalogNode[], name: string): CatalogElement | undefined {
  for (const node of nodes) {
    if (node.kind !== 'element') continue;
    if (node.name === name) return node;
    const nested = findFirstElement(node.children, name);
    if (nested) return nested;
  }
  return undefined;
}

export function childElements(element: CatalogElement, name?: string): CatalogElement[] {
  return element.children.filter(
    (child): child is CatalogElement => child.kind === 'element' && (name === undefined || child.name === name)
  );
}

export function textValues(element: CatalogElement): string[] {
  return element.children.flatMap((child) => (child.kind === 'text' ? [child.value] : []));
}

export function firstText(element: CatalogElement): string | undefined {
  return textValues(element)[0];
}
