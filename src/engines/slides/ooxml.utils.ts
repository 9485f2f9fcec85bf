/**
 * Helpers for walking fast-xml-parser output of OOXML parts
 */

import { posix } from 'path';
import { XMLParser } from 'fast-xml-parser';

export type XmlNode = Record<string, unknown>;

const ATTRIBUTES_KEY = ':@';
const DOCUMENT_KEY = '#document';

/**
 * Parser keeping sibling order: every element is `{ [tag]: children[] }`
 * with its attributes under `:@`, text nodes are `{ '#text': string }`
 */
export function createOoxmlParser(): XMLParser {
  return new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
  });
}

/**
 * Wrap parsed top-level nodes so the root element is reachable with child()
 */
export function parseDocument(parser: XMLParser, xml: string): XmlNode {
  const nodes: unknown = parser.parse(xml);
  return { [DOCUMENT_KEY]: Array.isArray(nodes) ? nodes : [] };
}

export function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tagName(node: XmlNode): string | undefined {
  return Object.keys(node).find((key) => key !== ATTRIBUTES_KEY);
}

/**
 * Child nodes of an element, in document order
 */
export function contentOf(node: unknown): unknown[] {
  if (!isNode(node)) return [];
  const tag = tagName(node);
  const content = tag === undefined ? undefined : node[tag];
  return Array.isArray(content) ? content : [];
}

export function children(node: unknown, key: string): XmlNode[] {
  return contentOf(node).filter(
    (item): item is XmlNode => isNode(item) && key in item,
  );
}

export function child(node: unknown, key: string): XmlNode | undefined {
  return children(node, key)[0];
}

export function attribute(node: unknown, name: string): string | null {
  const attributes = isNode(node) ? node[ATTRIBUTES_KEY] : undefined;
  const value = isNode(attributes) ? attributes[`@_${name}`] : undefined;
  return typeof value === 'string' ? value : null;
}

/**
 * Concatenated text nodes directly inside an element
 */
export function textOf(node: unknown): string {
  return contentOf(node)
    .map((item) => (isNode(item) ? item['#text'] : undefined))
    .map((text) => (typeof text === 'string' ? text : ''))
    .join('');
}

function paragraphText(paragraph: XmlNode): string {
  return contentOf(paragraph)
    .map((item) => {
      if (!isNode(item)) return '';
      if ('a:br' in item) return '\n';
      if ('a:r' in item || 'a:fld' in item) return textOf(child(item, 'a:t'));
      return '';
    })
    .join('');
}

/**
 * Text of a shape's text body: runs, fields and line breaks in document
 * order, paragraphs joined with newlines
 */
export function shapeText(shape: unknown): string {
  return children(child(shape, 'p:txBody'), 'a:p')
    .map(paragraphText)
    .join('\n');
}

export function hasTextFrame(shape: unknown): boolean {
  return child(shape, 'p:txBody') !== undefined;
}

export function placeholderType(shape: unknown): string | null {
  const placeholder = child(child(child(shape, 'p:nvSpPr'), 'p:nvPr'), 'p:ph');
  if (placeholder === undefined) return null;
  // A placeholder without a type attribute is a body placeholder
  return attribute(placeholder, 'type') ?? 'body';
}

/**
 * Top-level shapes of a slide (or notes slide) part
 */
export function slideShapes(part: unknown, root: string): unknown[] {
  return children(
    child(child(child(part, root), 'p:cSld'), 'p:spTree'),
    'p:sp',
  );
}

/**
 * Path of the relationships part of a package part
 * ("ppt/slides/slide1.xml" → "ppt/slides/_rels/slide1.xml.rels")
 */
export function relsPathFor(partPath: string): string {
  return posix.join(
    posix.dirname(partPath),
    '_rels',
    `${posix.basename(partPath)}.rels`,
  );
}

/**
 * Resolve a relationship target against the part that declares it
 */
export function resolveTarget(partPath: string, target: string): string {
  if (target.startsWith('/')) return target.slice(1);
  return posix.normalize(posix.join(posix.dirname(partPath), target));
}
