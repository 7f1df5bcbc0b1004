/**
 * Minimal ordered XML tree over fast-xml-parser
 *
 * OpenSong documents repeat sibling tags (<slide>, <body>, <author>) and their
 * order matters, so the parser runs in preserveOrder mode and the result is
 * folded into plain elements. Text is kept exactly as written (verse
 * indentation is content); character references are decoded.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';

export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  /** Direct text content, undefined when the element has none */
  text?: string;
}

export class XmlParseError extends Error {
  constructor(message: string, public readonly line?: number) {
    super(message);
    this.name = 'XmlParseError';
  }
}

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  htmlEntities: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) return attributes;
  for (const [key, attr] of Object.entries(value)) {
    attributes[key] = String(attr);
  }
  return attributes;
}

function readText(nodes: unknown): string | undefined {
  if (!Array.isArray(nodes)) return undefined;
  const list: unknown[] = nodes;
  let text: string | undefined;
  for (const node of list) {
    if (isRecord(node) && TEXT_KEY in node) {
      text = (text ?? '') + String(node[TEXT_KEY]);
    }
  }
  return text;
}

function toElements(nodes: unknown): XmlElement[] {
  if (!Array.isArray(nodes)) return [];
  const list: unknown[] = nodes;
  const elements: XmlElement[] = [];

  for (const node of list) {
    if (!isRecord(node)) continue;
    for (const [name, content] of Object.entries(node)) {
      if (name === ATTRIBUTES_KEY || name === TEXT_KEY) continue;
      elements.push({
        name,
        attributes: readAttributes(node[ATTRIBUTES_KEY]),
        children: toElements(content),
        text: readText(content),
      });
    }
  }

  return elements;
}

/**
 * Parse a document and return its root element.
 * Throws XmlParseError for malformed input or a document without elements.
 */
export function parseXml(source: string): XmlElement {
  const validation = XMLValidator.validate(source);
  if (validation !== true) {
    throw new XmlParseError(validation.err.msg, validation.err.line);
  }

  const [root] = toElements(parser.parse(source));
  if (!root) {
    throw new XmlParseError('Document has no root element');
  }
  return root;
}

export function findChild(element: XmlElement, name: string): XmlElement | undefined {
  return element.children.find(child => child.name === name);
}

export function findChildren(element: XmlElement, name: string): XmlElement[] {
  return element.children.filter(child => child.name === name);
}

/**
 * The element and all its descendants, depth-first in document order
 */
export function* iterElements(element: XmlElement): Generator<XmlElement> {
  yield element;
  for (const child of element.children) {
    yield* iterElements(child);
  }
}
