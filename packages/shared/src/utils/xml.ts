// ABOUTME: XML parsing helpers built on fast-xml-parser.
// ABOUTME: Validates documents up front and walks the parsed tree without casts.

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { DecodeError } from './errors';

/** A parsed element: attributes under `@_name`, text under `#text`, children by tag name */
export type XmlNode = Record<string, unknown>;

const ATTRIBUTE_PREFIX = '@_';
const TEXT_NODE = '#text';

/**
 * Create a parser configured for API payloads.
 *
 * Namespace prefixes are dropped (`ext:score` becomes `score`) and values are
 * left as strings: a band called "311" must not turn into a number. Values are
 * not trimmed, since join phrases such as " & " carry meaningful spaces.
 * Numeric character references (`&#233;`, `&#xF3;`) are decoded.
 */
export function createXmlParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_NODE,
    removeNSPrefix: true,
    ignoreDeclaration: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    htmlEntities: true,
  });
}

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse an XML document, rejecting anything that is not well-formed.
 *
 * @param service - Service name used in the error message
 * @throws DecodeError with the parser's line and column
 */
export function parseXml(xml: string, service: string): XmlNode {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new DecodeError(service, `malformed XML at ${line}:${col}: ${msg}`, { line, col });
  }

  const document: unknown = createXmlParser().parse(xml);
  if (!isXmlNode(document)) {
    throw new DecodeError(service, 'document has no root element');
  }
  return document;
}

/**
 * All child elements with the given tag name, in document order.
 * Text-only children are wrapped so every entry is an XmlNode.
 */
export function children(node: XmlNode, name: string): XmlNode[] {
  const value = node[name];
  if (value === undefined) return [];

  const items: unknown[] = Array.isArray(value) ? value : [value];
  const nodes: XmlNode[] = [];
  for (const item of items) {
    if (typeof item === 'string') {
      nodes.push({ [TEXT_NODE]: item });
    } else if (isXmlNode(item)) {
      nodes.push(item);
    }
  }
  return nodes;
}

export function child(node: XmlNode, name: string): XmlNode | undefined {
  return children(node, name)[0];
}

/**
 * Text content of the node itself. Empty elements yield undefined.
 */
export function ownText(node: XmlNode): string | undefined {
  const value = node[TEXT_NODE];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Text content of the first child element with the given tag name.
 */
export function childText(node: XmlNode, name: string): string | undefined {
  const element = child(node, name);
  return element ? ownText(element) : undefined;
}

/**
 * Tag name of the document's root element.
 */
export function rootName(document: XmlNode): string | undefined {
  return Object.keys(document).find((key) => !key.startsWith('#') && !key.startsWith(ATTRIBUTE_PREFIX));
}

export function attr(node: XmlNode, name: string): string | undefined {
  const value = node[`${ATTRIBUTE_PREFIX}${name}`];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Parse an integer, returning undefined for missing or non-numeric input.
 */
export function parseIntSafe(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function parseBooleanSafe(value: string | undefined): boolean {
  return value?.trim().toLowerCase() === 'true';
}
