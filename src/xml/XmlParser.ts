/**
 * XML parsing into the namespace-aware element model.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import {
  ROOT_SCOPE,
  XmlDocument,
  XmlElement,
  isRecord,
  splitQName,
} from './XmlElement.js';
import type { NamespaceScope, XmlNode } from './XmlElement.js';

export class XmlParseError extends Error {
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, line?: number, column?: number) {
    super(line !== undefined ? `${message} (line ${line}, column ${column ?? 0})` : message);
    this.name = 'XmlParseError';
    this.line = line;
    this.column = column;
  }
}

const ATTRIBUTES_KEY = ':@';
const TEXT_NODE_NAME = '#text';

const orderedParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  textNodeName: TEXT_NODE_NAME,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

const DECLARED_ENCODING = /^<\?xml[^>]*\sencoding\s*=\s*["']([A-Za-z0-9._:-]+)["']/;

/**
 * Encoding of raw XML: the byte order mark, else the `encoding` of the XML
 * declaration, else utf-8.
 */
export function detectXmlEncoding(bytes: Buffer): string {
  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) return 'utf-8';
  if (bytes[0] === 0xff && bytes[1] === 0xfe) return 'utf-16le';
  if (bytes[0] === 0xfe && bytes[1] === 0xff) return 'utf-16be';
  // "<?" in UTF-16 without a mark
  if (bytes[0] === 0x3c && bytes[1] === 0x00 && bytes[2] === 0x3f && bytes[3] === 0x00) return 'utf-16le';
  if (bytes[0] === 0x00 && bytes[1] === 0x3c && bytes[2] === 0x00 && bytes[3] === 0x3f) return 'utf-16be';

  const head = bytes.subarray(0, 256).toString('latin1');
  return DECLARED_ENCODING.exec(head)?.[1]?.toLowerCase() ?? 'utf-8';
}

/**
 * Decode raw XML with its detected encoding; an encoding TextDecoder does
 * not know is read as utf-8.
 */
export function decodeXml(bytes: Buffer): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(detectXmlEncoding(bytes));
  } catch {
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(bytes);
}

/**
 * Parse an XML string or buffer into an XmlDocument.
 *
 * @throws XmlParseError when the text is not well-formed or uses an
 *   undeclared namespace prefix
 */
export function parseXml(input: string | Buffer): XmlDocument {
  const text = typeof input === 'string' ? input : decodeXml(input);

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    throw new XmlParseError(validation.err.msg, validation.err.line, validation.err.col);
  }

  let parsed: unknown;
  try {
    parsed = orderedParser.parse(text);
  } catch (error) {
    throw new XmlParseError(error instanceof Error ? error.message : String(error));
  }

  if (!Array.isArray(parsed)) {
    throw new XmlParseError('Unexpected parser output');
  }

  const roots = toNodes(parsed, ROOT_SCOPE).filter((n): n is XmlElement => n instanceof XmlElement);
  const root = roots[0];
  if (!root) {
    throw new XmlParseError('Start tag expected');
  }
  if (roots.length > 1) {
    throw new XmlParseError('Multiple root elements');
  }
  return new XmlDocument(root);
}

function toNodes(entries: unknown[], scope: NamespaceScope): XmlNode[] {
  const nodes: XmlNode[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;

    const tagName = Object.keys(entry).find((k) => k !== ATTRIBUTES_KEY);
    if (tagName === undefined) continue;

    if (tagName === TEXT_NODE_NAME) {
      const value = entry[TEXT_NODE_NAME];
      if (value !== undefined && value !== null && String(value) !== '') {
        nodes.push(String(value));
      }
      continue;
    }

    // Comments and processing instructions are not part of the model
    if (tagName.startsWith('?') || tagName.startsWith('!')) continue;

    nodes.push(toElement(tagName, entry, scope));
  }
  return nodes;
}

function toElement(name: string, entry: Record<string, unknown>, parentScope: NamespaceScope): XmlElement {
  const attributes = new Map<string, string>();
  const rawAttributes = entry[ATTRIBUTES_KEY];
  if (isRecord(rawAttributes)) {
    for (const [key, value] of Object.entries(rawAttributes)) {
      attributes.set(key, String(value));
    }
  }

  const scope = declareNamespaces(attributes, parentScope);
  const { prefix, localName } = splitQName(name);
  const namespaceURI = scope.get(prefix);
  if (namespaceURI === undefined) {
    if (prefix) {
      throw new XmlParseError(`Namespace prefix '${prefix}' on ${localName} is not defined`);
    }
  }

  const children = entry[name];
  const nodes = Array.isArray(children) ? toNodes(children, scope) : [];
  return new XmlElement(name, namespaceURI ?? '', attributes, nodes, scope);
}

function declareNamespaces(attributes: ReadonlyMap<string, string>, parentScope: NamespaceScope): NamespaceScope {
  let scope: Map<string, string> | undefined;
  for (const [key, value] of attributes) {
    let prefix: string;
    if (key === 'xmlns') {
      prefix = '';
    } else if (key.startsWith('xmlns:')) {
      prefix = key.substring('xmlns:'.length);
    } else {
      continue;
    }
    scope ??= new Map(parentScope);
    if (value === '' && prefix === '') {
      scope.delete('');
    } else {
      scope.set(prefix, value);
    }
  }
  return scope ?? parentScope;
}
