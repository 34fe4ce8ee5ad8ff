/**
 * XML Element Model
 *
 * Purpose: Namespace-aware element tree for SOAP envelopes.
 *
 * Key behaviors:
 * - Every element knows its prefix, local name and resolved namespace URI
 * - In-scope namespace declarations are kept for QName lookups
 * - Serialization and plain-object views go through fast-xml-parser
 */

import { XMLBuilder, XMLParser } from 'fast-xml-parser';

export const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';
export const XMLNS_NAMESPACE = 'http://www.w3.org/2000/xmlns/';

/** Prefix → namespace URI; the default namespace is keyed by '' */
export type NamespaceScope = ReadonlyMap<string, string>;

export const ROOT_SCOPE: NamespaceScope = new Map([
  ['xml', XML_NAMESPACE],
  ['xmlns', XMLNS_NAMESPACE],
]);

export type XmlNode = XmlElement | string;

/** Ordered node shape shared with fast-xml-parser's `preserveOrder` mode */
export type OrderedXmlNode = Record<string, unknown>;

const ATTR_PREFIX = '@_';
const TEXT_NODE_NAME = '#text';

/**
 * Compose the `{namespace}local` form used for element types.
 * An empty namespace yields the bare local name.
 */
export function packType(namespaceURI: string, localName: string): string {
  return namespaceURI ? `{${namespaceURI}}${localName}` : localName;
}

/**
 * Split a `{namespace}local` type into its parts.
 */
export function unpackType(type: string): { namespaceURI: string; localName: string } {
  const match = /^\{([^}]*)\}(.+)$/.exec(type);
  if (match && match[1] !== undefined && match[2] !== undefined) {
    return { namespaceURI: match[1], localName: match[2] };
  }
  return { namespaceURI: '', localName: type };
}

/**
 * Split `prefix:local` into its parts; no colon means no prefix.
 */
export function splitQName(qname: string): { prefix: string; localName: string } {
  const colon = qname.indexOf(':');
  return colon < 0
    ? { prefix: '', localName: qname }
    : { prefix: qname.substring(0, colon), localName: qname.substring(colon + 1) };
}

export class XmlElement {
  readonly prefix: string;
  readonly localName: string;

  constructor(
    readonly name: string,
    readonly namespaceURI: string,
    readonly attributes: ReadonlyMap<string, string>,
    readonly nodes: readonly XmlNode[],
    readonly namespaces: NamespaceScope
  ) {
    const { prefix, localName } = splitQName(name);
    this.prefix = prefix;
    this.localName = localName;
  }

  /**
   * Child elements, in document order.
   */
  elements(): XmlElement[] {
    return this.nodes.filter((n): n is XmlElement => n instanceof XmlElement);
  }

  /**
   * First child element with the given namespace and local name.
   */
  firstChild(namespaceURI: string, localName: string): XmlElement | undefined {
    return this.elements().find(
      (child) => child.namespaceURI === namespaceURI && child.localName === localName
    );
  }

  /**
   * Concatenated direct text content.
   */
  get text(): string {
    return this.nodes.filter((n): n is string => typeof n === 'string').join('');
  }

  /**
   * Text of this element and all of its descendants.
   */
  textContent(): string {
    return this.nodes.map((n) => (typeof n === 'string' ? n : n.textContent())).join('');
  }

  attribute(qname: string): string | undefined {
    return this.attributes.get(qname);
  }

  /**
   * Resolve a prefix against the declarations in scope for this element.
   */
  lookupNamespaceURI(prefix: string): string | undefined {
    return this.namespaces.get(prefix);
  }

  /**
   * Resolve a QName-valued attribute or text (e.g. `tns:getInfo`) to a type.
   */
  resolveQName(qname: string): string | undefined {
    const { prefix, localName } = splitQName(qname.trim());
    const namespaceURI = this.lookupNamespaceURI(prefix);
    if (namespaceURI === undefined) {
      return prefix ? undefined : localName;
    }
    return packType(namespaceURI, localName);
  }

  /**
   * `{namespace}local`, or just `local` without a namespace.
   */
  typeOf(): string {
    return packType(this.namespaceURI, this.localName);
  }

  toOrderedNode(): OrderedXmlNode {
    const node: OrderedXmlNode = {
      [this.name]: this.nodes.map((n) => (typeof n === 'string' ? { [TEXT_NODE_NAME]: n } : n.toOrderedNode())),
    };
    if (this.attributes.size > 0) {
      const attrs: Record<string, string> = {};
      for (const [key, value] of this.attributes) {
        attrs[ATTR_PREFIX + key] = value;
      }
      node[':@'] = attrs;
    }
    return node;
  }

  /**
   * Serialize this element (without an XML declaration).
   */
  toXml(pretty = false): string {
    return buildOrdered([this.toOrderedNode()], pretty);
  }

  /**
   * Plain-object view of the element's content: namespace prefixes removed,
   * attributes under `@_`, text under `#text` when mixed with elements.
   */
  toObject(): Record<string, unknown> {
    const parser = new XMLParser({
      ignoreAttributes: false,
      attributeNamePrefix: ATTR_PREFIX,
      removeNSPrefix: true,
      parseTagValue: false,
      parseAttributeValue: false,
      trimValues: true,
    });
    const parsed: unknown = parser.parse(this.toXml());
    const content = isRecord(parsed) ? parsed[this.localName] : undefined;
    if (isRecord(content)) {
      return content;
    }
    if (content === undefined || content === '') {
      return {};
    }
    return { [TEXT_NODE_NAME]: String(content) };
  }

  /**
   * Copy of this element re-rooted at a new namespace scope: declarations
   * the element inherited from its ancestors are written onto it, so it can
   * be serialized on its own.
   */
  detach(): XmlElement {
    const attributes = new Map(this.attributes);
    for (const [prefix, uri] of this.namespaces) {
      if (prefix === 'xml' || prefix === 'xmlns') continue;
      const key = prefix ? `xmlns:${prefix}` : 'xmlns';
      if (!attributes.has(key) && (prefix || uri)) {
        attributes.set(key, uri);
      }
    }
    return new XmlElement(this.name, this.namespaceURI, attributes, this.nodes, this.namespaces);
  }
}

export class XmlDocument {
  constructor(readonly documentElement: XmlElement) {}

  /**
   * Serialize with an XML declaration.
   */
  toString(pretty = false): string {
    const separator = pretty ? '\n' : '';
    return `<?xml version="1.0" encoding="UTF-8"?>${separator}${this.documentElement.toXml(pretty)}`;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function buildOrdered(nodes: OrderedXmlNode[], pretty: boolean): string {
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    textNodeName: TEXT_NODE_NAME,
    suppressEmptyNode: true,
    format: pretty,
    indentBy: '  ',
  });
  const xml: unknown = builder.build(nodes);
  return String(xml).trim();
}
