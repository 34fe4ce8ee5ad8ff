/**
 * WSDL Parser
 *
 * Purpose: Parse WSDL 1.1 documents into the parts the daemon needs to
 * register operations.
 *
 * Key behaviors:
 * - Extract messages, port types, bindings, services and ports
 * - Tell SOAP 1.1 bindings from SOAP 1.2 ones by the binding extension's
 *   namespace
 * - Pick up soapAction per binding operation and WS-Addressing actions per
 *   port type input/output
 * - Resolve element references to `{namespace}local` types
 */

import { XMLParser } from 'fast-xml-parser';
import { SOAP_NAMESPACES, SoapVersion } from '../soap/ProtocolVersion.js';
import { isRecord, packType, splitQName } from '../xml/XmlElement.js';

export const WSDL_NAMESPACES = {
  WSDL11: 'http://schemas.xmlsoap.org/wsdl/',
  WSAW: 'http://www.w3.org/2006/05/addressing/wsdl',
  WSAW_2006_02: 'http://www.w3.org/2006/02/addressing/wsdl',
  WSAM: 'http://www.w3.org/2007/05/addressing/metadata',
} as const;

const WSA_METADATA_NAMESPACES: readonly string[] = [
  WSDL_NAMESPACES.WSAW,
  WSDL_NAMESPACES.WSAW_2006_02,
  WSDL_NAMESPACES.WSAM,
];

/**
 * WSDL message part
 */
export interface WsdlPart {
  name: string;
  /** Element type as `{ns}local` */
  element?: string;
  /** Schema type as `{ns}local` */
  type?: string;
}

export interface WsdlMessage {
  name: string;
  parts: WsdlPart[];
}

/**
 * Input or output of a port type operation
 */
export interface WsdlMessageRef {
  /** Referenced message name (local part) */
  message?: string;
  /** WS-Addressing action declared with wsaw:Action / wsam:Action */
  wsaAction?: string;
}

export interface WsdlPortTypeOperation {
  name: string;
  input?: WsdlMessageRef;
  output?: WsdlMessageRef;
  documentation?: string;
}

export interface WsdlPortType {
  name: string;
  operations: WsdlPortTypeOperation[];
}

/**
 * Binding operation
 */
export interface WsdlOperation {
  name: string;
  soapAction?: string;
  /** Operation-level style, overriding the binding's */
  style?: string;
  /** soap:body namespace attribute of the input (rpc style) */
  inputNamespace?: string;
}

export interface WsdlBinding {
  name: string;
  /** Port type name (local part) */
  portType: string;
  /** Undefined for bindings that are not SOAP bindings */
  soapVersion?: SoapVersion;
  /** SOAP style (document/rpc) */
  style?: string;
  transport?: string;
  operations: WsdlOperation[];
}

export interface WsdlPort {
  name: string;
  /** Binding name (local part) */
  binding: string;
  location: string;
}

export interface WsdlService {
  name: string;
  ports: WsdlPort[];
}

export interface ParsedWsdl {
  targetNamespace: string;
  /** Prefix → namespace declarations on the definitions element */
  namespaces: Record<string, string>;
  messages: WsdlMessage[];
  portTypes: WsdlPortType[];
  bindings: WsdlBinding[];
  services: WsdlService[];
}

type XmlObject = Record<string, unknown>;
type Scope = ReadonlyMap<string, string>;

/**
 * Parse WSDL content
 *
 * @throws Error when the document has no definitions element
 */
export function parseWsdlContent(wsdlContent: string): ParsedWsdl {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    removeNSPrefix: false,
    parseAttributeValue: false,
    parseTagValue: false,
    trimValues: true,
  });

  const parsed: unknown = parser.parse(wsdlContent);
  if (!isRecord(parsed)) {
    throw new Error('Invalid WSDL: definitions element not found');
  }

  // definitions may carry any prefix (wsdl:definitions, definitions, ...)
  let definitions: XmlObject | null = null;
  for (const [key, value] of Object.entries(parsed)) {
    if (splitQName(key).localName === 'definitions' && isRecord(value)) {
      definitions = value;
      break;
    }
  }

  if (!definitions) {
    throw new Error('Invalid WSDL: definitions element not found');
  }

  const scope = scopeOf(definitions, new Map());
  const targetNamespace = attr(definitions, 'targetNamespace') ?? '';

  return {
    targetNamespace,
    namespaces: Object.fromEntries(scope),
    messages: parseMessages(definitions, scope),
    portTypes: parsePortTypes(definitions, scope),
    bindings: parseBindings(definitions, scope),
    services: parseServices(definitions, scope),
  };
}

/**
 * Namespace declarations in scope for an element.
 */
function scopeOf(obj: XmlObject, parent: Scope): Scope {
  let scope: Map<string, string> | undefined;
  for (const [key, value] of Object.entries(obj)) {
    if (key !== '@_xmlns' && !key.startsWith('@_xmlns:')) continue;
    scope ??= new Map(parent);
    scope.set(key === '@_xmlns' ? '' : key.substring('@_xmlns:'.length), String(value));
  }
  return scope ?? parent;
}

function attr(obj: XmlObject, name: string): string | undefined {
  const value = obj[`@_${name}`];
  return value === undefined ? undefined : String(value);
}

/**
 * Attribute matched by local name and namespace, whatever its prefix.
 */
function attrNS(obj: XmlObject, namespaces: readonly string[], localName: string, scope: Scope): string | undefined {
  for (const [key, value] of Object.entries(obj)) {
    if (!key.startsWith('@_')) continue;
    const { prefix, localName: local } = splitQName(key.substring(2));
    if (prefix && local === localName && namespaces.includes(scope.get(prefix) ?? '')) {
      return String(value);
    }
  }
  return undefined;
}

/**
 * Child elements with a local name, optionally restricted to namespaces.
 * An empty element without attributes comes back as an empty object.
 */
function children(obj: XmlObject, localName: string, scope: Scope, namespaces?: readonly string[]): XmlObject[] {
  const found: XmlObject[] = [];
  for (const [key, value] of Object.entries(obj)) {
    if (key.startsWith('@_') || key === '#text') continue;

    const { prefix, localName: local } = splitQName(key);
    if (local !== localName) continue;
    if (namespaces && !namespaces.includes(scope.get(prefix) ?? '')) continue;

    for (const item of Array.isArray(value) ? value : [value]) {
      if (isRecord(item)) {
        found.push(item);
      } else if (item === '') {
        found.push({});
      }
    }
  }
  return found;
}

/**
 * Namespace URI of the prefix a child element was written with.
 */
function childNamespaces(obj: XmlObject, localName: string, scope: Scope): string[] {
  const found: string[] = [];
  for (const key of Object.keys(obj)) {
    if (key.startsWith('@_')) continue;
    const { prefix, localName: local } = splitQName(key);
    if (local === localName) {
      found.push(scope.get(prefix) ?? '');
    }
  }
  return found;
}

function resolveQName(qname: string, scope: Scope): string {
  const { prefix, localName } = splitQName(qname.trim());
  return packType(scope.get(prefix) ?? '', localName);
}

/** Drop the prefix of a QName reference */
function localPart(qname: string | undefined): string {
  return qname ? splitQName(qname.trim()).localName : '';
}

/**
 * Text of the first child element with a local name and namespace.
 */
function childText(obj: XmlObject, localName: string, scope: Scope, namespaces: readonly string[]): string | undefined {
  for (const [key, value] of Object.entries(obj)) {
    const { prefix, localName: local } = splitQName(key);
    if (key.startsWith('@_') || local !== localName || !namespaces.includes(scope.get(prefix) ?? '')) continue;

    const first: unknown = Array.isArray(value) ? value[0] : value;
    if (typeof first === 'string') return first;
    if (isRecord(first) && typeof first['#text'] === 'string') return first['#text'];
    return undefined;
  }
  return undefined;
}

const WSDL_ONLY: readonly string[] = [WSDL_NAMESPACES.WSDL11];

function parseMessages(definitions: XmlObject, parentScope: Scope): WsdlMessage[] {
  const messages: WsdlMessage[] = [];

  for (const message of children(definitions, 'message', parentScope, WSDL_ONLY)) {
    const scope = scopeOf(message, parentScope);
    const name = attr(message, 'name');
    if (!name) continue;

    const parts: WsdlPart[] = [];
    for (const part of children(message, 'part', scope, WSDL_ONLY)) {
      const partScope = scopeOf(part, scope);
      const partName = attr(part, 'name');
      if (!partName) continue;
      const element = attr(part, 'element');
      const type = attr(part, 'type');
      parts.push({
        name: partName,
        element: element ? resolveQName(element, partScope) : undefined,
        type: type ? resolveQName(type, partScope) : undefined,
      });
    }

    messages.push({ name, parts });
  }

  return messages;
}

function parseMessageRef(ref: XmlObject | undefined, parentScope: Scope): WsdlMessageRef | undefined {
  if (!ref) return undefined;
  const scope = scopeOf(ref, parentScope);
  return {
    message: localPart(attr(ref, 'message')) || undefined,
    wsaAction: attrNS(ref, WSA_METADATA_NAMESPACES, 'Action', scope),
  };
}

function parsePortTypes(definitions: XmlObject, parentScope: Scope): WsdlPortType[] {
  const portTypes: WsdlPortType[] = [];

  for (const portType of children(definitions, 'portType', parentScope, WSDL_ONLY)) {
    const scope = scopeOf(portType, parentScope);
    const name = attr(portType, 'name');
    if (!name) continue;

    const operations: WsdlPortTypeOperation[] = [];
    for (const op of children(portType, 'operation', scope, WSDL_ONLY)) {
      const opScope = scopeOf(op, scope);
      const opName = attr(op, 'name');
      if (!opName) continue;

      operations.push({
        name: opName,
        input: parseMessageRef(children(op, 'input', opScope, WSDL_ONLY)[0], opScope),
        output: parseMessageRef(children(op, 'output', opScope, WSDL_ONLY)[0], opScope),
        documentation: childText(op, 'documentation', opScope, WSDL_ONLY),
      });
    }

    portTypes.push({ name, operations });
  }

  return portTypes;
}

const SOAP_BINDING_NAMESPACES: readonly string[] = [SOAP_NAMESPACES.WSDL11_SOAP11, SOAP_NAMESPACES.WSDL11_SOAP12];

function soapVersionOf(namespaceURI: string): SoapVersion | undefined {
  if (namespaceURI === SOAP_NAMESPACES.WSDL11_SOAP11) return SoapVersion.SOAP11;
  if (namespaceURI === SOAP_NAMESPACES.WSDL11_SOAP12) return SoapVersion.SOAP12;
  return undefined;
}

/**
 * Parse bindings from WSDL definitions
 */
function parseBindings(definitions: XmlObject, parentScope: Scope): WsdlBinding[] {
  const bindings: WsdlBinding[] = [];

  for (const binding of children(definitions, 'binding', parentScope, WSDL_ONLY)) {
    const scope = scopeOf(binding, parentScope);
    const name = attr(binding, 'name');
    if (!name) continue;

    // The SOAP extension element (soap:binding / soap12:binding) decides the version
    const extensionNs = childNamespaces(binding, 'binding', scope).find((ns) => SOAP_BINDING_NAMESPACES.includes(ns));
    const soapBinding = children(binding, 'binding', scope, SOAP_BINDING_NAMESPACES)[0];

    bindings.push({
      name,
      portType: localPart(attr(binding, 'type')),
      soapVersion: extensionNs ? soapVersionOf(extensionNs) : undefined,
      style: soapBinding ? attr(soapBinding, 'style') : undefined,
      transport: soapBinding ? attr(soapBinding, 'transport') : undefined,
      operations: parseBindingOperations(binding, scope),
    });
  }

  return bindings;
}

/**
 * Parse operations from binding element
 */
function parseBindingOperations(binding: XmlObject, parentScope: Scope): WsdlOperation[] {
  const operations: WsdlOperation[] = [];

  for (const op of children(binding, 'operation', parentScope, WSDL_ONLY)) {
    const scope = scopeOf(op, parentScope);
    const name = attr(op, 'name');
    if (!name) continue;

    // soap:operation / soap12:operation carries soapAction and style
    const soapOp = children(op, 'operation', scope, SOAP_BINDING_NAMESPACES)[0];
    const input = children(op, 'input', scope, WSDL_ONLY)[0];
    const inputBody = input ? children(input, 'body', scopeOf(input, scope), SOAP_BINDING_NAMESPACES)[0] : undefined;

    operations.push({
      name,
      soapAction: soapOp ? attr(soapOp, 'soapAction') || undefined : undefined,
      style: soapOp ? attr(soapOp, 'style') : undefined,
      inputNamespace: inputBody ? attr(inputBody, 'namespace') : undefined,
    });
  }

  return operations;
}

/**
 * Parse services from WSDL definitions
 */
function parseServices(definitions: XmlObject, parentScope: Scope): WsdlService[] {
  const services: WsdlService[] = [];

  for (const service of children(definitions, 'service', parentScope, WSDL_ONLY)) {
    const scope = scopeOf(service, parentScope);
    const name = attr(service, 'name');
    if (!name) continue;

    const ports: WsdlPort[] = [];
    for (const port of children(service, 'port', scope, WSDL_ONLY)) {
      const portScope = scopeOf(port, scope);
      const portName = attr(port, 'name');
      if (!portName) continue;

      const address = children(port, 'address', portScope, SOAP_BINDING_NAMESPACES)[0];
      ports.push({
        name: portName,
        binding: localPart(attr(port, 'binding')),
        location: address ? attr(address, 'location') ?? '' : '',
      });
    }

    services.push({ name, ports });
  }

  return services;
}
