/**
 * SOAP Envelope Builder
 *
 * Purpose: Build SOAP 1.1 and SOAP 1.2 envelopes and fault messages
 *
 * Key behaviors:
 * - Generate version-correct envelopes with optional headers
 * - Map version-neutral fault code kinds onto each version's code names
 * - Produce fault envelopes as parsed documents ready to be returned
 */

import { SoapVersion, ENVELOPE_NAMESPACE } from './ProtocolVersion.js';
import { parseXml } from '../xml/XmlParser.js';
import type { XmlDocument } from '../xml/XmlElement.js';

export const WSA_NAMESPACES = {
  WSA_2005: 'http://www.w3.org/2005/08/addressing',
  WSA_2004: 'http://schemas.xmlsoap.org/ws/2004/08/addressing',
} as const;

/**
 * SOAP header entry
 */
export interface SoapHeader {
  /** Namespace URI */
  namespace?: string;
  /** Namespace prefix */
  prefix?: string;
  /** Local name of the header element */
  localName: string;
  /** Header content, already serialized (text is escaped) */
  content: string;
  /** Whether `content` is XML markup rather than text */
  rawContent?: boolean;
  mustUnderstand?: boolean;
  /** actor (1.1) or role (1.2) */
  actor?: string;
}

export interface SoapEnvelopeOptions {
  version?: SoapVersion;
  headers?: SoapHeader[];
  /** Additional namespace declarations on the Envelope */
  namespaces?: Record<string, string>;
}

/**
 * Version-neutral fault code: `client` is the sender's fault, `server` the
 * receiver's. Anything else is written as given.
 */
export type FaultCodeKind = 'client' | 'server';

export interface SoapFault {
  /**
   * A FaultCodeKind optionally followed by a dotted subcode
   * (`client.UnknownMessage`), or a prefixed code written as given
   */
  faultCode: string;
  /** Fault string (1.1) / reason text (1.2) */
  faultString: string;
  /** faultactor (1.1) / Role (1.2) */
  faultActor?: string;
  /** Detail content as XML markup */
  detail?: string;
}

const ENVELOPE_PREFIX = 'soap';

const CODE_NAMES: Readonly<Record<SoapVersion, Record<FaultCodeKind, string>>> = {
  [SoapVersion.SOAP11]: { client: 'Client', server: 'Server' },
  [SoapVersion.SOAP12]: { client: 'Sender', server: 'Receiver' },
};

/**
 * Build a SOAP envelope around body content (XML markup).
 */
export function buildSoapEnvelope(bodyContent: string, options: SoapEnvelopeOptions = {}): string {
  const version = options.version ?? SoapVersion.SOAP11;

  const namespaces: string[] = [`xmlns:${ENVELOPE_PREFIX}="${ENVELOPE_NAMESPACE[version]}"`];
  for (const [prefix, uri] of Object.entries(options.namespaces ?? {})) {
    namespaces.push(`xmlns:${prefix}="${escapeXml(uri)}"`);
  }

  let headerSection = '';
  if (options.headers && options.headers.length > 0) {
    const headerElements = options.headers.map((h) => buildHeaderElement(h, version)).join('');
    headerSection = `<${ENVELOPE_PREFIX}:Header>${headerElements}</${ENVELOPE_PREFIX}:Header>`;
  }

  return (
    `<${ENVELOPE_PREFIX}:Envelope ${namespaces.join(' ')}>` +
    headerSection +
    `<${ENVELOPE_PREFIX}:Body>${bodyContent}</${ENVELOPE_PREFIX}:Body>` +
    `</${ENVELOPE_PREFIX}:Envelope>`
  );
}

function buildHeaderElement(header: SoapHeader, version: SoapVersion): string {
  const prefix = header.prefix || 'h';
  const nsAttr = header.namespace ? ` xmlns:${prefix}="${escapeXml(header.namespace)}"` : '';

  const attrs: string[] = [];
  if (header.mustUnderstand !== undefined) {
    const value =
      version === SoapVersion.SOAP11 ? (header.mustUnderstand ? '1' : '0') : String(header.mustUnderstand);
    attrs.push(`${ENVELOPE_PREFIX}:mustUnderstand="${value}"`);
  }
  if (header.actor) {
    const actorAttr = version === SoapVersion.SOAP11 ? 'actor' : 'role';
    attrs.push(`${ENVELOPE_PREFIX}:${actorAttr}="${escapeXml(header.actor)}"`);
  }

  const attrStr = attrs.length > 0 ? ' ' + attrs.join(' ') : '';
  const tagName = header.namespace ? `${prefix}:${header.localName}` : header.localName;
  const content = header.rawContent ? header.content : escapeXml(header.content);

  return `<${tagName}${nsAttr}${attrStr}>${content}</${tagName}>`;
}

/**
 * Fault code as written in the envelope: `soap:Client`, `soap:Sender.Sub`, ...
 * A code that already carries a prefix is kept as it is.
 */
export function faultCodeFor(code: string, version: SoapVersion): string {
  if (code.includes(':')) return code;
  const dot = code.indexOf('.');
  const head = dot < 0 ? code : code.substring(0, dot);
  const rest = dot < 0 ? '' : code.substring(dot);
  const names = CODE_NAMES[version];
  const mapped = head === 'client' || head === 'server' ? names[head] : head;
  return `${ENVELOPE_PREFIX}:${mapped}${rest}`;
}

/**
 * Build a SOAP fault envelope.
 */
export function buildSoapFaultEnvelope(fault: SoapFault, options: SoapEnvelopeOptions = {}): string {
  const version = options.version ?? SoapVersion.SOAP11;
  const code = escapeXml(faultCodeFor(fault.faultCode, version));
  const p = ENVELOPE_PREFIX;

  let faultBody: string;
  if (version === SoapVersion.SOAP11) {
    faultBody =
      `<${p}:Fault>` +
      `<faultcode>${code}</faultcode>` +
      `<faultstring>${escapeXml(fault.faultString)}</faultstring>` +
      (fault.faultActor ? `<faultactor>${escapeXml(fault.faultActor)}</faultactor>` : '') +
      (fault.detail ? `<detail>${fault.detail}</detail>` : '') +
      `</${p}:Fault>`;
  } else {
    // SOAP 1.2 only knows the Sender/Receiver/... codes at top level;
    // a dotted subcode becomes a Subcode element
    const [topCode, ...sub] = code.split('.');
    const subcode = sub.length > 0 ? `<${p}:Subcode><${p}:Value>${sub.join('.')}</${p}:Value></${p}:Subcode>` : '';
    faultBody =
      `<${p}:Fault>` +
      `<${p}:Code><${p}:Value>${topCode ?? code}</${p}:Value>${subcode}</${p}:Code>` +
      `<${p}:Reason><${p}:Text xml:lang="en">${escapeXml(fault.faultString)}</${p}:Text></${p}:Reason>` +
      (fault.faultActor ? `<${p}:Role>${escapeXml(fault.faultActor)}</${p}:Role>` : '') +
      (fault.detail ? `<${p}:Detail>${fault.detail}</${p}:Detail>` : '') +
      `</${p}:Fault>`;
  }

  return buildSoapEnvelope(faultBody, options);
}

/**
 * Fault envelope as a document, ready to be returned as a payload.
 */
export function faultDocument(fault: SoapFault, version: SoapVersion): XmlDocument {
  return parseXml(buildSoapFaultEnvelope(fault, { version }));
}

/**
 * Escape XML special characters
 */
export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
