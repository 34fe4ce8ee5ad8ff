/**
 * Structural metadata of a received envelope: what is in the Header and
 * Body, and which WS-Addressing action the sender asked for.
 */

import type { XmlElement } from '../xml/XmlElement.js';
import { ENVELOPE_NAMESPACE, SoapVersion } from './ProtocolVersion.js';
import { WSA_NAMESPACES } from './SoapBuilder.js';

/** How the dispatcher picked the operation that answered */
export type SelectionStrategy = 'wsa-action' | 'soap-action' | 'attempt-all';

export interface MessageInfo {
  soapVersion: SoapVersion;
  /** Types (`{ns}local`) of the Body's child elements, in order */
  body: string[];
  /** Types of the Header's child elements, in order */
  header: string[];
  /** Trimmed text of the WS-Addressing Action header, when present */
  wsaAction?: string;
  /** Set by the dispatcher just before a handler is invoked */
  selectedBy?: SelectionStrategy;
  /** Opaque transport metadata handed to dispatch() */
  request?: unknown;
}

const WSA_NAMESPACE_LIST: readonly string[] = [WSA_NAMESPACES.WSA_2005, WSA_NAMESPACES.WSA_2004];

export function soapHeader(envelope: XmlElement, version: SoapVersion): XmlElement | undefined {
  return envelope.firstChild(ENVELOPE_NAMESPACE[version], 'Header');
}

export function soapBody(envelope: XmlElement, version: SoapVersion): XmlElement | undefined {
  return envelope.firstChild(ENVELOPE_NAMESPACE[version], 'Body');
}

/**
 * Decode the structure of an envelope already known to be of `version`.
 */
export function messageStructure(envelope: XmlElement, version: SoapVersion, request?: unknown): MessageInfo {
  const header = soapHeader(envelope, version);
  const body = soapBody(envelope, version);

  const info: MessageInfo = {
    soapVersion: version,
    body: body ? body.elements().map((el) => el.typeOf()) : [],
    header: header ? header.elements().map((el) => el.typeOf()) : [],
    request,
  };

  const action = header
    ?.elements()
    .find((el) => el.localName === 'Action' && WSA_NAMESPACE_LIST.includes(el.namespaceURI));
  const wsaAction = action?.textContent().trim();
  if (wsaAction) {
    info.wsaAction = wsaAction;
  }

  return info;
}
