/**
 * Handler Compiler
 *
 * Purpose: Turn an operation definition plus a user callback into an
 * OperationHandler the dispatcher can call.
 *
 * Key behaviors:
 * - A handler only accepts messages whose first Body element belongs to its
 *   operation; anything else is declined so the next operation can try
 * - Callbacks work on plain objects; the compiler does the XML both ways
 * - `_RETURN_CODE` / `_RETURN_TEXT` in an answer set the status
 * - A `Fault` key in an answer becomes a SOAP fault of the request version
 */

import { XMLBuilder } from 'fast-xml-parser';
import { matched, NO_MATCH } from '../daemon/HandlerResult.js';
import type { HandlerResult, OperationHandler } from '../daemon/HandlerResult.js';
import { notImplemented } from '../daemon/FaultSynthesizer.js';
import { soapBody, soapHeader } from '../soap/MessageStructure.js';
import type { MessageInfo } from '../soap/MessageStructure.js';
import { SoapVersion } from '../soap/ProtocolVersion.js';
import { buildSoapEnvelope, buildSoapFaultEnvelope, escapeXml, WSA_NAMESPACES } from '../soap/SoapBuilder.js';
import type { SoapEnvelopeOptions } from '../soap/SoapBuilder.js';
import { isRecord, unpackType } from '../xml/XmlElement.js';
import type { XmlElement } from '../xml/XmlElement.js';
import { parseXml } from '../xml/XmlParser.js';
import type { OperationDefinition } from './Wsdl.js';

export interface OperationRequest {
  operation: string;
  version: SoapVersion;
  /** Plain-object view of the Body element (prefixes removed, attributes under `@_`) */
  data: Record<string, unknown>;
  envelope: XmlElement;
  body: XmlElement;
  header?: XmlElement;
  info: MessageInfo;
  definition: OperationDefinition;
}

/**
 * Answer content. Reserved keys: `_RETURN_CODE`, `_RETURN_TEXT`, and
 * `Fault` / `fault` (with `faultcode`, `faultstring`, `faultactor`,
 * `detail`).
 */
export type OperationAnswer = Record<string, unknown>;

/** Returns undefined to decline the message */
export type OperationCallback = (request: OperationRequest) => OperationAnswer | undefined;

export function isOperationCallback(value: unknown): value is OperationCallback {
  return typeof value === 'function';
}

export interface HandlerCompiler {
  compile(definition: OperationDefinition, callback: OperationCallback): OperationHandler;
}

const RETURN_CODE = '_RETURN_CODE';
const RETURN_TEXT = '_RETURN_TEXT';

function numberOr(value: unknown, fallback: number): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isInteger(n) ? n : fallback;
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

/**
 * Compiles handlers for document/literal (and simple rpc/literal)
 * operations without a schema: data is mapped element-by-element.
 */
export class DocumentLiteralCompiler implements HandlerCompiler {
  private readonly builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    suppressEmptyNode: true,
  });

  compile(definition: OperationDefinition, callback: OperationCallback): OperationHandler {
    return (operation, envelope, info): HandlerResult => {
      const body = soapBody(envelope, info.soapVersion);
      const element = body?.elements()[0];
      if (!element || !this.accepts(definition, element)) {
        return NO_MATCH;
      }

      const answer = callback({
        operation,
        version: info.soapVersion,
        data: element.toObject(),
        envelope,
        body: element,
        header: soapHeader(envelope, info.soapVersion),
        info,
        definition,
      });
      if (answer === undefined) {
        return NO_MATCH;
      }

      return this.encode(definition, info.soapVersion, answer);
    };
  }

  private accepts(definition: OperationDefinition, element: XmlElement): boolean {
    if (definition.inputElement) {
      return element.typeOf() === definition.inputElement;
    }
    return element.localName === definition.name;
  }

  private encode(definition: OperationDefinition, version: SoapVersion, answer: OperationAnswer): HandlerResult {
    const { [RETURN_CODE]: code, [RETURN_TEXT]: text, ...content } = answer;
    const options: SoapEnvelopeOptions = { version };
    if (definition.wsaAction.output) {
      options.headers = [
        { namespace: WSA_NAMESPACES.WSA_2005, prefix: 'wsa', localName: 'Action', content: definition.wsaAction.output },
      ];
    }

    const fault = content['Fault'] ?? content['fault'];
    if (isRecord(fault)) {
      const actor = fault['faultactor'];
      const xml = buildSoapFaultEnvelope(
        {
          faultCode: stringOr(fault['faultcode'], 'server'),
          faultString: stringOr(fault['faultstring'], ''),
          faultActor: typeof actor === 'string' ? actor : undefined,
          detail: fault['detail'] === undefined ? undefined : this.markup(fault['detail']),
        },
        options
      );
      return matched(numberOr(code, 500), stringOr(text, 'Internal Server Error'), parseXml(xml));
    }

    const { namespaceURI, localName } = definition.outputElement
      ? unpackType(definition.outputElement)
      : { namespaceURI: definition.targetNamespace, localName: `${definition.name}Response` };

    const tag = namespaceURI ? `tns:${localName}` : localName;
    const root: Record<string, unknown> = namespaceURI ? { '@_xmlns:tns': namespaceURI, ...content } : { ...content };
    const xml = buildSoapEnvelope(this.builder.build({ [tag]: root }), options);
    return matched(numberOr(code, 200), stringOr(text, 'OK'), parseXml(xml));
  }

  /** Detail given as a string is text; objects are built as elements */
  private markup(value: unknown): string {
    if (isRecord(value)) {
      return this.builder.build(value);
    }
    return escapeXml(String(value));
  }
}

/**
 * Callback answering every accepted message with the "not implemented"
 * fault. Used for operations nobody supplied a callback for.
 */
export const stubCallback: OperationCallback = ({ operation, version }) => {
  const fault = notImplemented(version, operation);
  return {
    [RETURN_CODE]: fault.status,
    [RETURN_TEXT]: fault.reason,
    Fault: { faultcode: 'server.notImplemented', faultstring: fault.message },
  };
};
