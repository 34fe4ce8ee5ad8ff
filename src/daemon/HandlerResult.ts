import type { XmlDocument, XmlElement } from '../xml/XmlElement.js';
import type { MessageInfo } from '../soap/MessageStructure.js';

/** Response payload: an XML document, or plain text for transport-level errors */
export type SoapPayload = XmlDocument | string;

export interface Matched {
  readonly kind: 'matched';
  readonly status: number;
  readonly statusText: string;
  readonly payload: SoapPayload;
}

export interface NoMatch {
  readonly kind: 'no-match';
}

/**
 * What an operation handler answers: it took the message (`Matched`) or the
 * message is not its to answer (`NoMatch`), letting the dispatcher try the
 * next candidate.
 */
export type HandlerResult = Matched | NoMatch;

export const NO_MATCH: NoMatch = Object.freeze({ kind: 'no-match' });

export function matched(status: number, statusText: string, payload: SoapPayload): Matched {
  return { kind: 'matched', status, statusText, payload };
}

export function isMatched(result: HandlerResult): result is Matched {
  return result.kind === 'matched';
}

/**
 * An operation handler. Invoked synchronously; any blocking it does is its
 * own business.
 */
export type OperationHandler = (operationName: string, envelope: XmlElement, info: MessageInfo) => HandlerResult;
