/**
 * Fault Synthesizer
 *
 * Purpose: Turn every failure the daemon can meet into a FaultDescriptor
 * with a fixed status code and reason phrase.
 *
 * Status codes borrow HTTP's numbers as a severity vocabulary; nothing here
 * depends on HTTP. Faults raised before the SOAP version is known carry only
 * a text message. The SOAP-level ones also carry a fault envelope in the
 * version of the request.
 *
 * None of these functions throw.
 */

import { SoapVersion } from '../soap/ProtocolVersion.js';
import { faultDocument } from '../soap/SoapBuilder.js';
import type { SoapFault } from '../soap/SoapBuilder.js';
import type { XmlDocument } from '../xml/XmlElement.js';
import type { SoapPayload } from './HandlerResult.js';

export const FaultStatus = {
  SEE_OTHER: 303,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  NOT_ACCEPTABLE: 406,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  NOT_IMPLEMENTED: 501,
} as const;

export interface FaultDescriptor {
  status: number;
  /** Short reason phrase, usable as a status line text */
  reason: string;
  /** Human-readable explanation */
  message: string;
  /** Fault envelope, for faults raised once the SOAP version is known */
  detail?: XmlDocument;
}

export type FaultParams =
  | { category: 'invalid-xml'; error: unknown }
  | { category: 'not-soap-message'; type: string }
  | { category: 'unsupported-soap-version'; namespaceURI: string }
  | { category: 'try-other-protocol'; version: SoapVersion; bodyType: string; others: SoapVersion[] }
  | {
      category: 'message-not-recognized';
      version: SoapVersion;
      bodyType: string;
      soapAction?: string;
      operations: string[];
      discloseOperations?: boolean;
    }
  | { category: 'not-implemented'; version: SoapVersion; operation: string }
  | { category: 'handler-failure'; version: SoapVersion; operation: string }
  | { category: 'internal-error'; error: unknown }
  | { category: 'method-not-allowed'; method: string }
  | { category: 'not-acceptable'; contentType: string };

export type FaultCategory = FaultParams['category'];

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Descriptor with a fault envelope attached. Should the envelope fail to
 * build, the descriptor goes out with its text message only.
 */
function soapLevel(
  status: number,
  reason: string,
  version: SoapVersion,
  fault: SoapFault
): FaultDescriptor {
  const descriptor: FaultDescriptor = { status, reason, message: fault.faultString };
  try {
    descriptor.detail = faultDocument(fault, version);
  } catch (error) {
    descriptor.message = `${fault.faultString} (fault envelope unavailable: ${errorMessage(error)})`;
  }
  return descriptor;
}

export function invalidXml(error: unknown): FaultDescriptor {
  return {
    status: FaultStatus.UNPROCESSABLE_ENTITY,
    reason: 'XML syntax error',
    message: `The XML cannot be parsed: ${errorMessage(error)}`,
  };
}

export function notSoapMessage(type: string): FaultDescriptor {
  return {
    status: FaultStatus.FORBIDDEN,
    reason: 'message not SOAP',
    message: `The message was XML, but not SOAP; not an Envelope but '${type}'`,
  };
}

/**
 * Plain text only: there is no way to answer in a SOAP version we do not
 * understand.
 */
export function unsupportedSoapVersion(namespaceURI: string): FaultDescriptor {
  return {
    status: FaultStatus.NOT_IMPLEMENTED,
    reason: 'SOAP version not supported',
    message: `The soap version '${namespaceURI}' is not supported`,
  };
}

export function tryOtherProtocol(version: SoapVersion, bodyType: string, others: SoapVersion[]): FaultDescriptor {
  return soapLevel(FaultStatus.SEE_OTHER, 'SOAP protocol not in use', version, {
    faultCode: 'client.UnsupportedProtocol',
    faultString: `body element ${bodyType} not available in ${version}, try ${others.join(', ')}`,
  });
}

export function messageNotRecognized(
  version: SoapVersion,
  bodyType: string,
  soapAction: string | undefined,
  operations: string[],
  discloseOperations = true
): FaultDescriptor {
  const sa = soapAction ? `soapAction ${soapAction}` : 'no soapAction';
  let faultString = `${version} body element ${bodyType} not recognized, ${sa}`;
  if (discloseOperations) {
    faultString += `; available operations: ${operations.length > 0 ? operations.join(' ') : '(none)'}`;
  }
  return soapLevel(FaultStatus.NOT_FOUND, 'message not recognized', version, {
    faultCode: 'client.UnknownMessage',
    faultString,
  });
}

export function notImplemented(version: SoapVersion, operation: string): FaultDescriptor {
  return soapLevel(FaultStatus.NOT_IMPLEMENTED, 'not implemented', version, {
    faultCode: 'server.notImplemented',
    faultString: `procedure ${operation} for ${version} is not yet implemented`,
  });
}

/**
 * A handler threw. The caller logs the error; the client only learns which
 * operation failed.
 */
export function handlerFailure(version: SoapVersion, operation: string): FaultDescriptor {
  return soapLevel(FaultStatus.INTERNAL_SERVER_ERROR, 'unexpected handler failure', version, {
    faultCode: 'server.handlerFailure',
    faultString: `operation ${operation} failed unexpectedly`,
  });
}

export function internalError(error: unknown): FaultDescriptor {
  return {
    status: FaultStatus.INTERNAL_SERVER_ERROR,
    reason: 'internal server error',
    message: `The message could not be processed: ${errorMessage(error)}`,
  };
}

export function methodNotAllowed(method: string): FaultDescriptor {
  return {
    status: FaultStatus.METHOD_NOT_ALLOWED,
    reason: 'only POST or M-POST',
    message: `attempt to connect via ${method}`,
  };
}

export function notAcceptable(contentType: string): FaultDescriptor {
  return {
    status: FaultStatus.NOT_ACCEPTABLE,
    reason: 'required is XML',
    message: `content-type seems to be ${contentType}, must be some XML`,
  };
}

/**
 * Build the descriptor for any fault category.
 */
export function synthesizeFault(params: FaultParams): FaultDescriptor {
  switch (params.category) {
    case 'invalid-xml':
      return invalidXml(params.error);
    case 'not-soap-message':
      return notSoapMessage(params.type);
    case 'unsupported-soap-version':
      return unsupportedSoapVersion(params.namespaceURI);
    case 'try-other-protocol':
      return tryOtherProtocol(params.version, params.bodyType, params.others);
    case 'message-not-recognized':
      return messageNotRecognized(
        params.version,
        params.bodyType,
        params.soapAction,
        params.operations,
        params.discloseOperations
      );
    case 'not-implemented':
      return notImplemented(params.version, params.operation);
    case 'handler-failure':
      return handlerFailure(params.version, params.operation);
    case 'internal-error':
      return internalError(params.error);
    case 'method-not-allowed':
      return methodNotAllowed(params.method);
    case 'not-acceptable':
      return notAcceptable(params.contentType);
  }
}

/**
 * What a transport sends for a fault: the envelope when there is one,
 * otherwise the text message.
 */
export function faultPayload(fault: FaultDescriptor): SoapPayload {
  return fault.detail ?? fault.message;
}
