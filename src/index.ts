/**
 * soap-dispatch-daemon
 *
 * Dispatches received SOAP messages to operation handlers registered from
 * WSDL files, and serves them over HTTP.
 */

export * from './xml/index.js';
export { SoapVersion, SOAP_NAMESPACES, ENVELOPE_NAMESPACE, ProtocolTable, isSoapVersion } from './soap/ProtocolVersion.js';
export { messageStructure, soapBody, soapHeader } from './soap/MessageStructure.js';
export type { MessageInfo, SelectionStrategy } from './soap/MessageStructure.js';
export {
  WSA_NAMESPACES,
  buildSoapEnvelope,
  buildSoapFaultEnvelope,
  faultCodeFor,
  faultDocument,
  escapeXml,
} from './soap/SoapBuilder.js';
export type { SoapFault, SoapHeader, SoapEnvelopeOptions, FaultCodeKind } from './soap/SoapBuilder.js';

export { ConfigurationError } from './daemon/errors.js';
export { NO_MATCH, matched, isMatched } from './daemon/HandlerResult.js';
export type { HandlerResult, Matched, NoMatch, OperationHandler, SoapPayload } from './daemon/HandlerResult.js';
export { OperationRegistry } from './daemon/OperationRegistry.js';
export type { ActionDirection, ActionTable } from './daemon/OperationRegistry.js';
export { extractSoapAction, normalizeSoapAction, headerAccessor, HTTP_EXTENSION_ID } from './daemon/ActionExtractor.js';
export type { HeaderAccessor } from './daemon/ActionExtractor.js';
export * from './daemon/FaultSynthesizer.js';
export { SoapDispatcher, DispatchState } from './daemon/Dispatcher.js';
export type { DispatchInput, DispatchResult, DispatcherOptions } from './daemon/Dispatcher.js';

export { parseWsdlContent, WSDL_NAMESPACES } from './wsdl/WsdlParser.js';
export type { ParsedWsdl, WsdlBinding, WsdlMessage, WsdlPort, WsdlPortType, WsdlService } from './wsdl/WsdlParser.js';
export { Wsdl } from './wsdl/Wsdl.js';
export type { OperationDefinition, OperationStyle, WsdlModel } from './wsdl/Wsdl.js';
export { DocumentLiteralCompiler, stubCallback, isOperationCallback } from './wsdl/HandlerCompiler.js';
export type { HandlerCompiler, OperationAnswer, OperationCallback, OperationRequest } from './wsdl/HandlerCompiler.js';
export { importFrom } from './wsdl/WsdlImporter.js';
export type { ImportOptions, ImportSummary } from './wsdl/WsdlImporter.js';

export { createSoapApp, SoapHttpServer, decodeBody } from './http/SoapHttpBinding.js';
export type { SoapAppOptions, SoapHttpServerOptions } from './http/SoapHttpBinding.js';

export { getDaemonConfig, resetDaemonConfig } from './config/DaemonConfig.js';
export type { DaemonConfiguration } from './config/DaemonConfig.js';
export * from './logging/index.js';
