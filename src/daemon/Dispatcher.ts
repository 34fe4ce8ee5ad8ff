/**
 * SOAP Dispatcher
 *
 * Purpose: Take one received message to exactly one (status, text, payload)
 * answer.
 *
 * Key behaviors:
 * - Parse the message when it arrives as text or bytes
 * - Recognize the SOAP version from the Envelope namespace
 * - Select the operation by WS-Addressing action, then by SOAPAction, then
 *   (when enabled) by offering the message to every operation in turn
 * - Convert every failure, handler exceptions included, into a fault
 *
 * The last strategy costs one handler call per registered operation for a
 * message that carries no usable action hint. That is the price of
 * answering legacy clients; a client can make the server do that work on
 * purpose, so switch it off with `acceptSlowSelect: false` when every
 * client sends WS-Addressing or SOAPAction.
 */

import { getDaemonConfig } from '../config/DaemonConfig.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import { messageStructure } from '../soap/MessageStructure.js';
import type { MessageInfo, SelectionStrategy } from '../soap/MessageStructure.js';
import { ProtocolTable, SoapVersion } from '../soap/ProtocolVersion.js';
import { XmlDocument, XmlElement } from '../xml/XmlElement.js';
import { parseXml } from '../xml/XmlParser.js';
import { normalizeSoapAction } from './ActionExtractor.js';
import {
  faultPayload,
  handlerFailure,
  internalError,
  invalidXml,
  messageNotRecognized,
  notSoapMessage,
  tryOtherProtocol,
  unsupportedSoapVersion,
} from './FaultSynthesizer.js';
import type { FaultDescriptor } from './FaultSynthesizer.js';
import type { Matched, OperationHandler, SoapPayload } from './HandlerResult.js';
import type { OperationRegistry } from './OperationRegistry.js';

registerComponent('dispatcher', 'SOAP message dispatcher');

export enum DispatchState {
  RECEIVED = 'RECEIVED',
  PARSED = 'PARSED',
  VERSION_RESOLVED = 'VERSION_RESOLVED',
  OPERATION_RESOLVED = 'OPERATION_RESOLVED',
  HANDLER_INVOKED = 'HANDLER_INVOKED',
  RESPONSE_READY = 'RESPONSE_READY',
  FAULT = 'FAULT',
}

export type DispatchInput = string | Buffer | XmlDocument | XmlElement;

export interface DispatchResult {
  status: number;
  statusText: string;
  payload: SoapPayload;
  /** RESPONSE_READY for an operation's answer, FAULT otherwise */
  state: DispatchState.RESPONSE_READY | DispatchState.FAULT;
  /** For faults: the last state reached before failing */
  failedAt?: DispatchState;
  soapVersion?: SoapVersion;
  operation?: string;
  selectedBy?: SelectionStrategy;
}

export interface DispatcherOptions {
  /** Offer unresolved messages to every operation (default from SOAP_ACCEPT_SLOW_SELECT) */
  acceptSlowSelect?: boolean;
  /** Name the registered operations in "message not recognized" faults */
  discloseOperations?: boolean;
  /** Envelope namespaces accepted; both SOAP versions by default */
  protocols?: ProtocolTable;
  logger?: Logger;
}

type Attempt = Matched | { kind: 'no-match' } | { kind: 'failed'; fault: FaultDescriptor };

export class SoapDispatcher {
  private readonly acceptSlowSelect: boolean;
  private readonly discloseOperations: boolean;
  private readonly protocols: ProtocolTable;
  private readonly logger: Logger;

  constructor(
    private readonly registry: OperationRegistry,
    options: DispatcherOptions = {}
  ) {
    const config = getDaemonConfig();
    this.acceptSlowSelect = options.acceptSlowSelect ?? config.acceptSlowSelect;
    this.discloseOperations = options.discloseOperations ?? config.discloseOperations;
    this.protocols = options.protocols ?? new ProtocolTable();
    this.logger = options.logger ?? getLogger('dispatcher');
  }

  getRegistry(): OperationRegistry {
    return this.registry;
  }

  isSlowSelectEnabled(): boolean {
    return this.acceptSlowSelect;
  }

  /**
   * Process one message.
   *
   * @param input raw message text/bytes, or an already parsed document or
   *   envelope element
   * @param soapAction SOAPAction from the transport, if any
   * @param request transport metadata, passed to handlers as `info.request`
   */
  dispatch(input: DispatchInput, soapAction?: string, request?: unknown): DispatchResult {
    let state = DispatchState.RECEIVED;

    try {
      let parsed: XmlDocument | XmlElement;
      if (typeof input === 'string' || Buffer.isBuffer(input)) {
        try {
          parsed = parseXml(input);
        } catch (error) {
          this.logger.debug(`rejected unparsable message: ${error instanceof Error ? error.message : String(error)}`);
          return this.fault(state, invalidXml(error));
        }
      } else {
        parsed = input;
      }
      state = this.advance(state, DispatchState.PARSED);

      const envelope = parsed instanceof XmlDocument ? parsed.documentElement : parsed;
      if (envelope.localName !== 'Envelope') {
        return this.fault(state, notSoapMessage(envelope.typeOf()));
      }

      const version = this.protocols.fromEnvelope(envelope.namespaceURI);
      if (!version) {
        return this.fault(state, unsupportedSoapVersion(envelope.namespaceURI));
      }
      state = this.advance(state, DispatchState.VERSION_RESOLVED);

      const info = messageStructure(envelope, version, request);
      const action = soapAction === undefined ? undefined : normalizeSoapAction(soapAction);
      const tried = new Set<string>();

      const candidates = this.candidates(version, info, action);
      for (const { strategy, name, handler } of candidates) {
        if (tried.has(name)) continue;
        tried.add(name);
        state = this.advance(state, DispatchState.OPERATION_RESOLVED);
        const attempt = this.invoke(strategy, version, name, handler, envelope, info);
        if (attempt.kind === 'failed') {
          return this.fault(state, attempt.fault, version, name);
        }
        if (attempt.kind === 'matched') {
          state = this.advance(state, DispatchState.HANDLER_INVOKED);
          return this.ready(attempt, version, name, strategy, action);
        }
      }

      if (this.acceptSlowSelect) {
        for (const [name, handler] of this.registry.entries(version)) {
          if (tried.has(name)) continue;
          state = this.advance(state, DispatchState.OPERATION_RESOLVED);
          const attempt = this.invoke('attempt-all', version, name, handler, envelope, info);
          if (attempt.kind === 'failed') {
            return this.fault(state, attempt.fault, version, name);
          }
          if (attempt.kind === 'matched') {
            state = this.advance(state, DispatchState.HANDLER_INVOKED);
            return this.ready(attempt, version, name, 'attempt-all', action);
          }
        }
      }

      return this.fault(state, this.unresolved(version, info, action), version);
    } catch (error) {
      this.logger.error('dispatch failed unexpectedly', error instanceof Error ? error : undefined, {
        state,
      });
      return this.fault(state, internalError(error));
    }
  }

  /**
   * Handlers selected by the action hints, most specific first. A hint
   * naming an operation with no handler for this version yields nothing.
   */
  private candidates(
    version: SoapVersion,
    info: MessageInfo,
    soapAction: string | undefined
  ): Array<{ strategy: SelectionStrategy; name: string; handler: OperationHandler }> {
    const found: Array<{ strategy: SelectionStrategy; name: string; handler: OperationHandler }> = [];

    if (info.wsaAction) {
      const name = this.registry.lookupByWsaAction(info.wsaAction);
      const handler = name === undefined ? undefined : this.registry.lookupByName(version, name);
      if (name !== undefined && handler) {
        found.push({ strategy: 'wsa-action', name, handler });
      }
    }

    if (soapAction) {
      const name = this.registry.lookupBySoapAction(soapAction);
      const handler = name === undefined ? undefined : this.registry.lookupByName(version, name);
      if (name !== undefined && handler) {
        found.push({ strategy: 'soap-action', name, handler });
      }
    }

    return found;
  }

  private invoke(
    strategy: SelectionStrategy,
    version: SoapVersion,
    name: string,
    handler: OperationHandler,
    envelope: XmlElement,
    info: MessageInfo
  ): Attempt {
    info.selectedBy = strategy;
    let attempt: Attempt | undefined;
    try {
      attempt = handler(name, envelope, info);
      return attempt;
    } catch (error) {
      this.logger.error(
        `handler for ${version} operation '${name}' threw`,
        error instanceof Error ? error : new Error(String(error)),
        { operation: name, selectedBy: strategy }
      );
      return { kind: 'failed', fault: handlerFailure(version, name) };
    } finally {
      if (attempt?.kind !== 'matched') delete info.selectedBy;
      this.logger.trace(`offered message to ${version} ${name}`, { selectedBy: strategy });
    }
  }

  private unresolved(version: SoapVersion, info: MessageInfo, soapAction: string | undefined): FaultDescriptor {
    const bodyType = info.body[0] ?? '(none)';
    const others = this.registry.soapVersions().filter((v) => v !== version);
    if (others.length > 0) {
      return tryOtherProtocol(version, bodyType, others);
    }
    return messageNotRecognized(
      version,
      bodyType,
      soapAction,
      this.registry.allNames(version),
      this.discloseOperations
    );
  }

  private advance(from: DispatchState, to: DispatchState): DispatchState {
    if (from !== to) {
      this.logger.trace(`${from} -> ${to}`);
    }
    return to;
  }

  private ready(
    result: Matched,
    version: SoapVersion,
    operation: string,
    selectedBy: SelectionStrategy,
    soapAction: string | undefined
  ): DispatchResult {
    const via =
      selectedBy === 'wsa-action' ? ' via wsa action' : selectedBy === 'soap-action' ? ` via sa ${soapAction}` : '';
    this.logger.debug(`data ready for ${version} ${operation}${via}`, { status: result.status });
    return {
      status: result.status,
      statusText: result.statusText,
      payload: result.payload,
      state: DispatchState.RESPONSE_READY,
      soapVersion: version,
      operation,
      selectedBy,
    };
  }

  private fault(
    failedAt: DispatchState,
    fault: FaultDescriptor,
    soapVersion?: SoapVersion,
    operation?: string
  ): DispatchResult {
    this.logger.debug(`fault ${fault.status} ${fault.reason}: ${fault.message}`, { failedAt });
    return {
      status: fault.status,
      statusText: fault.reason,
      payload: faultPayload(fault),
      state: DispatchState.FAULT,
      failedAt,
      soapVersion,
      operation,
    };
  }
}
