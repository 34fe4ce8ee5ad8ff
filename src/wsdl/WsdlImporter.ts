/**
 * WSDL Importer
 *
 * Registers the operations of a WSDL with an OperationRegistry: one
 * compiled handler per operation, plus its WS-Addressing and SOAPAction
 * mappings. Can be called repeatedly on one registry to combine WSDLs.
 */

import { ConfigurationError } from '../daemon/errors.js';
import type { OperationRegistry } from '../daemon/OperationRegistry.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { DocumentLiteralCompiler, isOperationCallback, stubCallback } from './HandlerCompiler.js';
import type { HandlerCompiler, OperationCallback } from './HandlerCompiler.js';
import type { WsdlModel } from './Wsdl.js';

registerComponent('wsdl', 'WSDL import');
const logger = getLogger('wsdl');

export interface ImportOptions {
  /** Operation name → callback */
  callbacks?: Readonly<Record<string, OperationCallback>> | ReadonlyMap<string, OperationCallback>;
  /** Used for operations without a named callback; the not-implemented stub otherwise */
  defaultCallback?: OperationCallback;
  compiler?: HandlerCompiler;
}

export interface ImportSummary {
  /** Registered operations, as `VERSION name` */
  operations: string[];
  /** Callback names no operation in the WSDL matched, sorted */
  unmatchedCallbacks: string[];
}

function callbackTable(callbacks: ImportOptions['callbacks']): Map<string, OperationCallback> {
  const entries: Array<[string, unknown]> =
    callbacks === undefined ? [] : callbacks instanceof Map ? [...callbacks.entries()] : Object.entries(callbacks);

  const table = new Map<string, OperationCallback>();
  for (const [name, callback] of entries) {
    if (!isOperationCallback(callback)) {
      throw new ConfigurationError(`Callback for operation '${name}' must be a function`);
    }
    table.set(name, callback);
  }
  return table;
}

/**
 * Register every operation of `wsdl` with `registry`.
 *
 * @throws ConfigurationError when a supplied callback is not a function
 */
export function importFrom(registry: OperationRegistry, wsdl: WsdlModel, options: ImportOptions = {}): ImportSummary {
  const callbacks = callbackTable(options.callbacks);
  const defaultCallback: unknown = options.defaultCallback;
  if (defaultCallback !== undefined && !isOperationCallback(defaultCallback)) {
    throw new ConfigurationError('defaultCallback must be a function');
  }
  const compiler = options.compiler ?? new DocumentLiteralCompiler();

  const used = new Set<string>();
  const operations: string[] = [];

  const definitions = wsdl.operations();
  if (definitions.length === 0) {
    logger.info('no operations in WSDL');
  }

  for (const definition of definitions) {
    const { name, soapVersion } = definition;
    let callback = callbacks.get(name);
    if (callback) {
      used.add(name);
      logger.trace(`add handler for ${soapVersion} operation ${name}`);
    } else if (options.defaultCallback) {
      callback = options.defaultCallback;
      logger.trace(`add default handler for ${soapVersion} operation ${name}`);
    } else {
      callback = stubCallback;
      logger.trace(`add stub handler for ${soapVersion} operation ${name}`);
    }

    registry.register(soapVersion, name, compiler.compile(definition, callback));
    registry.addActionMapping('INPUT', { [name]: definition.wsaAction.input });
    registry.addActionMapping('OUTPUT', { [name]: definition.wsaAction.output });
    registry.addSoapActionMapping({ [name]: definition.soapAction });
    operations.push(`${soapVersion} ${name}`);
  }

  if (definitions.length > 0) {
    logger.info(`added ${operations.length} operations from WSDL`);
  }

  const unmatchedCallbacks = [...callbacks.keys()].filter((name) => !used.has(name)).sort();
  for (const name of unmatchedCallbacks) {
    logger.warn(`no operation for callback handler '${name}'`);
  }

  return { operations, unmatchedCallbacks };
}
