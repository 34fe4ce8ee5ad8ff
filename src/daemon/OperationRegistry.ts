/**
 * Operation Registry
 *
 * Purpose: Hold the operation handlers per SOAP version and the action
 * tables used to find them.
 *
 * Key behaviors:
 * - register() overwrites an existing (version, name) entry
 * - Action tables merge with "first registration wins", in both the forward
 *   (name → action) and the reverse (action → name) direction
 * - Bad registrations fail here, at startup, never at request time
 *
 * Concurrency: all registration is expected to finish before the first
 * request is dispatched. After that the registry is only read, which needs
 * no locking. Registering while requests are in flight is not supported.
 */

import { getLogger, registerComponent } from '../logging/index.js';
import { SoapVersion, isSoapVersion } from '../soap/ProtocolVersion.js';
import { ConfigurationError } from './errors.js';
import type { OperationHandler } from './HandlerResult.js';

registerComponent('registry', 'Operation registry');
const logger = getLogger('registry');

/** WS-Addressing table direction: actions the server receives, or sends */
export type ActionDirection = 'INPUT' | 'OUTPUT';

/** Operation name → action string; missing or empty actions are ignored */
export type ActionTable = Readonly<Record<string, string | undefined>> | ReadonlyMap<string, string | undefined>;

function tableEntries(table: ActionTable): Array<[string, string | undefined]> {
  return table instanceof Map ? [...table.entries()] : Object.entries(table);
}

/**
 * Insert only when the key is not taken yet. Returns whether it was stored.
 */
function putFirst(map: Map<string, string>, key: string, value: string): boolean {
  if (map.has(key)) return false;
  map.set(key, value);
  return true;
}

export class OperationRegistry {
  private readonly handlers = new Map<SoapVersion, Map<string, OperationHandler>>();
  private readonly wsaInput = new Map<string, string>();
  private readonly wsaInputReverse = new Map<string, string>();
  private readonly wsaOutput = new Map<string, string>();
  private readonly soapAction = new Map<string, string>();
  private readonly soapActionReverse = new Map<string, string>();

  /**
   * Register a handler for an operation. A second registration for the same
   * version and name replaces the first.
   *
   * @throws ConfigurationError for an unknown version, an empty name or a
   *   handler that is not a function
   */
  register(version: SoapVersion, name: string, handler: OperationHandler): this {
    if (!isSoapVersion(version)) {
      throw new ConfigurationError(`Unknown SOAP version '${String(version)}' for operation '${name}'`);
    }
    if (typeof name !== 'string' || name.length === 0) {
      throw new ConfigurationError('Operation name must be a non-empty string');
    }
    if (typeof handler !== 'function') {
      throw new ConfigurationError(`Handler for ${version} operation '${name}' must be a function`);
    }

    let table = this.handlers.get(version);
    if (!table) {
      table = new Map();
      this.handlers.set(version, table);
    }
    if (table.has(name)) {
      logger.debug(`replacing handler for ${version} operation '${name}'`);
    }
    table.set(name, handler);
    return this;
  }

  /**
   * Merge a WS-Addressing action table. Existing entries are kept.
   *
   * @throws ConfigurationError when the direction is not INPUT or OUTPUT
   */
  addActionMapping(direction: ActionDirection, table: ActionTable): this {
    if (direction !== 'INPUT' && direction !== 'OUTPUT') {
      throw new ConfigurationError(`Action table direction must be 'INPUT' or 'OUTPUT', not '${String(direction)}'`);
    }

    for (const [name, action] of tableEntries(table)) {
      if (!action) continue;
      if (direction === 'OUTPUT') {
        putFirst(this.wsaOutput, name, action);
        continue;
      }
      putFirst(this.wsaInput, name, action);
      if (!putFirst(this.wsaInputReverse, action, name) && this.wsaInputReverse.get(action) !== name) {
        logger.debug(`wsa action '${action}' already claimed by '${this.wsaInputReverse.get(action)}', ignored for '${name}'`);
      }
    }
    return this;
  }

  /**
   * Merge a SOAPAction table (values without quotes). Existing entries are
   * kept, in both directions.
   */
  addSoapActionMapping(table: ActionTable): this {
    for (const [name, action] of tableEntries(table)) {
      if (!action) continue;
      putFirst(this.soapAction, name, action);
      if (!putFirst(this.soapActionReverse, action, name) && this.soapActionReverse.get(action) !== name) {
        logger.debug(`soapAction '${action}' already claimed by '${this.soapActionReverse.get(action)}', ignored for '${name}'`);
      }
    }
    return this;
  }

  lookupByName(version: SoapVersion, name: string): OperationHandler | undefined {
    return this.handlers.get(version)?.get(name);
  }

  lookupByWsaAction(action: string): string | undefined {
    return this.wsaInputReverse.get(action);
  }

  lookupBySoapAction(action: string): string | undefined {
    return this.soapActionReverse.get(action);
  }

  wsaInputAction(name: string): string | undefined {
    return this.wsaInput.get(name);
  }

  wsaOutputAction(name: string): string | undefined {
    return this.wsaOutput.get(name);
  }

  soapActionFor(name: string): string | undefined {
    return this.soapAction.get(name);
  }

  /**
   * Operation names registered for a version, sorted.
   */
  allNames(version: SoapVersion): string[] {
    return [...(this.handlers.get(version)?.keys() ?? [])].sort();
  }

  /**
   * (name, handler) pairs for a version, in registration order.
   */
  entries(version: SoapVersion): Array<[string, OperationHandler]> {
    return [...(this.handlers.get(version)?.entries() ?? [])];
  }

  /**
   * Versions with at least one handler, sorted.
   */
  soapVersions(): SoapVersion[] {
    return [...this.handlers.entries()]
      .filter(([, table]) => table.size > 0)
      .map(([version]) => version)
      .sort();
  }

  /**
   * Text index of what the server can handle:
   *
   *   SOAP11:
   *      getInfo
   *      setInfo
   */
  printIndex(): string {
    let index = '';
    for (const version of this.soapVersions()) {
      const names = this.allNames(version);
      index += `${version}:\n   ${names.join('\n   ')}\n`;
    }
    return index;
  }
}
