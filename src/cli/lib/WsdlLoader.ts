/**
 * Loads WSDL files and handler modules for the CLI commands.
 */

import { resolve } from 'path';
import { pathToFileURL } from 'url';
import { OperationRegistry } from '../../daemon/OperationRegistry.js';
import { isOperationCallback } from '../../wsdl/HandlerCompiler.js';
import type { OperationCallback } from '../../wsdl/HandlerCompiler.js';
import { Wsdl } from '../../wsdl/Wsdl.js';
import { importFrom } from '../../wsdl/WsdlImporter.js';
import type { ImportOptions, ImportSummary } from '../../wsdl/WsdlImporter.js';
import { isRecord } from '../../xml/XmlElement.js';

export interface HandlerModule {
  callbacks: Record<string, OperationCallback>;
  defaultCallback?: OperationCallback;
}

export class HandlerModuleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HandlerModuleError';
  }
}

/**
 * Validate what a handlers module exports: `callbacks` (operation name →
 * function) and optionally `defaultCallback`.
 */
export function toHandlerModule(exported: unknown, source: string): HandlerModule {
  if (!isRecord(exported)) {
    throw new HandlerModuleError(`${source}: module exports nothing usable`);
  }

  const callbacks: Record<string, OperationCallback> = {};
  const rawCallbacks = exported['callbacks'];
  if (rawCallbacks !== undefined) {
    if (!isRecord(rawCallbacks)) {
      throw new HandlerModuleError(`${source}: 'callbacks' must be an object of functions`);
    }
    for (const [name, callback] of Object.entries(rawCallbacks)) {
      if (!isOperationCallback(callback)) {
        throw new HandlerModuleError(`${source}: callback '${name}' is not a function`);
      }
      callbacks[name] = callback;
    }
  }

  const defaultCallback = exported['defaultCallback'];
  if (defaultCallback !== undefined && !isOperationCallback(defaultCallback)) {
    throw new HandlerModuleError(`${source}: 'defaultCallback' is not a function`);
  }

  return { callbacks, defaultCallback };
}

/**
 * Import a handlers module from a file path.
 */
export async function loadHandlerModule(path: string): Promise<HandlerModule> {
  const exported: unknown = await import(pathToFileURL(resolve(path)).href);
  return toHandlerModule(exported, path);
}

/**
 * Register the operations of every WSDL file with one registry.
 */
export function loadWsdlFiles(
  paths: string[],
  options: ImportOptions = {},
  registry = new OperationRegistry()
): { registry: OperationRegistry; summaries: Map<string, ImportSummary> } {
  const summaries = new Map<string, ImportSummary>();
  for (const path of paths) {
    summaries.set(path, importFrom(registry, Wsdl.fromFile(path), options));
  }
  return { registry, summaries };
}
