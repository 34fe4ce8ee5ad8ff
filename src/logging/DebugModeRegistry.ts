/**
 * Debug Mode Registry
 *
 * Per-component log level overrides. Module-scoped state with exported
 * functions and a reset for tests.
 *
 * Components register themselves when their module loads (e.g. "dispatcher",
 * "wsdl"). Operators can then raise DEBUG/TRACE output for a single
 * component without flooding the rest of the log.
 */

import { LogLevel, isLevelEnabled, parseLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  description: string;
  levelOverride?: LogLevel;
}

const registry = new Map<string, ComponentRegistration>();

/**
 * Register a loggable component. An existing override survives
 * re-registration.
 */
export function registerComponent(name: string, description: string, defaultLevel?: LogLevel): void {
  const existing = registry.get(name);
  registry.set(name, {
    name,
    description,
    levelOverride: existing?.levelOverride ?? defaultLevel,
  });
}

/**
 * Override the global level for one component.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = level;
  } else {
    registry.set(name, { name, description: name, levelOverride: level });
  }
}

export function clearComponentLevel(name: string): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = undefined;
  }
}

/**
 * The component's override if set, otherwise the global level.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  return registry.get(name)?.levelOverride ?? globalLevel;
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return isLevelEnabled(messageLevel, getEffectiveLevel(name, globalLevel));
}

export interface ComponentLevelInfo {
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}

/**
 * All registered components with their effective levels, sorted by name.
 */
export function getRegisteredComponents(globalLevel: LogLevel): ComponentLevelInfo[] {
  const result: ComponentLevelInfo[] = [];
  for (const reg of registry.values()) {
    result.push({
      name: reg.name,
      description: reg.description,
      effectiveLevel: reg.levelOverride ?? globalLevel,
      hasOverride: reg.levelOverride !== undefined,
    });
  }
  return result.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Apply entries like ["dispatcher", "wsdl:TRACE"].
 * An entry without a level suffix gets DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

export function resetDebugRegistry(): void {
  registry.clear();
}
