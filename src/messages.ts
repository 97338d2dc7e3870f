import type { PolicyStore } from './policy.js';
import type { EngineName, Offense } from './types.js';

export function directAccessMessage(engine: EngineName): string {
  return `Direct access of ${engine} engine. Only access engine via ${engine}::Api.`;
}

export function stronglyProtectedEngineMessage(engine: EngineName): string {
  return `All direct access of ${engine} engine disallowed because it is in StronglyProtectedEngines list.`;
}

export function stronglyProtectedCurrentEngineMessage(accessed: EngineName, current: EngineName): string {
  return (
    `Direct access of ${accessed} is disallowed in this file because it's in the ${current} engine, ` +
    'which is in the StronglyProtectedEngines list.'
  );
}

/** Picks the message for the protection tier that caused the violation. */
export function formatOffenseMessage(
  accessedEngine: EngineName,
  currentEngine: EngineName | null,
  policy: PolicyStore,
): string {
  if (policy.isStronglyProtected(accessedEngine)) {
    return stronglyProtectedEngineMessage(accessedEngine);
  }
  if (currentEngine !== null && policy.isStronglyProtected(currentEngine)) {
    return stronglyProtectedCurrentEngineMessage(accessedEngine, currentEngine);
  }
  return directAccessMessage(accessedEngine);
}

/** `path:line:column: message`, one offense per line. */
export function formatOffense(offense: Offense): string {
  return `${offense.path}:${offense.line}:${offense.column}: ${offense.message}`;
}
