/**
 * Handler Lookup
 *
 * Resolve a registry handler for the current target or raise an
 * UnregisteredOperationError carrying the frame's path.
 */

import { UnregisteredOperationError } from '../../error-classes.js';
import type {
  IterateHandler,
  ReadHandler,
  RegistryOperation,
  WriteHandler,
} from './registry.js';
import type { Scope } from './scope.js';

function unregistered(
  scope: Scope,
  op: RegistryOperation,
  target: unknown
): UnregisteredOperationError {
  const registry = scope.registry;
  return new UnregisteredOperationError({
    operation: op,
    target,
    registeredTypes: registry.types(op),
    registrySize: registry.size,
    path: scope.path(),
  });
}

export function requireReader(scope: Scope, target: unknown): ReadHandler {
  const read = scope.registry.resolveOperation(target, 'read')?.read;
  if (!read) throw unregistered(scope, 'read', target);
  return read;
}

export function requireIterator(scope: Scope, target: unknown): IterateHandler {
  const iterate = scope.registry.resolveOperation(target, 'iterate')?.iterate;
  if (!iterate) throw unregistered(scope, 'iterate', target);
  return iterate;
}

export function requireWriter(scope: Scope, target: unknown): WriteHandler {
  const write = scope.registry.resolveOperation(target, 'write')?.write;
  if (!write) throw unregistered(scope, 'write', target);
  return write;
}
