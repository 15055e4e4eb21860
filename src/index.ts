/**
 * Restruct Module
 * Exports the runtime, error classes and error registry
 */

export * from './runtime/index.js';
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  type AccessErrorInit,
  type FallbackExhaustedInit,
  type RestructErrorData,
  type SkippedEntry,
  type UnregisteredOperationInit,
  AccessError,
  FallbackExhaustedError,
  RegistrationError,
  RestructError,
  StructuralTypeError,
  UnregisteredOperationError,
  createError,
} from './error-classes.js';
