/**
 * Fleetform Error System Module
 */

// Core error taxonomy
export {
  ErrorCategory,
  ErrorSeverity,
  ErrorEnvironment,
  ErrorCodeRegistry,
  FleetformError,
  ValidationError,
  ConfigurationError,
  StateError,
  BackendError,
  InfrastructureError,
  isFleetformError,
  extractErrorDetails,
  toError,
  type ErrorCode,
  type ErrorCodeFilter,
  type ErrorDetails
} from '../core/errors/taxonomy';

// State engine errors
export {
  STATE_ERROR_CODES,
  DecodeError,
  NotFoundError,
  AlreadyExistsError,
  InvalidModuleNameError,
  InvalidTargetNameError,
  NamingCollisionError,
  StateLockedError,
  BackendIOError,
  PersistFailure,
  ApplyFailure,
  InvalidConfigError,
  InvalidInputError
} from '../core/errors/state';
