/**
 * Error codes and error classes raised by the state engine:
 * document decoding, backends, naming and the provisioning coordinator.
 */

import {
  BackendError,
  ConfigurationError,
  ErrorCategory,
  ErrorCode,
  ErrorCodeRegistry,
  ErrorSeverity,
  InfrastructureError,
  StateError,
  ValidationError,
} from './taxonomy';

export const STATE_ERROR_CODES = {
  DECODE: ErrorCodeRegistry.register({
    code: 'STATE_DECODE_001',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.ERROR,
    devMessage: 'State document is not a well-formed module document',
    prodMessage: 'Stored state is corrupted',
    possibleCauses: ['State file edited by hand', 'Partial write by another tool'],
    suggestions: ['Inspect the stored main.tf.json and fix its JSON structure'],
  }),
  NOT_FOUND: ErrorCodeRegistry.register({
    code: 'STATE_NOT_FOUND_001',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.ERROR,
    devMessage: 'Not found',
    prodMessage: 'Requested resource does not exist',
    suggestions: ['List existing resources with `fleetform get`'],
  }),
  ALREADY_EXISTS: ErrorCodeRegistry.register({
    code: 'STATE_EXISTS_001',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.ERROR,
    devMessage: 'Already exists',
    prodMessage: 'Resource already exists',
    suggestions: ['Choose another name or destroy the existing resource first'],
  }),
  MODULE_NAME: ErrorCodeRegistry.register({
    code: 'STATE_MODULE_NAME_001',
    category: ErrorCategory.VALIDATION,
    severity: ErrorSeverity.ERROR,
    devMessage: 'Invalid module name',
    prodMessage: 'Invalid resource name',
    suggestions: ['Module names start with a letter or underscore and contain only letters, digits, "_" and "-"'],
  }),
  TARGET_NAME: ErrorCodeRegistry.register({
    code: 'STATE_TARGET_NAME_001',
    category: ErrorCategory.VALIDATION,
    severity: ErrorSeverity.ERROR,
    devMessage: 'Invalid cluster manager name',
    prodMessage: 'Invalid cluster manager name',
    suggestions: ['Cluster manager names start with a letter or digit and contain only letters, digits, "_" and "-"'],
  }),
  NAMING_COLLISION: ErrorCodeRegistry.register({
    code: 'STATE_NAMING_001',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Generated node name collides with an existing module',
    prodMessage: 'Internal naming error, nothing was provisioned',
  }),
  LOCKED: ErrorCodeRegistry.register({
    code: 'STATE_LOCKED_001',
    category: ErrorCategory.BACKEND,
    severity: ErrorSeverity.ERROR,
    devMessage: 'State is locked by another operation',
    prodMessage: 'Another operation is running on this cluster manager',
    suggestions: [
      'Wait for the other operation to finish',
      'Remove the lock manually only if you are sure no operation is running',
    ],
  }),
  BACKEND_IO: ErrorCodeRegistry.register({
    code: 'BACKEND_IO_001',
    category: ErrorCategory.BACKEND,
    severity: ErrorSeverity.ERROR,
    devMessage: 'State backend operation failed',
    prodMessage: 'Could not access stored state',
  }),
  PERSIST: ErrorCodeRegistry.register({
    code: 'BACKEND_PERSIST_001',
    category: ErrorCategory.BACKEND,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Infrastructure change succeeded but state could not be committed',
    prodMessage: 'Infrastructure changed but state was not saved, manual reconciliation required',
    suggestions: [
      'Save the uncommitted document from this error context',
      'Restore it to the state backend before running any other operation',
    ],
  }),
  APPLY: ErrorCodeRegistry.register({
    code: 'INFRA_APPLY_001',
    category: ErrorCategory.INFRASTRUCTURE,
    severity: ErrorSeverity.ERROR,
    devMessage: 'Terraform run failed',
    prodMessage: 'Provisioning failed, state left unchanged',
    suggestions: ['Check Terraform output above for the failing resource'],
  }),
  CONFIG: ErrorCodeRegistry.register({
    code: 'CONFIG_INVALID_001',
    category: ErrorCategory.CONFIGURATION,
    severity: ErrorSeverity.ERROR,
    devMessage: 'Invalid configuration',
    prodMessage: 'Invalid configuration',
  }),
  INPUT: ErrorCodeRegistry.register({
    code: 'INPUT_INVALID_001',
    category: ErrorCategory.VALIDATION,
    severity: ErrorSeverity.ERROR,
    devMessage: 'Invalid module input',
    prodMessage: 'Invalid input',
  }),
} as const;

function withDetail(errorCode: ErrorCode, detail: string): ErrorCode {
  return { ...errorCode, devMessage: `${errorCode.devMessage}: ${detail}` };
}

export class DecodeError extends StateError {
  constructor(reason: string, originalError?: Error) {
    super(withDetail(STATE_ERROR_CODES.DECODE, reason), { reason }, originalError);
  }
}

export class NotFoundError extends StateError {
  constructor(what: string, context: Record<string, unknown> = {}, originalError?: Error) {
    super(withDetail(STATE_ERROR_CODES.NOT_FOUND, what), { ...context, what }, originalError);
  }
}

export class AlreadyExistsError extends StateError {
  constructor(what: string, context: Record<string, unknown> = {}) {
    super(withDetail(STATE_ERROR_CODES.ALREADY_EXISTS, what), { ...context, what });
  }
}

export class InvalidModuleNameError extends ValidationError {
  constructor(name: string) {
    super(withDetail(STATE_ERROR_CODES.MODULE_NAME, `'${name}'`), { name });
  }
}

export class InvalidTargetNameError extends ValidationError {
  constructor(target: string) {
    super(withDetail(STATE_ERROR_CODES.TARGET_NAME, `'${target}'`), { target });
  }
}

export class NamingCollisionError extends StateError {
  constructor(name: string, context: Record<string, unknown> = {}) {
    super(withDetail(STATE_ERROR_CODES.NAMING_COLLISION, `'${name}'`), { ...context, name });
  }
}

export class StateLockedError extends BackendError {
  constructor(target: string, holder?: unknown) {
    super(withDetail(STATE_ERROR_CODES.LOCKED, target), { target, holder });
  }
}

export class BackendIOError extends BackendError {
  constructor(operation: string, target: string, originalError?: Error) {
    const reason = originalError ? ` (${originalError.message})` : '';
    super(
      withDetail(STATE_ERROR_CODES.BACKEND_IO, `${operation} '${target}'${reason}`),
      { operation, target },
      originalError
    );
  }
}

/**
 * Real infrastructure now exists (or was removed) that the durable state does not describe.
 * The uncommitted document is kept in context for manual reconciliation.
 */
export class PersistFailure extends BackendError {
  constructor(target: string, uncommittedDocument: string, originalError?: Error) {
    const reason = originalError ? ` (${originalError.message})` : '';
    super(
      withDetail(STATE_ERROR_CODES.PERSIST, `${target}${reason}`),
      { target, manualReconciliationRequired: true, uncommittedDocument },
      originalError
    );
  }
}

export class ApplyFailure extends InfrastructureError {
  constructor(context: { action: string; command: string; exitCode?: number | null; signal?: string | null }, originalError?: Error) {
    const status = context.exitCode !== undefined && context.exitCode !== null
      ? `exit code ${context.exitCode}`
      : context.signal ? `signal ${context.signal}` : originalError?.message ?? 'unknown error';
    super(withDetail(STATE_ERROR_CODES.APPLY, `'${context.command}' ${status}`), context, originalError);
  }
}

export class InvalidConfigError extends ConfigurationError {
  constructor(reason: string, originalError?: Error) {
    super(withDetail(STATE_ERROR_CODES.CONFIG, reason), { reason }, originalError);
  }
}

export class InvalidInputError extends ValidationError {
  constructor(reason: string, context: Record<string, unknown> = {}) {
    super(withDetail(STATE_ERROR_CODES.INPUT, reason), { ...context, reason });
  }
}
