/**
 * Structured errors for Fleetform.
 *
 * Every error raised on purpose carries a registered ErrorCode: a stable code,
 * a category, a severity, and the messages shown to developers and operators.
 */

export enum ErrorCategory {
  VALIDATION = 'VALIDATION',
  CONFIGURATION = 'CONFIGURATION',
  STATE = 'STATE',
  BACKEND = 'BACKEND',
  INFRASTRUCTURE = 'INFRASTRUCTURE'
}

export enum ErrorSeverity {
  CRITICAL = 'CRITICAL',  // Durable state and real infrastructure may disagree
  ERROR = 'ERROR',        // Operation failed, durable state untouched
  WARNING = 'WARNING'
}

/**
 * Which message an error carries: detailed for developers, short for operators
 */
export enum ErrorEnvironment {
  DEVELOPMENT = 'DEVELOPMENT',
  PRODUCTION = 'PRODUCTION'
}

export interface ErrorCode {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly devMessage: string;
  readonly prodMessage: string;
  readonly possibleCauses?: string[];
  readonly suggestions?: string[];
}

export interface ErrorCodeFilter {
  category?: ErrorCategory;
  severity?: ErrorSeverity;
}

export class ErrorCodeRegistry {
  private static codes: Map<string, ErrorCode> = new Map();

  /**
   * @returns the registered code, so it can be declared and registered at once
   */
  static register(errorCode: ErrorCode): ErrorCode {
    this.codes.set(errorCode.code, errorCode);
    return errorCode;
  }

  static get(code: string): ErrorCode | undefined {
    return this.codes.get(code);
  }

  static find(filter: ErrorCodeFilter = {}): ErrorCode[] {
    return Array.from(this.codes.values()).filter(errorCode =>
      (filter.category === undefined || errorCode.category === filter.category) &&
      (filter.severity === undefined || errorCode.severity === filter.severity)
    );
  }
}

export interface ErrorDetails {
  code?: string;
  message: string;
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  possibleCauses?: string[];
  suggestions?: string[];
  context: Record<string, unknown>;
}

export abstract class FleetformError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly timestamp: string;
  readonly context: Record<string, unknown>;
  readonly originalError?: Error;

  constructor(
    errorCode: ErrorCode,
    context: Record<string, unknown> = {},
    originalError?: Error,
    environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT
  ) {
    super(environment === ErrorEnvironment.PRODUCTION ? errorCode.prodMessage : errorCode.devMessage);

    this.name = this.constructor.name;
    this.code = errorCode.code;
    this.category = errorCode.category;
    this.severity = errorCode.severity;
    this.timestamp = new Date().toISOString();
    this.context = context;
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * True when infrastructure may have changed without the stored state following
   */
  get requiresReconciliation(): boolean {
    return this.severity === ErrorSeverity.CRITICAL;
  }

  /**
   * Context is left out in production, it may hold module records or documents.
   */
  getDetails(environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT): ErrorDetails {
    const errorCode = ErrorCodeRegistry.get(this.code);
    return {
      code: this.code,
      message: this.message,
      category: this.category,
      severity: this.severity,
      possibleCauses: errorCode?.possibleCauses,
      suggestions: errorCode?.suggestions,
      context: environment === ErrorEnvironment.PRODUCTION ? {} : this.context
    };
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      severity: this.severity,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
      originalError: this.originalError?.message
    };
  }
}

export class ValidationError extends FleetformError {}

export class ConfigurationError extends FleetformError {}

export class StateError extends FleetformError {}

export class BackendError extends FleetformError {}

export class InfrastructureError extends FleetformError {}

export function isFleetformError(error: unknown): error is FleetformError {
  return error instanceof FleetformError;
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Details of any thrown value, Fleetform error or not
 */
export function extractErrorDetails(
  error: unknown,
  environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT
): ErrorDetails {
  if (isFleetformError(error)) {
    return error.getDetails(environment);
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      context: environment === ErrorEnvironment.PRODUCTION ? {} : { stack: error.stack }
    };
  }

  return {
    message: String(error),
    context: {}
  };
}
