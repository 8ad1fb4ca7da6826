/**
 * OpbindError - Error hierarchy for opbind
 *
 * Every failure during a generation run is a build-time failure: the run
 * stops and nothing further is written.
 *
 * Error types:
 * - ConfigError: configuration parsing/validation errors (fatal)
 * - FileAccessError: unreadable or unwritable files (error)
 * - RegistryError: snapshot or registry query failures (fatal)
 * - TypeMappingError: native type strings with no known mapping (fatal)
 * - SpliceError: skeletons without a usable splice target (fatal)
 */

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  operator?: string;
  argument?: string;
  job?: string;
  [key: string]: unknown;
}

export type ErrorSeverity = 'fatal' | 'error';

/**
 * JSON representation of OpbindError
 */
export interface OpbindErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all opbind errors.
 */
export abstract class OpbindError extends Error {
  abstract readonly severity: ErrorSeverity;
  readonly code: string;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): OpbindErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - config file parsing, validation, missing fields
 *
 * Codes: ERR_CONFIG_NOT_FOUND, ERR_CONFIG_PARSE, ERR_CONFIG_INVALID, ERR_CONFIG_VERSION
 */
export class ConfigError extends OpbindError {
  readonly severity = 'fatal' as const;
}

/**
 * File access error - unreadable inputs, unwritable outputs
 *
 * Codes: ERR_FILE_UNREADABLE, ERR_FILE_UNWRITABLE
 */
export class FileAccessError extends OpbindError {
  readonly severity = 'error' as const;
}

/**
 * Registry error - malformed snapshot, unresolvable operator handle
 *
 * Codes: ERR_REGISTRY_SNAPSHOT_INVALID, ERR_REGISTRY_UNRESOLVED_OP,
 *        ERR_REGISTRY_UNKNOWN_HANDLE, ERR_REGISTRY_INFO_MALFORMED
 */
export class RegistryError extends OpbindError {
  readonly severity = 'fatal' as const;
}

/**
 * Type mapping error - native argument type the target surface cannot express
 *
 * Codes: ERR_TYPE_UNMAPPED, ERR_TYPE_MALFORMED
 */
export class TypeMappingError extends OpbindError {
  readonly severity = 'fatal' as const;
}

/**
 * Splice error - skeleton target missing, ambiguous or of an unsupported shape
 *
 * Codes: ERR_SKELETON_PARSE, ERR_SPLICE_TARGET_MISSING, ERR_SPLICE_TARGET_AMBIGUOUS,
 *        ERR_SPLICE_TARGET_INVALID, ERR_SPLICE_MEMBER_CONFLICT
 */
export class SpliceError extends OpbindError {
  readonly severity = 'fatal' as const;
}
