import { ErrorSeverity } from '../../types/errors';

/**
 * Error and diagnostic codes raised by the engine
 */
export enum DxfErrorCode {
  IO_FAILURE = 'IO_FAILURE',
  TRUNCATED = 'TRUNCATED',
  MALFORMED_VALUE = 'MALFORMED_VALUE',
  UNKNOWN_GROUP_CODE = 'UNKNOWN_GROUP_CODE',
  OUT_OF_RANGE_VALUE = 'OUT_OF_RANGE_VALUE',
  BAD_SUBCLASS_MARKER = 'BAD_SUBCLASS_MARKER',
  COUNT_MISMATCH = 'COUNT_MISMATCH',
  DXF_COMMENT = 'DXF_COMMENT',
  VERSION_MISMATCH = 'VERSION_MISMATCH',
  UNSUPPORTED_VERSION = 'UNSUPPORTED_VERSION',
  UNKNOWN_ENTITY_KIND = 'UNKNOWN_ENTITY_KIND',
  ENTITY_SKIPPED = 'ENTITY_SKIPPED',
  OWNERSHIP_VIOLATION = 'OWNERSHIP_VIOLATION',
  FIELD_TYPE = 'FIELD_TYPE',
  INVALID_CONFIG = 'INVALID_CONFIG'
}

/**
 * Error details type
 */
export interface ErrorDetails extends Record<string, unknown> {
  originalError?: string;
  source?: string;
  lineNumber?: number;
  groupCode?: number;
}

/**
 * Base error class for the engine
 */
export class DxfError extends Error {
  constructor(
    message: string,
    public code: DxfErrorCode,
    public cause?: Error,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = 'DxfError';
  }
}

/**
 * The underlying stream failed, or was closed while in use
 */
export class IoFailureError extends DxfError {
  constructor(message: string, cause?: Error, details?: ErrorDetails) {
    super(message, DxfErrorCode.IO_FAILURE, cause, details);
    this.name = 'IoFailureError';
  }
}

/**
 * A tag pair was cut off by the end of input
 */
export class TruncatedError extends DxfError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, DxfErrorCode.TRUNCATED, undefined, details);
    this.name = 'TruncatedError';
  }
}

/**
 * A value (or group code line) failed to convert to its declared type
 */
export class MalformedValueError extends DxfError {
  constructor(
    message: string,
    public rawValue: string,
    details?: ErrorDetails
  ) {
    super(message, DxfErrorCode.MALFORMED_VALUE, undefined, { rawValue, ...details });
    this.name = 'MalformedValueError';
  }
}

/**
 * Ownership or teardown-order violation on lists, entities and chains
 */
export class OwnershipError extends DxfError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, DxfErrorCode.OWNERSHIP_VIOLATION, undefined, details);
    this.name = 'OwnershipError';
  }
}

/**
 * Entity kind does not exist in the target version (strict mode only)
 */
export class VersionError extends DxfError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, DxfErrorCode.UNSUPPORTED_VERSION, undefined, details);
    this.name = 'VersionError';
  }
}

/**
 * No descriptor table is registered for an entity kind
 */
export class UnknownEntityKindError extends DxfError {
  constructor(public kind: string, details?: ErrorDetails) {
    super(`No descriptor table registered for entity kind: ${kind}`, DxfErrorCode.UNKNOWN_ENTITY_KIND, undefined, {
      kind,
      ...details
    });
    this.name = 'UnknownEntityKindError';
  }
}

/**
 * Create error details with original error
 */
export function createErrorDetails(originalError: unknown): ErrorDetails {
  return {
    originalError: originalError instanceof Error ? originalError.message : String(originalError)
  };
}

/**
 * Diagnostic entry collected by a reporter
 */
export interface ReportedDiagnostic {
  message: string;
  code: string;
  severity: ErrorSeverity;
  details?: ErrorDetails;
}

/**
 * Error reporter interface for collecting non-fatal diagnostics
 */
export interface ErrorReporter {
  addError: (message: string, code: string, details?: ErrorDetails) => void;
  addWarning: (message: string, code: string, details?: ErrorDetails) => void;
  addInfo: (message: string, code: string, details?: ErrorDetails) => void;
  clear: () => void;
  getErrors: () => ReportedDiagnostic[];
  getWarnings: () => ReportedDiagnostic[];
  getAll: () => ReportedDiagnostic[];
}
