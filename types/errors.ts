/**
 * Severity levels for errors and diagnostics
 */
export enum ErrorSeverity {
  /** Informational message (comments, tracing) */
  INFO = 'info',
  /** Warning that doesn't prevent operation */
  WARNING = 'warning',
  /** Error that affects operation but allows continuation */
  ERROR = 'error',
  /** Critical error that prevents operation */
  CRITICAL = 'critical'
}

/**
 * Where in a tag stream a diagnostic was raised
 */
export interface StreamPosition {
  /** Source identifier (file path or memory:<id>) */
  source: string;
  /** Physical line number of the last consumed line */
  lineNumber: number;
}

/**
 * Diagnostic summary, grouped by code
 */
export interface DiagnosticSummary {
  code: string;
  count: number;
  severity: ErrorSeverity;
  latestMessage: string;
}
