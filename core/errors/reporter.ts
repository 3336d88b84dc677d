import { ErrorSeverity, DiagnosticSummary } from '../../types/errors';
import { ErrorDetails, ErrorReporter, ReportedDiagnostic } from './types';

/**
 * Implementation of error reporter
 */
export class ErrorReporterImpl implements ErrorReporter {
  private diagnostics: ReportedDiagnostic[] = [];
  private readonly MAX_DIAGNOSTICS = 10000;

  addError(message: string, code: string, details?: ErrorDetails): void {
    this.push({ message, code, severity: ErrorSeverity.ERROR, details });
  }

  addWarning(message: string, code: string, details?: ErrorDetails): void {
    this.push({ message, code, severity: ErrorSeverity.WARNING, details });
  }

  addInfo(message: string, code: string, details?: ErrorDetails): void {
    this.push({ message, code, severity: ErrorSeverity.INFO, details });
  }

  getErrors(): ReportedDiagnostic[] {
    return this.diagnostics.filter(d => d.severity === ErrorSeverity.ERROR || d.severity === ErrorSeverity.CRITICAL);
  }

  getWarnings(): ReportedDiagnostic[] {
    return this.diagnostics.filter(d => d.severity === ErrorSeverity.WARNING);
  }

  getAll(): ReportedDiagnostic[] {
    return [...this.diagnostics];
  }

  /**
   * Group collected diagnostics by code
   */
  summarize(): DiagnosticSummary[] {
    const groups = new Map<string, DiagnosticSummary>();
    for (const d of this.diagnostics) {
      const existing = groups.get(d.code);
      if (existing) {
        existing.count++;
        existing.severity = d.severity;
        existing.latestMessage = d.message;
      } else {
        groups.set(d.code, { code: d.code, count: 1, severity: d.severity, latestMessage: d.message });
      }
    }
    return Array.from(groups.values());
  }

  clear(): void {
    this.diagnostics = [];
  }

  private push(diagnostic: ReportedDiagnostic): void {
    this.diagnostics.push(diagnostic);
    if (this.diagnostics.length > this.MAX_DIAGNOSTICS) {
      this.diagnostics.shift();
    }
  }
}

/**
 * Create a new error reporter instance
 */
export function createErrorReporter(): ErrorReporterImpl {
  return new ErrorReporterImpl();
}

const defaultReporter = createErrorReporter();

/**
 * Shared reporter for engine calls that were not given one
 */
export function getDefaultReporter(): ErrorReporterImpl {
  return defaultReporter;
}
