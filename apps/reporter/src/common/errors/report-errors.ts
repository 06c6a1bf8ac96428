import type { ReportErrorCode, ReportFailure } from '@sheetreport/shared';
import type { ZodError } from 'zod';

/** Base class for failures that end a report generation call */
export class ReportError extends Error {
  constructor(
    readonly code: ReportErrorCode,
    message: string,
    readonly details?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The in-memory workbook could not be encoded as XLSX */
export class SerializationError extends ReportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SERIALIZATION_FAILED', message, undefined, options);
  }
}

/** The output location could not be created or written */
export class OutputUnwritableError extends ReportError {
  constructor(readonly outputPath: string, message: string, options?: { cause?: unknown }) {
    super('OUTPUT_UNWRITABLE', message, undefined, options);
  }
}

/** A report definition or configuration failed validation */
export class InvalidInputError extends ReportError {
  constructor(message: string, details?: unknown) {
    super('INVALID_INPUT', message, details);
  }

  static fromZod(subject: string, error: ZodError): InvalidInputError {
    const details = error.issues.map((i) => ({
      path: i.path.join('.'),
      message: i.message,
    }));
    const formatted = details.map((d) => `  ${d.path || '(root)'}: ${d.message}`).join('\n');
    return new InvalidInputError(`${subject} validation failed:\n${formatted}`, details);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'unknown error';
}

/** Map any thrown value onto the failure envelope */
export function toReportFailure(err: unknown): ReportFailure {
  if (err instanceof ReportError) {
    return {
      success: false,
      error: { code: err.code, message: err.message, details: err.details },
    };
  }
  return {
    success: false,
    error: { code: 'REPORT_FAILED', message: errorMessage(err) },
  };
}
