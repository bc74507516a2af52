/**
 * Report Errors
 *
 * Typed failures raised by the report writers. Renderers never throw;
 * only file writes, the model-name command and snapshot validation do.
 */

export type ReportErrorKind = 'IOFailure' | 'CommandFailure' | 'InvalidSnapshot';

export abstract class ReportError extends Error {
  abstract readonly kind: ReportErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ReportIOError extends ReportError {
  readonly kind = 'IOFailure';

  constructor(
    readonly path: string,
    readonly operation: 'append' | 'write',
    cause: unknown,
  ) {
    super(`Failed to ${operation} ${path}: ${describeCause(cause)}`, { cause });
  }
}

export class CommandExecutionError extends ReportError {
  readonly kind = 'CommandFailure';

  constructor(readonly command: string, cause: unknown) {
    super(`Command failed: ${command}: ${describeCause(cause)}`, { cause });
  }
}

export class ReportDataError extends ReportError {
  readonly kind = 'InvalidSnapshot';

  constructor(readonly issues: readonly string[]) {
    super(`Invalid report snapshot: ${issues.join('; ')}`);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
