import type { BaseLogger } from 'pino';
import type { MissingAssignmentDiagnostic } from '../domain/index.js';

/** Logs each merge diagnostic as a data-integrity warning. */
export function reportDiagnostics(
  log: Pick<BaseLogger, 'warn'>,
  diagnostics: readonly MissingAssignmentDiagnostic[],
): void {
  for (const diagnostic of diagnostics) {
    log.warn(
      { assignment_id: diagnostic.assignment_id, context: diagnostic.context },
      diagnostic.message,
    );
  }
}
