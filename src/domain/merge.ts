/** Minimal shape the merger needs from an assignment. */
export interface AssignmentLike {
  readonly assignment_id: string;
}

/** Minimal shape the merger needs from a pairing. */
export interface PairingLike {
  readonly assignment_id: string;
  readonly status: unknown;
}

/** Pairing fields as they appear on a merged assignment. */
export type WorldStatusOverlay<P extends PairingLike> =
  Omit<P, 'status'> & { readonly world_status: P['status'] };

/**
 * An assignment, with the fields of its pairing overlaid when one was
 * recorded. Unpaired assignments come through unmodified.
 */
export type MergedAssignment<A extends AssignmentLike, P extends PairingLike> =
  A | (A & WorldStatusOverlay<P>);

/** A pairing whose assignment is missing from the assignment set. */
export interface MissingAssignmentDiagnostic {
  readonly assignment_id: string;
  readonly context: string;
  readonly message: string;
}

export interface MergeResult<A extends AssignmentLike, P extends PairingLike> {
  readonly assignments: MergedAssignment<A, P>[];
  readonly diagnostics: MissingAssignmentDiagnostic[];
}

function overlayPairing<A extends AssignmentLike, P extends PairingLike>(
  assignment: MergedAssignment<A, P>,
  pairing: P,
): MergedAssignment<A, P> {
  const { status, ...fields } = pairing;
  return { ...assignment, ...fields, world_status: status };
}

/**
 * Reconciles assignments with the pairings recorded against them.
 *
 * The assignment set defines the output keys: pairings are overlaid onto
 * the assignment with the same `assignment_id`, with their `status`
 * renamed to `world_status`. A pairing with no matching assignment is
 * dropped and reported once in `diagnostics`, tagged with `contextLabel`.
 *
 * Output follows the order of `assignments`. No I/O.
 */
export function mergeAssignmentsWithPairings<A extends AssignmentLike, P extends PairingLike>(
  assignments: readonly A[],
  pairings: readonly P[],
  contextLabel: string,
): MergeResult<A, P> {
  const merged = new Map<string, MergedAssignment<A, P>>();
  const diagnostics: MissingAssignmentDiagnostic[] = [];

  for (const assignment of assignments) {
    merged.set(assignment.assignment_id, assignment);
  }

  for (const pairing of pairings) {
    const existing = merged.get(pairing.assignment_id);
    if (existing === undefined) {
      diagnostics.push({
        assignment_id: pairing.assignment_id,
        context: contextLabel,
        message: `assignment ${pairing.assignment_id} missing from assignment table for ${contextLabel}`,
      });
      continue;
    }
    merged.set(pairing.assignment_id, overlayPairing(existing, pairing));
  }

  return { assignments: [...merged.values()], diagnostics };
}
