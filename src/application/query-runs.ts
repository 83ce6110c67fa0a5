import type { BaseLogger } from 'pino';
import {
  mergeAssignmentsWithPairings,
  RUN_STATUS_NOT_COMPUTED,
} from '../domain/index.js';
import type {
  AssignmentRecord,
  HitRecord,
  MergedAssignment,
  PairingRecord,
  RunDetails,
  RunRecord,
} from '../domain/index.js';
import type { RecordStore } from './record-store.js';
import { reportDiagnostics } from './diagnostics.js';

export type MergedAssignmentView = MergedAssignment<AssignmentRecord, PairingRecord>;

export interface RunOverview {
  run_details: RunDetails;
  assignments: MergedAssignmentView[];
  hits: HitRecord[];
}

/** Use case: every recorded run, in store order. */
export async function listRuns(store: RecordStore): Promise<RunRecord[]> {
  return store.getAllRuns();
}

/**
 * Use case: one run with its HITs and merged assignments.
 * Returns null if the run does not exist.
 *
 * `run_status` is a fixed placeholder; no derivation is defined yet.
 */
export async function getRunOverview(
  store: RecordStore,
  runId: string,
  log: Pick<BaseLogger, 'warn'>,
): Promise<RunOverview | null> {
  const [run, hits, assignments, pairings] = await Promise.all([
    store.getRun(runId),
    store.getHitsForRun(runId),
    store.getAssignmentsForRun(runId),
    store.getPairingsForRun(runId),
  ]);

  if (run === undefined) return null;

  const merged = mergeAssignmentsWithPairings(assignments, pairings, `run ${runId}`);
  reportDiagnostics(log, merged.diagnostics);

  return {
    run_details: { ...run, run_status: RUN_STATUS_NOT_COMPUTED },
    assignments: merged.assignments,
    hits,
  };
}
