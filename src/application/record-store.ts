import type {
  RunRecord,
  HitRecord,
  AssignmentRecord,
  WorkerRecord,
  PairingRecord,
} from '../domain/index.js';

/**
 * Read-only port over the task record store.
 *
 * Use cases depend on this interface only, so they can run against the
 * Postgres adapter in production and the in-memory store in tests.
 * Sequences come back in store-defined order; single-record lookups
 * resolve to `undefined` when nothing matches.
 */
export interface RecordStore {
  getAllRuns(): Promise<RunRecord[]>;
  getRun(runId: string): Promise<RunRecord | undefined>;
  getAllWorkers(): Promise<WorkerRecord[]>;
  getWorker(workerId: string): Promise<WorkerRecord | undefined>;
  getHitsForRun(runId: string): Promise<HitRecord[]>;
  getAssignmentsForRun(runId: string): Promise<AssignmentRecord[]>;
  getPairingsForRun(runId: string): Promise<PairingRecord[]>;
  getAssignmentsForWorker(workerId: string): Promise<AssignmentRecord[]>;
  getPairingsForWorker(workerId: string): Promise<PairingRecord[]>;
}
