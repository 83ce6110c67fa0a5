import type { BaseLogger } from 'pino';
import { mergeAssignmentsWithPairings } from '../domain/index.js';
import type { WorkerRecord } from '../domain/index.js';
import type { RecordStore } from './record-store.js';
import type { MergedAssignmentView } from './query-runs.js';
import { reportDiagnostics } from './diagnostics.js';

export interface WorkerOverview {
  worker_details: WorkerRecord;
  assignments: MergedAssignmentView[];
}

/** Use case: every known worker, in store order. */
export async function listWorkers(store: RecordStore): Promise<WorkerRecord[]> {
  return store.getAllWorkers();
}

/**
 * Use case: one worker with every assignment they hold, merged with
 * pairings. Returns null if the worker does not exist.
 */
export async function getWorkerOverview(
  store: RecordStore,
  workerId: string,
  log: Pick<BaseLogger, 'warn'>,
): Promise<WorkerOverview | null> {
  const [worker, assignments, pairings] = await Promise.all([
    store.getWorker(workerId),
    store.getAssignmentsForWorker(workerId),
    store.getPairingsForWorker(workerId),
  ]);

  if (worker === undefined) return null;

  const merged = mergeAssignmentsWithPairings(assignments, pairings, `worker ${workerId}`);
  reportDiagnostics(log, merged.diagnostics);

  return { worker_details: worker, assignments: merged.assignments };
}
