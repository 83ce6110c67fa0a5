import type { RecordStore } from '../../application/index.js';
import type {
  AssignmentRecord,
  HitRecord,
  PairingRecord,
  RunRecord,
  WorkerRecord,
} from '../../domain/index.js';
import type { Database } from './client.js';
import {
  findAllRuns,
  findRunById,
  findHitsForRun,
  findAssignmentsForRun,
  findPairingsForRun,
} from './run-repository.js';
import {
  findAllWorkers,
  findWorkerById,
  findAssignmentsForWorker,
  findPairingsForWorker,
} from './worker-repository.js';

/** RecordStore backed by the Postgres task tables. */
export class PgRecordStore implements RecordStore {
  private readonly db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  getAllRuns(): Promise<RunRecord[]> {
    return findAllRuns(this.db);
  }

  getRun(runId: string): Promise<RunRecord | undefined> {
    return findRunById(this.db, runId);
  }

  getAllWorkers(): Promise<WorkerRecord[]> {
    return findAllWorkers(this.db);
  }

  getWorker(workerId: string): Promise<WorkerRecord | undefined> {
    return findWorkerById(this.db, workerId);
  }

  getHitsForRun(runId: string): Promise<HitRecord[]> {
    return findHitsForRun(this.db, runId);
  }

  getAssignmentsForRun(runId: string): Promise<AssignmentRecord[]> {
    return findAssignmentsForRun(this.db, runId);
  }

  getPairingsForRun(runId: string): Promise<PairingRecord[]> {
    return findPairingsForRun(this.db, runId);
  }

  getAssignmentsForWorker(workerId: string): Promise<AssignmentRecord[]> {
    return findAssignmentsForWorker(this.db, workerId);
  }

  getPairingsForWorker(workerId: string): Promise<PairingRecord[]> {
    return findPairingsForWorker(this.db, workerId);
  }
}
