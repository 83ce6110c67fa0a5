import type { RecordStore } from '../../application/index.js';
import type {
  AssignmentRecord,
  HitRecord,
  PairingRecord,
  RunRecord,
  WorkerRecord,
} from '../../domain/index.js';

export interface RecordSeed {
  runs?: RunRecord[];
  hits?: HitRecord[];
  assignments?: AssignmentRecord[];
  workers?: WorkerRecord[];
  pairings?: PairingRecord[];
}

/**
 * In-memory RecordStore.
 *
 * Answers the same queries as the Postgres store over plain arrays, in
 * insertion order. Used by tests.
 */
export class InMemoryRecordStore implements RecordStore {
  private readonly runs: RunRecord[];
  private readonly hits: HitRecord[];
  private readonly assignments: AssignmentRecord[];
  private readonly workers: WorkerRecord[];
  private readonly pairings: PairingRecord[];

  constructor(seed: RecordSeed = {}) {
    this.runs = [...(seed.runs ?? [])];
    this.hits = [...(seed.hits ?? [])];
    this.assignments = [...(seed.assignments ?? [])];
    this.workers = [...(seed.workers ?? [])];
    this.pairings = [...(seed.pairings ?? [])];
  }

  async getAllRuns(): Promise<RunRecord[]> {
    return [...this.runs];
  }

  async getRun(runId: string): Promise<RunRecord | undefined> {
    return this.runs.find((r) => r.run_id === runId);
  }

  async getAllWorkers(): Promise<WorkerRecord[]> {
    return [...this.workers];
  }

  async getWorker(workerId: string): Promise<WorkerRecord | undefined> {
    return this.workers.find((w) => w.worker_id === workerId);
  }

  async getHitsForRun(runId: string): Promise<HitRecord[]> {
    return this.hits.filter((h) => h.run_id === runId);
  }

  /** Joins through HITs, like the SQL query. */
  async getAssignmentsForRun(runId: string): Promise<AssignmentRecord[]> {
    const hitIds = new Set(this.hits.filter((h) => h.run_id === runId).map((h) => h.hit_id));
    return this.assignments.filter((a) => a.hit_id !== null && hitIds.has(a.hit_id));
  }

  async getPairingsForRun(runId: string): Promise<PairingRecord[]> {
    return this.pairings.filter((p) => p.run_id === runId);
  }

  async getAssignmentsForWorker(workerId: string): Promise<AssignmentRecord[]> {
    return this.assignments.filter((a) => a.worker_id === workerId);
  }

  async getPairingsForWorker(workerId: string): Promise<PairingRecord[]> {
    return this.pairings.filter((p) => p.worker_id === workerId);
  }
}
