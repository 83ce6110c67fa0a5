import { asc, eq } from 'drizzle-orm';
import type { AssignmentRecord, PairingRecord, WorkerRecord } from '../../domain/index.js';
import type { Database } from './client.js';
import { assignments, pairings, workers } from './schema.js';

export async function findAllWorkers(db: Database): Promise<WorkerRecord[]> {
  return db.select().from(workers).orderBy(asc(workers.worker_id));
}

/**
 * Fetches a single worker by worker_id.
 * Returns undefined if not found.
 */
export async function findWorkerById(db: Database, workerId: string): Promise<WorkerRecord | undefined> {
  const rows = await db
    .select()
    .from(workers)
    .where(eq(workers.worker_id, workerId))
    .limit(1);

  return rows[0];
}

export async function findAssignmentsForWorker(db: Database, workerId: string): Promise<AssignmentRecord[]> {
  return db
    .select()
    .from(assignments)
    .where(eq(assignments.worker_id, workerId))
    .orderBy(asc(assignments.assignment_id));
}

export async function findPairingsForWorker(db: Database, workerId: string): Promise<PairingRecord[]> {
  return db
    .select()
    .from(pairings)
    .where(eq(pairings.worker_id, workerId));
}
