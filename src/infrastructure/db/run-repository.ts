import { asc, desc, eq, getTableColumns } from 'drizzle-orm';
import type { AssignmentRecord, HitRecord, PairingRecord, RunRecord } from '../../domain/index.js';
import type { Database } from './client.js';
import { assignments, hits, pairings, runs } from './schema.js';

/** All runs, newest first. */
export async function findAllRuns(db: Database): Promise<RunRecord[]> {
  return db.select().from(runs).orderBy(desc(runs.created));
}

/**
 * Fetches a single run by run_id.
 * Returns undefined if not found.
 */
export async function findRunById(db: Database, runId: string): Promise<RunRecord | undefined> {
  const rows = await db
    .select()
    .from(runs)
    .where(eq(runs.run_id, runId))
    .limit(1);

  return rows[0];
}

export async function findHitsForRun(db: Database, runId: string): Promise<HitRecord[]> {
  return db
    .select()
    .from(hits)
    .where(eq(hits.run_id, runId))
    .orderBy(asc(hits.hit_id));
}

/** Assignments do not carry run_id; they reach their run through the HIT. */
export async function findAssignmentsForRun(db: Database, runId: string): Promise<AssignmentRecord[]> {
  return db
    .select(getTableColumns(assignments))
    .from(assignments)
    .innerJoin(hits, eq(assignments.hit_id, hits.hit_id))
    .where(eq(hits.run_id, runId))
    .orderBy(asc(assignments.assignment_id));
}

export async function findPairingsForRun(db: Database, runId: string): Promise<PairingRecord[]> {
  return db
    .select()
    .from(pairings)
    .where(eq(pairings.run_id, runId));
}
