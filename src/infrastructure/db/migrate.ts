import type { Sql } from './client.js';

/**
 * Creates the record tables when they are missing.
 *
 * The task runner normally owns these tables; creating them here lets the
 * dashboard start against an empty database. drizzle-kit covers real
 * migrations.
 */
export async function ensureSchema(sql: Sql): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS runs (
      run_id       TEXT PRIMARY KEY,
      created      INTEGER NOT NULL,
      maximum      INTEGER NOT NULL,
      completed    INTEGER NOT NULL,
      failed       INTEGER NOT NULL,
      taskname     TEXT,
      launch_time  INTEGER,
      sandbox      BOOLEAN
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS hits (
      hit_id                 TEXT PRIMARY KEY,
      expiration             INTEGER NOT NULL,
      hit_status             TEXT,
      assignments_pending    INTEGER,
      assignments_available  INTEGER,
      assignments_complete   INTEGER,
      run_id                 TEXT
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS assignments (
      assignment_id  TEXT PRIMARY KEY,
      status         TEXT,
      approve_time   INTEGER,
      worker_id      TEXT,
      hit_id         TEXT
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS workers (
      worker_id     TEXT PRIMARY KEY,
      accepted      INTEGER NOT NULL,
      disconnected  INTEGER NOT NULL,
      expired       INTEGER NOT NULL,
      completed     INTEGER NOT NULL,
      approved      INTEGER NOT NULL,
      rejected      INTEGER NOT NULL
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS pairings (
      status            TEXT NOT NULL,
      onboarding_start  INTEGER,
      onboarding_end    INTEGER,
      task_start        INTEGER,
      task_end          INTEGER,
      conversation_id   TEXT,
      bonus_amount      INTEGER,
      bonus_text        TEXT,
      bonus_paid        BOOLEAN,
      notes             TEXT,
      onboarding_id     TEXT,
      worker_id         TEXT,
      assignment_id     TEXT NOT NULL,
      run_id            TEXT
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_hits_run_id ON hits (run_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_assignments_worker_id ON assignments (worker_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_assignments_hit_id ON assignments (hit_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_pairings_assignment_id ON pairings (assignment_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_pairings_worker_id ON pairings (worker_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_pairings_run_id ON pairings (run_id)`);
}
