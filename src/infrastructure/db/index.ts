export { runs, hits, assignments, workers, pairings } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient, Sql } from './client.js';
export { ensureSchema } from './migrate.js';
export {
  findAllRuns,
  findRunById,
  findHitsForRun,
  findAssignmentsForRun,
  findPairingsForRun,
} from './run-repository.js';
export {
  findAllWorkers,
  findWorkerById,
  findAssignmentsForWorker,
  findPairingsForWorker,
} from './worker-repository.js';
export { PgRecordStore } from './pg-record-store.js';
