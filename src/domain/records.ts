/**
 * Record types for the crowd-labor task store.
 *
 * One interface per stored table. Timestamps are epoch seconds as written
 * by the task runner; nullable columns are `null`, never `undefined`, so a
 * record serializes with every field present.
 */

/** A batch of HITs posted to the platform. */
export interface RunRecord {
  readonly run_id: string;
  readonly created: number;
  readonly maximum: number;
  readonly completed: number;
  readonly failed: number;
  readonly taskname: string | null;
  readonly launch_time: number | null;
  readonly sandbox: boolean | null;
}

/** A single unit of work within a run. */
export interface HitRecord {
  readonly hit_id: string;
  readonly expiration: number;
  readonly hit_status: string | null;
  readonly assignments_pending: number | null;
  readonly assignments_available: number | null;
  readonly assignments_complete: number | null;
  readonly run_id: string | null;
}

/** A worker's claim on a HIT. */
export interface AssignmentRecord {
  readonly assignment_id: string;
  readonly status: string | null;
  readonly approve_time: number | null;
  readonly worker_id: string | null;
  readonly hit_id: string | null;
}

/** Lifetime counters for one worker. */
export interface WorkerRecord {
  readonly worker_id: string;
  readonly accepted: number;
  readonly disconnected: number;
  readonly expired: number;
  readonly completed: number;
  readonly approved: number;
  readonly rejected: number;
}

/**
 * World/session outcome recorded against an assignment.
 *
 * `status` is the world status, distinct from the assignment's own status;
 * it is exposed as `world_status` once merged onto an assignment.
 */
export interface PairingRecord {
  readonly assignment_id: string;
  readonly status: string;
  readonly onboarding_start: number | null;
  readonly onboarding_end: number | null;
  readonly task_start: number | null;
  readonly task_end: number | null;
  readonly conversation_id: string | null;
  readonly bonus_amount: number | null;
  readonly bonus_text: string | null;
  readonly bonus_paid: boolean | null;
  readonly notes: string | null;
  readonly onboarding_id: string | null;
  readonly worker_id: string | null;
  readonly run_id: string | null;
}

/** Placeholder until run status derivation is decided. */
export const RUN_STATUS_NOT_COMPUTED = 'unimplemented';

export type RunStatus = typeof RUN_STATUS_NOT_COMPUTED;

export interface RunDetails extends RunRecord {
  readonly run_status: RunStatus;
}
