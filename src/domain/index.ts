export type {
  RunRecord,
  HitRecord,
  AssignmentRecord,
  WorkerRecord,
  PairingRecord,
  RunDetails,
  RunStatus,
} from './records.js';
export { RUN_STATUS_NOT_COMPUTED } from './records.js';
export { mergeAssignmentsWithPairings } from './merge.js';
export type {
  AssignmentLike,
  PairingLike,
  WorldStatusOverlay,
  MergedAssignment,
  MergeResult,
  MissingAssignmentDiagnostic,
} from './merge.js';
export type { ConnectionRole, ClientCommand, ServerMessage } from './commands.js';
export { CONNECTION_ROLES } from './commands.js';
