export type { RecordStore } from './record-store.js';
export { commandEnvelopeSchema, decodeCommand } from './command-schema.js';
export type { CommandEnvelope, DecodeResult } from './command-schema.js';
export { ConnectionRegistry } from './connection-registry.js';
export type { LiveConnection, RegisteredConnection } from './connection-registry.js';
export { BroadcastRouter } from './broadcast-router.js';
export type { BroadcastResult } from './broadcast-router.js';
export { DashboardGateway, GatewaySession } from './dashboard-gateway.js';
export type { SessionState, SnapshotProvider, DashboardGatewayOptions } from './dashboard-gateway.js';
export { listRuns, getRunOverview } from './query-runs.js';
export type { RunOverview, MergedAssignmentView } from './query-runs.js';
export { listWorkers, getWorkerOverview } from './query-workers.js';
export type { WorkerOverview } from './query-workers.js';
export { reportDiagnostics } from './diagnostics.js';
