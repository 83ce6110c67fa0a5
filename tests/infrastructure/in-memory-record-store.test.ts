import { describe, it, expect } from 'vitest';
import { InMemoryRecordStore } from '../../src/infrastructure/store/in-memory-record-store.js';
import { assignment, hit, pairing, run, worker } from '../helpers.js';

describe('InMemoryRecordStore', () => {
  const store = new InMemoryRecordStore({
    runs: [run({ run_id: 'run-1' })],
    hits: [hit({ hit_id: 'hit-1', run_id: 'run-1' }), hit({ hit_id: 'hit-2', run_id: 'run-2' })],
    assignments: [
      assignment({ assignment_id: 'asg-1', hit_id: 'hit-1', worker_id: 'worker-1' }),
      assignment({ assignment_id: 'asg-2', hit_id: 'hit-2', worker_id: 'worker-1' }),
      assignment({ assignment_id: 'asg-3', hit_id: null, worker_id: 'worker-2' }),
    ],
    workers: [worker({ worker_id: 'worker-1' })],
    pairings: [
      pairing({ assignment_id: 'asg-1', run_id: 'run-1', worker_id: 'worker-1' }),
      pairing({ assignment_id: 'asg-2', run_id: 'run-2', worker_id: 'worker-2' }),
    ],
  });

  it('returns undefined for missing single records', async () => {
    expect(await store.getRun('nope')).toBeUndefined();
    expect(await store.getWorker('nope')).toBeUndefined();
  });

  it('finds assignments for a run through its HITs', async () => {
    const rows = await store.getAssignmentsForRun('run-1');

    expect(rows.map((a) => a.assignment_id)).toEqual(['asg-1']);
  });

  it('filters assignments and pairings by worker', async () => {
    expect((await store.getAssignmentsForWorker('worker-1')).map((a) => a.assignment_id)).toEqual(['asg-1', 'asg-2']);
    expect((await store.getPairingsForWorker('worker-2')).map((p) => p.assignment_id)).toEqual(['asg-2']);
  });

  it('returns copies of the seeded lists', async () => {
    const first = await store.getAllRuns();
    first.pop();

    expect(await store.getAllRuns()).toHaveLength(1);
  });
});
