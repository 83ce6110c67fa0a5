import { describe, it, expect, vi } from 'vitest';
import { listRuns, getRunOverview } from '../../src/application/query-runs.js';
import { InMemoryRecordStore } from '../../src/infrastructure/store/in-memory-record-store.js';
import { assignment, hit, pairing, run } from '../helpers.js';

function warnLog() {
  return { warn: vi.fn() };
}

const store = new InMemoryRecordStore({
  runs: [run({ run_id: 'run-1' }), run({ run_id: 'run-2', taskname: 'other' })],
  hits: [
    hit({ hit_id: 'hit-1', run_id: 'run-1' }),
    hit({ hit_id: 'hit-2', run_id: 'run-1' }),
    hit({ hit_id: 'hit-9', run_id: 'run-2' }),
  ],
  assignments: [
    assignment({ assignment_id: 'asg-1', hit_id: 'hit-1' }),
    assignment({ assignment_id: 'asg-2', hit_id: 'hit-2', worker_id: 'worker-2' }),
    assignment({ assignment_id: 'asg-9', hit_id: 'hit-9' }),
  ],
  pairings: [
    pairing({ assignment_id: 'asg-1', status: 'done', run_id: 'run-1' }),
    pairing({ assignment_id: 'asg-404', status: 'done', run_id: 'run-1' }),
  ],
});

describe('listRuns', () => {
  it('returns every run in store order', async () => {
    const rows = await listRuns(store);

    expect(rows.map((r) => r.run_id)).toEqual(['run-1', 'run-2']);
  });
});

describe('getRunOverview', () => {
  it('returns null for an unknown run', async () => {
    const log = warnLog();

    expect(await getRunOverview(store, 'run-missing', log)).toBeNull();
    expect(log.warn).not.toHaveBeenCalled();
  });

  it('attaches the not-computed run status placeholder', async () => {
    const overview = await getRunOverview(store, 'run-1', warnLog());

    expect(overview?.run_details).toEqual({ ...run({ run_id: 'run-1' }), run_status: 'unimplemented' });
  });

  it('returns only the HITs of the run', async () => {
    const overview = await getRunOverview(store, 'run-1', warnLog());

    expect(overview?.hits.map((h) => h.hit_id)).toEqual(['hit-1', 'hit-2']);
  });

  it('merges pairings onto the run assignments', async () => {
    const overview = await getRunOverview(store, 'run-1', warnLog());

    const { status: _worldStatus, ...pairingFields } = pairing({ assignment_id: 'asg-1', status: 'done', run_id: 'run-1' });
    expect(overview?.assignments).toEqual([
      { ...assignment({ assignment_id: 'asg-1', hit_id: 'hit-1' }), ...pairingFields, world_status: 'done' },
      assignment({ assignment_id: 'asg-2', hit_id: 'hit-2', worker_id: 'worker-2' }),
    ]);
  });

  it('warns once per pairing without an assignment', async () => {
    const log = warnLog();

    await getRunOverview(store, 'run-1', log);

    expect(log.warn).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith(
      { assignment_id: 'asg-404', context: 'run run-1' },
      'assignment asg-404 missing from assignment table for run run-1',
    );
  });
});
