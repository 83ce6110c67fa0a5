import { describe, it, expect } from 'vitest';
import { mergeAssignmentsWithPairings } from '../../src/domain/index.js';
import { assignment, pairing } from '../helpers.js';

describe('mergeAssignmentsWithPairings', () => {
  it('overlays a pairing and renames status to world_status', () => {
    const result = mergeAssignmentsWithPairings(
      [{ assignment_id: 'a1', worker_id: 'w1' }],
      [{ assignment_id: 'a1', status: 'done' }],
      'run r1',
    );

    expect(result.assignments).toEqual([
      { assignment_id: 'a1', worker_id: 'w1', world_status: 'done' },
    ]);
    expect(result.diagnostics).toEqual([]);
  });

  it('drops a pairing with no assignment and reports it once', () => {
    const result = mergeAssignmentsWithPairings(
      [],
      [{ assignment_id: 'a9', status: 'done' }],
      'run r1',
    );

    expect(result.assignments).toEqual([]);
    expect(result.diagnostics).toEqual([
      {
        assignment_id: 'a9',
        context: 'run r1',
        message: 'assignment a9 missing from assignment table for run r1',
      },
    ]);
  });

  it('emits one diagnostic per orphaned pairing', () => {
    const result = mergeAssignmentsWithPairings(
      [{ assignment_id: 'a1' }],
      [
        { assignment_id: 'x1', status: 'done' },
        { assignment_id: 'a1', status: 'done' },
        { assignment_id: 'x2', status: 'partner disconnect' },
      ],
      'worker w1',
    );

    expect(result.diagnostics.map((d) => d.assignment_id)).toEqual(['x1', 'x2']);
    expect(result.assignments).toEqual([{ assignment_id: 'a1', world_status: 'done' }]);
  });

  it('passes unpaired assignments through unmodified', () => {
    const unpaired = assignment({ assignment_id: 'asg-2' });
    const result = mergeAssignmentsWithPairings(
      [assignment(), unpaired],
      [pairing()],
      'run run-1',
    );

    expect(result.assignments[1]).toBe(unpaired);
  });

  it('keeps the assignment status apart from the world status', () => {
    const result = mergeAssignmentsWithPairings(
      [assignment({ status: 'Approved' })],
      [pairing({ status: 'done' })],
      'run run-1',
    );

    expect(result.assignments[0]).toMatchObject({ status: 'Approved', world_status: 'done' });
  });

  it('lets pairing fields override assignment fields of the same name', () => {
    const result = mergeAssignmentsWithPairings(
      [assignment({ worker_id: 'worker-old' })],
      [pairing({ worker_id: 'worker-new' })],
      'run run-1',
    );

    expect(result.assignments[0]).toMatchObject({ worker_id: 'worker-new' });
  });

  it('applies repeated pairings for one assignment in order', () => {
    const result = mergeAssignmentsWithPairings(
      [{ assignment_id: 'a1' }],
      [
        { assignment_id: 'a1', status: 'onboarding' },
        { assignment_id: 'a1', status: 'done' },
      ],
      'run r1',
    );

    expect(result.assignments).toEqual([{ assignment_id: 'a1', world_status: 'done' }]);
  });

  it('keeps the order of the assignment pass', () => {
    const result = mergeAssignmentsWithPairings(
      [{ assignment_id: 'c' }, { assignment_id: 'a' }, { assignment_id: 'b' }],
      [{ assignment_id: 'b', status: 'done' }, { assignment_id: 'c', status: 'done' }],
      'run r1',
    );

    expect(result.assignments.map((a) => a.assignment_id)).toEqual(['c', 'a', 'b']);
  });

  it('only ever outputs keys from the assignment set', () => {
    const assignments = [{ assignment_id: 'a1' }, { assignment_id: 'a2' }];
    const result = mergeAssignmentsWithPairings(
      assignments,
      [{ assignment_id: 'a3', status: 'done' }, { assignment_id: 'a2', status: 'done' }],
      'run r1',
    );

    const keys = new Set(assignments.map((a) => a.assignment_id));
    for (const merged of result.assignments) {
      expect(keys.has(merged.assignment_id)).toBe(true);
    }
  });

  it('is deterministic and independent of pairing order', () => {
    const assignments = [assignment({ assignment_id: 'asg-1' }), assignment({ assignment_id: 'asg-2' })];
    const pairings = [
      pairing({ assignment_id: 'asg-1', status: 'done' }),
      pairing({ assignment_id: 'asg-2', status: 'returned' }),
    ];

    const first = mergeAssignmentsWithPairings(assignments, pairings, 'run run-1');
    const second = mergeAssignmentsWithPairings(assignments, pairings, 'run run-1');
    const reversed = mergeAssignmentsWithPairings(assignments, [...pairings].reverse(), 'run run-1');

    expect(second).toEqual(first);
    expect(reversed).toEqual(first);
  });

  it('does not mutate its inputs', () => {
    const assignments = [assignment()];
    const pairings = [pairing()];

    mergeAssignmentsWithPairings(assignments, pairings, 'run run-1');

    expect(assignments[0]).toEqual(assignment());
    expect(pairings[0]).toEqual(pairing());
    expect(pairings[0]).not.toHaveProperty('world_status');
  });
});
