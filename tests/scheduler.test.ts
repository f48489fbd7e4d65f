import { describe, expect, it } from 'vitest';

import { replayTaskStates } from '../src/core/audit/replay.js';
import { StorageFailure } from '../src/core/errors.js';
import { FakeVersionControl, ScriptedAgent, createHarness, wellBehavedAgent } from './fakes.js';

/** Well-behaved, except the tester of `badTask` writes into src/. */
function agentFailing(badTask: string) {
  return (vcs: FakeVersionControl) => {
    const good = wellBehavedAgent(vcs);
    return new ScriptedAgent(async (call) => {
      if (call.context.task.id === badTask && call.context.role === 'tester') {
        vcs.write('src/oops.ts', 1);
        return {};
      }
      return await good.propose(call.context, call.stage, call.options);
    });
  };
}

describe('scheduler', () => {
  it('blocks dependents of an aborted task and keeps running independent ones', async () => {
    const h = createHarness({
      backlog: [{ id: 'A' }, { id: 'B', dependsOn: ['A'] }, { id: 'C' }],
      agent: agentFailing('A')
    });
    const report = await h.scheduler.run();

    expect(report.aborted.map((a) => a.taskId)).toEqual(['A']);
    expect(report.committed.map((c) => c.taskId)).toEqual(['C']);
    expect(report.blocked).toEqual([{ taskId: 'B', blockedBy: ['A'] }]);
    expect(h.graph.snapshot()).toEqual({ A: 'Aborted', B: 'Queued', C: 'Committed' });

    const blocked = h.sink.entries.find((e) => e.taskId === null && e.data.event === 'blocked');
    expect(blocked?.outcome).toBe('aborted');
  });

  it('runs ready tasks in declaration order and stacks each on the last commit', async () => {
    const order: string[] = [];
    const h = createHarness({
      backlog: [{ id: 'C', dependsOn: ['A'] }, { id: 'A' }, { id: 'B' }],
      events: { taskStarted: (t) => order.push(t.id) }
    });
    const report = await h.scheduler.run();

    expect(order).toEqual(['A', 'C', 'B']);
    expect(report.committed.map((c) => c.taskId)).toEqual(['A', 'C', 'B']);
    expect(h.vcs.created.map((c) => `${c.name}<-${c.base.ref}@${c.base.revision}`)).toEqual([
      'task/A<-main@rev-0',
      'task/C<-task/A@rev-1',
      'task/B<-task/C@rev-2'
    ]);
    expect(report.base).toEqual({ ref: 'task/B', revision: 'rev-3' });
  });

  it('produces the same order on every run', async () => {
    const backlog = [{ id: 'x1' }, { id: 'x2', dependsOn: ['x1'] }, { id: 'x3' }, { id: 'x4', dependsOn: ['x3', 'x1'] }];
    const runs: string[][] = [];
    for (let i = 0; i < 3; i++) {
      const h = createHarness({ backlog });
      const report = await h.scheduler.run();
      runs.push(report.committed.map((c) => c.taskId));
    }
    expect(runs[0]).toEqual(['x1', 'x2', 'x3', 'x4']);
    expect(runs[1]).toEqual(runs[0]);
    expect(runs[2]).toEqual(runs[0]);
  });

  it('leaves an audit log whose replay matches the final task states', async () => {
    const h = createHarness({
      backlog: [{ id: 'A' }, { id: 'B', dependsOn: ['A'] }, { id: 'C' }, { id: 'D', dependsOn: ['C'] }],
      agent: agentFailing('A')
    });
    await h.scheduler.run();

    expect(replayTaskStates(h.sink.entries)).toEqual(h.graph.snapshot());
  });

  it('skips tasks committed by an earlier session', async () => {
    const h = createHarness({ backlog: [{ id: 'A' }, { id: 'B', dependsOn: ['A'] }], committed: ['A'] });
    const report = await h.scheduler.run();

    expect(report.committed.map((c) => c.taskId)).toEqual(['B']);
    const started = h.sink.entries[0];
    expect(started.data).toEqual({ event: 'started', mode: 'run', interactive: false, tasks: ['A', 'B'], committed: ['A'] });
  });

  it('restricts the session to the requested tasks', async () => {
    const h = createHarness({ backlog: [{ id: 'A' }, { id: 'B' }, { id: 'C', dependsOn: ['B'] }], only: ['A', 'C'] });
    const report = await h.scheduler.run();

    expect(report.committed.map((c) => c.taskId)).toEqual(['A']);
    expect(report.blocked).toEqual([{ taskId: 'C', blockedBy: ['B'] }]);
    expect(h.graph.get('B').state).toBe('Queued');
  });

  it('rejects unknown task ids in the restriction', () => {
    expect(() => createHarness({ backlog: [{ id: 'A' }], only: ['Z'] })).toThrow("Unknown task 'Z'");
  });

  it('halts the session on a storage failure after cleaning up', async () => {
    const vcs = new FakeVersionControl();
    vcs.failOn.commit = new Error('disk full');
    const h = createHarness({ backlog: [{ id: 'A' }, { id: 'B' }], vcs });

    await expect(h.scheduler.run()).rejects.toBeInstanceOf(StorageFailure);
    expect(vcs.discards).toEqual([{ branch: 'task/A', base: { ref: 'main', revision: 'rev-0' } }]);
    expect(h.graph.get('B').state).toBe('Queued');
    expect(h.sink.entries.some((e) => e.data.event === 'finished')).toBe(false);
    expect(h.records.done).toEqual([]);
  });

  it('finishes at once when nothing is pending', async () => {
    const h = createHarness({ backlog: [{ id: 'A' }], committed: ['A'] });
    const report = await h.scheduler.run();

    expect(report.committed).toEqual([]);
    expect(h.sink.entries.map((e) => e.data.event)).toEqual(['started', 'finished']);
  });
});
