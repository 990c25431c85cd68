import { createTypedError, executionError, lockHeldError } from '../../src/domain/errors';
import { ExitCode, ModuleRunStatus, RunReport, RunStatus } from '../../src/domain/run';
import { describeRun, summarizeRun } from '../../src/engine/run-summary';

function report(overrides: Partial<RunReport> = {}): RunReport {
  return {
    runId: 'run_1',
    status: RunStatus.Succeeded,
    dryRun: false,
    startedAt: '2026-03-01T10:00:00.000Z',
    completedAt: '2026-03-01T10:00:05.000Z',
    plan: {
      batches: [
        { index: 0, modules: ['base'] },
        { index: 1, modules: ['desktop'] },
      ],
      order: ['base', 'desktop'],
    },
    modules: {
      base: { moduleId: 'base', status: ModuleRunStatus.Skipped, transactionsRecorded: 0 },
      desktop: { moduleId: 'desktop', status: ModuleRunStatus.Completed, transactionsRecorded: 2 },
    },
    checkpointsReverted: [],
    exitCode: ExitCode.Success,
    ...overrides,
  };
}

describe('summarizeRun', () => {
  test('a successful run', () => {
    const summary = summarizeRun(report());

    expect(summary).toMatchObject({
      title: 'Provisioning complete',
      severity: 'info',
      exitCode: 0,
      unrevertedCommands: [],
      suggestedActions: [],
      modules: [
        { moduleId: 'base', status: 'skipped' },
        { moduleId: 'desktop', status: 'completed' },
      ],
    });
    expect(summary.counts.skipped).toBe(1);
    expect(summary.counts.completed).toBe(1);
    expect(summary.rollback).toBeUndefined();
  });

  test('a successful dry run gets its own title', () => {
    expect(summarizeRun(report({ dryRun: true })).title).toBe('Dry run: all modules ready or already done');
  });

  test('a degraded rollback lists the commands left to run by hand', () => {
    const failedEntry = { timestamp: '2026-03-01T10:00:01.000Z', action: 'Created user: devuser', rollbackCommand: "userdel -r 'devuser'", line: 2 };
    const summary = summarizeRun(
      report({
        status: RunStatus.Failed,
        exitCode: ExitCode.RollbackDegraded,
        failure: { moduleId: 'desktop', error: executionError('desktop', 'apt-get failed') },
        rollback: {
          label: 'run_1',
          attempted: 2,
          succeeded: 1,
          failed: [{ entry: failedEntry, error: createTypedError({ code: 'ROLLBACK.COMMAND_FAILED', message: 'exit 1' }) }],
          alreadyCompensated: 0,
          startedAt: '2026-03-01T10:00:04.000Z',
          completedAt: '2026-03-01T10:00:05.000Z',
        },
      }),
    );

    expect(summary).toMatchObject({
      title: 'Provisioning failed; rollback incomplete',
      severity: 'error',
      failingModule: 'desktop',
      reason: 'apt-get failed',
      errorCode: 'EXECUTION.FAILED',
      rollback: { attempted: 2, succeeded: 1, failed: 1 },
      unrevertedCommands: ["userdel -r 'devuser'"],
      suggestedActions: ['Run the failed rollback commands manually, then re-run provisioning'],
    });
  });

  test('suggested fixes of the failure are carried over', () => {
    const summary = summarizeRun(
      report({
        status: RunStatus.Failed,
        exitCode: ExitCode.LockHeld,
        failure: { error: lockHeldError('/var/lib/provision/run.lock', 4242) },
      }),
    );
    expect(summary.severity).toBe('warning');
    expect(summary.suggestedActions).toEqual(['Wait for the other run to finish']);
  });

  test('modules that never ran are left out, whatever their ids', () => {
    const summary = summarizeRun(
      report({
        status: RunStatus.Failed,
        exitCode: ExitCode.LockHeld,
        plan: { batches: [{ index: 0, modules: ['toString', 'constructor'] }], order: ['toString', 'constructor'] },
        modules: {},
        failure: { error: lockHeldError('/var/lib/provision/run.lock', 4242) },
      }),
    );
    expect(summary.modules).toEqual([]);
    expect(Object.values(summary.counts).every((count) => count === 0)).toBe(true);
  });
});

describe('describeRun', () => {
  test('renders one line per item', () => {
    const lines = describeRun(
      report({
        status: RunStatus.Failed,
        exitCode: ExitCode.ModuleFailure,
        failure: { moduleId: 'desktop', error: executionError('desktop', 'apt-get failed') },
        modules: {
          base: { moduleId: 'base', status: ModuleRunStatus.Completed, transactionsRecorded: 1 },
          desktop: { moduleId: 'desktop', status: ModuleRunStatus.Failed, transactionsRecorded: 1 },
        },
        rollback: {
          label: 'run_1',
          attempted: 2,
          succeeded: 2,
          failed: [],
          alreadyCompensated: 0,
          startedAt: '2026-03-01T10:00:04.000Z',
          completedAt: '2026-03-01T10:00:05.000Z',
        },
        checkpointsReverted: ['base'],
      }),
    );

    expect(lines).toEqual([
      'Provisioning failed; changes rolled back (exit 1)',
      'Run: run_1',
      'Failing module: desktop',
      'Reason: apt-get failed [EXECUTION.FAILED]',
      'Rollback: attempted 2, succeeded 2, failed 0',
      '  base: completed',
      '  desktop: failed',
    ]);
  });
});
