import { EngineError, storageError } from '../../src/domain/errors';
import { fail, fromFieldErrors } from '../../src/domain/module';
import { ModuleRunStatus } from '../../src/domain/run';
import { ModuleRunDependencies, runModule } from '../../src/engine/module-runner';
import { RunTransactionRecorder } from '../../src/engine/run-recorder';
import { logger } from '../../src/logger';
import { PhaseEventPublisher } from '../../src/monitoring/publisher';
import { MemoryCheckpointStore, MemoryTransactionLog } from '../../src/storage/memory-store';
import { CallLog, fakeModule, fixedClock } from '../helpers/fakes';

describe('runModule', () => {
  let checkpoints: MemoryCheckpointStore;
  let log: MemoryTransactionLog;
  let calls: CallLog;

  const deps = (overrides: Partial<ModuleRunDependencies> = {}): ModuleRunDependencies => ({
    runId: 'run_1',
    checkpoints,
    recorder: new RunTransactionRecorder(log, 'run_1', overrides.dryRun ?? false),
    settings: { DEVELOPER_USERNAME: 'devuser' },
    dryRun: false,
    forced: false,
    logger,
    now: fixedClock,
    ...overrides,
  });

  beforeEach(() => {
    checkpoints = new MemoryCheckpointStore(fixedClock);
    log = new MemoryTransactionLog(fixedClock);
    calls = new CallLog();
  });

  test('a module with a checkpoint is skipped without checking prerequisites', async () => {
    await checkpoints.create('desktop');

    const result = await runModule(fakeModule('desktop', calls), deps());

    expect(result.status).toBe(ModuleRunStatus.Skipped);
    expect(calls.checks).toEqual([]);
    expect(calls.executes).toEqual([]);
  });

  test('a successful module records transactions and gets a checkpoint', async () => {
    const result = await runModule(
      fakeModule('desktop', calls, { records: [['Installed package: xfce4', "apt-get remove -y 'xfce4'"]] }),
      deps(),
    );

    expect(result).toMatchObject({ moduleId: 'desktop', status: ModuleRunStatus.Completed, transactionsRecorded: 1, durationMs: 0 });
    expect(await checkpoints.exists('desktop')).toBe(true);
    expect(await log.count()).toBe(2);
  });

  test('a failed prerequisite blocks the module', async () => {
    const result = await runModule(
      fakeModule('rdp', calls, { check: async () => fail('Port 3389 in use', { code: 'PORT_BUSY' }) }),
      deps(),
    );

    expect(result.status).toBe(ModuleRunStatus.Blocked);
    expect(result.error).toMatchObject({
      code: 'PREREQUISITE.FAILED',
      message: 'Port 3389 in use',
      moduleId: 'rdp',
      runId: 'run_1',
      details: { reasonCode: 'PORT_BUSY' },
    });
    expect(calls.executes).toEqual([]);
    expect(await checkpoints.exists('rdp')).toBe(false);
  });

  test('field errors from validation reach the typed error', async () => {
    const result = await runModule(
      fakeModule('user', calls, { check: async () => fromFieldErrors([{ field: 'DEVELOPER_USERNAME', reason: 'too short' }]) }),
      deps(),
    );
    expect(result.error?.message).toBe('Invalid configuration');
    expect(result.error?.details).toEqual({
      reasonCode: 'INVALID_CONFIGURATION',
      fieldErrors: [{ field: 'DEVELOPER_USERNAME', reason: 'too short' }],
    });
  });

  test('a throwing prerequisite check blocks the module', async () => {
    const result = await runModule(
      fakeModule('rdp', calls, {
        check: async () => {
          throw new Error('cannot stat /dev/null');
        },
      }),
      deps(),
    );
    expect(result.status).toBe(ModuleRunStatus.Blocked);
    expect(result.error).toMatchObject({ code: 'PREREQUISITE.THREW', message: 'cannot stat /dev/null' });
  });

  test('a failed execute leaves no checkpoint', async () => {
    const result = await runModule(
      fakeModule('tools', calls, { records: [['step', 'undo step']], execute: async () => fail('download failed') }),
      deps(),
    );

    expect(result.status).toBe(ModuleRunStatus.Failed);
    expect(result.error).toMatchObject({ code: 'EXECUTION.FAILED', message: 'download failed' });
    expect(result.transactionsRecorded).toBe(1);
    expect(await checkpoints.exists('tools')).toBe(false);
  });

  test('a throwing execute fails the module', async () => {
    const result = await runModule(
      fakeModule('tools', calls, {
        execute: async () => {
          throw new Error('boom');
        },
      }),
      deps(),
    );
    expect(result.error).toMatchObject({ code: 'EXECUTION.THREW', message: 'boom', moduleId: 'tools' });
  });

  test('a storage failure thrown by execute keeps its kind', async () => {
    const result = await runModule(
      fakeModule('tools', calls, {
        execute: async () => {
          throw new EngineError(storageError('TRANSACTION_WRITE', 'disk full'));
        },
      }),
      deps(),
    );
    expect(result.status).toBe(ModuleRunStatus.Failed);
    expect(result.error?.code).toBe('STORAGE.TRANSACTION_WRITE');
  });

  test('failing to write the checkpoint is a storage failure', async () => {
    class FullDisk extends MemoryCheckpointStore {
      async create(): Promise<never> {
        throw new Error('ENOSPC');
      }
    }
    checkpoints = new FullDisk(fixedClock);

    const result = await runModule(fakeModule('tools', calls), deps());

    expect(result.status).toBe(ModuleRunStatus.Failed);
    expect(result.error).toMatchObject({
      code: 'STORAGE.CHECKPOINT_WRITE',
      message: 'Cannot write checkpoint of tools: ENOSPC',
    });
    expect(calls.executes).toEqual(['tools']);
  });

  test('dry run stops at READY without executing', async () => {
    const result = await runModule(fakeModule('tools', calls), deps({ dryRun: true }));

    expect(result.status).toBe(ModuleRunStatus.Ready);
    expect(calls.checks).toEqual(['tools']);
    expect(calls.executes).toEqual([]);
    expect(await checkpoints.exists('tools')).toBe(false);
  });

  test('a forced module has its checkpoint removed and runs again', async () => {
    await checkpoints.create('tools');

    const result = await runModule(fakeModule('tools', calls), deps({ forced: true }));

    expect(result).toMatchObject({ status: ModuleRunStatus.Completed, forced: true });
    expect(calls.executes).toEqual(['tools']);
    expect(await checkpoints.exists('tools')).toBe(true);
  });

  test('a forced module that is blocked keeps its checkpoint', async () => {
    await checkpoints.create('tools');

    const result = await runModule(
      fakeModule('tools', calls, { check: async () => fail('Port 3389 in use') }),
      deps({ forced: true }),
    );

    expect(result.status).toBe(ModuleRunStatus.Blocked);
    expect(result.forced).toBeUndefined();
    expect(await checkpoints.exists('tools')).toBe(true);
  });

  test('modules see settings and a read-only checkpoint view', async () => {
    await checkpoints.create('base');
    let seen: { user?: string; baseDone?: boolean; canCreate?: boolean } = {};
    const descriptor = fakeModule('user', calls, {
      check: async (context) => {
        seen = {
          user: context.settings.DEVELOPER_USERNAME,
          baseDone: await context.checkpoints.exists('base'),
          canCreate: 'create' in context.checkpoints,
        };
        return { success: true };
      },
    });

    await runModule(descriptor, deps());

    expect(seen).toEqual({ user: 'devuser', baseDone: true, canCreate: false });
  });

  test('publishes start and completion events', async () => {
    const publisher = new PhaseEventPublisher();
    await runModule(fakeModule('tools', calls, { expectedDurationMs: 1000 }), deps({ publisher }));

    const events = publisher.getEventsByRun('run_1');
    expect(events.map((e) => [e.type, e.moduleId])).toEqual([
      ['module.started', 'tools'],
      ['module.completed', 'tools'],
    ]);
    expect(events[0].payload).toEqual({ expectedDurationMs: 1000 });
    expect(events[1].payload).toMatchObject({ status: 'completed' });
  });
});
