import { DurationWatch } from '../../src/monitoring/duration-watch';
import { PhaseEventPublisher } from '../../src/monitoring/publisher';

describe('DurationWatch', () => {
  let clock: number;
  let publisher: PhaseEventPublisher;
  let watch: DurationWatch;

  beforeEach(() => {
    clock = 1_000;
    publisher = new PhaseEventPublisher();
    watch = new DurationWatch({ publisher, intervalMs: 60_000, now: () => clock });
    watch.start();
  });

  afterEach(() => watch.stop());

  const overdue = () => publisher.getEventsByRun('run_1', ['module.overdue']);

  test('announces a module once it runs past its expected duration', () => {
    publisher.publish({ type: 'module.started', runId: 'run_1', moduleId: 'desktop', payload: { expectedDurationMs: 500 } });

    clock = 1_500;
    watch.check();
    expect(overdue()).toEqual([]);

    clock = 1_750;
    watch.check();
    watch.check();

    expect(overdue()).toHaveLength(1);
    expect(overdue()[0]).toMatchObject({ moduleId: 'desktop', payload: { elapsedMs: 750, expectedDurationMs: 500 } });
  });

  test('a completed module is no longer watched', () => {
    publisher.publish({ type: 'module.started', runId: 'run_1', moduleId: 'desktop', payload: { expectedDurationMs: 500 } });
    publisher.publish({ type: 'module.completed', runId: 'run_1', moduleId: 'desktop', payload: { status: 'completed' } });

    clock = 10_000;
    watch.check();

    expect(overdue()).toEqual([]);
  });

  test('modules without an expected duration are ignored', () => {
    publisher.publish({ type: 'module.started', runId: 'run_1', moduleId: 'base', payload: {} });

    clock = 1_000_000;
    watch.check();

    expect(overdue()).toEqual([]);
  });

  test('start and stop toggle the timer', () => {
    expect(watch.running).toBe(true);
    watch.stop();
    expect(watch.running).toBe(false);

    publisher.publish({ type: 'module.started', runId: 'run_1', moduleId: 'desktop', payload: { expectedDurationMs: 1 } });
    clock = 5_000;
    watch.check();
    expect(overdue()).toEqual([]);
  });
});
