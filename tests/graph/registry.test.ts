import { EngineError } from '../../src/domain/errors';
import { ModuleRegistry, validateModules } from '../../src/graph/registry';
import { CallLog, fakeModule } from '../helpers/fakes';

function buildError(fn: () => unknown): EngineError {
  try {
    fn();
  } catch (err) {
    if (err instanceof EngineError) return err;
    throw err;
  }
  throw new Error('expected an EngineError');
}

describe('ModuleRegistry', () => {
  const calls = new CallLog();

  test('builds a plan for a valid graph', () => {
    const registry = ModuleRegistry.build([
      fakeModule('system-prep', calls),
      fakeModule('desktop', calls, { dependsOn: ['system-prep'] }),
      fakeModule('rdp-server', calls, { dependsOn: ['desktop'] }),
    ]);

    expect(registry.size).toBe(3);
    expect(registry.plan.order).toEqual(['system-prep', 'desktop', 'rdp-server']);
    expect(registry.ids()).toEqual(['system-prep', 'desktop', 'rdp-server']);
    expect(registry.has('desktop')).toBe(true);
    expect(registry.get('missing')).toBeUndefined();
  });

  test('rejects a cycle naming every member', () => {
    const err = buildError(() =>
      ModuleRegistry.build([
        fakeModule('A', calls, { dependsOn: ['B'] }),
        fakeModule('B', calls, { dependsOn: ['A'] }),
      ]),
    );

    expect(err.code).toBe('CONFIGURATION.CYCLE');
    expect(err.kind).toBe('ConfigurationError');
    expect(err.message).toBe('Dependency cycle detected: A -> B -> A');
    expect(err.typedError.details?.modules).toEqual(['A', 'B']);
  });

  test('rejects an unresolved dependency', () => {
    const err = buildError(() => ModuleRegistry.build([fakeModule('A', calls, { dependsOn: ['ghost'] })]));

    expect(err.code).toBe('CONFIGURATION.UNRESOLVED_DEPENDENCY');
    expect(err.typedError.moduleId).toBe('A');
    expect(err.message).toBe('Module "A" depends on unregistered module "ghost"');
  });

  test('rejects duplicate ids', () => {
    const err = buildError(() => ModuleRegistry.build([fakeModule('A', calls), fakeModule('A', calls)]));
    expect(err.code).toBe('CONFIGURATION.DUPLICATE_MODULE');
  });

  test('rejects malformed ids', () => {
    const err = buildError(() => ModuleRegistry.build([fakeModule('bad id', calls)]));
    expect(err.code).toBe('ARGUMENT.INVALID_MODULE_ID');
  });

  test('lists remaining errors in the details of the first', () => {
    const err = buildError(() =>
      ModuleRegistry.build([
        fakeModule('A', calls, { dependsOn: ['x'] }),
        fakeModule('B', calls, { dependsOn: ['y'] }),
      ]),
    );
    expect(err.typedError.details?.additionalErrors).toEqual(['Module "B" depends on unregistered module "y"']);
  });

  test('empty registry has an empty plan', () => {
    const registry = ModuleRegistry.build([]);
    expect(registry.plan).toEqual({ batches: [], order: [] });
  });

  test('dependentsOf lists direct dependents in registration order', () => {
    const registry = ModuleRegistry.build([
      fakeModule('base', calls),
      fakeModule('web', calls, { dependsOn: ['base'] }),
      fakeModule('db', calls, { dependsOn: ['base', 'base'] }),
      fakeModule('app', calls, { dependsOn: ['web'] }),
    ]);
    expect(registry.dependentsOf('base')).toEqual(['web', 'db']);
    expect(registry.get('db')?.dependsOn).toEqual(['base']);
  });
});

describe('validateModules', () => {
  test('skips cycle detection while dependencies are unresolved', () => {
    const calls = new CallLog();
    const result = validateModules([
      fakeModule('A', calls, { dependsOn: ['B', 'missing'] }),
      fakeModule('B', calls, { dependsOn: ['A'] }),
    ]);
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.code)).toEqual(['CONFIGURATION.UNRESOLVED_DEPENDENCY']);
  });
});
