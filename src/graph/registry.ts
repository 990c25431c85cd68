/**
 * Module registry.
 *
 * Built once per run from explicit descriptors. Validation happens here,
 * before anything runs: ids must be well formed and unique, every
 * dependency must resolve, and the graph must be acyclic.
 */

import { EngineError, TypedError, dependencyCycleError, duplicateModuleError, invalidModuleIdError, unresolvedDependencyError } from '../domain/errors';
import { ExecutionPlan, ModuleDescriptor, isValidModuleId } from '../domain/module';
import { buildExecutionPlan, findCycle } from './planner';

/** Validation result for a set of descriptors. */
export interface RegistryValidationResult {
  valid: boolean;
  errors: TypedError[];
}

/** Validate descriptors without building a registry. */
export function validateModules(descriptors: ReadonlyArray<ModuleDescriptor>): RegistryValidationResult {
  const errors: TypedError[] = [];
  const seen = new Set<string>();

  for (const descriptor of descriptors) {
    if (!isValidModuleId(descriptor.id)) {
      errors.push(invalidModuleIdError(descriptor.id));
      continue;
    }
    if (seen.has(descriptor.id)) {
      errors.push(duplicateModuleError(descriptor.id));
    }
    seen.add(descriptor.id);
  }

  for (const descriptor of descriptors) {
    for (const dep of descriptor.dependsOn) {
      if (!seen.has(dep)) {
        errors.push(unresolvedDependencyError(descriptor.id, dep));
      }
    }
  }

  // Cycle detection only makes sense over a resolvable graph.
  if (errors.length === 0) {
    const cycle = findCycle(descriptors);
    if (cycle) errors.push(dependencyCycleError(cycle));
  }

  return { valid: errors.length === 0, errors };
}

function freezeDescriptor(descriptor: ModuleDescriptor): Readonly<ModuleDescriptor> {
  return Object.freeze({
    ...descriptor,
    dependsOn: Object.freeze([...new Set(descriptor.dependsOn)]),
  });
}

export class ModuleRegistry {
  private constructor(
    private readonly descriptors: ReadonlyMap<string, Readonly<ModuleDescriptor>>,
    /** The batched plan, computed once at build time. */
    readonly plan: ExecutionPlan,
  ) {}

  /**
   * Build and validate the registry. Throws an EngineError carrying the
   * first ConfigurationError; all errors are listed in its details.
   */
  static build(descriptors: ReadonlyArray<ModuleDescriptor>): ModuleRegistry {
    const validation = validateModules(descriptors);
    if (!validation.valid) {
      const [first, ...rest] = validation.errors;
      throw new EngineError({
        ...first,
        details: { ...first.details, additionalErrors: rest.map((e) => e.message) },
      });
    }

    const frozen = descriptors.map(freezeDescriptor);
    const plan = buildExecutionPlan(frozen);
    if (!plan) {
      // validateModules already rejects cycles; kept as an invariant check.
      throw new EngineError(dependencyCycleError(findCycle(frozen) ?? frozen.map((d) => d.id)));
    }
    return new ModuleRegistry(new Map(frozen.map((d) => [d.id, d])), plan);
  }

  get size(): number {
    return this.descriptors.size;
  }

  has(id: string): boolean {
    return this.descriptors.has(id);
  }

  get(id: string): Readonly<ModuleDescriptor> | undefined {
    return this.descriptors.get(id);
  }

  /** Module ids in registration order. */
  ids(): string[] {
    return [...this.descriptors.keys()];
  }

  /** Modules that list `id` as a direct dependency. */
  dependentsOf(id: string): string[] {
    return this.ids().filter((other) => this.descriptors.get(other)?.dependsOn.includes(id));
  }
}
