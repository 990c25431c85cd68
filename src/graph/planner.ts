/**
 * Execution planner.
 *
 * Turns a validated module graph into ordered batches. A module is ready
 * once every dependency is placed in an earlier batch. The first ready
 * module (registration order) opens the next batch; ready modules sharing
 * its parallel-group tag join it. Untagged modules run alone.
 */

import { ExecutionBatch, ExecutionPlan, ModuleDescriptor } from '../domain/module';

/**
 * Find one dependency cycle, returned as a closed path (first id repeated
 * at the end). Returns null for an acyclic graph. Dependencies that do not
 * resolve are ignored here.
 */
export function findCycle(modules: ReadonlyArray<Pick<ModuleDescriptor, 'id' | 'dependsOn'>>): string[] | null {
  const byId = new Map(modules.map((m) => [m.id, m]));
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];

  const visit = (id: string): string[] | null => {
    state.set(id, 'visiting');
    stack.push(id);
    for (const dep of byId.get(id)?.dependsOn ?? []) {
      if (!byId.has(dep)) continue;
      const depState = state.get(dep);
      if (depState === 'visiting') {
        return [...stack.slice(stack.indexOf(dep)), dep];
      }
      if (depState === undefined) {
        const cycle = visit(dep);
        if (cycle) return cycle;
      }
    }
    stack.pop();
    state.set(id, 'done');
    return null;
  };

  for (const module of modules) {
    if (state.has(module.id)) continue;
    const cycle = visit(module.id);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Build the batched plan. Returns null if the graph cannot be fully
 * placed (a cycle); callers validate with findCycle first to report it.
 */
export function buildExecutionPlan(
  modules: ReadonlyArray<Pick<ModuleDescriptor, 'id' | 'dependsOn' | 'parallelGroup'>>,
): ExecutionPlan | null {
  const placed = new Set<string>();
  const remaining = [...modules];
  const batches: ExecutionBatch[] = [];

  while (remaining.length > 0) {
    const ready = remaining.filter((m) => m.dependsOn.every((dep) => placed.has(dep)));
    if (ready.length === 0) return null;

    const lead = ready[0];
    const members = lead.parallelGroup
      ? ready.filter((m) => m.parallelGroup === lead.parallelGroup)
      : [lead];

    const batch: ExecutionBatch = {
      index: batches.length,
      modules: members.map((m) => m.id),
    };
    if (lead.parallelGroup) batch.parallelGroup = lead.parallelGroup;
    batches.push(batch);

    for (const member of members) {
      placed.add(member.id);
      remaining.splice(remaining.indexOf(member), 1);
    }
  }

  return {
    batches,
    order: batches.flatMap((b) => b.modules),
  };
}
