/**
 * Execution planning for decomposed task graphs.
 *
 * Uses Kahn's algorithm with a smallest-index-first ready list, so the
 * order is stable: among tasks whose dependencies are met, the one
 * declared earliest runs first. Tasks left over when nothing is ready
 * are cycle participants.
 */

import { CycleDetectedError, UnknownDependencyError } from '../errors.js';
import type { ExecutionPlan, Task } from '../types/task.js';

type PlanTask = Pick<Task, 'index' | 'dependencies'>;

/**
 * Check every dependency points at an existing task position.
 */
function validateDependencies(tasks: readonly PlanTask[]): void {
  tasks.forEach((task, position) => {
    for (const dep of task.dependencies) {
      if (!Number.isInteger(dep) || dep < 0 || dep >= tasks.length) {
        throw new UnknownDependencyError(position, dep);
      }
    }
  });
}

function insertSorted(list: number[], value: number): void {
  let i = list.length;
  while (i > 0 && list[i - 1] > value) i--;
  list.splice(i, 0, value);
}

/**
 * Build an execution plan for a task list.
 *
 * Dependencies are task positions. `executionOrder` lists `Task.index`
 * values; `waves` groups tasks whose dependencies are all satisfied by
 * earlier waves.
 *
 * @throws UnknownDependencyError when a dependency is out of range
 * @throws CycleDetectedError when dependencies form a cycle
 */
export function createExecutionPlan(tasks: readonly PlanTask[]): ExecutionPlan {
  validateDependencies(tasks);

  const inDegree = tasks.map((task) => new Set(task.dependencies).size);
  const successors: number[][] = tasks.map(() => []);
  tasks.forEach((task, position) => {
    for (const dep of new Set(task.dependencies)) {
      successors[dep].push(position);
    }
  });

  // ---- Stable topological order ----
  const ready: number[] = [];
  inDegree.forEach((degree, position) => {
    if (degree === 0) ready.push(position);
  });

  const remaining = [...inDegree];
  const order: number[] = [];
  while (ready.length > 0) {
    const position = ready.shift();
    if (position === undefined) break;
    order.push(position);
    for (const next of successors[position]) {
      remaining[next]--;
      if (remaining[next] === 0) insertSorted(ready, next);
    }
  }

  if (order.length < tasks.length) {
    const placed = new Set(order);
    const unresolved = tasks.map((task) => task.index).filter((_index, position) => !placed.has(position));
    throw new CycleDetectedError(unresolved);
  }

  // ---- Waves ----
  const level = new Array<number>(tasks.length).fill(0);
  for (const position of order) {
    for (const dep of tasks[position].dependencies) {
      level[position] = Math.max(level[position], level[dep] + 1);
    }
  }
  const waves: number[][] = [];
  tasks.forEach((task, position) => {
    const wave = level[position];
    while (waves.length <= wave) waves.push([]);
    waves[wave].push(task.index);
  });

  return {
    executionOrder: order.map((position) => tasks[position].index),
    estimatedSteps: tasks.length,
    waves,
  };
}
