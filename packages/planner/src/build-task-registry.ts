/**
 * Build task registry
 *
 * UUID → build task, insert-if-absent. The first task stored under a UUID is
 * kept; later inserts with the same UUID reuse it.
 */

import type { BuildTask } from '@matrixplan/core';

export interface InsertResult {
  task: BuildTask;
  added: boolean;
}

export class BuildTaskRegistry {
  private readonly tasks: Map<string, BuildTask> = new Map();

  /**
   * Store the task built by `createTask` unless the UUID is already present.
   * `createTask` only runs for new UUIDs.
   */
  insertIfAbsent(matrixUuid: string, createTask: () => BuildTask): InsertResult {
    const existing = this.tasks.get(matrixUuid);
    if (existing) {
      return { task: existing, added: false };
    }

    const task = createTask();
    this.tasks.set(matrixUuid, task);
    return { task, added: true };
  }

  has(matrixUuid: string): boolean {
    return this.tasks.has(matrixUuid);
  }

  get(matrixUuid: string): BuildTask | undefined {
    return this.tasks.get(matrixUuid);
  }

  get size(): number {
    return this.tasks.size;
  }

  uuids(): string[] {
    return [...this.tasks.keys()];
  }

  /**
   * Plain record for serialization and hand-off to a builder
   */
  toRecord(): Record<string, BuildTask> {
    return Object.fromEntries(this.tasks);
  }
}

/**
 * Merge registries planned independently (e.g. one per worker).
 * First writer wins: earlier registries take precedence on UUID collisions.
 */
export function mergeBuildTaskRegistries(
  ...registries: ReadonlyArray<Readonly<Record<string, BuildTask>>>
): Record<string, BuildTask> {
  const merged = new BuildTaskRegistry();
  for (const registry of registries) {
    for (const [matrixUuid, task] of Object.entries(registry)) {
      merged.insertIfAbsent(matrixUuid, () => task);
    }
  }
  return merged.toRecord();
}
