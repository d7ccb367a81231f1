import type { DataDep } from '../types/index.js';
import { UnknownDependencyError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Name-to-descriptor registry
 */
export class DataDepRegistry {
  private readonly entries = new Map<string, DataDep>();

  /**
   * Register a descriptor. A second registration under the same name
   * replaces the first.
   */
  register(dep: DataDep): void {
    if (this.entries.has(dep.name)) {
      logger.warn(`Over-writing registration of the data dependency '${dep.name}'`);
    }
    this.entries.set(dep.name, dep);
    logger.debug(`Registered data dependency '${dep.name}'`);
  }

  get(name: string): DataDep {
    const dep = this.entries.get(name);
    if (!dep) {
      throw new UnknownDependencyError(name);
    }
    return dep;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  list(): DataDep[] {
    return [...this.entries.values()].sort((a, b) => a.name.localeCompare(b.name));
  }
}
