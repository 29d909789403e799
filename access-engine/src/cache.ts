/**
 * access-engine - Permission set cache
 *
 * Least-recently-used map of role id -> effective object set. Every
 * invalidation starts a new generation; a set computed under an older
 * generation is refused by `store`, so a walk that raced a mutation never
 * repopulates the cache with stale data.
 */

export class PermissionSetCache {
  private entries = new Map<string, ReadonlySet<string>>();
  private generation = 0;

  constructor(private maxSize: number) {}

  /** Generation to hand back to `store` once the set is computed */
  snapshot(): number {
    return this.generation;
  }

  get(roleId: string): ReadonlySet<string> | undefined {
    const objects = this.entries.get(roleId);
    if (objects !== undefined) {
      // Re-insert to mark as most recently used
      this.entries.delete(roleId);
      this.entries.set(roleId, objects);
    }
    return objects;
  }

  /**
   * Cache `objects` unless the cache was invalidated after `generation`
   */
  store(roleId: string, objects: ReadonlySet<string>, generation: number): boolean {
    if (generation !== this.generation) return false;

    this.entries.delete(roleId);
    if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(roleId, objects);
    return true;
  }

  invalidate(): void {
    this.generation++;
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
