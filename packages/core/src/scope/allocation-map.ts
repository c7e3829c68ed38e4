/**
 * Allocate-if-absent map backing a scope's per-kind metrics and the scope registry.
 *
 * Lookups never wait on anything. A miss enters the allocation section for this map,
 * re-checks, allocates and inserts, so every caller gets the first inserted instance.
 * The section is entirely synchronous: no other call can run between the re-check and
 * the insert. Re-entering the section for the same key from inside `allocate` (a cached
 * reporter calling back into its scope) throws, and the section is always left, even
 * when `allocate` throws.
 */

import { AllocationError } from "@scopemeter/sdk";

export class AllocationMap<V> {
  private readonly items = new Map<string, V>();
  private readonly allocating = new Set<string>();

  constructor(private readonly kind: string) {}

  get size(): number {
    return this.items.size;
  }

  get(key: string): V | undefined {
    return this.items.get(key);
  }

  getOrAllocate(key: string, allocate: () => V): V {
    const existing = this.items.get(key);
    if (existing !== undefined) return existing;

    if (this.allocating.has(key)) {
      throw new AllocationError(this.kind, key);
    }
    this.allocating.add(key);
    try {
      let allocated = this.items.get(key);
      if (allocated === undefined) {
        allocated = allocate();
        this.items.set(key, allocated);
      }
      return allocated;
    } finally {
      this.allocating.delete(key);
    }
  }

  /** Entries present at call time, in allocation order. */
  entries(): Array<[string, V]> {
    return [...this.items];
  }

  values(): V[] {
    return [...this.items.values()];
  }
}
