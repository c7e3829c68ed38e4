/**
 * ScopeRegistry — deduplicating store of every scope in one root tree.
 */

import type { Logger } from "@scopemeter/shared";
import { AllocationMap } from "./allocation-map.js";
import type { Scope } from "./scope.js";

export interface ScopeRegistry {
  /** The scope for `identityKey`, created with `factory` the first time the key is seen. */
  getOrCreate(identityKey: string, factory: () => Scope): Scope;
  get(identityKey: string): Scope | undefined;
  /** Scopes present at call time, in creation order. */
  scopes(): Scope[];
  readonly size: number;
}

export function createScopeRegistry(logger: Logger): ScopeRegistry {
  const subscopes = new AllocationMap<Scope>("scope");

  return {
    getOrCreate(identityKey: string, factory: () => Scope): Scope {
      return subscopes.getOrAllocate(identityKey, () => {
        logger.debug("Creating scope", { key: identityKey });
        return factory();
      });
    },

    get(identityKey: string): Scope | undefined {
      return subscopes.get(identityKey);
    },

    scopes(): Scope[] {
      return subscopes.values();
    },

    get size(): number {
      return subscopes.size;
    },
  };
}
