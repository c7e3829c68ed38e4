/**
 * Tag types shared by scopes and reporters.
 */

/** Frozen tag record handed to reporters and snapshot leaves. */
export type Tags = Readonly<Record<string, string>>;

/** Immutable, order-independent set of string tags. Exposes read operations only. */
export interface TagSet {
  readonly size: number;
  get(key: string): string | undefined;
  has(key: string): boolean;
  /** Keys in ascending order. */
  keys(): string[];
  /** Entries in ascending key order. */
  entries(): Array<[string, string]>;
  /** Frozen record view of the set. The same object is returned on every call. */
  toRecord(): Tags;
}
