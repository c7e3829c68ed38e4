/**
 * Immutable tag sets and the canonical (prefix, tags) identity key.
 */

import type { TagSet, Tags } from "@scopemeter/sdk";

type TagInput = Readonly<Record<string, string>> | TagSet | null | undefined;

class ImmutableTagSet implements TagSet {
  private readonly values: ReadonlyMap<string, string>;
  private readonly record: Tags;

  constructor(source: Readonly<Record<string, string>>) {
    const sorted = Object.entries(source).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    this.values = new Map(sorted);
    // fromEntries defines own properties, so a "__proto__" key is stored like any other
    this.record = Object.freeze(Object.fromEntries(sorted));
  }

  get size(): number {
    return this.values.size;
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  entries(): Array<[string, string]> {
    return [...this.values];
  }

  toRecord(): Tags {
    return this.record;
  }
}

export const EMPTY_TAGS: TagSet = new ImmutableTagSet({});

function toRecord(input: TagInput): Readonly<Record<string, string>> {
  if (!input) return {};
  return isTagSet(input) ? input.toRecord() : input;
}

function isTagSet(input: Readonly<Record<string, string>> | TagSet): input is TagSet {
  return typeof input.toRecord === "function";
}

export function tagSetOf(tags: TagInput): TagSet {
  if (tags && isTagSet(tags)) return tags;
  const record = toRecord(tags);
  return Object.keys(record).length === 0 ? EMPTY_TAGS : new ImmutableTagSet({ ...record });
}

/** New tag set with `overrides` applied over `parent`. Either side may be absent. */
export function mergeTags(parent: TagInput, overrides: TagInput): TagSet {
  const base = toRecord(parent);
  const extra = toRecord(overrides);
  if (Object.keys(extra).length === 0) return tagSetOf(base);
  return new ImmutableTagSet({ ...base, ...extra });
}

const RESERVED = /[\\+=,]/g;

function escapeKeyPart(part: string): string {
  return part.replace(RESERVED, (ch) => `\\${ch}`);
}

/**
 * Identity key for a (prefix, tags) pair: `prefix+k1=v1,k2=v2` with keys sorted.
 * An empty prefix with no tags yields `"+"`. `\`, `+`, `=` and `,` inside a part
 * are backslash-escaped so distinct pairs never share a key.
 */
export function canonicalKey(prefix: string | null | undefined, tags: TagInput): string {
  const set = tagSetOf(tags);
  const pairs = set.entries().map(([key, value]) => `${escapeKeyPart(key)}=${escapeKeyPart(value)}`);
  return `${escapeKeyPart(prefix ?? "")}+${pairs.join(",")}`;
}
