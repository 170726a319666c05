import type {
  EnvironmentEntry,
  EnvironmentSnapshot,
  EnvironmentSource,
} from "./types.ts";

/**
 * Ordinal comparison by code point, so "Z" sorts before "a" and characters
 * outside the BMP sort after U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(i) ?? 0;
    if (ca !== cb) return ca < cb ? -1 : 1;
    i += ca > 0xffff ? 2 : 1;
  }
  return a.length - b.length;
}

function compareNames(a: EnvironmentEntry, b: EnvironmentEntry): number {
  return compareCodePoints(a[0], b[0]);
}

/**
 * Capture an environment source as a frozen snapshot sorted by name.
 * Entries whose value is undefined are dropped.
 */
export function captureEnvironment(source: EnvironmentSource): EnvironmentSnapshot {
  const entries: EnvironmentEntry[] = [];
  for (const [name, value] of Object.entries(source)) {
    if (value !== undefined) {
      entries.push(Object.freeze([name, value] as const));
    }
  }
  entries.sort(compareNames);
  return Object.freeze(entries);
}
