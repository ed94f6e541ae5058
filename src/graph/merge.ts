/**
 * Deterministic record layering: defaults first, each later record wins.
 */

/**
 * Shallow merge where later records override earlier ones. Keys keep the
 * order in which they first appear; `undefined` never erases a value.
 *
 * `mergeRecords({ A: 1, B: 2 }, { B: 3, C: 4 })` → `{ A: 1, B: 3, C: 4 }`
 */
export function mergeRecords<V>(
  defaults: Readonly<Record<string, V>>,
  ...overrides: ReadonlyArray<Readonly<Record<string, V | undefined>> | undefined>
): Record<string, V> {
  const result: Record<string, V> = { ...defaults };
  for (const layer of overrides) {
    if (!layer) continue;
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      result[key] = value;
    }
  }
  return result;
}

/** Tags merged the same way; caller tags beat template tags. */
export function mergeTags<V extends string | object>(
  base: Readonly<Record<string, V>>,
  ...overrides: ReadonlyArray<Readonly<Record<string, V>> | undefined>
): Record<string, V> {
  return mergeRecords(base, ...overrides);
}
