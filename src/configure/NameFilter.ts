/**
 * Package / artifact name filters.
 *
 * Names are matched exactly (case-sensitive) against the declared, unprefixed id.
 */

export type NameFilter = readonly string[];

/**
 * "Pkg1, Pkg2,,Pkg3" → ["Pkg1", "Pkg2", "Pkg3"]
 */
export function parseNameFilter(value: string | undefined): NameFilter {
  if (!value) return [];
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * An empty filter includes everything.
 */
export function isIncluded(name: string, filter: NameFilter): boolean {
  return filter.length === 0 || filter.includes(name);
}
