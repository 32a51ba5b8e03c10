/**
 * Alias and rename tables
 * Immutable lookups built once from ordered reference entries.
 */

export interface FactionAlias {
  alias: string;
  factionId: string;
}

export interface UnitRename {
  from: string;
  to: string;
}

export interface DuplicateKey {
  key: string;
  index: number;
}

export interface LookupTable {
  table: ReadonlyMap<string, string>;
  duplicates: DuplicateKey[];
}

/**
 * Build a lookup from [key, value] pairs. The first entry for a key wins,
 * later ones are reported as duplicates.
 */
export function buildLookupTable(pairs: ReadonlyArray<readonly [string, string]>): LookupTable {
  const table = new Map<string, string>();
  const duplicates: DuplicateKey[] = [];

  pairs.forEach(([key, value], index) => {
    if (table.has(key)) {
      duplicates.push({ key, index });
      return;
    }
    table.set(key, value);
  });

  return { table, duplicates };
}

export function createAliasTable(entries: readonly FactionAlias[]): LookupTable {
  return buildLookupTable(entries.map(entry => [entry.alias, entry.factionId] as const));
}

export function createRenameTable(entries: readonly UnitRename[]): LookupTable {
  return buildLookupTable(entries.map(entry => [entry.from, entry.to] as const));
}

/**
 * Case- and apostrophe-insensitive form of a name. Only used to report
 * near misses; lookups themselves are exact.
 */
export function foldName(name: string): string {
  return name
    .toLowerCase()
    .replace(/['‘’`]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Folded key -> original key, first entry wins
 */
export function foldedIndex(table: ReadonlyMap<string, string>): ReadonlyMap<string, string> {
  const index = new Map<string, string>();
  for (const key of table.keys()) {
    const folded = foldName(key);
    if (!index.has(folded)) {
      index.set(folded, key);
    }
  }
  return index;
}
