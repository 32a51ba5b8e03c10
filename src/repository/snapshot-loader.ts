/**
 * Reference snapshot loader
 * Validates a snapshot entry by entry and builds the repository plus the
 * alias and rename tables. Bad entries are skipped and reported; only a
 * snapshot that is unreadable as a whole throws.
 */

import { readFileSync } from 'fs';
import type { Faction, FactionScope, MalformedReferenceEntry, Stratagem, UnitPredicate } from '../types';
import { SnapshotError } from '../errors';
import type { Logger } from '../utils/logger';
import { defaultLogger } from '../utils/logger';
import { buildLookupTable } from '../normalizer/tables';
import type { LookupTable } from '../normalizer/tables';
import { parsePhaseLabel } from './phases';
import { StratagemRepository } from './stratagem-repository';
import {
  FactionAliasEntrySchema,
  FactionEntrySchema,
  SnapshotSchema,
  StratagemEntrySchema,
  UnitPredicateSchema,
  UnitRenameEntrySchema,
  describeIssues
} from './snapshot-schema';
import type { StratagemEntry } from './snapshot-schema';

export interface ReferenceData {
  repository: StratagemRepository;
  aliases: ReadonlyMap<string, string>;
  renames: ReadonlyMap<string, string>;
  issues: readonly MalformedReferenceEntry[];
}

interface Indexed<T> {
  index: number;
  value: T;
}

// ============================================================================
// FACTIONS
// ============================================================================

function loadFactions(entries: unknown[], issues: MalformedReferenceEntry[]): Faction[] {
  const accepted = new Map<string, Indexed<Faction>>();

  entries.forEach((entry, index) => {
    const parsed = FactionEntrySchema.safeParse(entry);
    if (!parsed.success) {
      issues.push({ section: 'factions', index, reason: describeIssues(parsed.error) });
      return;
    }
    const { id, name, parentId } = parsed.data;
    if (accepted.has(id)) {
      issues.push({ section: 'factions', index, id, reason: `duplicate faction id "${id}"` });
      return;
    }
    accepted.set(id, { index, value: parentId ? { id, name, parentId } : { id, name } });
  });

  const reject = (id: string, reason: string) => {
    const rejected = accepted.get(id);
    if (rejected === undefined) return;
    accepted.delete(id);
    issues.push({ section: 'factions', index: rejected.index, id, reason });
  };

  // Repeat until stable: dropping a faction can orphan its children
  let changed = true;
  while (changed) {
    changed = false;

    for (const { value: faction } of Array.from(accepted.values())) {
      if (faction.parentId !== undefined && !accepted.has(faction.parentId)) {
        reject(faction.id, `parent faction "${faction.parentId}" is not defined`);
        changed = true;
      }
    }

    for (const cycle of findParentCycles(accepted)) {
      cycle.forEach(id => reject(id, `parent chain forms a cycle (${cycle.join(' -> ')})`));
      changed = true;
    }
  }

  return Array.from(accepted.values())
    .sort((a, b) => a.index - b.index)
    .map(entry => entry.value);
}

function findParentCycles(factions: ReadonlyMap<string, Indexed<Faction>>): string[][] {
  const cycles: string[][] = [];
  const settled = new Set<string>();

  for (const start of factions.keys()) {
    const path: string[] = [];
    let current: string | undefined = start;
    while (current !== undefined && !settled.has(current)) {
      const position = path.indexOf(current);
      if (position >= 0) {
        cycles.push(path.slice(position));
        break;
      }
      path.push(current);
      current = factions.get(current)?.value.parentId;
    }
    path.forEach(id => settled.add(id));
  }

  return cycles;
}

// ============================================================================
// LOOKUP TABLES
// ============================================================================

function loadLookup(
  section: 'factionAliases' | 'unitRenames',
  entries: unknown[],
  read: (entry: unknown) => { pair: readonly [string, string] } | { error: string },
  issues: MalformedReferenceEntry[]
): LookupTable {
  const accepted: Indexed<readonly [string, string]>[] = [];
  entries.forEach((entry, index) => {
    const result = read(entry);
    if ('error' in result) {
      issues.push({ section, index, reason: result.error });
    } else {
      accepted.push({ index, value: result.pair });
    }
  });

  const lookup = buildLookupTable(accepted.map(entry => entry.value));
  for (const duplicate of lookup.duplicates) {
    issues.push({
      section,
      index: accepted[duplicate.index].index,
      id: duplicate.key,
      reason: `duplicate key "${duplicate.key}"; the first entry is kept`
    });
  }
  return lookup;
}

// ============================================================================
// STRATAGEMS
// ============================================================================

function toFactionScope(scope: StratagemEntry['factionScope']): FactionScope {
  if (scope === undefined) return { kind: 'generic' };
  const factionIds = Array.isArray(scope) ? scope : scope.kind === 'factions' ? scope.factionIds : [];
  return factionIds.length > 0 ? { kind: 'factions', factionIds } : { kind: 'generic' };
}

function toUnitPredicate(raw: unknown): UnitPredicate {
  const parsed = UnitPredicateSchema.safeParse(raw);
  return parsed.success ? parsed.data : { kind: 'unrecognized', reason: describeIssues(parsed.error) };
}

function loadStratagems(
  entries: unknown[],
  factionIds: ReadonlySet<string>,
  issues: MalformedReferenceEntry[]
): Stratagem[] {
  const stratagems: Stratagem[] = [];
  const seen = new Set<string>();

  entries.forEach((entry, index) => {
    const parsed = StratagemEntrySchema.safeParse(entry);
    if (!parsed.success) {
      issues.push({ section: 'stratagems', index, reason: describeIssues(parsed.error) });
      return;
    }

    const data = parsed.data;
    if (seen.has(data.id)) {
      issues.push({ section: 'stratagems', index, id: data.id, reason: `duplicate stratagem id "${data.id}"` });
      return;
    }
    const phase = parsePhaseLabel(data.phase);
    if (phase === undefined) {
      issues.push({ section: 'stratagems', index, id: data.id, reason: `unknown phase "${data.phase}"` });
      return;
    }

    // Unknown scope ids are dropped; an entry left with none is skipped
    let factionScope = toFactionScope(data.factionScope);
    if (factionScope.kind === 'factions') {
      const known = factionScope.factionIds.filter(id => factionIds.has(id));
      for (const id of factionScope.factionIds.filter(id => !factionIds.has(id))) {
        issues.push({ section: 'stratagems', index, id: data.id, reason: `faction scope names unknown faction "${id}"` });
      }
      if (known.length === 0) return;
      factionScope = { kind: 'factions', factionIds: known };
    }
    seen.add(data.id);

    const { units, detachment, armyOfRenown } = data.eligibility;
    stratagems.push({
      id: data.id,
      name: data.name,
      type: data.type,
      phase,
      cost: data.cost,
      factionScope,
      eligibility: {
        units: units === undefined ? undefined : toUnitPredicate(units),
        detachment,
        armyOfRenown
      },
      description: data.description
    });
  });

  return stratagems;
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

/**
 * Build reference data from an already-parsed snapshot document
 */
export function loadReferenceSnapshot(raw: unknown, logger: Logger = defaultLogger): ReferenceData {
  const snapshot = SnapshotSchema.safeParse(raw);
  if (!snapshot.success) {
    throw new SnapshotError(`Reference snapshot is invalid: ${describeIssues(snapshot.error)}`);
  }

  const issues: MalformedReferenceEntry[] = [];
  const factions = loadFactions(snapshot.data.factions, issues);
  const factionIds = new Set(factions.map(faction => faction.id));

  const aliases = loadLookup('factionAliases', snapshot.data.factionAliases, entry => {
    const parsed = FactionAliasEntrySchema.safeParse(entry);
    if (!parsed.success) return { error: describeIssues(parsed.error) };
    if (!factionIds.has(parsed.data.factionId)) {
      return { error: `alias "${parsed.data.alias}" points at unknown faction "${parsed.data.factionId}"` };
    }
    return { pair: [parsed.data.alias, parsed.data.factionId] };
  }, issues);

  const renames = loadLookup('unitRenames', snapshot.data.unitRenames, entry => {
    const parsed = UnitRenameEntrySchema.safeParse(entry);
    return parsed.success ? { pair: [parsed.data.from, parsed.data.to] } : { error: describeIssues(parsed.error) };
  }, issues);

  const stratagems = loadStratagems(snapshot.data.stratagems, factionIds, issues);

  for (const issue of issues) {
    const label = issue.id === undefined ? '' : ` (${issue.id})`;
    logger.warn(`Skipping ${issue.section}[${issue.index}]${label}: ${issue.reason}`);
  }
  logger.debug(`Loaded reference snapshot ${snapshot.data.version}: ${factions.length} factions, ${stratagems.length} stratagems`);

  return {
    repository: new StratagemRepository({
      version: snapshot.data.version,
      factions,
      stratagems,
      issues
    }),
    aliases: aliases.table,
    renames: renames.table,
    issues
  };
}

/**
 * Read and load a snapshot JSON file
 */
export function loadSnapshotFile(path: string, logger: Logger = defaultLogger): ReferenceData {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SnapshotError(`Cannot read reference snapshot ${path}: ${reason}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SnapshotError(`Reference snapshot ${path} is not valid JSON: ${reason}`);
  }

  return loadReferenceSnapshot(raw, logger);
}
