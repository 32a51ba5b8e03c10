/**
 * Stratagem Eligibility Engine
 *
 * Joins a normalized roster with the reference repository and reports every
 * stratagem the army can use, with the units that satisfy its requirements.
 */

import type {
  EligibilityResult,
  EvaluationDiagnostics,
  EvaluationOptions,
  EvaluationReport,
  Roster,
  Stratagem,
  Unit
} from '../types';
import type { StratagemRepository } from '../repository/stratagem-repository';
import { compareStratagems } from '../repository/stratagem-repository';
import type { Logger } from '../utils/logger';
import { defaultLogger } from '../utils/logger';
import { compilePredicate } from './predicates';

/**
 * Detachment and Army of Renown names compare without case or spaces
 */
export function requirementKey(name: string): string {
  return name.toLowerCase().replace(/\s+/g, '');
}

function isCoreType(type: string): boolean {
  return /\bcore\b/i.test(type);
}

/**
 * Resolved factions of the roster plus all of their ancestors
 */
export function effectiveFactions(roster: Roster, repository: StratagemRepository): string[] {
  const effective: string[] = [];
  for (const { factionId } of roster.factions) {
    if (factionId === null) continue;
    for (const id of [factionId, ...repository.ancestorsOf(factionId)]) {
      if (!effective.includes(id)) effective.push(id);
    }
  }
  return effective;
}

function collectCandidates(factionIds: readonly string[], repository: StratagemRepository): Stratagem[] {
  if (factionIds.length === 0) {
    return [...repository.genericStratagems()];
  }

  const byId = new Map<string, Stratagem>();
  for (const factionId of factionIds) {
    for (const stratagem of repository.stratagemsForFaction(factionId)) {
      if (!byId.has(stratagem.id)) byId.set(stratagem.id, stratagem);
    }
  }
  return Array.from(byId.values());
}

function isWanted(stratagem: Stratagem, options: EvaluationOptions): boolean {
  if (options.includeCore === false && isCoreType(stratagem.type)) return false;
  if (options.ignoredPhases?.includes(stratagem.phase)) return false;

  const type = stratagem.type.toLowerCase();
  return !(options.excludedTypes ?? []).some(excluded => excluded !== '' && type.includes(excluded.toLowerCase()));
}

function meetsRosterRequirements(stratagem: Stratagem, roster: Roster): boolean {
  const { detachment, armyOfRenown } = stratagem.eligibility;

  if (detachment !== undefined) {
    const wanted = requirementKey(detachment);
    if (!roster.detachments.some(candidate => requirementKey(candidate.name) === wanted)) {
      return false;
    }
  }

  if (armyOfRenown !== undefined) {
    if (roster.armyOfRenown === undefined || requirementKey(roster.armyOfRenown) !== requirementKey(armyOfRenown)) {
      return false;
    }
  }

  return true;
}

/**
 * Units a stratagem can target: faction-scoped stratagems only reach units
 * of a related faction
 */
function unitsInScope(stratagem: Stratagem, units: readonly Unit[], repository: StratagemRepository): readonly Unit[] {
  const scope = stratagem.factionScope;
  if (scope.kind === 'generic') return units;
  return units.filter(unit =>
    unit.factionStatus === 'resolved' &&
    scope.factionIds.some(scopeId => repository.isRelated(unit.factionId, scopeId))
  );
}

function buildDiagnostics(roster: Roster, resolvedCount: number, malformed: string[]): EvaluationDiagnostics {
  const unresolvedTags = roster.factions
    .filter(resolution => resolution.factionId === null)
    .map(resolution => resolution.tag);

  return {
    unresolvedFaction: unresolvedTags.length > 0 || resolvedCount === 0,
    unresolvedTags,
    unitsWithoutKeywords: roster.units.filter(unit => unit.keywords.length === 0).map(unit => unit.id),
    unresolvedUnits: roster.units.filter(unit => unit.factionStatus === 'unresolved').map(unit => unit.id),
    malformedStratagems: malformed
  };
}

/**
 * Evaluate every candidate stratagem against the roster.
 * Results are ordered by phase, then cost, then id.
 */
export function evaluate(
  roster: Roster,
  repository: StratagemRepository,
  options: EvaluationOptions = {},
  logger: Logger = defaultLogger
): EvaluationReport {
  const resolved = roster.factions.filter(resolution => resolution.factionId !== null);
  const factionIds = effectiveFactions(roster, repository);
  const candidates = collectCandidates(factionIds, repository)
    .filter(stratagem => isWanted(stratagem, options))
    .sort(compareStratagems);

  const results: EligibilityResult[] = [];
  const malformed: string[] = [];

  for (const stratagem of candidates) {
    if (!meetsRosterRequirements(stratagem, roster)) continue;

    const predicate = stratagem.eligibility.units;
    if (predicate === undefined) {
      results.push({ stratagemId: stratagem.id, matchedUnits: [] });
      continue;
    }

    const compiled = compilePredicate(predicate);
    if (!compiled.valid) {
      logger.warn(`Stratagem "${stratagem.id}" has a malformed eligibility predicate: ${compiled.reason}`);
      malformed.push(stratagem.id);
      continue;
    }

    const matchedUnits = unitsInScope(stratagem, roster.units, repository)
      .filter(compiled.test)
      .map(unit => unit.id);
    if (matchedUnits.length > 0) {
      results.push({ stratagemId: stratagem.id, matchedUnits });
    }
  }

  const diagnostics = buildDiagnostics(roster, resolved.length, malformed);
  if (diagnostics.unresolvedFaction) {
    const tags = diagnostics.unresolvedTags.length > 0 ? diagnostics.unresolvedTags.join(', ') : 'none found';
    logger.warn(`Roster faction could not be fully resolved (${tags}); generic stratagems are still evaluated`);
  }

  return { results, diagnostics };
}
