/**
 * Plain-text rendering of a roster analysis for the command line
 */

import type { RosterAnalysis } from './pipeline';
import type { StratagemRepository } from './repository/stratagem-repository';

function stratagemLabel(repository: StratagemRepository, id: string): string {
  const stratagem = repository.getStratagem(id);
  return stratagem ? `[${stratagem.phase}] ${stratagem.name} (${stratagem.cost}CP)` : id;
}

function factionWarning({ roster, report }: RosterAnalysis): string | undefined {
  const { unresolvedFaction, unresolvedTags } = report.diagnostics;
  if (!unresolvedFaction) return undefined;

  const anyResolved = roster.factions.some(resolution => resolution.factionId !== null);
  if (unresolvedTags.length === 0) {
    return 'Warning: roster names no faction, only generic stratagems are listed';
  }
  return anyResolved
    ? `Warning: unresolved faction tags ${unresolvedTags.join(', ')}; their stratagems are not listed`
    : `Warning: no faction could be resolved (${unresolvedTags.join(', ')}), only generic stratagems are listed`;
}

export function formatAnalysis(analysis: RosterAnalysis, repository: StratagemRepository): string {
  const { roster, report } = analysis;
  const lines: string[] = [];
  lines.push(`${roster.armyName ?? 'Unnamed roster'} (${roster.units.length} units)`);
  for (const resolution of roster.factions) {
    lines.push(`  Faction: ${resolution.tag} -> ${resolution.factionId ?? 'unresolved'}`);
  }
  for (const detachment of roster.detachments) {
    lines.push(`  Detachment: ${detachment.name}`);
  }
  lines.push('');

  const unitNames = new Map(roster.units.map(unit => [unit.id, unit.canonicalName]));
  for (const result of report.results) {
    const label = stratagemLabel(repository, result.stratagemId);
    const targets = result.matchedUnits.map(id => unitNames.get(id) ?? id);
    lines.push(targets.length > 0 ? `${label}: ${targets.join(', ')}` : label);
  }

  const warning = factionWarning(analysis);
  if (warning) {
    lines.push('', warning);
  }
  if (report.diagnostics.malformedStratagems.length > 0) {
    lines.push(`Warning: skipped malformed stratagems ${report.diagnostics.malformedStratagems.join(', ')}`);
  }
  return lines.join('\n');
}
