/**
 * Roster Normalizer
 * Maps raw faction tags and exported unit names onto the canonical
 * vocabulary of the reference data.
 */

import type { Faction, FactionResolution, Roster, RosterDiagnostic, Unit } from '../types';
import type { Logger } from '../utils/logger';
import { defaultLogger } from '../utils/logger';
import { foldName, foldedIndex } from './tables';

/**
 * The part of the reference data the normalizer needs
 */
export interface FactionDirectory {
  getFaction(id: string): Faction | undefined;
  findFactionByName(name: string): Faction | undefined;
}

export interface NormalizerOptions {
  factions: FactionDirectory;
  aliases: ReadonlyMap<string, string>;
  renames: ReadonlyMap<string, string>;
  logger?: Logger;
}

// Diagnostics produced while parsing; everything else is recomputed here
const PARSER_DIAGNOSTICS = new Set<RosterDiagnostic['code']>(['empty-keywords']);

export class RosterNormalizer {
  private readonly factions: FactionDirectory;
  private readonly aliases: ReadonlyMap<string, string>;
  private readonly renames: ReadonlyMap<string, string>;
  private readonly foldedRenames: ReadonlyMap<string, string>;
  private readonly logger: Logger;

  constructor(options: NormalizerOptions) {
    this.factions = options.factions;
    this.aliases = options.aliases;
    this.renames = options.renames;
    this.foldedRenames = foldedIndex(options.renames);
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Resolve a raw faction tag to a canonical faction id, or null.
   * Canonical ids resolve to themselves so normalizing twice changes nothing.
   */
  resolveFaction(tag: string): string | null {
    if (!tag) return null;

    const direct = this.factions.getFaction(tag);
    if (direct) return direct.id;

    const aliased = this.aliases.get(tag);
    if (aliased !== undefined && this.factions.getFaction(aliased)) {
      return aliased;
    }

    return this.factions.findFactionByName(tag)?.id ?? null;
  }

  /**
   * Return a normalized copy of the roster; the input is left untouched
   */
  normalize(roster: Roster): Roster {
    const diagnostics: RosterDiagnostic[] = roster.diagnostics.filter(diagnostic =>
      PARSER_DIAGNOSTICS.has(diagnostic.code)
    );

    const factions: FactionResolution[] = roster.factionTags.map(tag => ({
      tag,
      factionId: this.resolveFaction(tag)
    }));
    for (const resolution of factions) {
      if (resolution.factionId === null) {
        this.logger.warn(`Unresolved faction "${resolution.tag}"; only generic stratagems apply to it`);
        diagnostics.push({ code: 'unresolved-faction', tag: resolution.tag });
      }
    }

    const units = roster.units.map(unit => this.normalizeUnit(unit, diagnostics));

    return {
      ...roster,
      factionTags: [...roster.factionTags],
      forces: roster.forces.map(force => ({ ...force })),
      detachments: roster.detachments.map(detachment => ({ ...detachment, rules: [...detachment.rules] })),
      units,
      factions,
      diagnostics,
      normalized: true
    };
  }

  private normalizeUnit(unit: Unit, diagnostics: RosterDiagnostic[]): Unit {
    const factionId = this.resolveFaction(unit.factionId);
    if (factionId === null) {
      diagnostics.push({ code: 'unresolved-unit-faction', unitId: unit.id, factionId: unit.factionId });
    }

    const renamed = this.renames.get(unit.name);
    if (renamed === undefined) {
      const candidate = this.foldedRenames.get(foldName(unit.name));
      if (candidate !== undefined) {
        this.logger.warn(`Unit "${unit.name}" was not renamed: only "${candidate}" is listed, which differs in case or punctuation`);
        diagnostics.push({ code: 'unresolved-unit-rename', unitId: unit.id, name: unit.name, candidate });
      }
    }

    return {
      ...unit,
      canonicalName: renamed ?? unit.name,
      factionId: factionId ?? unit.factionId,
      factionStatus: factionId === null ? 'unresolved' : 'resolved',
      keywords: [...unit.keywords],
      factionKeywords: [...unit.factionKeywords]
    };
  }
}
