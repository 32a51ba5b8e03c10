/**
 * Tests for stratagem eligibility evaluation
 */

import { describe, it, expect } from 'vitest';
import { evaluate, effectiveFactions, requirementKey } from '../src/engine/eligibility-engine';
import { compilePredicate } from '../src/engine/predicates';
import { parseRoster } from '../src/parser/roster-parser';
import { StratagemRepository } from '../src/repository/stratagem-repository';
import type { Roster, Stratagem, Unit, UnitPredicate } from '../src/types';
import {
  createTestNormalizer,
  loadFixture,
  loadTestReference,
  recordingLogger,
  rosterJson,
  silentLogger
} from './helpers';
import type { ForceSpec } from './helpers';

const reference = loadTestReference();
const { repository } = reference;
const normalizer = createTestNormalizer(reference);

function normalized(document: string | Buffer): Roster {
  return normalizer.normalize(parseRoster(document));
}

function rosterOf(forces: ForceSpec[]): Roster {
  return normalized(rosterJson(forces));
}

const resultIds = (roster: Roster, repo: StratagemRepository = repository) =>
  evaluate(roster, repo, {}, silentLogger).results.map(result => result.stratagemId);

function unit(keywords: string[], overrides: Partial<Unit> = {}): Unit {
  return {
    id: 'u',
    name: 'Unit',
    canonicalName: 'Unit',
    factionId: 'SM',
    factionStatus: 'resolved',
    keywords,
    factionKeywords: [],
    modelCount: 1,
    points: 0,
    forceIndex: 0,
    ...overrides
  };
}

describe('Eligibility Engine', () => {
  describe('strike force roster', () => {
    const roster = normalized(loadFixture('strike-force.ros'));
    const report = evaluate(roster, repository, {}, silentLogger);

    it('should list every usable stratagem with its units, in canonical order', () => {
      expect(report.results).toEqual([
        { stratagemId: 'command-reroll', matchedUnits: [] },
        { stratagemId: 'crusade-relic', matchedUnits: [] },
        { stratagemId: 'insane-bravery', matchedUnits: [] },
        { stratagemId: 'um-courage', matchedUnits: ['u-captain', 'u-intercessors', 'u-intercessors-2'] },
        { stratagemId: 'um-captain-orders', matchedUnits: ['u-captain'] },
        { stratagemId: 'sm-squad-tactics', matchedUnits: ['u-intercessors', 'u-intercessors-2'] },
        {
          stratagemId: 'sm-armour-of-contempt',
          matchedUnits: ['u-captain', 'u-intercessors', 'u-intercessors-2', 'u-rhino']
        },
        { stratagemId: 'smokescreen', matchedUnits: ['u-rhino'] },
        { stratagemId: 'tank-shock', matchedUnits: ['u-rhino'] },
        { stratagemId: 'epic-challenge', matchedUnits: ['u-captain'] },
        { stratagemId: 'counter-offensive', matchedUnits: [] }
      ]);
    });

    it('should report diagnostics for the roster', () => {
      expect(report.diagnostics).toEqual({
        unresolvedFaction: false,
        unresolvedTags: [],
        unitsWithoutKeywords: ['u-servitors'],
        unresolvedUnits: [],
        malformedStratagems: []
      });
    });

    it('should compute the effective faction set with ancestors', () => {
      expect(effectiveFactions(roster, repository)).toEqual(['SM', 'UM']);
    });

    it('should be deterministic', () => {
      const again = evaluate(roster, repository, {}, silentLogger);
      expect(JSON.stringify(again)).toBe(JSON.stringify(report));
    });
  });

  describe('scenarios', () => {
    it('should offer generic and Adeptus Astartes stratagems to an Ultramarines character', () => {
      const roster = rosterOf([{
        catalogueName: 'Imperium - Ultramarines',
        units: [{ id: 'lt', name: 'Lieutenant', type: 'model', keywords: ['Infantry', 'Character'] }]
      }]);

      expect(roster.factions).toEqual([{ tag: 'Ultramarines', factionId: 'UM' }]);
      expect(resultIds(roster)).toEqual([
        'command-reroll',
        'crusade-relic',
        'insane-bravery',
        'um-courage',
        'epic-challenge',
        'counter-offensive'
      ]);
      expect(resultIds(roster)).not.toContain('tank-shock');
    });

    it('should fall back to generic stratagems for an unknown faction', () => {
      const roster = rosterOf([{
        catalogueName: 'Homebrew Faction',
        units: [{ id: 'h1', name: 'Warband', keywords: ['Infantry'] }]
      }]);
      const report = evaluate(roster, repository, {}, silentLogger);

      expect(report.results.map(result => result.stratagemId)).toEqual([
        'command-reroll',
        'crusade-relic',
        'insane-bravery',
        'counter-offensive'
      ]);
      expect(report.diagnostics.unresolvedFaction).toBe(true);
      expect(report.diagnostics.unresolvedTags).toEqual(['Homebrew Faction']);
      expect(report.diagnostics.unresolvedUnits).toEqual(['h1']);
      expect(roster.diagnostics).toContainEqual({ code: 'unresolved-faction', tag: 'Homebrew Faction' });
    });

    it('should match detachment stratagems only when that detachment is present', () => {
      const units = [{ id: 'i1', name: 'Intercessor Squad', keywords: ['Faction: Adeptus Astartes', 'Infantry'] }];
      const withGladius = rosterOf([
        { catalogueName: 'Imperium - Space Marines', detachment: 'Ironstorm Spearhead', units },
        { catalogueName: 'Imperium - Space Marines', detachment: 'Gladius Task Force', units: [] }
      ]);
      const withoutGladius = rosterOf([
        { catalogueName: 'Imperium - Space Marines', detachment: 'Ironstorm Spearhead', units },
        { catalogueName: 'Imperium - Space Marines', detachment: 'Firestorm Assault Force', units: [] }
      ]);

      expect(resultIds(withGladius)).toContain('sm-armour-of-contempt');
      expect(resultIds(withoutGladius)).not.toContain('sm-armour-of-contempt');
    });

    it('should compare detachment names without case or spacing', () => {
      const roster = rosterOf([{
        catalogueName: 'Imperium - Space Marines',
        detachment: 'GladiusTask  force',
        units: [{ id: 'i1', name: 'Intercessor Squad', keywords: ['Faction: Adeptus Astartes'] }]
      }]);

      expect(requirementKey('Gladius Task Force')).toBe('gladiustaskforce');
      expect(resultIds(roster)).toContain('sm-armour-of-contempt');
    });

    it('should require the matching Army of Renown', () => {
      const renowned = rosterOf([{ catalogueName: 'Imperium - Space Marines', armyOfRenown: 'Vanguard Spearhead', units: [] }]);
      const plain = rosterOf([{ catalogueName: 'Imperium - Space Marines', units: [] }]);

      expect(resultIds(renowned)).toContain('sm-renown-ambush');
      expect(resultIds(plain)).not.toContain('sm-renown-ambush');
    });
  });

  describe('faction scope', () => {
    it('should never offer stratagems of a faction outside the effective set', () => {
      const roster = rosterOf([{
        catalogueName: 'Imperium - Astra Militarum',
        units: [{ id: 'lr', name: 'Leman Russ', type: 'model', keywords: ['Vehicle'] }]
      }]);
      const found = resultIds(roster);

      expect(found).toContain('am-armoured-might');
      expect(found.filter(id => id.startsWith('sm-') || id.startsWith('um-') || id.startsWith('nec-'))).toEqual([]);
    });

    it('should only match units of a related faction for scoped stratagems', () => {
      const roster = rosterOf([
        { catalogueName: 'Imperium - Space Marines', units: [{ id: 'sm', name: 'Tactical Squad', keywords: ['Infantry'] }] },
        { catalogueName: 'Imperium - Astra Militarum', units: [{ id: 'am', name: 'Infantry Squad', keywords: ['Infantry'] }] }
      ]);
      const report = evaluate(roster, repository, {}, silentLogger);

      expect(report.results.find(result => result.stratagemId === 'sm-squad-tactics')?.matchedUnits).toEqual(['sm']);
    });
  });

  describe('options', () => {
    const roster = rosterOf([{
      catalogueName: 'Imperium - Space Marines',
      units: [{ id: 'i1', name: 'Intercessor Squad', keywords: ['Infantry'] }]
    }]);

    it('should drop core stratagems when asked', () => {
      const report = evaluate(roster, repository, { includeCore: false }, silentLogger);
      expect(report.results.map(result => result.stratagemId)).toEqual(['crusade-relic', 'sm-squad-tactics']);
    });

    it('should drop excluded types and ignored phases', () => {
      const report = evaluate(roster, repository, { excludedTypes: ['Crusade'], ignoredPhases: ['any', 'fight'] }, silentLogger);
      expect(report.results.map(result => result.stratagemId)).toEqual(['insane-bravery', 'sm-squad-tactics']);
    });
  });

  describe('malformed predicates', () => {
    const base: Stratagem = {
      id: 'base',
      name: 'Base',
      type: 'Stratagem',
      phase: 'fight',
      cost: 1,
      factionScope: { kind: 'generic' },
      eligibility: {}
    };

    it('should skip a malformed predicate with a warning and keep evaluating', () => {
      const logger = recordingLogger();
      const local = new StratagemRepository({
        version: 'v',
        factions: [{ id: 'SM', name: 'Adeptus Astartes' }],
        stratagems: [
          { ...base, id: 'broken', eligibility: { units: { kind: 'keywords', all: [] } } },
          { ...base, id: 'fine', eligibility: { units: { kind: 'keywords', all: ['INFANTRY'] } } },
          { ...base, id: 'odd', eligibility: { units: { kind: 'unrecognized', reason: 'kind: Invalid discriminator value' } } }
        ]
      });
      const roster = rosterOf([{ catalogueName: 'Space Marines', units: [{ id: 'i1', name: 'Squad', keywords: ['Infantry'] }] }]);
      const report = evaluate(roster, local, {}, logger);

      expect(report.results).toEqual([{ stratagemId: 'fine', matchedUnits: ['i1'] }]);
      expect(report.diagnostics.malformedStratagems).toEqual(['broken', 'odd']);
      expect(logger.warn).toHaveBeenCalledWith(
        'Stratagem "broken" has a malformed eligibility predicate: keywords predicate needs a non-empty "all" list'
      );
    });

    it('should always include generic roster-wide stratagems', () => {
      const rosters = [
        rosterOf([{ catalogueName: 'Imperium - Space Marines', units: [] }]),
        rosterOf([{ catalogueName: 'Homebrew Faction', units: [{ name: 'Mystery', keywords: [] }] }]),
        parseRoster(rosterJson([{ catalogueName: 'Necrons', units: [] }]))
      ];
      const rosterWide = repository.genericStratagems()
        .filter(stratagem => stratagem.eligibility.units === undefined)
        .map(stratagem => stratagem.id);

      for (const roster of rosters) {
        const found = resultIds(roster);
        rosterWide.forEach(id => expect(found).toContain(id));
      }
    });
  });

  describe('compilePredicate', () => {
    it('should match keyword supersets only', () => {
      const compiled = compilePredicate({ kind: 'keywords', all: ['infantry', 'Character'], none: ['Titanic'] });
      if (!compiled.valid) throw new Error(compiled.reason);

      expect(compiled.test(unit(['CHARACTER', 'INFANTRY', 'PHOBOS']))).toBe(true);
      expect(compiled.test(unit(['INFANTRY']))).toBe(false);
      expect(compiled.test(unit(['CHARACTER', 'INFANTRY', 'TITANIC']))).toBe(false);
    });

    it('should match canonical unit names and disjunctions', () => {
      const predicate: UnitPredicate = {
        kind: 'any',
        of: [
          { kind: 'unit-name', names: ['Captain'] },
          { kind: 'keywords', all: ['VEHICLE'] }
        ]
      };
      const compiled = compilePredicate(predicate);
      if (!compiled.valid) throw new Error(compiled.reason);

      expect(compiled.test(unit([], { canonicalName: 'captain' }))).toBe(true);
      expect(compiled.test(unit(['VEHICLE']))).toBe(true);
      expect(compiled.test(unit(['INFANTRY'], { name: 'Captain', canonicalName: 'Lieutenant' }))).toBe(false);
    });

    it('should reject malformed structures', () => {
      expect(compilePredicate({ kind: 'unit-name', names: [] })).toEqual({
        valid: false,
        reason: 'unit-name predicate needs a non-empty "names" list'
      });
      expect(compilePredicate({ kind: 'any', of: [{ kind: 'keywords', all: ['  '] }] })).toEqual({
        valid: false,
        reason: 'keywords predicate needs a non-empty "all" list'
      });
    });
  });
});
