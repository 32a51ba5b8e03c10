/**
 * Type definitions for the roster parser and stratagem eligibility engine
 */

import type { Phase } from '../repository/phases';

export type { Phase };

/**
 * Export schema a roster document was recognised as
 */
export interface SchemaInfo {
  id: 'battlescribe-xml' | 'roster-json';
  format: 'xml' | 'json';
  version: string;
}

/**
 * One force (catalogue) inside a roster
 */
export interface Force {
  index: number;
  name: string;
  catalogueName: string;
  factionTag: string;
}

/**
 * Detachment chosen for a force
 */
export interface Detachment {
  name: string;
  forceIndex: number;
  rules: string[];       // Names of the rules attached to the detachment selection
}

/**
 * 'raw' until the normalizer has looked at the unit
 */
export type FactionStatus = 'raw' | 'resolved' | 'unresolved';

/**
 * Army list entry
 */
export interface Unit {
  id: string;
  name: string;
  canonicalName: string;
  factionId: string;
  factionStatus: FactionStatus;
  keywords: string[];          // Upper-cased, unique, sorted
  factionKeywords: string[];   // From "Faction: X" categories
  modelCount: number;
  points: number;
  forceIndex: number;
}

/**
 * Outcome of resolving one raw faction tag
 */
export interface FactionResolution {
  tag: string;
  factionId: string | null;
}

export type RosterDiagnostic =
  | { code: 'empty-keywords'; unitId: string; unitName: string }
  | { code: 'unresolved-faction'; tag: string }
  | { code: 'unresolved-unit-faction'; unitId: string; factionId: string }
  | { code: 'unresolved-unit-rename'; unitId: string; name: string; candidate: string };

/**
 * Complete parsed roster
 */
export interface Roster {
  armyName?: string;
  schema: SchemaInfo;
  factionTags: string[];
  forces: Force[];
  detachments: Detachment[];
  units: Unit[];
  armyOfRenown?: string;
  pointsTotal?: number;
  factions: FactionResolution[];
  diagnostics: RosterDiagnostic[];
  normalized: boolean;
}

/**
 * Canonical faction from the reference data
 */
export interface Faction {
  id: string;
  name: string;
  parentId?: string;
}

export type FactionScope =
  | { kind: 'generic' }
  | { kind: 'factions'; factionIds: readonly string[] };

/**
 * Condition a single unit has to meet. Reference entries whose predicate
 * could not be read are kept as 'unrecognized' and never match.
 */
export type UnitPredicate =
  | { kind: 'keywords'; all: readonly string[]; none?: readonly string[] }
  | { kind: 'unit-name'; names: readonly string[] }
  | { kind: 'any'; of: readonly UnitPredicate[] }
  | { kind: 'unrecognized'; reason: string };

/**
 * When a stratagem can be used. Without `units` it applies to the whole army.
 */
export interface Eligibility {
  units?: UnitPredicate;
  detachment?: string;
  armyOfRenown?: string;
}

export interface Stratagem {
  id: string;
  name: string;
  type: string;
  phase: Phase;
  cost: number;
  factionScope: FactionScope;
  eligibility: Eligibility;
  description?: string;
}

export interface EligibilityResult {
  stratagemId: string;
  matchedUnits: string[];
}

export interface EvaluationDiagnostics {
  unresolvedFaction: boolean;
  unresolvedTags: string[];
  unitsWithoutKeywords: string[];
  unresolvedUnits: string[];
  malformedStratagems: string[];
}

export interface EvaluationReport {
  results: EligibilityResult[];
  diagnostics: EvaluationDiagnostics;
}

/**
 * Switches for the evaluator
 */
export interface EvaluationOptions {
  includeCore?: boolean;
  ignoredPhases?: readonly Phase[];
  excludedTypes?: readonly string[];
}

/**
 * A reference entry that was skipped while loading a snapshot
 */
export interface MalformedReferenceEntry {
  section: 'factions' | 'stratagems' | 'factionAliases' | 'unitRenames';
  index: number;
  id?: string;
  reason: string;
}
