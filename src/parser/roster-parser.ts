/**
 * Roster Parser
 * Builds the Roster model (forces, detachments, units with keywords and model
 * counts) from a decoded roster document.
 */

import type { Detachment, Force, Roster, RosterDiagnostic, Unit } from '../types';
import { readRosterDocument } from './document';
import type { RawForce, RawSelection, RosterData } from './document';
import {
  ARMY_OF_RENOWN,
  CATALOGUE_LIBRARY_SEGMENTS,
  DETACHMENT_SELECTIONS,
  FACTION_CATEGORY_PREFIX,
  NON_UNIT_SELECTIONS,
  POINTS_COST_NAMES,
  SUBFACTION_SELECTORS
} from './constants';

interface ParseState {
  forces: Force[];
  factionTags: string[];
  detachments: Detachment[];
  units: Unit[];
  diagnostics: RosterDiagnostic[];
  usedIds: Set<string>;
  armyOfRenown?: string;
}

/**
 * Check if a selection is a configuration entry
 */
function isConfiguration(selection: RawSelection): boolean {
  return selection.type === 'configuration';
}

/**
 * Check if a selection is a unit or model
 */
function isUnitOrModel(selection: RawSelection): boolean {
  return selection.type === 'unit' || selection.type === 'model';
}

function isDetachmentSelection(selection: RawSelection): boolean {
  return DETACHMENT_SELECTIONS.has(selection.name.toLowerCase());
}

function isArmyOfRenown(selection: RawSelection): boolean {
  return selection.name.startsWith(ARMY_OF_RENOWN);
}

function isStructuralSelection(selection: RawSelection): boolean {
  return NON_UNIT_SELECTIONS.has(selection.name) ||
    SUBFACTION_SELECTORS.has(selection.name) ||
    isDetachmentSelection(selection) ||
    isArmyOfRenown(selection);
}

/**
 * Faction segment of a catalogue name: "Imperium - Space Marines" -> "Space Marines".
 * Library catalogues name the faction first ("Aeldari - Craftworlds").
 */
export function catalogueFactionTag(catalogueName: string): string {
  const segments = catalogueName.split(' - ').map(segment => segment.trim()).filter(Boolean);
  if (segments.length === 0) return '';
  const last = segments[segments.length - 1];
  return CATALOGUE_LIBRARY_SEGMENTS.has(last) ? segments[0] : last;
}

export function normalizeKeyword(value: string): string {
  return value.replace(/\s+/g, ' ').trim().toUpperCase();
}

function addUnique(list: string[], value: string): void {
  if (value && !list.includes(value)) {
    list.push(value);
  }
}

/**
 * Keywords from the unit's categories, falling back to its models' categories
 */
function extractKeywords(selection: RawSelection): { keywords: string[]; factionKeywords: string[] } {
  let categories = selection.categories;
  if (categories.length === 0) {
    categories = selection.selections
      .filter(child => child.type === 'model')
      .flatMap(child => child.categories);
  }

  const keywords = new Set<string>();
  const factionKeywords = new Set<string>();
  for (const category of categories) {
    const isFaction = FACTION_CATEGORY_PREFIX.test(category.name);
    const keyword = normalizeKeyword(category.name.replace(FACTION_CATEGORY_PREFIX, ''));
    if (!keyword) continue;
    keywords.add(keyword);
    if (isFaction) {
      factionKeywords.add(keyword);
    }
  }

  return {
    keywords: Array.from(keywords).sort(),
    factionKeywords: Array.from(factionKeywords).sort()
  };
}

/**
 * Count the models inside a unit selection without descending into the models
 */
function countModels(selections: RawSelection[]): number {
  let total = 0;
  for (const selection of selections) {
    if (selection.type === 'model') {
      total += Math.max(0, Math.floor(selection.number));
    } else if (!isConfiguration(selection)) {
      total += countModels(selection.selections);
    }
  }
  return total;
}

function getModelCount(selection: RawSelection): number {
  const own = Math.max(1, Math.floor(selection.number));
  if (selection.type === 'model') {
    return own;
  }
  const models = countModels(selection.selections);
  return models > 0 ? models : own;
}

/**
 * Points cost of a selection and everything chosen inside it
 */
function getPointsCost(selection: RawSelection): number {
  const own = selection.costs
    .filter(cost => POINTS_COST_NAMES.has(cost.name.toLowerCase()))
    .reduce((sum, cost) => sum + cost.value, 0);
  return selection.selections.reduce((sum, child) => sum + getPointsCost(child), own);
}

function uniqueUnitId(state: ParseState, candidate: string): string {
  let id = candidate;
  for (let copy = 2; state.usedIds.has(id); copy++) {
    id = `${candidate}#${copy}`;
  }
  state.usedIds.add(id);
  return id;
}

/**
 * Create a unit entry from a selection
 */
function createUnit(selection: RawSelection, state: ParseState, forceIndex: number, factionTag: string): Unit {
  const id = uniqueUnitId(state, selection.id || `unit-${state.units.length + 1}`);
  const { keywords, factionKeywords } = extractKeywords(selection);

  const unit: Unit = {
    id,
    name: selection.name,
    canonicalName: selection.name,
    factionId: factionTag,
    factionStatus: 'raw',
    keywords,
    factionKeywords,
    modelCount: getModelCount(selection),
    points: getPointsCost(selection),
    forceIndex
  };

  if (keywords.length === 0) {
    state.diagnostics.push({ code: 'empty-keywords', unitId: id, unitName: unit.name });
  }

  return unit;
}

/**
 * Extract units from selections, looking through grouping selections
 */
function extractUnits(selections: RawSelection[], state: ParseState, forceIndex: number, factionTag: string): void {
  for (const selection of selections) {
    if (isConfiguration(selection) || isStructuralSelection(selection)) {
      continue;
    }

    if (isUnitOrModel(selection)) {
      state.units.push(createUnit(selection, state, forceIndex, factionTag));
    } else if (selection.selections.length > 0) {
      extractUnits(selection.selections, state, forceIndex, factionTag);
    }
  }
}

/**
 * Older exports name the force after its detachment ("Patrol Detachment -2CP")
 */
function detachmentFromForceName(forceName: string): string | undefined {
  if (!/detachment/i.test(forceName)) return undefined;
  const name = forceName.replace(/\s*[-+]?\d+\s*CP\s*$/i, '').trim();
  return name || undefined;
}

function readForceSelections(force: RawForce, state: ParseState, forceIndex: number): string[] {
  const subfactionTags: string[] = [];
  let foundDetachment = false;

  for (const selection of force.selections) {
    if (SUBFACTION_SELECTORS.has(selection.name)) {
      selection.selections.forEach(child => addUnique(subfactionTags, child.name));
    } else if (isDetachmentSelection(selection)) {
      for (const child of selection.selections) {
        if (!child.name) continue;
        foundDetachment = true;
        state.detachments.push({
          name: child.name,
          forceIndex,
          rules: child.rules.map(rule => rule.name).filter(Boolean)
        });
      }
    } else if (isArmyOfRenown(selection) && state.armyOfRenown === undefined) {
      const named = selection.name.slice(ARMY_OF_RENOWN.length).replace(/^\s*-\s*/, '').trim();
      state.armyOfRenown = named || selection.selections[0]?.name || undefined;
    }
  }

  if (!foundDetachment) {
    const legacy = detachmentFromForceName(force.name);
    if (legacy) {
      state.detachments.push({ name: legacy, forceIndex, rules: force.rules.map(rule => rule.name).filter(Boolean) });
    }
  }

  return subfactionTags;
}

function readForce(force: RawForce, state: ParseState): void {
  const forceIndex = state.forces.length;
  const catalogueTag = catalogueFactionTag(force.catalogueName);
  const subfactionTags = readForceSelections(force, state, forceIndex);
  const factionTag = catalogueTag || subfactionTags[0] || '';

  state.forces.push({
    index: forceIndex,
    name: force.name,
    catalogueName: force.catalogueName,
    factionTag
  });
  addUnique(state.factionTags, catalogueTag);
  subfactionTags.forEach(tag => addUnique(state.factionTags, tag));

  extractUnits(force.selections, state, forceIndex, factionTag);

  force.forces.forEach(nested => readForce(nested, state));
}

/**
 * Build a Roster from decoded roster data
 */
export function buildRoster(data: RosterData): Roster {
  const state: ParseState = {
    forces: [],
    factionTags: [],
    detachments: [],
    units: [],
    diagnostics: [],
    usedIds: new Set()
  };

  data.forces.forEach(force => readForce(force, state));

  return {
    armyName: data.name,
    schema: data.schema,
    factionTags: state.factionTags,
    forces: state.forces,
    detachments: state.detachments,
    units: state.units,
    armyOfRenown: state.armyOfRenown,
    pointsTotal: data.pointsTotal,
    factions: [],
    diagnostics: state.diagnostics,
    normalized: false
  };
}

/**
 * Parse raw roster bytes. Throws MalformedDocumentError, UnsupportedSchemaError
 * or DocumentTooLargeError; never returns a partial roster.
 */
export function parseRoster(raw: Uint8Array | string, maxBytes?: number): Roster {
  return buildRoster(readRosterDocument(raw, maxBytes));
}
