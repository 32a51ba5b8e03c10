/**
 * Selection names with structural meaning in roster exports
 */

// Force-level selections whose children name a sub-faction
export const SUBFACTION_SELECTORS = new Set([
  '**Chapter Selector**',
  'Order Convictions',
  'Forge World Choice',
  'Brotherhood',
  'Noble Household',
  'Chapter',
  'Chaos Allegiance',
  'Dread Household',
  'Legion',
  'Plague Company',
  'Cult of the Legion',
  'Craftworld Selection',
  'Kabal',
  'Wych Cult',
  'Haemonculus Coven',
  'Cult Creed',
  'League',
  'Dynasty Choice',
  'Clan Kultur',
  'Sept Choice',
  'Hive Fleet'
]);

export const DETACHMENT_SELECTIONS = new Set(['detachment', 'detachment choice']);

export const ARMY_OF_RENOWN = 'Army of Renown';

// Bookkeeping selections that never describe a unit
export const NON_UNIT_SELECTIONS = new Set([
  'Game Type',
  'Detachment Command Cost',
  'Battle Size',
  'Arks of Omen Compulsory Type',
  'Show/Hide Options'
]);

// Catalogue name segments that are libraries rather than the faction itself
export const CATALOGUE_LIBRARY_SEGMENTS = new Set(['Craftworlds', 'Library']);

export const FACTION_CATEGORY_PREFIX = /^faction:\s*/i;

export const POINTS_COST_NAMES = new Set(['pts', 'points']);

// BattleScribe roster schema majors this parser reads
export const SUPPORTED_VERSION_PATTERN = /^2\.\d+$/;
export const EXPECTED_VERSIONS = ['2.x'] as const;

export const ROSTER_NAMESPACE_MARKER = 'rosterSchema';
