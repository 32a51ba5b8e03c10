/**
 * Roster document reader
 * Turns BattleScribe XML (.ros / .rosz) and roster JSON exports into one
 * intermediate shape before units are extracted.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { SchemaInfo } from '../types';
import { MalformedDocumentError, UnsupportedSchemaError } from '../errors';
import { extractRosterEntry, isZipArchive } from './archive';
import { EXPECTED_VERSIONS, ROSTER_NAMESPACE_MARKER, SUPPORTED_VERSION_PATTERN } from './constants';

export interface RawCategory {
  name: string;
  primary: boolean;
}

export interface RawCost {
  name: string;
  value: number;
}

export interface RawRule {
  id?: string;
  name: string;
}

export interface RawSelection {
  id?: string;
  name: string;
  type?: string;
  number: number;
  selections: RawSelection[];
  rules: RawRule[];
  categories: RawCategory[];
  costs: RawCost[];
}

export interface RawForce {
  id?: string;
  name: string;
  catalogueName: string;
  selections: RawSelection[];
  rules: RawRule[];
  forces: RawForce[];
}

export interface RosterData {
  name?: string;
  schema: SchemaInfo;
  forces: RawForce[];
  pointsTotal?: number;
}

type DocumentNode = Record<string, unknown>;

// Tags that repeat in the XML and must always parse as arrays
const ARRAY_TAGS = new Set(['force', 'selection', 'rule', 'category', 'cost']);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  textNodeName: '$text',
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  isArray: (tagName: string, _jPath: string, _isLeafNode: boolean, isAttribute: boolean) =>
    !isAttribute && ARRAY_TAGS.has(tagName)
});

const textDecoder = new TextDecoder('utf-8');

function isNode(value: unknown): value is DocumentNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Child nodes of a container. JSON exports hold arrays directly
 * (`selections: [...]`), XML wraps them (`selections: { selection: [...] }`).
 */
function children(node: DocumentNode, container: string, item: string): DocumentNode[] {
  const holder = node[container];
  const list = Array.isArray(holder) ? holder : isNode(holder) ? toList(holder[item]) : [];
  return list.filter(isNode);
}

function text(node: DocumentNode, key: string): string | undefined {
  const value = node[key];
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return undefined;
}

function numberValue(node: DocumentNode, key: string, fallback: number): number {
  const value = node[key];
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? parseFloat(value) : NaN;
  return Number.isFinite(parsed) ? parsed : fallback;
}

function flag(node: DocumentNode, key: string): boolean {
  const value = node[key];
  return value === true || value === 'true';
}

/**
 * Normalize rules to a flat list
 */
function normalizeRules(node: DocumentNode): RawRule[] {
  return children(node, 'rules', 'rule').map(rule => ({
    id: text(rule, 'id'),
    name: text(rule, 'name') ?? ''
  }));
}

function normalizeCategories(node: DocumentNode): RawCategory[] {
  return children(node, 'categories', 'category')
    .map(category => ({
      name: text(category, 'name') ?? '',
      primary: flag(category, 'primary')
    }))
    .filter(category => category.name !== '');
}

function normalizeCosts(node: DocumentNode): RawCost[] {
  return children(node, 'costs', 'cost').map(cost => ({
    name: text(cost, 'name') ?? '',
    value: numberValue(cost, 'value', 0)
  }));
}

/**
 * Normalize selections (recursive)
 */
function normalizeSelections(node: DocumentNode): RawSelection[] {
  return children(node, 'selections', 'selection').map(selection => ({
    id: text(selection, 'id'),
    name: text(selection, 'name') ?? '',
    type: text(selection, 'type'),
    number: numberValue(selection, 'number', 1),
    selections: normalizeSelections(selection),
    rules: normalizeRules(selection),
    categories: normalizeCategories(selection),
    costs: normalizeCosts(selection)
  }));
}

/**
 * Normalize forces, including forces nested inside other forces
 */
function normalizeForces(node: DocumentNode): RawForce[] {
  return children(node, 'forces', 'force').map(force => ({
    id: text(force, 'id'),
    name: text(force, 'name') ?? '',
    catalogueName: text(force, 'catalogueName') ?? '',
    selections: normalizeSelections(force),
    rules: normalizeRules(force),
    forces: normalizeForces(force)
  }));
}

function extractPointsTotal(roster: DocumentNode): number | undefined {
  const points = normalizeCosts(roster).find(cost => cost.name.toLowerCase() === 'pts');
  if (points) return points.value;

  const legacy = roster.points;
  if (isNode(legacy)) {
    const total = numberValue(legacy, 'total', NaN);
    return Number.isFinite(total) ? total : undefined;
  }
  return undefined;
}

function checkVersion(version: string | undefined): string {
  if (version === undefined || !SUPPORTED_VERSION_PATTERN.test(version)) {
    throw new UnsupportedSchemaError(version ?? 'unknown', EXPECTED_VERSIONS);
  }
  return version;
}

/**
 * Parse a BattleScribe XML roster
 */
export function parseXMLRoster(xmlContent: string): RosterData {
  const validation = XMLValidator.validate(xmlContent);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new MalformedDocumentError(`Roster is not well-formed XML: ${msg} (line ${line})`);
  }

  const parsed: unknown = xmlParser.parse(xmlContent);
  if (!isNode(parsed) || !('roster' in parsed)) {
    throw new MalformedDocumentError('Document has no <roster> root element');
  }

  const roster: DocumentNode = isNode(parsed.roster) ? parsed.roster : {};
  const namespace = text(roster, 'xmlns');
  if (namespace !== undefined && !namespace.includes(ROSTER_NAMESPACE_MARKER)) {
    throw new UnsupportedSchemaError(namespace, EXPECTED_VERSIONS);
  }
  const version = checkVersion(text(roster, 'battleScribeVersion'));

  return {
    name: text(roster, 'name'),
    schema: { id: 'battlescribe-xml', format: 'xml', version },
    forces: normalizeForces(roster),
    pointsTotal: extractPointsTotal(roster)
  };
}

/**
 * Parse a roster JSON export
 */
export function parseJSONRoster(jsonContent: string): RosterData {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonContent);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedDocumentError(`Roster is not valid JSON: ${reason}`);
  }

  const roster = isNode(parsed) ? parsed.roster : undefined;
  if (!isNode(parsed) || !isNode(roster)) {
    throw new MalformedDocumentError('Document has no "roster" object');
  }

  const declared = text(roster, 'battleScribeVersion');
  const version = declared === undefined ? 'json' : checkVersion(declared);
  if (!Array.isArray(roster.forces)) {
    throw new UnsupportedSchemaError(`${version} without a forces list`, ['roster.forces array']);
  }

  return {
    name: text(parsed, 'name') ?? text(roster, 'name'),
    schema: { id: 'roster-json', format: 'json', version },
    forces: normalizeForces(roster),
    pointsTotal: extractPointsTotal(roster)
  };
}

/**
 * Decode raw upload bytes (or an already-decoded string) and dispatch on format.
 * maxBytes bounds the size of a .ros entry unpacked from a .rosz archive.
 */
export function readRosterDocument(raw: Uint8Array | string, maxBytes?: number): RosterData {
  let content: string;
  if (typeof raw === 'string') {
    content = raw;
  } else {
    const bytes = isZipArchive(raw) ? extractRosterEntry(raw, maxBytes) : raw;
    content = textDecoder.decode(bytes);
  }

  const trimmed = content.replace(/^\uFEFF/, '').trim();
  if (trimmed === '') {
    throw new MalformedDocumentError('Roster document is empty');
  }
  if (trimmed.startsWith('<')) {
    return parseXMLRoster(trimmed);
  }
  if (trimmed.startsWith('{')) {
    return parseJSONRoster(trimmed);
  }
  throw new MalformedDocumentError('Document is neither roster XML nor roster JSON');
}
