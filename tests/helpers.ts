/**
 * Shared test helpers: fixture loading, reference data and zip building
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { deflateRawSync } from 'zlib';
import { vi } from 'vitest';
import { loadReferenceSnapshot } from '../src/repository/snapshot-loader';
import type { ReferenceData } from '../src/repository/snapshot-loader';
import { RosterNormalizer } from '../src/normalizer/roster-normalizer';
import type { Logger } from '../src/utils/logger';
import { createLogger } from '../src/utils/logger';

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function loadFixture(name: string): Buffer {
  return readFileSync(fixturePath(name));
}

export const silentLogger: Logger = createLogger('silent');

export function recordingLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

export function loadTestReference(logger: Logger = silentLogger): ReferenceData {
  return loadReferenceSnapshot(JSON.parse(loadFixture('test-snapshot.json').toString('utf-8')), logger);
}

export function createTestNormalizer(reference: ReferenceData, logger: Logger = silentLogger): RosterNormalizer {
  return new RosterNormalizer({
    factions: reference.repository,
    aliases: reference.aliases,
    renames: reference.renames,
    logger
  });
}

export interface UnitSpec {
  id?: string;
  name: string;
  type?: string;
  number?: number;
  keywords?: string[];
  models?: Array<{ name: string; number: number }>;
}

export interface ForceSpec {
  catalogueName: string;
  name?: string;
  detachment?: string;
  subfaction?: string;
  armyOfRenown?: string;
  units: UnitSpec[];
}

/**
 * Roster JSON export text with the given forces
 */
export function rosterJson(forces: ForceSpec[], name = 'Test Roster'): string {
  return JSON.stringify({
    name,
    roster: {
      forces: forces.map(force => ({
        name: force.name ?? 'Army Roster',
        catalogueName: force.catalogueName,
        selections: [
          ...(force.subfaction ? [{ name: '**Chapter Selector**', type: 'upgrade', selections: [{ name: force.subfaction, type: 'upgrade' }] }] : []),
          ...(force.detachment ? [{ name: 'Detachment', type: 'upgrade', selections: [{ name: force.detachment, type: 'upgrade' }] }] : []),
          ...(force.armyOfRenown ? [{ name: `Army of Renown - ${force.armyOfRenown}`, type: 'upgrade' }] : []),
          ...force.units.map(unit => ({
            id: unit.id,
            name: unit.name,
            type: unit.type ?? 'unit',
            number: unit.number ?? 1,
            categories: (unit.keywords ?? []).map(keyword => ({ name: keyword })),
            selections: (unit.models ?? []).map(model => ({ name: model.name, type: 'model', number: model.number }))
          }))
        ]
      }))
    }
  });
}

export interface ZipEntrySpec {
  name: string;
  content: string;
  method?: 0 | 8;
  // Uncompressed size written to the central directory, when it should not match the content
  declaredSize?: number;
}

/**
 * Minimal zip archive (no CRC) with stored or deflated entries
 */
export function buildZip(entries: ZipEntrySpec[]): Buffer {
  const parts: Buffer[] = [];
  const directory: Buffer[] = [];
  let offset = 0;

  for (const entry of entries) {
    const name = Buffer.from(entry.name, 'utf-8');
    const raw = Buffer.from(entry.content, 'utf-8');
    const method = entry.method ?? 8;
    const data = method === 8 ? deflateRawSync(raw) : raw;

    const local = Buffer.alloc(30);
    local.writeUInt32LE(0x04034b50, 0);
    local.writeUInt16LE(20, 4);
    local.writeUInt16LE(method, 8);
    local.writeUInt32LE(data.length, 18);
    local.writeUInt32LE(raw.length, 22);
    local.writeUInt16LE(name.length, 26);

    const central = Buffer.alloc(46);
    central.writeUInt32LE(0x02014b50, 0);
    central.writeUInt16LE(20, 4);
    central.writeUInt16LE(20, 6);
    central.writeUInt16LE(method, 10);
    central.writeUInt32LE(data.length, 20);
    central.writeUInt32LE(entry.declaredSize ?? raw.length, 24);
    central.writeUInt16LE(name.length, 28);
    central.writeUInt32LE(offset, 42);

    parts.push(local, name, data);
    directory.push(central, name);
    offset += local.length + name.length + data.length;
  }

  const centralDirectory = Buffer.concat(directory);
  const end = Buffer.alloc(22);
  end.writeUInt32LE(0x06054b50, 0);
  end.writeUInt16LE(entries.length, 8);
  end.writeUInt16LE(entries.length, 10);
  end.writeUInt32LE(centralDirectory.length, 12);
  end.writeUInt32LE(offset, 16);

  return Buffer.concat([...parts, centralDirectory, end]);
}
