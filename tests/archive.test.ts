import { describe, it, expect } from 'vitest';
import { extractRosterEntry, isZipArchive } from '../src/parser/archive';
import { parseRoster } from '../src/parser/roster-parser';
import { DocumentTooLargeError, MalformedDocumentError } from '../src/errors';
import { buildZip, loadFixture } from './helpers';

const ROSTER_XML = loadFixture('strike-force.ros').toString('utf-8');

describe('rosz archives', () => {
  it('should detect zip data by its signature', () => {
    expect(isZipArchive(buildZip([{ name: 'a.ros', content: '<roster/>' }]))).toBe(true);
    expect(isZipArchive(Buffer.from('<roster/>'))).toBe(false);
  });

  it('should parse a deflated roster', () => {
    const archive = buildZip([{ name: 'Strike Force.ros', content: ROSTER_XML }]);
    const roster = parseRoster(archive);

    expect(roster.schema.id).toBe('battlescribe-xml');
    expect(roster.units.map(unit => unit.id)).toEqual([
      'u-captain',
      'u-intercessors',
      'u-intercessors-2',
      'u-rhino',
      'u-servitors'
    ]);
  });

  it('should read a stored entry after other files', () => {
    const archive = buildZip([
      { name: 'notes.txt', content: 'not a roster', method: 0 },
      { name: 'list.ros', content: '<roster battleScribeVersion="2.03"/>', method: 0 }
    ]);

    expect(Buffer.from(extractRosterEntry(archive)).toString('utf-8')).toBe('<roster battleScribeVersion="2.03"/>');
  });

  it('should reject an archive without a roster document', () => {
    const archive = buildZip([{ name: 'notes.txt', content: 'not a roster' }]);
    expect(() => parseRoster(archive)).toThrow(
      new MalformedDocumentError('Roster archive does not contain a .ros document')
    );
  });

  it('should reject a truncated archive', () => {
    const archive = buildZip([{ name: 'list.ros', content: ROSTER_XML }]);
    expect(() => parseRoster(archive.subarray(0, 40))).toThrow(
      'Roster archive is truncated: central directory not found'
    );
  });

  describe('size limit', () => {
    it('should reject an entry whose declared size is over the limit', () => {
      const archive = buildZip([{ name: 'list.ros', content: ROSTER_XML }]);
      expect(() => parseRoster(archive, 100)).toThrow(
        new DocumentTooLargeError(Buffer.byteLength(ROSTER_XML), 100)
      );
    });

    it('should stop inflating once the output passes the limit', () => {
      const archive = buildZip([{ name: 'list.ros', content: 'x'.repeat(100000), declaredSize: 10 }]);

      expect(() => extractRosterEntry(archive, 1000)).toThrow(DocumentTooLargeError);
      expect(() => extractRosterEntry(archive, 1000)).toThrow('Roster document exceeds the limit of 1000 bytes');
    });

    it('should check stored entries against the limit', () => {
      const archive = buildZip([{ name: 'list.ros', content: 'x'.repeat(2000), method: 0, declaredSize: 5 }]);
      expect(() => extractRosterEntry(archive, 1000)).toThrow('Roster document is 2000 bytes, limit is 1000');
    });

    it('should read entries within the limit', () => {
      const archive = buildZip([{ name: 'list.ros', content: '<roster/>' }]);
      expect(Buffer.from(extractRosterEntry(archive, 9)).toString('utf-8')).toBe('<roster/>');
    });
  });
});
