/**
 * Reads the .ros document out of a zipped .rosz roster archive
 */

import { inflateRawSync } from 'zlib';
import { DocumentTooLargeError, MalformedDocumentError } from '../errors';

const LOCAL_HEADER_SIGNATURE = 0x04034b50;
const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const END_OF_CENTRAL_DIRECTORY_SIGNATURE = 0x06054b50;
const END_OF_CENTRAL_DIRECTORY_SIZE = 22;
const MAX_COMMENT_LENGTH = 0xffff;

const METHOD_STORED = 0;
const METHOD_DEFLATE = 8;

const nameDecoder = new TextDecoder('utf-8');

export function isZipArchive(bytes: Uint8Array): boolean {
  return bytes.length >= 4 &&
    bytes[0] === 0x50 && bytes[1] === 0x4b && bytes[2] === 0x03 && bytes[3] === 0x04;
}

function findEndOfCentralDirectory(view: DataView): number {
  const last = view.byteLength - END_OF_CENTRAL_DIRECTORY_SIZE;
  const first = Math.max(0, last - MAX_COMMENT_LENGTH);
  for (let offset = last; offset >= first; offset--) {
    if (view.getUint32(offset, true) === END_OF_CENTRAL_DIRECTORY_SIGNATURE) {
      return offset;
    }
  }
  return -1;
}

interface EntryLocation {
  name: string;
  method: number;
  localOffset: number;
  compressedSize: number;
}

function readEntry(bytes: Uint8Array, view: DataView, entry: EntryLocation, maxBytes?: number): Uint8Array {
  const { name: entryName, method, localOffset, compressedSize } = entry;
  if (localOffset + 30 > bytes.length || view.getUint32(localOffset, true) !== LOCAL_HEADER_SIGNATURE) {
    throw new MalformedDocumentError(`Roster archive entry "${entryName}" has a corrupt header`);
  }

  const nameLength = view.getUint16(localOffset + 26, true);
  const extraLength = view.getUint16(localOffset + 28, true);
  const start = localOffset + 30 + nameLength + extraLength;
  const end = start + compressedSize;
  if (end > bytes.length) {
    throw new MalformedDocumentError(`Roster archive entry "${entryName}" is truncated`);
  }

  const data = bytes.subarray(start, end);
  if (method === METHOD_STORED) {
    if (maxBytes !== undefined && data.length > maxBytes) {
      throw new DocumentTooLargeError(data.length, maxBytes);
    }
    return data;
  }
  if (method !== METHOD_DEFLATE) {
    throw new MalformedDocumentError(`Roster archive entry "${entryName}" uses unsupported compression method ${method}`);
  }

  try {
    return maxBytes === undefined ? inflateRawSync(data) : inflateRawSync(data, { maxOutputLength: maxBytes });
  } catch (error) {
    // zlib stops with a RangeError once the output passes maxOutputLength
    if (maxBytes !== undefined && error instanceof RangeError) {
      throw new DocumentTooLargeError(undefined, maxBytes);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedDocumentError(`Roster archive entry "${entryName}" could not be decompressed: ${reason}`);
  }
}

/**
 * Return the bytes of the first .ros entry in the archive.
 * With maxBytes set, an entry that inflates past it throws DocumentTooLargeError.
 */
export function extractRosterEntry(bytes: Uint8Array, maxBytes?: number): Uint8Array {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const endOfDirectory = bytes.length >= END_OF_CENTRAL_DIRECTORY_SIZE ? findEndOfCentralDirectory(view) : -1;
  if (endOfDirectory < 0) {
    throw new MalformedDocumentError('Roster archive is truncated: central directory not found');
  }

  const entryCount = view.getUint16(endOfDirectory + 10, true);
  let offset = view.getUint32(endOfDirectory + 16, true);

  for (let entry = 0; entry < entryCount; entry++) {
    if (offset + 46 > bytes.length || view.getUint32(offset, true) !== CENTRAL_HEADER_SIGNATURE) {
      throw new MalformedDocumentError('Roster archive has a corrupt central directory');
    }

    const method = view.getUint16(offset + 10, true);
    const compressedSize = view.getUint32(offset + 20, true);
    const uncompressedSize = view.getUint32(offset + 24, true);
    const nameLength = view.getUint16(offset + 28, true);
    const extraLength = view.getUint16(offset + 30, true);
    const commentLength = view.getUint16(offset + 32, true);
    const localOffset = view.getUint32(offset + 42, true);
    const entryName = nameDecoder.decode(bytes.subarray(offset + 46, offset + 46 + nameLength));

    if (entryName.toLowerCase().endsWith('.ros')) {
      if (maxBytes !== undefined && uncompressedSize > maxBytes) {
        throw new DocumentTooLargeError(uncompressedSize, maxBytes);
      }
      return readEntry(bytes, view, { name: entryName, method, localOffset, compressedSize }, maxBytes);
    }

    offset += 46 + nameLength + extraLength + commentLength;
  }

  throw new MalformedDocumentError('Roster archive does not contain a .ros document');
}
