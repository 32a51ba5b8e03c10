/**
 * Error types raised by the roster pipeline. Anything not listed here is
 * reported as a diagnostic instead of being thrown.
 */

export class RosterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The input could not be read as a roster document at all
 */
export class MalformedDocumentError extends RosterError {}

/**
 * The document is roster markup, but from an export version we do not read
 */
export class UnsupportedSchemaError extends RosterError {
  constructor(
    readonly detected: string,
    readonly expected: readonly string[]
  ) {
    super(`Unsupported roster export version "${detected}" (expected ${expected.join(' or ')})`);
  }
}

/**
 * size is undefined when decompression stopped at the limit
 */
export class DocumentTooLargeError extends RosterError {
  constructor(
    readonly size: number | undefined,
    readonly limit: number
  ) {
    super(size === undefined
      ? `Roster document exceeds the limit of ${limit} bytes`
      : `Roster document is ${size} bytes, limit is ${limit}`);
  }
}

/**
 * The reference snapshot as a whole could not be loaded
 */
export class SnapshotError extends RosterError {}

export class ConfigError extends RosterError {}
