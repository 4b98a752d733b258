/**
 * Errors raised while reading or patching scene files.
 */

/**
 * The file is not a readable scene file: bad magic, truncated header or
 * block table, or no structure-type table.
 */
export class SceneBinaryError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'SceneBinaryError';
  }
}

/** A structure-type name is absent from this file's table. */
export class StructNotFoundError extends Error {
  constructor(public readonly structName: string, public readonly filePath: string) {
    super(`Struct "${structName}" is not defined in ${filePath}`);
    this.name = 'StructNotFoundError';
  }
}

/** A field path does not exist on the struct it was looked up in. */
export class FieldNotFoundError extends Error {
  constructor(public readonly structName: string, public readonly fieldPath: string) {
    super(`Struct "${structName}" has no field "${fieldPath}"`);
    this.name = 'FieldNotFoundError';
  }
}

/** A field lies (partly) outside the payload of the block it was read from. */
export class FieldOutOfBoundsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FieldOutOfBoundsError';
  }
}

/** A value written into a fixed-size field does not fit. */
export class FieldOverflowError extends Error {
  constructor(public readonly fieldPath: string, public readonly fieldSize: number, public readonly valueSize: number) {
    super(`Value of ${valueSize} bytes does not fit field "${fieldPath}" (${fieldSize} bytes including terminator)`);
    this.name = 'FieldOverflowError';
  }
}

/** A sequence or tile pattern matched no file on disk. */
export class SequenceNotFoundError extends Error {
  constructor(public readonly pattern: string) {
    super(`No files found for sequence ${pattern}`);
    this.name = 'SequenceNotFoundError';
  }
}

/** Packing cannot start, e.g. because the scene lies outside the project root. */
export class PackError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'PackError';
  }
}

/** Raised when a pack run is cancelled. */
export class AbortedError extends Error {
  constructor(public readonly reason: string) {
    super(reason ? `Packing aborted: ${reason}` : 'Packing aborted');
    this.name = 'AbortedError';
  }
}
