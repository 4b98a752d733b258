/**
 * Physical writer of a pack. Entry names are forward-slash paths relative to
 * the pack root; the plan decides them, the transferrer only stores them.
 */
export interface Transferrer {
  /** Where the pack ends up: a directory or an archive file. */
  readonly outputPath: string;
  /** Path of the archive, for archive backends. */
  readonly archivePath?: string;

  /**
   * Copies the file at `source` into the pack.
   *
   * @returns Number of bytes copied
   */
  writeFile(source: string, entryName: string): Promise<number>;

  writeBuffer(data: Uint8Array, entryName: string): Promise<void>;

  /** Flushes and closes the pack. No writes are accepted afterwards. */
  finish(): Promise<void>;

  /** Stops writing. Partial output may remain. */
  abort(): Promise<void>;
}
