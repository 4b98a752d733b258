import type { ManifestEntry } from './pack-plan.js';

/**
 * Outcome of executing a pack plan.
 */
export interface TransferResult {
  readonly manifest: readonly ManifestEntry[];
  /** Sources that do not exist. */
  readonly missing: readonly string[];
  /** Sources that exist but could not be opened, with the OS reason. */
  readonly unreadable: Readonly<Record<string, string>>;
  /** Sources whose copy or rewrite failed, with the reason. */
  readonly failures: Readonly<Record<string, string>>;
  /** Path of the produced archive, for archive output. */
  readonly archivePath?: string;
  /** Destination of the packed scene. */
  readonly outputPath: string;
  readonly aborted: boolean;
  readonly abortReason?: string;
}

/** Counters passed to progress callbacks; every field only ever grows. */
export interface PackProgress {
  readonly filesDone: number;
  readonly filesTotal: number;
  readonly bytesDone: number;
}

export type ProgressCallback = (progress: PackProgress) => void;
