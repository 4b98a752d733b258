import type { BlendPath } from '../blend-path.js';

/** Coordinates of one field inside a scene file, stable across re-reads. */
export interface FieldLocation {
  readonly blockAddress: bigint;
  readonly structName: string;
  readonly elementIndex: number;
  readonly field: readonly string[];
}

/**
 * Where a stored path was found: the storing file, the datablock that owns
 * it, and the field (or directory/basename field pair) to patch when the
 * asset moves.
 */
export interface BlockUsage {
  /** Normalized absolute path of the file that stores the path. */
  readonly sceneFile: string;
  readonly blockAddress: bigint;
  readonly blockCode: string;
  /** Datablock name (e.g. `IMwood.png`), or the struct name for non-ID blocks. */
  readonly blockName: string;
  readonly storedPath: BlendPath;
  /** Set for paths stored whole in one field. */
  readonly pathFull?: FieldLocation;
  /** Set, with `pathBase`, for paths split into a directory and a file name. */
  readonly pathDir?: FieldLocation;
  readonly pathBase?: FieldLocation;
  readonly isSequence: boolean;
  readonly isOptional: boolean;
  /** Library files crossed to reach the storing file, outermost first. */
  readonly via: readonly string[];
}

/**
 * One distinct dependency, keyed by its resolved absolute path.
 */
export interface AssetReference {
  readonly storedPath: BlendPath;
  readonly absolutePath: string;
  readonly isSequence: boolean;
  readonly isOptional: boolean;
  /** Set on the members of an expanded sequence: the path they were expanded from. */
  readonly sequenceStem?: string;
  readonly usages: readonly BlockUsage[];
}

export type TraceMode = 'hydrate' | 'first-level';

export interface TraceResult {
  readonly references: readonly AssetReference[];
  /** Library paths that could not be opened or parsed, with the reason. */
  readonly unresolvedLibraries: ReadonlyMap<string, string>;
  /** Pointers that matched no block, summed over every visited file. */
  readonly unresolvedPointers: number;
}
