import type { BlendPath } from '../blend-path.js';
import type { AssetReference, FieldLocation } from './asset-reference.js';

/** Where an asset lands relative to the project root. */
export type Placement = 'project' | 'outside';

export type SkipReason = 'excluded' | 'absolute-path' | 'optional-outside-project' | 'unexpanded-sequence';

/** One field patch inside a scene-type file. */
export interface FieldRewrite {
  /** Source path of the asset the field points at. */
  readonly asset: string;
  readonly location: FieldLocation;
  readonly oldValue: BlendPath;
  readonly newValue: BlendPath;
}

/**
 * Everything execute needs for one distinct source path.
 */
export interface AssetAction {
  readonly source: string;
  /** Absolute destination under the target root. */
  readonly destination: string;
  /** Destination relative to the target root, as used for archive entries. */
  readonly entryName: string;
  readonly placement: Placement;
  readonly copy: boolean;
  readonly skipReason?: SkipReason;
  /** The references that led to this action; empty for the packed scene itself. */
  readonly references: readonly AssetReference[];
  /** Field patches to apply when this action's file is a scene file. */
  readonly rewrites: readonly FieldRewrite[];
  readonly isScene: boolean;
}

export interface ManifestEntry {
  readonly source: string;
  readonly destination: string;
  readonly entryName: string;
  readonly placement: Placement;
}

export interface PackPlan {
  readonly projectRoot: string;
  readonly target: string;
  /** Source path of the scene being packed. */
  readonly sceneSource: string;
  /** Destination of the scene being packed. */
  readonly outputPath: string;
  readonly actions: readonly AssetAction[];
  /** Ordered source to destination mapping of the copied files. */
  readonly manifest: readonly ManifestEntry[];
}
