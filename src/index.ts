/**
 * blendpack - Main entry point
 *
 * Reads .blend scene files, traces the files they depend on and packs them
 * into self-contained directories or ZIP archives.
 */

// Reading scene files
export { SceneBinary } from './scene-binary.js';
export { SceneFile } from './scene-file.js';
export { SceneFileCache } from './scene-file-cache.js';
export { Block, splitFieldPath, type Dereference, type FieldPath } from './block.js';
export { StructTable } from './sdna.js';
export type { Field, StructType } from './types/struct-type.js';
export type { BlockHeader, Compression, Endianness, SceneHeader } from './types/scene-header.js';

// Stored paths
export { BlendPath, basenameOf, dirnameOf, isWithin, normalizeAbsolute, rebase, relativeFrom } from './blend-path.js';

// Registries and tracing
export { extractUsages, extractorFor, fieldAt, registerExtractor, type AssetExtractor, type UsageDraft } from './extractors.js';
export { expandBlock, expanderFor, registerExpander, type Expander } from './expanders.js';
export { listbase, listbaseField, modifiers, sequencerStrips } from './iterators.js';
export { traceDependencies, type TraceOptions } from './tracer.js';
export { expandReferences, expandSequence, mergeReference, udimTiles, usesSequenceStem } from './file-sequence.js';
export { referencesFromJson, referencesToJson } from './reference-json.js';
export type { AssetReference, BlockUsage, FieldLocation, TraceMode, TraceResult } from './types/asset-reference.js';

// Packing
export { Packer, pack, packInfo, PACK_INFO_FILE, type PackerOptions } from './packer.js';
export { OUTSIDE_DIRECTORY, outsideKey } from './pack-paths.js';
export { applyRewrites, rewriteSceneFile, type RewriteOutcome } from './rewriter.js';
export { probeAsset, type ProbeResult } from './asset-probe.js';
export { DirectoryTransferrer } from './transfer/directory-transferrer.js';
export { ZipTransferrer, shouldStore, STORE_ONLY_EXTENSIONS, type ZipTransferrerOptions } from './transfer/zip-transferrer.js';
export type { Transferrer } from './transfer/transferrer.js';
export type { AssetAction, FieldRewrite, ManifestEntry, PackPlan, Placement, SkipReason } from './types/pack-plan.js';
export type { PackProgress, ProgressCallback, TransferResult } from './types/transfer-result.js';

// Ambient
export { ConfigError, DEFAULT_CONFIG, loadConfig, type BlendpackConfig, type ZipConfig } from './config.js';
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from './utils/logger.js';
export {
  AbortedError,
  FieldNotFoundError,
  FieldOutOfBoundsError,
  FieldOverflowError,
  PackError,
  SceneBinaryError,
  SequenceNotFoundError,
  StructNotFoundError,
} from './types/errors.js';
