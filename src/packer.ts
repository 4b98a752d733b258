/**
 * Packer - Copies a scene and everything it depends on into a self-contained
 * directory tree or ZIP archive.
 *
 * Packing runs in two phases. `strategise()` traces the scene and decides,
 * without touching any file, where every asset goes and which stored paths
 * have to change. `execute()` carries the plan out through a transferrer,
 * recording missing and unreadable files instead of stopping at them.
 */

import { stat } from 'node:fs/promises';
import { BlendPath, basenameOf, dirnameOf, isWithin, normalizeAbsolute } from './blend-path.js';
import { DEFAULT_CONFIG, type BlendpackConfig } from './config.js';
import { BLOCK_CODE } from './constants/scene-dna.js';
import { expandReferences, mergeReference, usesSequenceStem } from './file-sequence.js';
import { probeAsset } from './asset-probe.js';
import {
  OUTSIDE_DIRECTORY,
  claimDestination,
  destinationFor,
  entryNameFor,
  outsideKey,
  sequenceMemberDestination,
  type Destination,
} from './pack-paths.js';
import { rewriteSceneFile } from './rewriter.js';
import { SceneFileCache } from './scene-file-cache.js';
import { traceDependencies } from './tracer.js';
import { DirectoryTransferrer } from './transfer/directory-transferrer.js';
import type { Transferrer } from './transfer/transferrer.js';
import { ZipTransferrer } from './transfer/zip-transferrer.js';
import { AbortedError, PackError } from './types/errors.js';
import type { AssetReference, BlockUsage, FieldLocation, TraceMode } from './types/asset-reference.js';
import type { AssetAction, FieldRewrite, ManifestEntry, PackPlan, Placement, SkipReason } from './types/pack-plan.js';
import type { PackProgress, ProgressCallback, TransferResult } from './types/transfer-result.js';
import { matchesGlob } from './utils/glob.js';
import { silentLogger, type Logger } from './utils/logger.js';
import { KeyedTaskPool } from './utils/task-pool.js';

/** Name of the description file written at the root of every pack. */
export const PACK_INFO_FILE = 'pack-info.txt';

export interface PackerOptions {
  /** Scene file to pack. */
  readonly sceneFile: string;
  /** Files below this directory keep their layout; others go to `_outside/`. */
  readonly projectRoot: string;
  /** Output directory, or archive path when packing to ZIP. */
  readonly target: string;
  /** Replace sequence references by the files found on disk. */
  readonly expandSequences: boolean;
  /** Rewrite stored paths so the packed scene finds its assets. */
  readonly rewrite?: boolean;
  /** Write a ZIP archive. Defaults to true when `target` ends in `.zip`. */
  readonly archive?: boolean;
  /** Directory prepended to every archive entry. */
  readonly archiveRootPrefix?: string;
  /** References traced earlier; the scene is not traced again. */
  readonly preTraced?: readonly AssetReference[];
  readonly mode?: TraceMode;
  /** Glob patterns of source paths to leave out. */
  readonly exclude?: readonly string[];
  /** Leave out assets stored with an absolute path. */
  readonly relativeOnly?: boolean;
  /** Probe every source but write nothing. */
  readonly noop?: boolean;
  readonly config?: BlendpackConfig;
  /** Overrides the transferrer chosen from `target`. */
  readonly transferrer?: Transferrer;
  readonly logger?: Logger;
  readonly onProgress?: ProgressCallback;
  readonly signal?: AbortSignal;
}

interface ActionDraft {
  readonly source: string;
  readonly destination: string;
  readonly placement: Placement;
  readonly skipReason?: SkipReason;
  readonly references: AssetReference[];
  readonly rewrites: Map<string, FieldRewrite>;
  isScene: boolean;
}

type ActionOutcome =
  | { readonly kind: 'done'; readonly bytes: number; readonly rejected?: ReadonlyMap<string, string> }
  | { readonly kind: 'missing' }
  | { readonly kind: 'unreadable'; readonly reason: string }
  | { readonly kind: 'failed'; readonly reason: string }
  | { readonly kind: 'cancelled' };

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function locationKey(location: FieldLocation): string {
  return `${location.blockAddress}:${location.structName}:${location.elementIndex}:${location.field.join('.')}`;
}

/** Splits a stored `dir/name` path at its last slash, keeping the slash on the directory. */
function splitStoredPath(path: BlendPath): { readonly dir: BlendPath; readonly base: BlendPath } {
  const slash = Math.max(path.bytes.lastIndexOf(0x2f), path.bytes.lastIndexOf(0x5c));
  return {
    dir: new BlendPath(path.bytes.subarray(0, slash + 1)),
    base: new BlendPath(path.bytes.subarray(slash + 1)),
  };
}

/** Stored form of a directory, always ending in a slash. */
function directoryPath(path: BlendPath): BlendPath {
  return path.toString().endsWith('/') ? path : new BlendPath(`${path.toString()}/`);
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Merges references that resolve to the same path. Traced references are
 * already unique; pre-traced lists may not be.
 */
function mergeReferences(references: readonly AssetReference[]): AssetReference[] {
  const merged = new Map<string, AssetReference>();
  for (const reference of references) {
    const absolutePath = normalizeAbsolute(reference.absolutePath);
    const existing = merged.get(absolutePath);
    if (!existing) {
      merged.set(absolutePath, { ...reference, absolutePath });
      continue;
    }
    merged.set(absolutePath, mergeReference(existing, reference));
  }
  return Array.from(merged.values());
}

export class Packer {
  private readonly options: PackerOptions;
  private readonly logger: Logger;
  private readonly config: BlendpackConfig;
  private readonly controller = new AbortController();
  private abortReason: string | undefined;
  private currentPlan: PackPlan | undefined;

  constructor(options: PackerOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.config = options.config ?? DEFAULT_CONFIG;
  }

  /** The plan of the last `strategise()` call. */
  get plan(): PackPlan | undefined {
    return this.currentPlan;
  }

  get isArchive(): boolean {
    return this.options.archive ?? this.options.target.toLowerCase().endsWith('.zip');
  }

  /**
   * Stops packing. Tracing stops at the next block; execution finishes the
   * actions already running and starts no others.
   */
  abort(reason = 'aborted by caller'): void {
    if (this.abortReason !== undefined) {
      return;
    }
    this.abortReason = reason;
    this.controller.abort(reason);
  }

  /**
   * Plans the pack. Reads the scene and its libraries but writes nothing, so
   * calling it again on unchanged inputs yields the same plan.
   *
   * @throws {PackError} If the scene is not inside the project root
   * @throws {SceneBinaryError} If the scene file cannot be read
   * @throws {AbortedError} If packing was aborted
   */
  async strategise(): Promise<PackPlan> {
    const release = this.followSignal();
    try {
      return await this.buildPlan();
    } finally {
      release();
    }
  }

  /**
   * Carries out `plan` (by default the last planned one). Missing,
   * unreadable and failed assets are recorded and the run continues.
   */
  async execute(plan: PackPlan | undefined = this.currentPlan): Promise<TransferResult> {
    if (!plan) {
      throw new PackError('Nothing to execute: call strategise() first');
    }
    const release = this.followSignal();
    try {
      return await this.carryOut(plan);
    } finally {
      release();
    }
  }

  /** Forwards an abort of the caller's signal while a phase runs. */
  private followSignal(): () => void {
    const { signal } = this.options;
    if (!signal) {
      return () => undefined;
    }
    const forward = (): void => this.abort(signal.reason instanceof Error ? signal.reason.message : String(signal.reason ?? ''));
    if (signal.aborted) {
      forward();
      return () => undefined;
    }
    signal.addEventListener('abort', forward, { once: true });
    return () => signal.removeEventListener('abort', forward);
  }

  private async buildPlan(): Promise<PackPlan> {
    const sceneSource = normalizeAbsolute(this.options.sceneFile);
    const projectRoot = normalizeAbsolute(this.options.projectRoot);
    const target = normalizeAbsolute(this.options.target);
    if (!isWithin(sceneSource, projectRoot)) {
      throw new PackError(`Scene ${sceneSource} is not inside the project root ${projectRoot}`);
    }
    this.throwIfAborted();

    const references = mergeReferences(await this.references(sceneSource));
    this.throwIfAborted();

    const claimed = new Map<string, string>();
    claimDestination(claimed, normalizeAbsolute(`${target}/${PACK_INFO_FILE}`), PACK_INFO_FILE);

    const sceneDraft: ActionDraft = {
      source: sceneSource,
      destination: claimDestination(claimed, destinationFor(sceneSource, projectRoot, target).destination, sceneSource),
      placement: 'project',
      references: [],
      rewrites: new Map(),
      isScene: true,
    };
    const drafts = new Map<string, ActionDraft>([[sceneSource, sceneDraft]]);

    for (const reference of references) {
      const source = reference.absolutePath;
      const existing = drafts.get(source);
      if (existing) {
        existing.references.push(reference);
        existing.isScene ||= this.isSceneReference(reference);
        continue;
      }
      const { destination, placement } = this.destinationOf(reference, projectRoot, target);
      const skipReason = await this.skipReasonOf(reference, placement);
      drafts.set(source, {
        source,
        destination: skipReason ? destination : claimDestination(claimed, destination, source),
        placement,
        skipReason,
        references: [reference],
        rewrites: new Map(),
        isScene: this.isSceneReference(reference),
      });
    }

    if (this.options.rewrite) {
      this.planRewrites(drafts, projectRoot, target);
    }

    const actions: AssetAction[] = Array.from(drafts.values(), (draft) => ({
      source: draft.source,
      destination: draft.destination,
      entryName: entryNameFor(draft.destination, target),
      placement: draft.placement,
      copy: draft.skipReason === undefined,
      skipReason: draft.skipReason,
      references: draft.references,
      rewrites: Array.from(draft.rewrites.values()),
      isScene: draft.isScene,
    }));
    const manifest: ManifestEntry[] = actions
      .filter((action) => action.copy)
      .map(({ source, destination, entryName, placement }) => ({ source, destination, entryName, placement }));

    for (const action of actions) {
      if (action.skipReason) {
        this.logger.debug(`Skipping ${action.source} (${action.skipReason})`);
      }
    }

    const plan: PackPlan = {
      projectRoot,
      target,
      sceneSource,
      outputPath: sceneDraft.destination,
      actions,
      manifest,
    };
    this.currentPlan = plan;
    return plan;
  }

  private async carryOut(plan: PackPlan): Promise<TransferResult> {
    const copies = plan.actions.filter((action) => action.copy);
    const transferrer = this.options.noop ? undefined : this.options.transferrer ?? this.createTransferrer(plan);
    const pool = new KeyedTaskPool(this.config.concurrency);
    const progress = { filesDone: 0, filesTotal: copies.length, bytesDone: 0 };

    this.logger.info(`🔄 Packing ${copies.length} files into ${transferrer?.outputPath ?? plan.target}${this.options.noop ? ' (dry run)' : ''}`);

    const outcomes = await Promise.all(
      copies.map((action) =>
        pool.run(action.destination.toLowerCase(), async () => {
          const outcome = await this.runAction(action, transferrer);
          if (outcome.kind !== 'cancelled') {
            progress.filesDone++;
            progress.bytesDone += outcome.kind === 'done' ? outcome.bytes : 0;
            this.report(progress);
          }
          return outcome;
        }),
      ),
    );

    const manifest: ManifestEntry[] = [];
    const missing: string[] = [];
    const unreadable: Record<string, string> = {};
    const failures: Record<string, string> = {};
    copies.forEach((action, index) => {
      const outcome: ActionOutcome = outcomes[index] ?? { kind: 'cancelled' };
      switch (outcome.kind) {
        case 'done':
          manifest.push({ source: action.source, destination: action.destination, entryName: action.entryName, placement: action.placement });
          for (const [asset, reason] of outcome.rejected ?? []) {
            failures[asset] ??= reason;
          }
          break;
        case 'missing':
          missing.push(action.source);
          break;
        case 'unreadable':
          unreadable[action.source] = outcome.reason;
          break;
        case 'failed':
          failures[action.source] = outcome.reason;
          break;
        default:
          break;
      }
    });

    const aborted = this.abortReason !== undefined;
    if (transferrer) {
      if (aborted) {
        await transferrer.abort();
      } else {
        await this.finishTransfer(transferrer, plan, failures);
      }
    }

    if (aborted) {
      this.logger.warn(`Packing aborted after ${manifest.length} of ${copies.length} files: ${this.abortReason ?? ''}`);
    } else if (missing.length > 0 || Object.keys(unreadable).length > 0 || Object.keys(failures).length > 0) {
      this.logger.warn(
        `Packed with problems: ${missing.length} missing, ${Object.keys(unreadable).length} unreadable, ${Object.keys(failures).length} failed`,
      );
    } else {
      this.logger.info(`✅ Packed ${manifest.length} files`);
    }

    return {
      manifest,
      missing,
      unreadable,
      failures,
      archivePath: transferrer?.archivePath,
      outputPath: plan.outputPath,
      aborted,
      abortReason: this.abortReason,
    };
  }

  private async references(sceneSource: string): Promise<readonly AssetReference[]> {
    const { preTraced, expandSequences } = this.options;
    if (preTraced) {
      return expandSequences ? expandReferences(preTraced, this.logger) : preTraced;
    }
    const cache = new SceneFileCache();
    try {
      const result = await traceDependencies(sceneSource, {
        mode: this.options.mode ?? 'hydrate',
        expandSequences,
        cache,
        logger: this.logger,
        signal: this.controller.signal,
      });
      for (const [path, reason] of result.unresolvedLibraries) {
        this.logger.warn(`Library ${path} was not traced: ${reason}`);
      }
      if (result.unresolvedPointers > 0) {
        this.logger.debug(`${result.unresolvedPointers} pointers did not resolve to a block`);
      }
      return result.references;
    } finally {
      await cache.clear();
    }
  }

  private throwIfAborted(): void {
    if (this.abortReason !== undefined) {
      throw new AbortedError(this.abortReason);
    }
  }

  private isSceneReference(reference: AssetReference): boolean {
    return reference.usages.some((usage) => usage.blockCode === BLOCK_CODE.LIBRARY);
  }

  private destinationOf(reference: AssetReference, projectRoot: string, target: string): Destination {
    if (reference.sequenceStem !== undefined) {
      return sequenceMemberDestination(reference.absolutePath, reference.sequenceStem, projectRoot, target);
    }
    return destinationFor(reference.absolutePath, projectRoot, target);
  }

  private async skipReasonOf(reference: AssetReference, placement: Placement): Promise<SkipReason | undefined> {
    const { exclude = [], relativeOnly = false, expandSequences } = this.options;
    if (exclude.some((pattern) => matchesGlob(reference.absolutePath, pattern))) {
      return 'excluded';
    }
    if (relativeOnly && reference.storedPath.isAbsolute) {
      return 'absolute-path';
    }
    if (reference.isOptional && placement === 'outside') {
      return 'optional-outside-project';
    }
    if (
      reference.isSequence &&
      reference.sequenceStem === undefined &&
      !expandSequences &&
      !(await isRegularFile(reference.absolutePath))
    ) {
      this.logger.warn(`Sequence ${reference.absolutePath} was not expanded; its files are not packed`);
      return 'unexpanded-sequence';
    }
    return undefined;
  }

  /**
   * Decides the new stored value of every path field in the files being
   * packed. Copied assets are pointed at their destination, relative to the
   * destination of the file storing them; skipped assets keep working by
   * being stored absolute.
   */
  private planRewrites(drafts: ReadonlyMap<string, ActionDraft>, projectRoot: string, target: string): void {
    for (const draft of drafts.values()) {
      for (const reference of draft.references) {
        for (const usage of reference.usages) {
          const storing = drafts.get(usage.sceneFile);
          if (!storing || storing.skipReason !== undefined) {
            continue;
          }
          // A usage that names the whole family points at the family's destination.
          const stem = usesSequenceStem(reference, usage) ? reference.sequenceStem : undefined;
          let assetTarget: string | undefined;
          if (draft.skipReason === undefined) {
            assetTarget = stem === undefined ? draft.destination : destinationFor(stem, projectRoot, target).destination;
          }
          for (const rewrite of this.usageRewrites(usage, stem ?? reference.absolutePath, assetTarget, storing.destination)) {
            storing.rewrites.set(locationKey(rewrite.location), { ...rewrite, asset: draft.source });
          }
        }
      }
    }
  }

  private usageRewrites(
    usage: BlockUsage,
    original: string,
    assetTarget: string | undefined,
    storingDestination: string,
  ): Omit<FieldRewrite, 'asset'>[] {
    if (assetTarget === undefined && usage.storedPath.isAbsolute) {
      return [];
    }
    const stored = usage.storedPath;
    const newPath =
      assetTarget === undefined ? new BlendPath(stored.resolve(dirnameOf(usage.sceneFile))) : BlendPath.mkrelative(assetTarget, storingDestination);

    if (usage.pathFull) {
      return newPath.equals(stored) ? [] : [{ location: usage.pathFull, oldValue: stored, newValue: newPath }];
    }
    if (usage.pathDir && usage.pathBase) {
      const old = splitStoredPath(stored);
      const directory =
        assetTarget === undefined
          ? new BlendPath(dirnameOf(original))
          : BlendPath.mkrelative(dirnameOf(assetTarget), storingDestination);
      const newDir = directoryPath(directory);
      const newBase = new BlendPath(basenameOf(assetTarget ?? original));
      if (newDir.equals(old.dir) && newBase.equals(old.base)) {
        return [];
      }
      return [
        { location: usage.pathDir, oldValue: old.dir, newValue: newDir },
        { location: usage.pathBase, oldValue: old.base, newValue: newBase },
      ];
    }
    return [];
  }

  private createTransferrer(plan: PackPlan): Transferrer {
    if (this.isArchive) {
      return new ZipTransferrer(plan.target, {
        zip: this.config.zip,
        rootPrefix: this.options.archiveRootPrefix,
        logger: this.logger,
      });
    }
    return new DirectoryTransferrer(plan.target);
  }

  private async runAction(action: AssetAction, transferrer: Transferrer | undefined): Promise<ActionOutcome> {
    if (this.abortReason !== undefined) {
      return { kind: 'cancelled' };
    }
    try {
      const probe = await probeAsset(action.source);
      if (probe.status === 'missing') {
        this.logger.warn(`Missing file: ${action.source}`);
        return { kind: 'missing' };
      }
      if (probe.status === 'unreadable') {
        this.logger.warn(`Unreadable file: ${action.source} (${probe.reason})`);
        return { kind: 'unreadable', reason: probe.reason };
      }
      if (!transferrer) {
        return { kind: 'done', bytes: probe.size };
      }

      if (action.rewrites.length > 0) {
        const { data, rejected } = await rewriteSceneFile(action.source, action.rewrites);
        await transferrer.writeBuffer(data, action.entryName);
        for (const reason of rejected.values()) {
          this.logger.warn(`Kept a stored path in ${action.entryName}: ${reason}`);
        }
        this.logger.debug(`Rewrote paths in ${action.entryName}`);
        return { kind: 'done', bytes: data.byteLength, rejected };
      }
      const bytes = await transferrer.writeFile(action.source, action.entryName);
      this.logger.debug(`Copied ${action.source} → ${action.entryName}`);
      return { kind: 'done', bytes };
    } catch (error) {
      this.logger.warn(`Cannot pack ${action.source}: ${describe(error)}`);
      return { kind: 'failed', reason: describe(error) };
    }
  }

  private async finishTransfer(transferrer: Transferrer, plan: PackPlan, failures: Record<string, string>): Promise<void> {
    try {
      await transferrer.writeBuffer(Buffer.from(packInfo(plan), 'utf8'), PACK_INFO_FILE);
    } catch (error) {
      failures[PACK_INFO_FILE] = describe(error);
      this.logger.warn(`Cannot write ${PACK_INFO_FILE}: ${describe(error)}`);
    }
    try {
      await transferrer.finish();
    } catch (error) {
      failures[transferrer.archivePath ?? transferrer.outputPath] = describe(error);
      this.logger.error(`Cannot finish ${transferrer.outputPath}: ${describe(error)}`);
    }
  }

  private report(progress: PackProgress): void {
    try {
      this.options.onProgress?.({ ...progress });
    } catch (error) {
      this.logger.warn(`Progress callback failed: ${describe(error)}`);
    }
  }
}

/**
 * Contents of the description file: the packed scene and where each
 * relocated directory came from.
 */
export function packInfo(plan: PackPlan): string {
  const lines = [
    'This project was packed by blendpack.',
    '',
    `Packed scene: ${entryNameFor(plan.outputPath, plan.target)}`,
    `Original scene: ${plan.sceneSource}`,
    `Project root: ${plan.projectRoot}`,
  ];
  const outside = new Map<string, string>();
  for (const action of plan.actions) {
    if (action.copy && action.placement === 'outside') {
      const directory = dirnameOf(action.references[0]?.sequenceStem ?? action.source);
      outside.set(`${OUTSIDE_DIRECTORY}/${outsideKey(directory)}`, directory);
    }
  }
  if (outside.size > 0) {
    lines.push('', 'Files from outside the project root:');
    for (const [key, directory] of [...outside.entries()].sort(([a], [b]) => a.localeCompare(b))) {
      lines.push(`  ${key}/ ← ${directory}`);
    }
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Plans and executes a pack in one call.
 */
export async function pack(options: PackerOptions): Promise<{ readonly plan: PackPlan; readonly result: TransferResult }> {
  const packer = new Packer(options);
  const plan = await packer.strategise();
  const result = await packer.execute(plan);
  return { plan, result };
}
