/**
 * Dependency tracing: walks the block graph of a scene file, and of the
 * libraries it links, collecting every external file it needs.
 */
import { BlendPath, dirnameOf, normalizeAbsolute } from './blend-path.js';
import type { Block } from './block.js';
import { BLOCK_CODE } from './constants/scene-dna.js';
import { expandBlock } from './expanders.js';
import { extractUsages, type UsageDraft } from './extractors.js';
import { expandReferences } from './file-sequence.js';
import { SceneBinary } from './scene-binary.js';
import { SceneFileCache } from './scene-file-cache.js';
import type { SceneFile } from './scene-file.js';
import { AbortedError } from './types/errors.js';
import type { AssetReference, BlockUsage, TraceMode, TraceResult } from './types/asset-reference.js';
import { silentLogger, type Logger } from './utils/logger.js';

export interface TraceOptions {
  /** `hydrate` follows linked libraries; `first-level` only reports them. */
  readonly mode?: TraceMode;
  /** Replace sequence references by the files found on disk. */
  readonly expandSequences: boolean;
  /** Shared cache of opened libraries. A private one is used and cleared otherwise. */
  readonly cache?: SceneFileCache;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
}

interface ReferenceBuilder {
  readonly storedPath: BlendPath;
  readonly absolutePath: string;
  isSequence: boolean;
  isOptional: boolean;
  readonly usages: BlockUsage[];
}

/** Datablocks to visit in a linked library, by name. */
interface LibraryJob {
  readonly path: string;
  readonly names: Set<string>;
  readonly via: readonly string[];
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Whether a datablock of the root file is used for output. Scenes, libraries
 * and link placeholders always are; other datablocks need a user.
 */
function isRootSeed(block: Block): boolean {
  if (!block.isIdBlock) {
    return false;
  }
  if (block.code === BLOCK_CODE.SCENE || block.code === BLOCK_CODE.LIBRARY || block.code === BLOCK_CODE.ID_PLACEHOLDER) {
    return true;
  }
  const usersField = block.dnaTypeName === 'ID' ? ['us'] : ['id', 'us'];
  return !block.hasField(usersField) || block.getNumber(usersField) > 0;
}

function libraryPath(library: Block): BlendPath | undefined {
  const field = ['filepath', 'name'].find((candidate) => library.hasField(candidate));
  if (!field) {
    return undefined;
  }
  const path = new BlendPath(library.getCString(field));
  return path.isEmpty ? undefined : path;
}

class DependencyTracer {
  private readonly visited = new Set<string>();
  private readonly references = new Map<string, ReferenceBuilder>();
  private readonly unresolvedLibraries = new Map<string, string>();
  private readonly files = new Set<SceneFile>();
  private readonly jobs: LibraryJob[] = [];

  constructor(
    private readonly mode: TraceMode,
    private readonly cache: SceneFileCache,
    private readonly logger: Logger,
    private readonly signal: AbortSignal | undefined,
  ) {}

  async run(root: SceneFile): Promise<TraceResult> {
    this.cache.add(root);
    this.walk(root, root.blocks.filter(isRootSeed), []);

    for (let job = this.jobs.shift(); job; job = this.jobs.shift()) {
      this.checkAborted();
      let library: SceneFile;
      try {
        library = await this.cache.open(job.path);
      } catch (error) {
        this.logger.warn(`Cannot open library ${job.path}: ${describe(error)}`);
        this.unresolvedLibraries.set(job.path, describe(error));
        continue;
      }
      const seeds = library.idBlocks().filter((block) => {
        const name = block.idName;
        return name !== undefined && job.names.has(name);
      });
      this.logger.debug(`Following ${seeds.length} of ${job.names.size} linked datablocks into ${job.path}`);
      this.walk(library, seeds, job.via);
    }

    let unresolvedPointers = 0;
    for (const file of this.files) {
      unresolvedPointers += file.unresolvedAddresses.size;
    }

    return {
      references: Array.from(this.references.values(), (builder) => ({ ...builder, usages: builder.usages })),
      unresolvedLibraries: this.unresolvedLibraries,
      unresolvedPointers,
    };
  }

  private checkAborted(): void {
    if (this.signal?.aborted) {
      throw new AbortedError(this.signal.reason instanceof Error ? this.signal.reason.message : String(this.signal.reason ?? ''));
    }
  }

  /** Breadth-first walk of one file from `seeds`. */
  private walk(file: SceneFile, seeds: readonly Block[], via: readonly string[]): void {
    this.files.add(file);
    const fileKey = normalizeAbsolute(file.filePath);
    const placeholders = new Map<string, Set<string>>();
    const queue = [...seeds];

    for (let head = 0; head < queue.length; head++) {
      const block = queue[head];
      const key = `${fileKey}\0${block.address}`;
      if (this.visited.has(key)) {
        continue;
      }
      this.visited.add(key);
      this.checkAborted();

      try {
        if (block.code === BLOCK_CODE.ID_PLACEHOLDER) {
          const library = this.recordPlaceholder(fileKey, block, placeholders);
          if (library) {
            queue.push(library);
          }
          continue;
        }
        for (const draft of extractUsages(block)) {
          this.addUsage(fileKey, block, draft, via);
        }
        queue.push(...expandBlock(block));
      } catch (error) {
        if (error instanceof AbortedError) {
          throw error;
        }
        this.logger.warn(`Skipping unreadable block ${block.toString()} in ${fileKey}: ${describe(error)}`);
      }
    }

    if (this.mode !== 'hydrate') {
      return;
    }
    for (const [path, names] of placeholders) {
      this.jobs.push({ path, names, via: [...via, path] });
    }
  }

  /**
   * Notes which library a link placeholder points into, and returns that
   * library's block so its own path is reported too.
   */
  private recordPlaceholder(fileKey: string, block: Block, placeholders: Map<string, Set<string>>): Block | undefined {
    const library = block.getBlock('lib');
    const name = block.idName;
    const path = library ? libraryPath(library) : undefined;
    if (!path || name === undefined) {
      return library;
    }
    const absolute = path.resolve(dirnameOf(fileKey));
    const names = placeholders.get(absolute) ?? new Set<string>();
    names.add(name);
    placeholders.set(absolute, names);
    return library;
  }

  private addUsage(fileKey: string, block: Block, draft: UsageDraft, via: readonly string[]): void {
    const absolutePath = draft.storedPath.resolve(dirnameOf(fileKey));
    const usage: BlockUsage = {
      sceneFile: fileKey,
      blockAddress: block.address,
      blockCode: block.code,
      blockName: block.idName ?? block.dnaTypeName,
      storedPath: draft.storedPath,
      pathFull: draft.pathFull,
      pathDir: draft.pathDir,
      pathBase: draft.pathBase,
      isSequence: draft.isSequence,
      isOptional: draft.isOptional,
      via,
    };

    const existing = this.references.get(absolutePath);
    if (existing) {
      existing.isSequence ||= draft.isSequence;
      existing.isOptional &&= draft.isOptional;
      existing.usages.push(usage);
      return;
    }
    this.references.set(absolutePath, {
      storedPath: draft.storedPath,
      absolutePath,
      isSequence: draft.isSequence,
      isOptional: draft.isOptional,
      usages: [usage],
    });
  }
}

/**
 * Traces every external file `root` depends on.
 *
 * A malformed root file is fatal. Unreadable libraries and dangling pointers
 * are reported in the result and the trace continues.
 *
 * @param root - Opened scene file, or the path of one
 * @throws {SceneBinaryError} If the root file cannot be read
 * @throws {AbortedError} If `signal` is aborted
 */
export async function traceDependencies(root: SceneFile | string, options: TraceOptions): Promise<TraceResult> {
  const logger = options.logger ?? silentLogger;
  const rootFile = typeof root === 'string' ? await SceneBinary.read({ filePath: root }) : root;
  const cache = options.cache ?? new SceneFileCache();
  const tracer = new DependencyTracer(options.mode ?? 'hydrate', cache, logger, options.signal);

  try {
    const result = await tracer.run(rootFile);
    const references: readonly AssetReference[] = options.expandSequences
      ? await expandReferences(result.references, logger)
      : result.references;
    return { ...result, references };
  } finally {
    if (!options.cache) {
      await cache.clear(typeof root === 'string' ? undefined : rootFile);
    }
  }
}
