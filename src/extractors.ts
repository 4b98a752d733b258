/**
 * Registry of per-struct rules that say which fields hold file paths.
 */
import { BlendPath } from './blend-path.js';
import { splitFieldPath, type Block, type FieldPath } from './block.js';
import { FLUID_TYPE_DOMAIN, IMAGE_SOURCE, MODIFIER_TYPE, MOVIE_CLIP_SOURCE, STRIP_TYPE } from './constants/scene-dna.js';
import { modifierType, modifiers, sequencerStrips } from './iterators.js';
import type { FieldLocation } from './types/asset-reference.js';

/**
 * A path found in a block, before the tracer adds the storing file and
 * provenance.
 */
export interface UsageDraft {
  readonly storedPath: BlendPath;
  readonly pathFull?: FieldLocation;
  readonly pathDir?: FieldLocation;
  readonly pathBase?: FieldLocation;
  readonly isSequence: boolean;
  readonly isOptional: boolean;
}

export interface AssetExtractor {
  extract(block: Block): Iterable<UsageDraft>;
}

const extractors = new Map<string, AssetExtractor>();

/**
 * Registers the extractor for blocks of struct `structName`, replacing any
 * earlier registration.
 */
export function registerExtractor(structName: string, extractor: AssetExtractor): void {
  extractors.set(structName, extractor);
}

export function extractorFor(structName: string): AssetExtractor | undefined {
  return extractors.get(structName);
}

/** Paths stored in `block`, according to the extractor of its struct. */
export function extractUsages(block: Block): UsageDraft[] {
  const extractor = extractors.get(block.dnaTypeName);
  return extractor ? Array.from(extractor.extract(block)) : [];
}

export function fieldAt(block: Block, field: FieldPath): FieldLocation {
  return {
    blockAddress: block.address,
    structName: block.dnaTypeName,
    elementIndex: block.elementIndex,
    field: splitFieldPath(field),
  };
}

/** First of `candidates` present on the block; field names changed across versions. */
function pathField(block: Block, candidates: readonly string[]): string | undefined {
  return candidates.find((candidate) => block.hasField(candidate));
}

function isPacked(block: Block): boolean {
  return block.hasField('packedfile') && block.getPointer('packedfile') !== 0n;
}

function fullPath(
  block: Block,
  field: string,
  options: { readonly isSequence?: boolean; readonly isOptional?: boolean } = {},
): UsageDraft | undefined {
  const storedPath = new BlendPath(block.getCString(field));
  if (storedPath.isEmpty) {
    return undefined;
  }
  return {
    storedPath,
    pathFull: fieldAt(block, field),
    isSequence: options.isSequence ?? false,
    isOptional: options.isOptional ?? false,
  };
}

/**
 * Extractor for datablocks with one path field (named `filepath` in current
 * files and `name` in old ones).
 */
function singleFileExtractor(
  decide: (block: Block) => { readonly skip?: boolean; readonly isSequence?: boolean; readonly isOptional?: boolean },
): AssetExtractor {
  return {
    *extract(block) {
      const field = pathField(block, ['filepath', 'name']);
      if (!field) {
        return;
      }
      const decision = decide(block);
      if (decision.skip) {
        return;
      }
      const usage = fullPath(block, field, decision);
      if (usage) {
        yield usage;
      }
    },
  };
}

const IMAGE_FILE_SOURCES: ReadonlySet<number> = new Set([
  IMAGE_SOURCE.FILE,
  IMAGE_SOURCE.SEQUENCE,
  IMAGE_SOURCE.MOVIE,
  IMAGE_SOURCE.TILED,
]);

registerExtractor(
  'Image',
  singleFileExtractor((block) => {
    const source = block.hasField('source') ? block.getNumber('source') : IMAGE_SOURCE.FILE;
    return {
      skip: isPacked(block) || !IMAGE_FILE_SOURCES.has(source),
      isSequence: source === IMAGE_SOURCE.SEQUENCE || source === IMAGE_SOURCE.TILED,
    };
  }),
);

// A packed library still loads when its file is gone.
registerExtractor(
  'Library',
  singleFileExtractor((block) => ({ isOptional: isPacked(block) })),
);

registerExtractor(
  'CacheFile',
  singleFileExtractor((block) => ({
    isSequence: block.hasField('is_sequence') && block.getNumber('is_sequence') !== 0,
  })),
);

registerExtractor(
  'bSound',
  singleFileExtractor((block) => ({ skip: isPacked(block) })),
);

registerExtractor(
  'VFont',
  singleFileExtractor((block) => {
    const field = pathField(block, ['filepath', 'name']);
    const builtin = field !== undefined && block.getString(field) === '<builtin>';
    return { skip: builtin || isPacked(block) };
  }),
);

registerExtractor(
  'MovieClip',
  singleFileExtractor((block) => ({
    isSequence: block.hasField('source') && block.getNumber('source') === MOVIE_CLIP_SOURCE.SEQUENCE,
  })),
);

registerExtractor(
  'Volume',
  singleFileExtractor((block) => ({
    skip: isPacked(block),
    isSequence: block.hasField('is_sequence') && block.getNumber('is_sequence') !== 0,
  })),
);

function* modifierPaths(modifier: Block): Generator<UsageDraft> {
  switch (modifierType(modifier)) {
    case MODIFIER_TYPE.MESH_CACHE: {
      const usage = modifier.hasField('filepath') ? fullPath(modifier, 'filepath') : undefined;
      if (usage) yield usage;
      return;
    }
    case MODIFIER_TYPE.OCEAN: {
      if (modifier.hasField('cached') && modifier.getNumber('cached') === 0) {
        return;
      }
      const usage = modifier.hasField('cachepath') ? fullPath(modifier, 'cachepath', { isSequence: true }) : undefined;
      if (usage) yield usage;
      return;
    }
    case MODIFIER_TYPE.FLUID: {
      if (!modifier.hasField('type') || (modifier.getNumber('type') & FLUID_TYPE_DOMAIN) === 0) {
        return;
      }
      const domain = modifier.getBlock('domain');
      const usage = domain?.hasField('cache_directory') ? fullPath(domain, 'cache_directory', { isSequence: true }) : undefined;
      if (usage) yield usage;
      return;
    }
    default:
      return;
  }
}

registerExtractor('Object', {
  *extract(block) {
    for (const modifier of modifiers(block)) {
      yield* modifierPaths(modifier);
    }
  },
});

/** Strip payload: `data` in current files, `strip` in older ones. */
function stripData(strip: Block): Block | undefined {
  for (const field of ['data', 'strip']) {
    const target = strip.getBlock(field);
    if (target?.hasField('dir')) {
      return target;
    }
  }
  return undefined;
}

function* stripPaths(strip: Block, type: number): Generator<UsageDraft> {
  if (type !== STRIP_TYPE.IMAGE && type !== STRIP_TYPE.MOVIE) {
    return;
  }
  const data = stripData(strip);
  const elements = data?.getBlock('stripdata');
  if (!data || !elements?.hasField('name') || elements.count === 0) {
    return;
  }
  const directory = new BlendPath(data.getCString('dir'));
  const first = elements.element(0);
  const name = first.getString('name');
  if (name === '' && directory.isEmpty) {
    return;
  }
  yield {
    storedPath: directory.join(name),
    pathDir: fieldAt(data, 'dir'),
    pathBase: fieldAt(first, 'name'),
    isSequence: type === STRIP_TYPE.IMAGE && elements.count > 1,
    isOptional: false,
  };
}

registerExtractor('Scene', {
  *extract(block) {
    const editing = block.getBlock('ed');
    if (!editing) {
      return;
    }
    for (const { strip, type } of sequencerStrips(editing)) {
      yield* stripPaths(strip, type);
    }
  },
});
