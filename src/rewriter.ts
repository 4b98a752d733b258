/**
 * In-place patching of stored paths inside a scene file.
 */
import type { Block } from './block.js';
import { SceneBinary } from './scene-binary.js';
import type { SceneFile } from './scene-file.js';
import { PackError } from './types/errors.js';
import type { FieldLocation } from './types/asset-reference.js';
import type { FieldRewrite } from './types/pack-plan.js';

export interface RewriteOutcome {
  /** Number of fields patched. */
  readonly patched: number;
  /** Assets whose stored paths were left as they were, with the reason. */
  readonly rejected: ReadonlyMap<string, string>;
}

function locationLabel(location: FieldLocation): string {
  return `${location.structName}@0x${location.blockAddress.toString(16)}[${location.elementIndex}].${location.field.join('.')}`;
}

function elementAt(file: SceneFile, location: FieldLocation): Block {
  const target = file.dereference(location.blockAddress);
  if (target.kind !== 'resolved') {
    throw new PackError(`No block at ${locationLabel(location)} in ${file.filePath}`);
  }
  const typed = target.block.dnaTypeName === location.structName ? target.block : target.block.refine(location.structName);
  return typed.element(location.elementIndex);
}

/**
 * Writes each rewrite into the in-memory copy of `file`. Only the addressed
 * field bytes change; every other byte of the file stays as read.
 *
 * When one new path of an asset does not fit its field, none of that
 * asset's fields are patched, so a directory and file name pair never ends
 * up half rewritten.
 *
 * @throws {PackError} If a location no longer matches a block of the file
 */
export function applyRewrites(file: SceneFile, rewrites: readonly FieldRewrite[]): RewriteOutcome {
  const targets = rewrites.map((rewrite) => ({ rewrite, element: elementAt(file, rewrite.location) }));

  const rejected = new Map<string, string>();
  for (const { rewrite, element } of targets) {
    const room = element.fieldInfo(rewrite.location.field).size - 1;
    const length = rewrite.newValue.bytes.length;
    if (length > room && !rejected.has(rewrite.asset)) {
      rejected.set(
        rewrite.asset,
        `Path "${rewrite.newValue.toString()}" is too long for ${locationLabel(rewrite.location)} (${length} bytes, room for ${room})`,
      );
    }
  }

  let patched = 0;
  for (const { rewrite, element } of targets) {
    if (!rejected.has(rewrite.asset)) {
      element.set(rewrite.location.field, rewrite.newValue.bytes);
      patched++;
    }
  }
  return { patched, rejected };
}

/**
 * Reads the scene file at `filePath`, applies `rewrites` and returns the
 * patched contents in the file's container format. The file on disk is not
 * modified.
 */
export async function rewriteSceneFile(
  filePath: string,
  rewrites: readonly FieldRewrite[],
): Promise<{ readonly data: Buffer; readonly rejected: ReadonlyMap<string, string> }> {
  const file = await SceneBinary.read({ filePath });
  try {
    const { rejected } = applyRewrites(file, rewrites);
    return { data: file.toBuffer(), rejected };
  } finally {
    file.close();
  }
}
