/**
 * Filesystem-only expansion of paths that stand for a family of files:
 * numbered frames, `<UDIM>` tiles, `*` globs and whole directories.
 */
import type { Dirent, Stats } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { basenameOf, dirnameOf, normalizeAbsolute } from './blend-path.js';
import { SequenceNotFoundError } from './types/errors.js';
import { globToRegExp } from './utils/glob.js';
import { silentLogger, type Logger } from './utils/logger.js';
import type { AssetReference, BlockUsage } from './types/asset-reference.js';

const UDIM_TOKEN = '<UDIM>';
const FIRST_UDIM_TILE = 1001;
/** A run of exactly four digits; the last one in a file name is its tile number. */
const UDIM_TILE_NUMBER = /(?<!\d)(\d{4})(?!\d)/g;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

async function statOrUndefined(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path);
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }
}

/** Regular files directly inside `directory` whose name satisfies `accept`, sorted. */
async function matchingFiles(directory: string, accept: (name: string) => boolean): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }
  return entries
    .filter((entry) => entry.isFile() && accept(entry.name))
    .map((entry) => normalizeAbsolute(`${directory}/${entry.name}`))
    .sort();
}

async function filesBelow(directory: string): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    const path = normalizeAbsolute(`${directory}/${entry.name}`);
    if (entry.isDirectory()) {
      files.push(...(await filesBelow(path)));
    } else if (entry.isFile()) {
      files.push(path);
    }
  }
  return files.sort();
}

/** Splits `frame_0001.png` into `frame_`, `0001` and `.png`. */
function splitFrameNumber(name: string): { prefix: string; digits: string; suffix: string } | undefined {
  const match = /^(.*?)(\d+)(\.[^.]*)?$/.exec(name);
  if (!match || match[2] === undefined) {
    return undefined;
  }
  return { prefix: match[1] ?? '', digits: match[2], suffix: match[3] ?? '' };
}

/**
 * Concrete files denoted by `path`, sorted.
 *
 * - `<UDIM>` in the file name matches four-digit tiles from 1001 on.
 * - `*` in the file name is a glob within its directory.
 * - An existing directory expands to every file below it.
 * - A file name ending in a digit run matches every file that differs
 *   only in those digits.
 * - Anything else is the file itself.
 *
 * @throws {SequenceNotFoundError} If nothing on disk matches
 */
export async function expandSequence(path: string): Promise<string[]> {
  const absolute = normalizeAbsolute(path);
  const directory = dirnameOf(absolute);
  const name = basenameOf(absolute);
  let files: string[];

  if (name.includes(UDIM_TOKEN)) {
    const [before = '', after = ''] = name.split(UDIM_TOKEN);
    const tile = new RegExp(`^${escapeRegExp(before)}(\\d{4})${escapeRegExp(after)}$`);
    files = await matchingFiles(directory, (candidate) => {
      const match = tile.exec(candidate);
      return match !== null && Number(match[1]) >= FIRST_UDIM_TILE;
    });
  } else if (name.includes('*')) {
    const glob = globToRegExp(name);
    files = await matchingFiles(directory, (candidate) => glob.test(candidate));
  } else {
    const stats = await statOrUndefined(absolute);
    if (stats?.isDirectory()) {
      files = await filesBelow(absolute);
    } else {
      const frame = splitFrameNumber(name);
      if (frame) {
        const family = new RegExp(`^${escapeRegExp(frame.prefix)}\\d+${escapeRegExp(frame.suffix)}$`);
        files = await matchingFiles(directory, (candidate) => family.test(candidate));
      } else {
        files = stats?.isFile() ? [absolute] : [];
      }
    }
  }

  if (files.length === 0) {
    throw new SequenceNotFoundError(absolute);
  }
  return files;
}

/** File name with its last four-digit tile number replaced by `<UDIM>`, if it has one from 1001 on. */
function udimTemplate(name: string): string | undefined {
  const matches = Array.from(name.matchAll(UDIM_TILE_NUMBER));
  const last = matches[matches.length - 1];
  const start = last?.index;
  if (last === undefined || start === undefined || Number(last[1]) < FIRST_UDIM_TILE) {
    return undefined;
  }
  return `${name.slice(0, start)}${UDIM_TOKEN}${name.slice(start + last[0].length)}`;
}

/**
 * Every tile of the UDIM set that a file named after one concrete tile
 * belongs to, e.g. `wood.1001.png` and `wood.1002.png` for `wood.1001.png`.
 * Empty unless at least two tiles exist.
 */
export async function udimTiles(path: string): Promise<string[]> {
  const absolute = normalizeAbsolute(path);
  const template = udimTemplate(basenameOf(absolute));
  if (template === undefined) {
    return [];
  }
  const tiles = await matchingFiles(dirnameOf(absolute), (candidate) => udimTemplate(candidate) === template);
  return tiles.length >= 2 ? tiles : [];
}

/**
 * Combines two references to the same path. The result owns a new usage
 * list; it is required unless both are optional.
 */
export function mergeReference(existing: AssetReference, reference: AssetReference): AssetReference {
  return {
    ...existing,
    isSequence: existing.isSequence || reference.isSequence,
    isOptional: existing.isOptional && reference.isOptional,
    sequenceStem: existing.sequenceStem ?? reference.sequenceStem,
    usages: [...existing.usages, ...reference.usages],
  };
}

/**
 * Whether `usage` reaches `reference` through the family it was expanded
 * from, rather than by storing the member's own path.
 */
export function usesSequenceStem(reference: AssetReference, usage: BlockUsage): boolean {
  return reference.sequenceStem !== undefined && usage.storedPath.resolve(dirnameOf(usage.sceneFile)) !== reference.absolutePath;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Replaces every sequence reference by one reference per file on disk. The
 * members share the original's usages and carry its path as `sequenceStem`.
 * A file named after one concrete UDIM tile is expanded the same way when
 * its sibling tiles exist. References that end up on the same path are
 * merged. A sequence that cannot be listed is kept as-is so that packing
 * reports it.
 */
export async function expandReferences(
  references: readonly AssetReference[],
  logger: Logger = silentLogger,
): Promise<AssetReference[]> {
  const expanded: AssetReference[] = [];
  const positions = new Map<string, number>();
  const push = (reference: AssetReference): void => {
    const position = positions.get(reference.absolutePath);
    if (position === undefined) {
      positions.set(reference.absolutePath, expanded.length);
      expanded.push(reference);
      return;
    }
    const existing = expanded[position];
    if (existing) {
      expanded[position] = mergeReference(existing, reference);
    }
  };

  for (const reference of references) {
    if (reference.sequenceStem !== undefined) {
      push(reference);
      continue;
    }
    let members: string[];
    try {
      members = reference.isSequence ? await expandSequence(reference.absolutePath) : await udimTiles(reference.absolutePath);
    } catch (error) {
      logger.warn(
        error instanceof SequenceNotFoundError
          ? error.message
          : `Cannot expand sequence ${reference.absolutePath}: ${describeError(error)}`,
      );
      push(reference);
      continue;
    }
    if (members.length === 0) {
      push(reference);
      continue;
    }
    if (!reference.isSequence && !members.includes(reference.absolutePath)) {
      members.unshift(reference.absolutePath);
    }
    for (const member of members) {
      push({ ...reference, absolutePath: member, sequenceStem: reference.absolutePath });
    }
  }
  return expanded;
}
