/**
 * Destination layout of a pack: project files keep their relative layout,
 * files outside the project go under `_outside/<key>/`.
 */
import { createHash } from 'node:crypto';
import { basenameOf, dirnameOf, isWithin, normalizeAbsolute, rebase, relativeFrom } from './blend-path.js';
import type { Placement } from './types/pack-plan.js';

export const OUTSIDE_DIRECTORY = '_outside';
const KEY_HASH_LENGTH = 10;
const KEY_LABEL_LENGTH = 32;

/**
 * Stable name for an outside-project directory: its sanitized base name
 * followed by a short hash of the full normalized path, so two directories
 * with the same name never share a key.
 */
export function outsideKey(directory: string): string {
  const normalized = normalizeAbsolute(directory);
  const label = basenameOf(normalized)
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^[._]+/, '')
    .slice(0, KEY_LABEL_LENGTH);
  const hash = createHash('sha256').update(normalized, 'utf8').digest('hex').slice(0, KEY_HASH_LENGTH);
  return `${label || 'root'}-${hash}`;
}

export interface Destination {
  readonly destination: string;
  readonly placement: Placement;
}

/** Destination of one source file or sequence stem. */
export function destinationFor(source: string, projectRoot: string, target: string): Destination {
  if (isWithin(source, projectRoot)) {
    return { destination: rebase(source, projectRoot, target), placement: 'project' };
  }
  const directory = dirnameOf(source);
  return {
    destination: normalizeAbsolute(`${target}/${OUTSIDE_DIRECTORY}/${outsideKey(directory)}/${basenameOf(source)}`),
    placement: 'outside',
  };
}

/**
 * Destination of one file of an expanded sequence: placed relative to where
 * its stem goes. Members of a directory stem keep their sub-path; members of
 * a file pattern land beside the stem's destination.
 */
export function sequenceMemberDestination(member: string, stem: string, projectRoot: string, target: string): Destination {
  const stemDestination = destinationFor(stem, projectRoot, target);
  const stemIsDirectory = member !== stem && isWithin(member, stem);
  const sourceBase = stemIsDirectory ? stem : dirnameOf(stem);
  const destinationBase = stemIsDirectory ? stemDestination.destination : dirnameOf(stemDestination.destination);
  return { destination: rebase(member, sourceBase, destinationBase), placement: stemDestination.placement };
}

/** Forward-slash path of `destination` below `target`. */
export function entryNameFor(destination: string, target: string): string {
  return relativeFrom(target, destination) ?? basenameOf(destination);
}

function withSuffix(path: string, counter: number): string {
  const directory = dirnameOf(path);
  const name = basenameOf(path);
  const dot = name.lastIndexOf('.');
  const stem = dot > 0 ? name.slice(0, dot) : name;
  const extension = dot > 0 ? name.slice(dot) : '';
  return normalizeAbsolute(`${directory}/${stem}-${counter}${extension}`);
}

/**
 * Reserves `destination` for `source`, appending `-1`, `-2`, ... to the
 * file name when another source already holds it. Comparison ignores case,
 * since the pack may be unpacked on a case-insensitive filesystem.
 */
export function claimDestination(claimed: Map<string, string>, destination: string, source: string): string {
  let candidate = destination;
  for (let counter = 1; ; counter++) {
    const key = candidate.toLowerCase();
    const holder = claimed.get(key);
    if (holder === undefined || holder === source) {
      claimed.set(key, source);
      return candidate;
    }
    candidate = withSuffix(destination, counter);
  }
}
