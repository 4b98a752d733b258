/**
 * Paths as stored inside scene files.
 *
 * Stored paths are either project-relative (`//textures/wood.png`, relative to
 * the directory of the file that stored them) or absolute (POSIX, drive
 * letter or UNC). The raw bytes are kept as read and only decoded when a path
 * has to reach the filesystem.
 */
import { resolve as resolveFromCwd } from 'node:path';

const RELATIVE_PREFIX = '//';
const DRIVE_ROOT = /^([A-Za-z]):(?:\/|$)/;

interface SplitPath {
  /** `/`, `C:/` or `//server/share/`. */
  readonly root: string;
  readonly segments: readonly string[];
}

function toForwardSlashes(path: string): string {
  return path.replace(/\\/g, '/');
}

function collapse(segments: readonly string[]): string[] {
  const result: string[] = [];
  for (const segment of segments) {
    if (segment === '' || segment === '.') {
      continue;
    }
    if (segment === '..') {
      result.pop();
      continue;
    }
    result.push(segment);
  }
  return result;
}

function splitAbsolute(path: string): SplitPath {
  const slashed = toForwardSlashes(path).normalize('NFC');

  if (slashed.startsWith('//')) {
    const [server = '', share = '', ...rest] = slashed.slice(2).split('/');
    return { root: `//${server}/${share}/`, segments: collapse(rest) };
  }

  const drive = DRIVE_ROOT.exec(slashed);
  if (drive) {
    return { root: `${(drive[1] ?? '').toUpperCase()}:/`, segments: collapse(slashed.slice(2).split('/')) };
  }

  if (slashed.startsWith('/')) {
    return { root: '/', segments: collapse(slashed.split('/')) };
  }

  return splitAbsolute(resolveFromCwd(path));
}

function join({ root, segments }: SplitPath): string {
  return `${root}${segments.join('/')}`.normalize('NFC');
}

function joinUnder(directory: string, relative: string): string {
  const base = splitAbsolute(directory);
  return join({ root: base.root, segments: collapse([...base.segments, ...toForwardSlashes(relative).normalize('NFC').split('/')]) });
}

/**
 * Canonical form used for equality and deduplication: forward slashes, `.`
 * and `..` collapsed, no trailing slash except on a root, NFC. Drive letters
 * are upper-cased and UNC roots kept. Relative input is resolved against the
 * working directory.
 */
export function normalizeAbsolute(path: string): string {
  return join(splitAbsolute(path));
}

/** True when `path` is `base` itself or lies below it. */
export function isWithin(path: string, base: string): boolean {
  const child = splitAbsolute(path);
  const parent = splitAbsolute(base);
  if (child.root !== parent.root || child.segments.length < parent.segments.length) {
    return false;
  }
  return parent.segments.every((segment, index) => child.segments[index] === segment);
}

/** Parent directory of a normalized absolute path. */
export function dirnameOf(path: string): string {
  const split = splitAbsolute(path);
  return join({ root: split.root, segments: split.segments.slice(0, -1) });
}

/** Final segment of a path. */
export function basenameOf(path: string): string {
  const { segments } = splitAbsolute(path);
  return segments[segments.length - 1] ?? '';
}

/**
 * Forward-slash path from directory `from` to `to`, or `undefined` when the
 * two live under different roots (drives or UNC shares).
 */
export function relativeFrom(from: string, to: string): string | undefined {
  const source = splitAbsolute(from);
  const target = splitAbsolute(to);
  if (source.root !== target.root) {
    return undefined;
  }
  let common = 0;
  while (
    common < source.segments.length &&
    common < target.segments.length &&
    source.segments[common] === target.segments[common]
  ) {
    common++;
  }
  const ups = source.segments.slice(common).map(() => '..');
  return [...ups, ...target.segments.slice(common)].join('/').normalize('NFC');
}

/**
 * Moves `absolutePath` from under `oldBase` to the same place under
 * `newBase`. Paths outside `oldBase` are returned normalized but otherwise
 * unchanged.
 */
export function rebase(absolutePath: string, oldBase: string, newBase: string): string {
  if (!isWithin(absolutePath, oldBase)) {
    return normalizeAbsolute(absolutePath);
  }
  const tail = splitAbsolute(absolutePath).segments.slice(splitAbsolute(oldBase).segments.length);
  const base = splitAbsolute(newBase);
  return join({ root: base.root, segments: [...base.segments, ...tail] });
}

export class BlendPath {
  readonly bytes: Buffer;

  constructor(bytes: Buffer | string) {
    this.bytes = typeof bytes === 'string' ? Buffer.from(bytes, 'utf8') : Buffer.from(bytes);
  }

  /** Decoded form, for the filesystem boundary and for display. */
  toString(): string {
    return this.bytes.toString('utf8');
  }

  get isEmpty(): boolean {
    return this.bytes.length === 0;
  }

  /** Starts with the `//` marker meaning "relative to the storing file". */
  get isBlendfileRelative(): boolean {
    return this.bytes.subarray(0, RELATIVE_PREFIX.length).toString('latin1') === RELATIVE_PREFIX;
  }

  get isAbsolute(): boolean {
    if (this.isBlendfileRelative) {
      return false;
    }
    const text = toForwardSlashes(this.toString());
    return text.startsWith('/') || DRIVE_ROOT.test(text);
  }

  /**
   * Resolves against the directory of the file that stored this path.
   * Backslashes written on Windows hosts are accepted in every form.
   */
  resolve(storingDir: string): string {
    const text = this.toString();
    if (this.isBlendfileRelative) {
      return joinUnder(storingDir, text.slice(RELATIVE_PREFIX.length));
    }
    if (this.isAbsolute) {
      return normalizeAbsolute(text);
    }
    return joinUnder(storingDir, text);
  }

  equals(other: BlendPath): boolean {
    return this.bytes.equals(other.bytes);
  }

  /** Appends a segment with a forward slash. */
  join(segment: string): BlendPath {
    const separator = this.bytes.length === 0 || this.toString().endsWith('/') ? '' : '/';
    return new BlendPath(Buffer.concat([this.bytes, Buffer.from(`${separator}${segment}`, 'utf8')]));
  }

  /**
   * Stored form of `assetPath` as seen from `sceneFilePath`: `//`-relative
   * when both share a root, absolute otherwise.
   */
  static mkrelative(assetPath: string, sceneFilePath: string): BlendPath {
    const relative = relativeFrom(dirnameOf(sceneFilePath), assetPath);
    if (relative === undefined) {
      return new BlendPath(normalizeAbsolute(assetPath));
    }
    return new BlendPath(`${RELATIVE_PREFIX}${relative}`);
  }
}
