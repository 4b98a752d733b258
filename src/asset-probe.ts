/**
 * Open-for-read check that tells missing files from unreadable ones.
 */
import { open, type FileHandle } from 'node:fs/promises';

export type ProbeResult =
  | { readonly status: 'readable'; readonly size: number }
  | { readonly status: 'missing' }
  | { readonly status: 'unreadable'; readonly reason: string };

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Opens `path` and reads one byte. Only a path that does not exist is
 * "missing"; every other failure (permissions, symlink loops, directories,
 * I/O errors) is "unreadable" with the OS reason.
 */
export async function probeAsset(path: string): Promise<ProbeResult> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return { status: 'missing' };
    }
    return { status: 'unreadable', reason: `${code ?? 'Error'}: ${error instanceof Error ? error.message : String(error)}` };
  }

  try {
    const stats = await handle.stat();
    if (!stats.isFile()) {
      return { status: 'unreadable', reason: 'not a regular file' };
    }
    await handle.read(Buffer.alloc(1), 0, 1, 0);
    return { status: 'readable', size: stats.size };
  } catch (error) {
    const code = errorCode(error);
    return { status: 'unreadable', reason: `${code ?? 'Error'}: ${error instanceof Error ? error.message : String(error)}` };
  } finally {
    await handle.close();
  }
}
