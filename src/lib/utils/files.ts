import { randomBytes } from 'crypto';
import { access, chmod, chown, lchown, link, lstat, readdir, rename, unlink, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';

function tempPathFor(path: string): string {
  return join(dirname(path), `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`);
}

/**
 * Write `data` to `path` so that readers only ever see the old or the new content:
 * the bytes go to a temporary sibling first, which is then renamed over `path`.
 */
export async function writeFileAtomic(
  path: string,
  data: string | Uint8Array,
  mode = 0o644,
): Promise<void> {
  const tmp = tempPathFor(path);
  try {
    await writeFile(tmp, data, { mode, flag: 'wx' });
    await chmod(tmp, mode);
    await rename(tmp, path);
  } catch (err) {
    await unlink(tmp).catch(() => undefined);
    throw err;
  }
}

/**
 * Create `path` with `data` only if it does not exist yet.
 *
 * The content is fully written to a temporary sibling and then hard-linked into
 * place; `link` fails with EEXIST when another writer got there first, so the file
 * appears complete or not at all. Returns false when the file already existed.
 */
export async function createFileExclusive(
  path: string,
  data: string | Uint8Array,
  mode = 0o644,
): Promise<boolean> {
  const tmp = tempPathFor(path);
  await writeFile(tmp, data, { mode, flag: 'wx' });
  try {
    await link(tmp, path);
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === 'EEXIST') return false;
    throw err;
  } finally {
    await unlink(tmp).catch(() => undefined);
  }
}

/** Recursively change owner of `path` and everything below it (symlinks are not followed). */
export async function chownRecursive(path: string, uid: number, gid: number): Promise<void> {
  const info = await lstat(path);
  if (info.isSymbolicLink()) {
    await lchown(path, uid, gid);
    return;
  }
  await chown(path, uid, gid);
  if (!info.isDirectory()) return;
  for (const entry of await readdir(path)) {
    await chownRecursive(join(path, entry), uid, gid);
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === 'object' && err !== null && 'code' in err;
}

export function isNotFound(err: unknown): boolean {
  return isErrnoException(err) && err.code === 'ENOENT';
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}
