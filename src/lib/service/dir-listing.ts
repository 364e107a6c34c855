import { readdir, readFile } from 'fs/promises';
import { join } from 'path';

/** Contents of every regular file of `dir`, in name order. */
export async function readDirFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files = entries.filter((e) => e.isFile()).map((e) => e.name).sort();
  return Promise.all(files.map((name) => readFile(join(dir, name), 'utf-8')));
}

/** `File : <index>` followed by the file's contents, for each file of `dir`. */
export async function formatDirListing(dir: string): Promise<string> {
  const contents = await readDirFiles(dir);
  return contents.map((text, i) => `File : ${i}\n${text}`).join('');
}
