import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';

/** Tutorial docs and example templates shipped with the CLI. */
export const CORPUS_DIR = fileURLToPath(new URL('../../content/', import.meta.url));

export type ScaffoldStatus = 'created' | 'updated' | 'unchanged';

export interface ScaffoldEntry {
  path: string;
  status: ScaffoldStatus;
}

/**
 * Corpus files relative to `sourceDir`, with `/` separators, sorted.
 */
export async function listCorpusFiles(sourceDir: string = CORPUS_DIR): Promise<string[]> {
  const files: string[] = [];

  async function walk(dir: string, prefix: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await walk(path.join(dir, entry.name), relative);
      } else if (entry.isFile()) {
        files.push(relative);
      }
    }
  }

  await walk(sourceDir, '');
  return files.sort();
}

async function readIfExists(file: string): Promise<Buffer | null> {
  try {
    return await readFile(file);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

/**
 * Write every corpus file under `targetDir`. Files whose bytes already match
 * are left alone, so running twice produces an identical tree.
 */
export async function scaffoldCorpus(
  targetDir: string,
  sourceDir: string = CORPUS_DIR
): Promise<ScaffoldEntry[]> {
  const results: ScaffoldEntry[] = [];

  for (const relative of await listCorpusFiles(sourceDir)) {
    const content = await readFile(path.join(sourceDir, ...relative.split('/')));
    const destination = path.join(targetDir, ...relative.split('/'));
    const existing = await readIfExists(destination);

    if (existing && existing.equals(content)) {
      results.push({ path: relative, status: 'unchanged' });
      continue;
    }

    await mkdir(path.dirname(destination), { recursive: true });
    await writeFile(destination, content);
    results.push({ path: relative, status: existing ? 'updated' : 'created' });
  }

  return results;
}
