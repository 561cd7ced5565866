import type { Dirent } from 'fs';
import { readdir, readFile, stat } from 'fs/promises';
import * as path from 'path';

export const TEMPLATE_EXTENSION = '.bicep';

export interface VersionRecord {
  identifier: string;
  resourceType: string;
  sourceFile: string;
}

export interface SkippedEntry {
  path: string;
  message: string;
}

export interface AuditScan {
  rootPath: string;
  rootExists: boolean;
  files: string[];
  skipped: SkippedEntry[];
  records: VersionRecord[];
  byVersion: Map<string, VersionRecord[]>;
  byResourceType: Map<string, VersionRecord[]>;
}

/**
 * Matches `resource <symbolicName> '<type>@<version>'` on a single line.
 * Declarations split across lines are not recognised.
 */
const DECLARATION_REGEX =
  /\bresource[ \t]+[A-Za-z_][A-Za-z0-9_]*[ \t]+'(?<type>[^'@\s]+)@(?<version>[^'\s]+)'/g;

export interface Declaration {
  resourceType: string;
  identifier: string;
}

export function extractDeclarations(text: string): Declaration[] {
  const found: Declaration[] = [];
  for (const match of text.matchAll(DECLARATION_REGEX)) {
    const type = match.groups?.type;
    const version = match.groups?.version;
    if (type && version) {
      found.push({ resourceType: type, identifier: version });
    }
  }
  return found;
}

async function directoryExists(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

function skip(skipped: SkippedEntry[], entryPath: string, err: unknown): void {
  skipped.push({ path: entryPath, message: err instanceof Error ? err.message : String(err) });
}

/**
 * Every `.bicep` file under `rootPath`, sorted. A missing root yields `[]`;
 * directories that cannot be read are passed over.
 */
export async function findTemplateFiles(rootPath: string): Promise<string[]> {
  return (await walkTemplates(rootPath)).files;
}

async function walkTemplates(
  rootPath: string
): Promise<{ files: string[]; skipped: SkippedEntry[] }> {
  const files: string[] = [];
  const skipped: SkippedEntry[] = [];
  if (await directoryExists(rootPath)) {
    await collect(rootPath, files, skipped);
  }
  return { files: files.sort(), skipped };
}

async function collect(dir: string, files: string[], skipped: SkippedEntry[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    skip(skipped, dir, err);
    return;
  }
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await collect(fullPath, files, skipped);
    } else if (entry.isFile() && entry.name.endsWith(TEMPLATE_EXTENSION)) {
      files.push(fullPath);
    }
  }
}

function addTo<K>(map: Map<K, VersionRecord[]>, key: K, record: VersionRecord): void {
  const group = map.get(key);
  if (group) {
    group.push(record);
  } else {
    map.set(key, [record]);
  }
}

export async function scanTemplates(rootPath: string): Promise<AuditScan> {
  const rootExists = await directoryExists(rootPath);
  const { files, skipped } = await walkTemplates(rootPath);
  const records: VersionRecord[] = [];
  const byVersion = new Map<string, VersionRecord[]>();
  const byResourceType = new Map<string, VersionRecord[]>();

  for (const file of files) {
    let text: string;
    try {
      text = await readFile(file, 'utf-8');
    } catch (err) {
      skip(skipped, file, err);
      continue;
    }
    for (const { resourceType, identifier } of extractDeclarations(text)) {
      const record: VersionRecord = { identifier, resourceType, sourceFile: file };
      records.push(record);
      addTo(byVersion, identifier, record);
      addTo(byResourceType, resourceType, record);
    }
  }

  return { rootPath, rootExists, files, skipped, records, byVersion, byResourceType };
}
