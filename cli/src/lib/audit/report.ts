import * as path from 'path';
import chalk from 'chalk';
import type { Dayjs } from 'dayjs';
import { scanTemplates, type AuditScan, type VersionRecord } from './scan.js';
import {
  classifyVersions,
  sortVersionsDescending,
  type VersionClassification,
} from './classify.js';
import { splitResourceType, type ProviderRegistry } from './registry.js';

export interface AuditOptions {
  rootPath: string;
  detailed: boolean;
  showLatest: boolean;
}

export interface OutputSink {
  write(chunk: string): unknown;
}

export interface AuditDeps {
  out: OutputSink;
  now?: Date | Dayjs;
  registry?: ProviderRegistry;
}

export type LatestStatus = 'current' | 'outdated' | 'unknown';

export interface LatestCheck {
  resourceType: string;
  used: string[];
  latest: string | null;
  status: LatestStatus;
}

export interface AuditResult {
  scan: AuditScan;
  versions: string[];
  classification: VersionClassification;
  latest: LatestCheck[];
}

function distinct(records: VersionRecord[]): string[] {
  return [...new Set(records.map((r) => r.identifier))];
}

function writeList(out: OutputSink, title: string, versions: string[]): void {
  if (versions.length === 0) {
    return;
  }
  out.write(`\n${title}\n`);
  for (const version of versions) {
    out.write(`  - ${version}\n`);
  }
}

function writeSummary(out: OutputSink, scan: AuditScan, versions: string[], detailed: boolean): void {
  out.write(chalk.bold('\nAPI version summary\n'));
  out.write(chalk.gray('='.repeat(40)) + '\n');

  for (const version of versions) {
    const group = scan.byVersion.get(version) ?? [];
    out.write(`${chalk.cyan(version)} (${group.length} reference(s))\n`);
    if (detailed) {
      for (const record of group) {
        const file = path.relative(scan.rootPath, record.sourceFile);
        out.write(chalk.gray(`    ${record.resourceType} in ${file}\n`));
      }
    }
  }

  out.write(chalk.gray(`\n${scan.records.length} resource declaration(s) in ${scan.files.length} file(s)\n`));
}

async function checkLatest(
  out: OutputSink,
  scan: AuditScan,
  registry: ProviderRegistry
): Promise<LatestCheck[]> {
  const checks: LatestCheck[] = [];
  out.write(chalk.bold('\nLatest API version check\n'));

  for (const resourceType of [...scan.byResourceType.keys()].sort()) {
    const parts = splitResourceType(resourceType);
    if (!parts) {
      continue;
    }
    const used = sortVersionsDescending(distinct(scan.byResourceType.get(resourceType) ?? []));

    let latest: string | null = null;
    try {
      const known = await registry.listApiVersions(parts.namespace, parts.resourceType);
      latest = known[0] ?? null;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      out.write(chalk.yellow(`  ? ${resourceType}: could not query latest version (${message})\n`));
      checks.push({ resourceType, used, latest: null, status: 'unknown' });
      continue;
    }

    if (!latest) {
      out.write(chalk.yellow(`  ? ${resourceType}: no versions published\n`));
      checks.push({ resourceType, used, latest: null, status: 'unknown' });
      continue;
    }

    const current = used.every((version) => version === latest);
    if (current) {
      out.write(chalk.green(`  ✓ ${resourceType}: ${latest}\n`));
    } else {
      out.write(
        chalk.yellow(`  ⚠ ${resourceType}: using ${used.join(', ')}, latest is ${latest}\n`)
      );
    }
    checks.push({ resourceType, used, latest, status: current ? 'current' : 'outdated' });
  }

  return checks;
}

/**
 * Scan, classify and report. Findings are advisory: nothing here throws
 * because a version is old or in preview.
 */
export async function runAudit(options: AuditOptions, deps: AuditDeps): Promise<AuditResult> {
  const { out } = deps;
  out.write(`Scanning Bicep templates in ${options.rootPath}...\n`);

  const scan = await scanTemplates(options.rootPath);
  if (!scan.rootExists) {
    out.write(chalk.yellow(`Directory not found: ${options.rootPath}\n`));
  }
  out.write(`Found ${scan.files.length} template file(s)\n`);
  for (const entry of scan.skipped) {
    out.write(chalk.yellow(`Skipped ${entry.path}: ${entry.message}\n`));
  }

  const empty: AuditResult = {
    scan,
    versions: [],
    classification: { veryOld: [], old: [], preview: [] },
    latest: [],
  };
  if (scan.files.length === 0) {
    return empty;
  }

  const versions = sortVersionsDescending(scan.byVersion.keys());
  writeSummary(out, scan, versions, options.detailed);

  const classification = classifyVersions(versions, deps.now);
  writeList(out, chalk.red('Very old API versions (more than 2 years):'), classification.veryOld);
  writeList(out, chalk.yellow('Old API versions (1-2 years):'), classification.old);
  writeList(out, chalk.magenta('Preview API versions:'), classification.preview);

  let latest: LatestCheck[] = [];
  if (options.showLatest) {
    if (deps.registry) {
      latest = await checkLatest(out, scan, deps.registry);
    } else {
      out.write(chalk.yellow('\nLatest version check skipped: no provider registry available\n'));
    }
  }

  return { scan, versions, classification, latest };
}
