import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { extractDeclarations, findTemplateFiles, scanTemplates } from '../lib/audit/scan.js';

async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(tmpdir(), 'bicep-tutorial-scan-'));
}

async function cleanupTempDir(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

async function writeFile(root: string, relative: string, content: string): Promise<void> {
  const file = path.join(root, relative);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content);
}

// ============================================================================
// Declaration grammar
// ============================================================================

describe('extractDeclarations', () => {
  it('should capture resource type and version', () => {
    const text = "resource sa 'Microsoft.Storage/storageAccounts@2023-01-01' = {\n  name: 'x'\n}\n";

    expect(extractDeclarations(text)).toEqual([
      { resourceType: 'Microsoft.Storage/storageAccounts', identifier: '2023-01-01' },
    ]);
  });

  it('should capture existing references and nested types', () => {
    const text = [
      "resource kv 'Microsoft.KeyVault/vaults@2023-06-01-preview' existing = {",
      "resource c 'Microsoft.Storage/storageAccounts/blobServices/containers@2023-01-01' = [for n in names: {",
    ].join('\n');

    expect(extractDeclarations(text)).toEqual([
      { resourceType: 'Microsoft.KeyVault/vaults', identifier: '2023-06-01-preview' },
      {
        resourceType: 'Microsoft.Storage/storageAccounts/blobServices/containers',
        identifier: '2023-01-01',
      },
    ]);
  });

  it('should ignore modules and nested child declarations', () => {
    const text = [
      "module storage 'modules/storage.bicep' = {",
      "resource child 'blobServices' = {",
    ].join('\n');

    expect(extractDeclarations(text)).toEqual([]);
  });

  it('should not match a declaration split across lines', () => {
    const text = "resource sa\n  'Microsoft.Storage/storageAccounts@2020-01-01' = {}";

    expect(extractDeclarations(text)).toEqual([]);
  });
});

// ============================================================================
// Directory scanning
// ============================================================================

describe('scanTemplates', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should find .bicep files recursively and nothing else', async () => {
    await writeFile(tempDir, 'a.bicep', '');
    await writeFile(tempDir, 'nested/deeper/b.bicep', '');
    await writeFile(tempDir, 'notes.txt', "resource sa 'A/b@2020-01-01' = {}");

    const files = await findTemplateFiles(tempDir);

    expect(files).toEqual([
      path.join(tempDir, 'a.bicep'),
      path.join(tempDir, 'nested', 'deeper', 'b.bicep'),
    ]);
  });

  it('should group records by version and by resource type', async () => {
    await writeFile(
      tempDir,
      'a.bicep',
      [
        "resource sa 'Microsoft.Storage/storageAccounts@2021-01-01' = {",
        '}',
        "resource kv 'Microsoft.KeyVault/vaults@2023-06-01-preview' existing = {",
        '}',
      ].join('\n')
    );
    await writeFile(
      tempDir,
      'nested/b.bicep',
      [
        "resource plan 'Microsoft.Web/serverfarms@2024-01-01' = {}",
        "resource other 'Custom@2024-01-01' = {}",
      ].join('\n')
    );

    const scan = await scanTemplates(tempDir);

    expect(scan.rootExists).toBe(true);
    expect(scan.files).toHaveLength(2);
    expect(scan.records).toHaveLength(4);
    expect(scan.byVersion.get('2024-01-01')?.map((r) => r.resourceType)).toEqual([
      'Microsoft.Web/serverfarms',
      'Custom',
    ]);
    expect(scan.byVersion.get('2021-01-01')?.[0]).toEqual({
      identifier: '2021-01-01',
      resourceType: 'Microsoft.Storage/storageAccounts',
      sourceFile: path.join(tempDir, 'a.bicep'),
    });
    expect([...scan.byResourceType.keys()]).toEqual([
      'Microsoft.Storage/storageAccounts',
      'Microsoft.KeyVault/vaults',
      'Microsoft.Web/serverfarms',
      'Custom',
    ]);
  });

  it('should keep the total reference count across version groups', async () => {
    await writeFile(
      tempDir,
      'one.bicep',
      [
        "resource a 'Microsoft.Storage/storageAccounts@2023-01-01' = {}",
        "resource b 'Microsoft.Storage/storageAccounts@2023-01-01' = {}",
        "resource c 'Microsoft.Web/sites@2022-03-01' = {}",
      ].join('\n')
    );
    await writeFile(tempDir, 'two.bicep', "resource d 'Microsoft.Web/sites@2023-01-01' = {}");

    const scan = await scanTemplates(tempDir);
    const grouped = [...scan.byVersion.values()].reduce((sum, group) => sum + group.length, 0);

    expect(scan.records).toHaveLength(4);
    expect(grouped).toBe(4);
    expect(scan.byVersion.get('2023-01-01')).toHaveLength(3);
  });

  it('should report a missing root as empty', async () => {
    const scan = await scanTemplates(path.join(tempDir, 'missing'));

    expect(scan.rootExists).toBe(false);
    expect(scan.files).toEqual([]);
    expect(scan.records).toEqual([]);
  });

  it('should build fresh maps on every call', async () => {
    await writeFile(tempDir, 'a.bicep', "resource a 'Microsoft.Web/sites@2022-03-01' = {}");

    const first = await scanTemplates(tempDir);
    const second = await scanTemplates(tempDir);

    expect(second.records).toHaveLength(1);
    expect(second.byVersion).not.toBe(first.byVersion);
  });
});
