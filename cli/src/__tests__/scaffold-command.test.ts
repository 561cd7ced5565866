import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'path';
import { tmpdir } from 'os';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { Command } from 'commander';
import { registerScaffoldCommand } from '../commands/scaffold.js';

const spinner = vi.hoisted(() => ({ succeed: vi.fn(), fail: vi.fn() }));

vi.mock('ora', () => ({
  default: () => ({ start: () => spinner }),
}));

function buildProgram(): Command {
  const program = new Command();
  program.exitOverride();
  registerScaffoldCommand(program);
  return program;
}

describe('scaffold command', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'bicep-tutorial-scaffold-cmd-'));
    spinner.succeed.mockClear();
    spinner.fail.mockClear();
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`exit ${code}`);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    try {
      await rm(tempDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  it('should succeed the spinner after writing the corpus', async () => {
    const target = path.join(tempDir, 'tutorial');

    await buildProgram().parseAsync(['scaffold', target], { from: 'user' });

    expect(spinner.succeed).toHaveBeenCalledWith(`Tutorial files written to ${target}`);
    expect(spinner.fail).not.toHaveBeenCalled();
  });

  it('should fail the spinner and exit 1 when the target cannot be written', async () => {
    const blocker = path.join(tempDir, 'not-a-directory');
    await writeFile(blocker, 'x');

    await expect(
      buildProgram().parseAsync(['scaffold', path.join(blocker, 'tutorial')], { from: 'user' })
    ).rejects.toThrow('exit 1');

    expect(spinner.fail).toHaveBeenCalledWith('Scaffold failed');
    expect(spinner.succeed).not.toHaveBeenCalled();
  });
});
