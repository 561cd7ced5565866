import { spawn } from 'child_process';

export interface AzResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Raised when `az` exits non-zero. The CLI's own stderr is kept verbatim so
 * the caller can show the user exactly what Azure said.
 */
export class AzCliError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stderr: string
  ) {
    const detail = stderr.trim();
    super(
      detail
        ? `${command} failed (exit ${exitCode}):\n${detail}`
        : `${command} failed (exit ${exitCode})`
    );
    this.name = 'AzCliError';
  }
}

export type AzRunner = (args: string[]) => Promise<AzResult>;

/**
 * Run the Azure CLI with a fixed argument list and collect its output.
 * Waits for the process to exit; there is no timeout.
 */
export const runAz: AzRunner = (args) =>
  new Promise((resolve, reject) => {
    const child = spawn('az', args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (err) => {
      reject(
        new Error(
          `Failed to run az CLI: ${err.message}. Make sure the Azure CLI is installed and on your PATH.`
        )
      );
    });

    child.on('close', (code) => {
      resolve({ code: code ?? 1, stdout, stderr });
    });
  });

/** `az group create --name x` -> `az group create` */
export function describeCommand(args: string[]): string {
  const end = args.findIndex((arg) => arg.startsWith('-'));
  return ['az', ...(end === -1 ? args : args.slice(0, end))].join(' ');
}

/**
 * Run `az` and parse its JSON output. Rejects with {@link AzCliError} on a
 * non-zero exit; empty output parses to `null`.
 */
export async function runAzJson(run: AzRunner, args: string[]): Promise<unknown> {
  const result = await run([...args, '--output', 'json']);
  if (result.code !== 0) {
    throw new AzCliError(describeCommand(args), result.code, result.stderr);
  }
  const body = result.stdout.trim();
  return body ? JSON.parse(body) : null;
}
