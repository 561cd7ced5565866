import chalk from 'chalk';
import { AzCliBackend, requireAzureCli } from './backend.js';

export function reportError(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(chalk.red(`Error: ${message}\n`));
  process.exit(1);
}

/**
 * Wraps an async command action with consistent error formatting and
 * process.exit(1).
 */
export function withErrors<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err) {
      reportError(err);
    }
  };
}

/**
 * Like {@link withErrors}, but first checks that `az` is installed and signed
 * in, and hands the action a ready backend:
 *
 *   .action(withAzure(async (backend, name, opts) => { ... }))
 */
export function withAzure<T extends unknown[]>(
  fn: (backend: AzCliBackend, ...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return withErrors(async (...args: T) => {
    const backend = new AzCliBackend();
    await requireAzureCli(backend);
    await fn(backend, ...args);
  });
}
