import { Command } from 'commander';
import chalk from 'chalk';
import {
  CONFIG_PATHS,
  getConfigValue,
  isConfigPath,
  resetConfig,
  setConfig,
  type ConfigPath,
} from '../lib/config.js';

function requireKey(key: string): ConfigPath {
  if (!isConfigPath(key)) {
    process.stderr.write(
      chalk.red(`Unknown key "${key}". Valid keys: ${CONFIG_PATHS.join(', ')}\n`)
    );
    process.exit(1);
  }
  return key;
}

export function registerConfigCommand(program: Command): void {
  const config = program.command('config').description('Manage stored defaults');

  config
    .command('list')
    .description('Show every stored value')
    .action(() => {
      for (const key of CONFIG_PATHS) {
        process.stdout.write(`${key.padEnd(22)}${chalk.cyan(getConfigValue(key))}\n`);
      }
    });

  config
    .command('get <key>')
    .description('Print one stored value')
    .action((key: string) => {
      process.stdout.write(getConfigValue(requireKey(key)) + '\n');
    });

  config
    .command('set <key> <value>')
    .description('Store a default')
    .action((key: string, value: string) => {
      if (!value.trim()) {
        process.stderr.write(chalk.red('Value cannot be empty.\n'));
        process.exit(1);
      }
      setConfig(requireKey(key), value.trim());
      process.stdout.write(chalk.green(`${key} = ${value.trim()}\n`));
    });

  config
    .command('reset')
    .description('Restore the built-in defaults')
    .action(() => {
      resetConfig();
      process.stdout.write(chalk.green('Defaults restored.\n'));
    });
}
