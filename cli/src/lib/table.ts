import chalk from 'chalk';
import type { ResourceSummary } from './backend.js';

export function printResourceTable(resources: ResourceSummary[]): void {
  if (resources.length === 0) {
    process.stdout.write(chalk.gray('No resources found.\n'));
    return;
  }

  const nameWidth = Math.max(4, ...resources.map((r) => r.name.length));
  const typeWidth = Math.max(4, ...resources.map((r) => r.type.length));
  const header = ['NAME'.padEnd(nameWidth), 'TYPE'.padEnd(typeWidth), 'LOCATION'].join('  ');

  process.stdout.write(chalk.bold(header) + '\n');
  process.stdout.write(chalk.gray('-'.repeat(header.length)) + '\n');
  for (const resource of resources) {
    process.stdout.write(
      [resource.name.padEnd(nameWidth), resource.type.padEnd(typeWidth), resource.location].join('  ') +
        '\n'
    );
  }
}
