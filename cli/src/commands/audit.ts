import * as path from 'path';
import { Command } from 'commander';
import { getConfigValue } from '../lib/config.js';
import { AzCliBackend } from '../lib/backend.js';
import { runAudit } from '../lib/audit/report.js';
import { withErrors } from '../lib/command.js';

interface AuditCommandOptions {
  detailed?: boolean;
  showLatest?: boolean;
}

export function registerAuditCommand(program: Command): void {
  program
    .command('audit [dir]')
    .description('Report the API versions used by the Bicep templates in a directory')
    .option('--detailed', 'List every file and resource type per API version')
    .option('--show-latest', 'Compare with the newest versions published by Azure (needs az)')
    .action(withErrors(async (dir: string | undefined, opts: AuditCommandOptions) => {
      await runAudit(
        {
          rootPath: path.resolve(dir ?? getConfigValue('paths.examplesDir')),
          detailed: Boolean(opts.detailed),
          showLatest: Boolean(opts.showLatest),
        },
        {
          out: process.stdout,
          registry: opts.showLatest ? new AzCliBackend() : undefined,
        }
      );
    }));
}
