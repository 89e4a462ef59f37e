/**
 * Command line surface: a dry-run toggle and the maintenance document path.
 */

import { Command } from 'commander';

export const DEFAULT_CONFIG_PATH = 'maintenance_config.yml';

export interface CliOptions {
  dryRun: boolean;
  config: string;
}

export function createProgram(action: (options: CliOptions) => Promise<void>): Command {
  return new Command()
    .name('db-maintenance')
    .description('MySQL table maintenance: dump, foreign-key audit, delete, optimize')
    .option('--dry-run', 'Only log the SQL and dump commands without executing them', false)
    .option('--config <path>', 'Path to YAML configuration file', DEFAULT_CONFIG_PATH)
    .action(async (options: { dryRun: boolean; config: string }) => {
      await action({ dryRun: options.dryRun, config: options.config });
    });
}
