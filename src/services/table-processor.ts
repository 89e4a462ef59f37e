/**
 * TableProcessor
 *
 * Runs the steps configured for one table, always in this order:
 *   dump -> foreign-key audit -> delete -> optimize
 *
 * A failed dump stops the table: nothing destructive runs without the backup
 * that was asked for. Every other failure is recorded and the next step runs.
 * Each configured step adds at least one line to the ResultLog, whatever its
 * outcome.
 */

import type { Logger } from '../config/logger';
import type { Row, SqlSession } from '../database/client';
import type { SqlExecutor } from '../database/sql-executor';
import { optimizeTable } from '../database/statements';
import { errorMessage } from '../errors';
import type { MaintenanceMetrics } from '../metrics';
import type { TableSpec } from '../strategies/delete-strategy.interface';
import type { DeletionEngine } from './deletion-engine';
import { formatForeignKey } from './foreign-key-auditor';
import type { ForeignKeyAuditor } from './foreign-key-auditor';
import type { ResultLog } from './result-log';
import type { TableDumper } from './table-dumper';

export type TableOutcome = 'completed' | 'completed_with_errors' | 'aborted';

function describeOptimize(rows: Row[] | null): string {
  if (!rows || rows.length === 0) {
    return '';
  }
  const statuses = rows.map((row) => `${String(row.Msg_type ?? '')}: ${String(row.Msg_text ?? '')}`);
  return `: ${statuses.join('; ')}`;
}

export class TableProcessor {
  constructor(
    private dumper: TableDumper,
    private auditor: ForeignKeyAuditor,
    private deletionEngine: DeletionEngine,
    private executor: SqlExecutor,
    private metrics: MaintenanceMetrics,
    private logger: Logger
  ) {}

  async process(
    session: SqlSession,
    database: string,
    table: TableSpec,
    results: ResultLog
  ): Promise<TableOutcome> {
    const outcome = await this.runSteps(session, database, table, results);
    this.metrics.tables.inc({ outcome });
    return outcome;
  }

  private async runSteps(
    session: SqlSession,
    database: string,
    table: TableSpec,
    results: ResultLog
  ): Promise<TableOutcome> {
    const name = table.name;
    let hadErrors = false;

    results.info(`Processing table \`${database}\`.\`${name}\``);

    if (table.dump) {
      const dump = await this.dumper.dumpTable(database, name, table.dump);
      if (!dump.ok) {
        results.error(`Dump failed for \`${database}\`.\`${name}\`: ${dump.reason}`);
        results.error(`Skipping remaining steps for \`${name}\` because the dump failed.`);
        return 'aborted';
      }

      if (dump.simulated) {
        results.info(`[DRY RUN] Would dump \`${database}\`.\`${name}\` to ${dump.file}`);
        if (dump.upload) {
          results.info(`[DRY RUN] Would upload ${dump.file} to ${dump.upload.backend} as ${dump.upload.key}`);
        }
      } else {
        results.info(`Dumped \`${database}\`.\`${name}\` to ${dump.file}`);
        if (dump.upload?.error !== undefined) {
          results.error(`Error uploading ${dump.file} to ${dump.upload.backend}: ${dump.upload.error}`);
          hadErrors = true;
        } else if (dump.upload) {
          results.info(`Uploaded ${dump.file} to ${dump.upload.backend} as ${dump.upload.key}`);
        }
      }
    }

    if (table.checkForeignKeys) {
      try {
        const references = await this.auditor.audit(session, database, name);
        if (references.length > 0) {
          results.info(`Foreign keys found for \`${name}\`: ${references.map(formatForeignKey).join(', ')}`);
        } else {
          results.info(`No foreign keys found for \`${name}\`.`);
        }
      } catch (error) {
        results.error(`Error checking foreign keys for \`${name}\`: ${errorMessage(error)}`);
      }
    }

    const summary = await this.deletionEngine.delete(
      { session, target: { database, table: name }, results },
      table.deleteStrategy
    );
    if (summary) {
      this.logger.info('Delete step finished', { database, table: name, ...summary });
      hadErrors = hadErrors || summary.status !== 'success';
    }

    if (table.runOptimize) {
      try {
        const result = await this.executor.execute(session, optimizeTable(name));
        results.info(`Optimized \`${name}\`${describeOptimize(result?.rows ?? null)}`);
      } catch (error) {
        results.error(`Error optimizing table \`${name}\`: ${errorMessage(error)}`);
        hadErrors = true;
      }
    }

    return hadErrors ? 'completed_with_errors' : 'completed';
  }
}
