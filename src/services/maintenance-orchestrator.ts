/**
 * MaintenanceOrchestrator
 *
 * Service layer that runs a maintenance plan end to end.
 *
 * Responsibilities:
 *   - Open the run's single database session and always close it
 *   - Select each configured database before its tables (skip the group when
 *     selection fails)
 *   - Process tables strictly one after another
 *   - Replay the ResultLog as the run summary
 */

import type { Logger } from '../config/logger';
import type { SqlSession } from '../database/client';
import { useDatabase } from '../database/statements';
import { DatabaseSelectionError, errorMessage } from '../errors';
import type { MaintenancePlan } from '../strategies/delete-strategy.interface';
import { ResultLog } from './result-log';
import type { TableOutcome, TableProcessor } from './table-processor';

export type RunStatus = 'completed' | 'connection_failed' | 'failed';

export interface RunReport {
  status: RunStatus;
  dryRun: boolean;
  results: string[];
  tables: Record<TableOutcome, number>;
  error?: string;
}

export class MaintenanceOrchestrator {
  constructor(
    private connect: () => Promise<SqlSession>,
    private processor: TableProcessor,
    private logger: Logger,
    private dryRun: boolean
  ) {}

  async run(plan: MaintenancePlan): Promise<RunReport> {
    const results = new ResultLog(this.logger);
    const tables: Record<TableOutcome, number> = { completed: 0, completed_with_errors: 0, aborted: 0 };

    this.logger.info('MaintenanceOrchestrator: Starting run', {
      databases: plan.databases.length,
      dryRun: this.dryRun,
    });

    let session: SqlSession;
    try {
      session = await this.connect();
    } catch (error) {
      this.logger.error('MaintenanceOrchestrator: Connection failed', { error: errorMessage(error) });
      return { status: 'connection_failed', dryRun: this.dryRun, results: [], tables, error: errorMessage(error) };
    }
    this.logger.info('Successfully connected to MySQL');

    let status: RunStatus = 'completed';
    let failure: string | undefined;
    try {
      for (const group of plan.databases) {
        try {
          await this.selectDatabase(session, group.name);
        } catch (error) {
          results.error(`Error selecting database \`${group.name}\`: ${errorMessage(error)}`);
          continue;
        }
        results.info(`Using database \`${group.name}\``);

        for (const table of group.tables) {
          const outcome = await this.processor.process(session, group.name, table, results);
          tables[outcome] += 1;
        }
      }
    } catch (error) {
      status = 'failed';
      failure = errorMessage(error);
      this.logger.error('MaintenanceOrchestrator: Run failed', {
        error: failure,
        stack: error instanceof Error ? error.stack : undefined,
      });
    } finally {
      try {
        await session.close();
        this.logger.info('MySQL connection closed');
      } catch (error) {
        this.logger.error('MaintenanceOrchestrator: Failed to close connection', {
          error: errorMessage(error),
        });
      }
    }

    this.logger.info('Maintenance Results:');
    for (const message of results.messages()) {
      this.logger.info(message);
    }
    this.logger.info('MaintenanceOrchestrator: Run complete', { status, tables });

    return { status, dryRun: this.dryRun, results: results.messages(), tables, error: failure };
  }

  private async selectDatabase(session: SqlSession, database: string): Promise<void> {
    try {
      await session.execute(useDatabase(database));
    } catch (error) {
      throw new DatabaseSelectionError(errorMessage(error), { cause: error });
    }
  }
}
