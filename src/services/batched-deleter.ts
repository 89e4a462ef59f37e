/**
 * BatchedDeleter
 *
 * Shared removal loop for the condition and age strategies.
 *
 * With a batch size B it repeats `DELETE ... WHERE predicate LIMIT B`, each
 * batch committed on its own, until a batch removes fewer than B rows. A batch
 * that removes exactly B rows is followed by another one, so K matching rows
 * take ceil(K/B) batches, plus one empty batch when B divides K. Between
 * non-terminal batches it sleeps for the configured delay (real runs only).
 *
 * In dry run every batch reports 0 rows, so the loop stops after one batch.
 *
 * Note: a batch that removes fewer than B rows ends the loop even if matching
 * rows remain (e.g. concurrent writers); the next run picks them up.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from '../config/logger';
import { deleteRows } from '../database/statements';
import type { SqlExecutor } from '../database/sql-executor';
import type { MaintenanceMetrics } from '../metrics';
import type {
  BatchOutcome,
  BatchSettings,
  DeleteContext,
} from '../strategies/delete-strategy.interface';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export interface BatchedDeleteResult {
  rowsDeleted: number;
  batches: BatchOutcome[];
  error?: unknown;
}

export class BatchedDeleter {
  constructor(
    private executor: SqlExecutor,
    private metrics: MaintenanceMetrics,
    private logger: Logger,
    private sleep: Sleep = defaultSleep
  ) {}

  /**
   * Never throws: a failed statement ends the loop and is returned in `error`
   * together with the batches that did commit.
   */
  async run(
    context: DeleteContext,
    predicate: string,
    batching: BatchSettings
  ): Promise<BatchedDeleteResult> {
    const { session, target, results } = context;
    const labels = { database: target.database, table: target.table };
    const batches: BatchOutcome[] = [];
    let rowsDeleted = 0;

    try {
      if (batching.batchSize === undefined) {
        const result = await this.executor.execute(session, deleteRows(target.table, predicate));
        rowsDeleted = result?.affectedRows ?? 0;
        this.metrics.rowsDeleted.inc(labels, rowsDeleted);
        return { rowsDeleted, batches };
      }

      const batchSize = batching.batchSize;
      const statement = deleteRows(target.table, predicate, batchSize);

      for (;;) {
        const result = await this.executor.execute(session, statement);
        const affectedRows = result?.affectedRows ?? 0;
        const terminal = affectedRows < batchSize;

        batches.push({ affectedRows, terminal });
        rowsDeleted += affectedRows;
        this.metrics.deleteBatches.inc(labels);
        this.metrics.rowsDeleted.inc(labels, affectedRows);
        results.info(`Batch deleted ${affectedRows} rows from \`${target.table}\`.`);

        if (terminal) {
          break;
        }

        if (batching.delaySeconds > 0 && !this.executor.dryRun) {
          this.logger.debug('Pausing between delete batches', {
            table: target.table,
            delaySeconds: batching.delaySeconds,
          });
          await this.sleep(batching.delaySeconds * 1000);
        }
      }

      return { rowsDeleted, batches };
    } catch (error) {
      return { rowsDeleted, batches, error };
    }
  }
}
