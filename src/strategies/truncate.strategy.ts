/**
 * TruncateStrategy
 *
 * Unconditional removal: a single TRUNCATE TABLE, never batched. Reported as
 * success or failure without a row count.
 */

import { errorMessage } from '../errors';
import { truncateTable } from '../database/statements';
import type { SqlExecutor } from '../database/sql-executor';
import type { DeleteContext, DeleteStrategy, DeleteSummary } from './delete-strategy.interface';

export class TruncateStrategy implements DeleteStrategy<void> {
  readonly name = 'TruncateStrategy';

  constructor(private executor: SqlExecutor) {}

  async execute({ session, target, results }: DeleteContext): Promise<DeleteSummary> {
    try {
      await this.executor.execute(session, truncateTable(target.table));
      results.info(`Table \`${target.table}\` truncated successfully.`);
      return this.summary('success');
    } catch (error) {
      results.error(`Error truncating table \`${target.table}\`: ${errorMessage(error)}`);
      return this.summary('failed');
    }
  }

  private summary(status: DeleteSummary['status']): DeleteSummary {
    return {
      strategy: this.name,
      status,
      rowsDeleted: 0,
      batches: [],
      dryRun: this.executor.dryRun,
    };
  }
}
