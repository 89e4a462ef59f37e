/**
 * AgeDeleteStrategy
 *
 * Cleanup strategy for deleting old records based on a date column.
 *
 * Strategy: DELETE WHERE date_column < cutoff, where cutoff is today's local
 * date minus delete_older_than_days (yyyy-MM-dd). date_column defaults to
 * `date`.
 */

import { errorMessage } from '../errors';
import { olderThanPredicate } from '../database/statements';
import type { BatchedDeleter } from '../services/batched-deleter';
import type {
  BatchSettings,
  DeleteContext,
  DeleteStrategy,
  DeleteSummary,
} from './delete-strategy.interface';

export interface AgeDeleteConfig {
  days: number;
  dateColumn: string;
  batching: BatchSettings;
}

export class AgeDeleteStrategy implements DeleteStrategy<AgeDeleteConfig> {
  readonly name = 'AgeDeleteStrategy';

  constructor(
    private deleter: BatchedDeleter,
    private dryRun: boolean,
    private now: () => Date = () => new Date()
  ) {}

  async execute(context: DeleteContext, config: AgeDeleteConfig): Promise<DeleteSummary> {
    const { target, results } = context;
    const predicate = olderThanPredicate(config.dateColumn, config.days, this.now());
    const outcome = await this.deleter.run(context, predicate, config.batching);

    if (outcome.error !== undefined) {
      results.error(`Error deleting rows from \`${target.table}\`: ${errorMessage(outcome.error)}`);
    } else if (config.batching.batchSize === undefined) {
      results.info(
        `Deleted ${outcome.rowsDeleted} rows from \`${target.table}\` older than ${config.days} days (${predicate}).`
      );
    }

    return {
      strategy: this.name,
      status: outcome.error === undefined ? 'success' : 'failed',
      rowsDeleted: outcome.rowsDeleted,
      batches: outcome.batches,
      dryRun: this.dryRun,
    };
  }
}
