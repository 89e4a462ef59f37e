/**
 * ConditionDeleteStrategy
 *
 * Removes rows matching the operator-supplied delete_condition, batched when a
 * batch size is configured.
 */

import { errorMessage } from '../errors';
import type { BatchedDeleter } from '../services/batched-deleter';
import type {
  BatchSettings,
  DeleteContext,
  DeleteStrategy,
  DeleteSummary,
} from './delete-strategy.interface';

export interface ConditionDeleteConfig {
  predicate: string;
  batching: BatchSettings;
}

export class ConditionDeleteStrategy implements DeleteStrategy<ConditionDeleteConfig> {
  readonly name = 'ConditionDeleteStrategy';

  constructor(
    private deleter: BatchedDeleter,
    private dryRun: boolean
  ) {}

  async execute(context: DeleteContext, config: ConditionDeleteConfig): Promise<DeleteSummary> {
    const { target, results } = context;
    const outcome = await this.deleter.run(context, config.predicate, config.batching);

    if (outcome.error !== undefined) {
      results.error(`Error deleting rows from \`${target.table}\`: ${errorMessage(outcome.error)}`);
    } else if (config.batching.batchSize === undefined) {
      results.info(`Deleted ${outcome.rowsDeleted} rows from \`${target.table}\` using condition.`);
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
