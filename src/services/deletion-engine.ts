/**
 * DeletionEngine
 *
 * Dispatches a table's delete strategy to its implementation. Errors never
 * escape: a failed statement is recorded against the table and the run moves
 * on, unlike a failed dump, which stops the table before this point.
 */

import type { AgeDeleteStrategy } from '../strategies/age-delete.strategy';
import type { ConditionDeleteStrategy } from '../strategies/condition-delete.strategy';
import type { TruncateStrategy } from '../strategies/truncate.strategy';
import type {
  DeleteContext,
  DeleteStrategyConfig,
  DeleteSummary,
} from '../strategies/delete-strategy.interface';

export interface DeleteStrategies {
  truncate: TruncateStrategy;
  condition: ConditionDeleteStrategy;
  olderThanDays: AgeDeleteStrategy;
}

export class DeletionEngine {
  constructor(
    private strategies: DeleteStrategies,
    private dryRun: boolean
  ) {}

  /**
   * Returns null when the table has no delete strategy configured.
   */
  async delete(context: DeleteContext, strategy: DeleteStrategyConfig): Promise<DeleteSummary | null> {
    switch (strategy.kind) {
      case 'none':
        return null;
      case 'truncate':
        return this.strategies.truncate.execute(context);
      case 'condition':
        return this.strategies.condition.execute(context, strategy);
      case 'older_than_days':
        return this.strategies.olderThanDays.execute(context, strategy);
      case 'misconfigured':
        context.results.warn(strategy.problem);
        return {
          strategy: strategy.strategy,
          status: 'skipped',
          rowsDeleted: 0,
          batches: [],
          dryRun: this.dryRun,
        };
    }
  }
}
