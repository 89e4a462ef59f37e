/**
 * SqlExecutor
 *
 * Runs one statement on the session the caller passes in and commits it, so
 * every statement (and every delete batch) is its own checkpoint. In dry-run
 * mode nothing is sent and the result is null.
 */

import type { Logger } from '../config/logger';
import { ExecutionError, errorMessage } from '../errors';
import type { SqlSession, StatementResult } from './client';

export class SqlExecutor {
  constructor(
    private logger: Logger,
    readonly dryRun: boolean
  ) {}

  /**
   * @throws ExecutionError when the driver rejects the statement or the commit
   */
  async execute(session: SqlSession, statement: string): Promise<StatementResult | null> {
    this.logger.info('Executing SQL', { sql: statement, dryRun: this.dryRun });

    if (this.dryRun) {
      this.logger.info(`[DRY RUN] Would execute SQL: ${statement}`);
      return null;
    }

    try {
      const result = await session.execute(statement);
      await session.commit();
      return result;
    } catch (error) {
      throw new ExecutionError(errorMessage(error), statement, { cause: error });
    }
  }
}
