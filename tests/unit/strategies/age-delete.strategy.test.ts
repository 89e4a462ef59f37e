/**
 * AgeDeleteStrategy Unit Tests
 *
 * Strategy: DELETE WHERE date_column < today - delete_older_than_days
 */

import { describe, it, expect } from 'vitest';
import { SqlExecutor } from '../../../src/database/sql-executor';
import { createMetrics } from '../../../src/metrics';
import { BatchedDeleter } from '../../../src/services/batched-deleter';
import { ResultLog } from '../../../src/services/result-log';
import { AgeDeleteStrategy } from '../../../src/strategies/age-delete.strategy';
import { FakeSession, matchingRows, silentLogger } from '../../helpers/fakes';

const NOW = new Date(2026, 9, 18, 14, 5, 9);

function setup(session: FakeSession) {
  const logger = silentLogger();
  const deleter = new BatchedDeleter(new SqlExecutor(logger, false), createMetrics(), logger, async () => {});
  const results = new ResultLog(logger);
  return {
    strategy: new AgeDeleteStrategy(deleter, false, () => NOW),
    results,
    context: { session, target: { database: 'app', table: 'audit_log' }, results },
  };
}

describe('AgeDeleteStrategy', () => {
  it('should have name "AgeDeleteStrategy"', () => {
    const { strategy } = setup(new FakeSession());
    expect(strategy.name).toBe('AgeDeleteStrategy');
  });

  it('should compare the date column against today minus the configured days', async () => {
    const session = new FakeSession(matchingRows(12));
    const { strategy, results, context } = setup(session);

    const summary = await strategy.execute(context, {
      days: 30,
      dateColumn: 'created_at',
      batching: { delaySeconds: 0 },
    });

    expect(session.statements).toEqual(["DELETE FROM `audit_log` WHERE `created_at` < '2026-09-18';"]);
    expect(summary.rowsDeleted).toBe(12);
    expect(results.messages()).toEqual([
      "Deleted 12 rows from `audit_log` older than 30 days (`created_at` < '2026-09-18').",
    ]);
  });

  it('should use the same predicate for every batch', async () => {
    const session = new FakeSession(matchingRows(3));
    const { strategy, context } = setup(session);

    await strategy.execute(context, { days: 7, dateColumn: 'date', batching: { batchSize: 2, delaySeconds: 0 } });

    expect(session.statements).toEqual([
      "DELETE FROM `audit_log` WHERE `date` < '2026-10-11' LIMIT 2;",
      "DELETE FROM `audit_log` WHERE `date` < '2026-10-11' LIMIT 2;",
    ]);
  });
});
