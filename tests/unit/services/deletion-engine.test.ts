/**
 * DeletionEngine Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { ResultLog } from '../../../src/services/result-log';
import { FakeSession, matchingRows, silentLogger } from '../../helpers/fakes';
import { buildStack } from '../../helpers/stack';
import { DeletionEngine } from '../../../src/services/deletion-engine';
import { SqlExecutor } from '../../../src/database/sql-executor';
import { TruncateStrategy } from '../../../src/strategies/truncate.strategy';
import { ConditionDeleteStrategy } from '../../../src/strategies/condition-delete.strategy';
import { AgeDeleteStrategy } from '../../../src/strategies/age-delete.strategy';
import { BatchedDeleter } from '../../../src/services/batched-deleter';
import { createMetrics } from '../../../src/metrics';

function createEngine(dryRun = false) {
  const logger = silentLogger();
  const executor = new SqlExecutor(logger, dryRun);
  const deleter = new BatchedDeleter(executor, createMetrics(), logger, async () => {});
  return new DeletionEngine(
    {
      truncate: new TruncateStrategy(executor),
      condition: new ConditionDeleteStrategy(deleter, dryRun),
      olderThanDays: new AgeDeleteStrategy(deleter, dryRun),
    },
    dryRun
  );
}

describe('DeletionEngine', () => {
  const target = { database: 'app', table: 'jobs' };

  it('should do nothing when no strategy is configured', async () => {
    const session = new FakeSession();
    const results = new ResultLog(silentLogger());

    const summary = await createEngine().delete({ session, target, results }, { kind: 'none' });

    expect(summary).toBeNull();
    expect(session.statements).toHaveLength(0);
    expect(results.messages()).toEqual([]);
  });

  it('should report a condition strategy without predicate as a skipped step', async () => {
    const session = new FakeSession();
    const results = new ResultLog(silentLogger());

    const summary = await createEngine().delete(
      { session, target, results },
      {
        kind: 'misconfigured',
        strategy: 'condition',
        problem: 'No delete_condition provided for `jobs` with condition strategy.',
      }
    );

    expect(summary).toEqual({ strategy: 'condition', status: 'skipped', rowsDeleted: 0, batches: [], dryRun: false });
    expect(session.statements).toHaveLength(0);
    expect(results.entries()).toEqual([
      { level: 'warn', message: 'No delete_condition provided for `jobs` with condition strategy.' },
    ]);
  });

  it('should dispatch truncate, condition and age strategies', async () => {
    const session = new FakeSession(matchingRows(5));
    const results = new ResultLog(silentLogger());
    const engine = createEngine();

    const truncate = await engine.delete({ session, target, results }, { kind: 'truncate' });
    const condition = await engine.delete(
      { session, target, results },
      { kind: 'condition', predicate: 'id < 10', batching: { delaySeconds: 0 } }
    );
    const age = await engine.delete(
      { session, target, results },
      { kind: 'older_than_days', days: 1, dateColumn: 'date', batching: { delaySeconds: 0 } }
    );

    expect(truncate?.strategy).toBe('TruncateStrategy');
    expect(condition?.strategy).toBe('ConditionDeleteStrategy');
    expect(age?.strategy).toBe('AgeDeleteStrategy');
    expect(session.statements[0]).toBe('TRUNCATE TABLE `jobs`;');
    expect(session.statements[1]).toBe('DELETE FROM `jobs` WHERE id < 10;');
  });

  it('should be reachable through the table processor stack', async () => {
    const { processor, session } = buildStack({ session: new FakeSession(matchingRows(3)) });
    const results = new ResultLog(silentLogger());

    await processor.process(
      session,
      'app',
      {
        name: 'jobs',
        checkForeignKeys: false,
        deleteStrategy: { kind: 'condition', predicate: 'id < 10', batching: { delaySeconds: 0 } },
        runOptimize: false,
      },
      results
    );

    expect(results.messages()).toEqual(['Processing table `app`.`jobs`', 'Deleted 3 rows from `jobs` using condition.']);
  });
});
