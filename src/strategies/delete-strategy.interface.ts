/**
 * Delete Strategy Interface
 *
 * Defines the contract for row removal strategies and the typed table
 * configuration they run against. Each strategy implements one way of removing
 * rows (truncate, condition delete, age-based delete).
 */

import type { SqlSession } from '../database/client';
import type { ResultLog } from '../services/result-log';

export type DeleteStrategyName = 'truncate' | 'condition' | 'older_than_days';

export interface BatchSettings {
  /** Rows per DELETE ... LIMIT; undefined means one unbounded statement */
  batchSize?: number;
  /** Pause between batches, in seconds */
  delaySeconds: number;
}

export type DeleteStrategyConfig =
  | { kind: 'none' }
  | { kind: 'truncate' }
  | { kind: 'condition'; predicate: string; batching: BatchSettings }
  | { kind: 'older_than_days'; days: number; dateColumn: string; batching: BatchSettings }
  | { kind: 'misconfigured'; strategy: DeleteStrategyName; problem: string };

export type DumpStorage = 'local' | 's3' | 'gcs';

export interface DumpSpec {
  storage: DumpStorage;
  path: string;
}

export interface TableSpec {
  name: string;
  dump?: DumpSpec;
  checkForeignKeys: boolean;
  deleteStrategy: DeleteStrategyConfig;
  runOptimize: boolean;
}

export interface DatabaseGroup {
  name: string;
  tables: TableSpec[];
}

export interface MaintenancePlan {
  databases: DatabaseGroup[];
}

export interface TableRef {
  database: string;
  table: string;
}

export interface BatchOutcome {
  affectedRows: number;
  terminal: boolean;
}

export interface DeleteSummary {
  strategy: string;
  status: 'success' | 'failed' | 'skipped';
  rowsDeleted: number;
  batches: BatchOutcome[];
  dryRun: boolean;
}

export interface DeleteContext {
  session: SqlSession;
  target: TableRef;
  results: ResultLog;
}

export interface DeleteStrategy<C> {
  readonly name: string;
  execute(context: DeleteContext, config: C): Promise<DeleteSummary>;
}
