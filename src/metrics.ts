/**
 * Maintenance Metrics
 *
 * Prometheus counters for one run, kept in their own registry. A maintenance
 * run is a batch job, so the counters are pushed to a Pushgateway at the end of
 * the run instead of being scraped.
 */

import { Counter, Pushgateway, Registry } from 'prom-client';
import type { Logger } from './config/logger';
import { errorMessage } from './errors';

export const METRICS_JOB_NAME = 'db-maintenance';

export interface MaintenanceMetrics {
  registry: Registry;
  tables: Counter<'outcome'>;
  rowsDeleted: Counter<'database' | 'table'>;
  deleteBatches: Counter<'database' | 'table'>;
  dumps: Counter<'outcome'>;
  uploads: Counter<'backend' | 'outcome'>;
}

export function createMetrics(registry: Registry = new Registry()): MaintenanceMetrics {
  return {
    registry,
    tables: new Counter({
      name: 'db_maintenance_tables_total',
      help: 'Tables processed, by outcome',
      labelNames: ['outcome'],
      registers: [registry],
    }),
    rowsDeleted: new Counter({
      name: 'db_maintenance_rows_deleted_total',
      help: 'Rows removed by delete statements',
      labelNames: ['database', 'table'],
      registers: [registry],
    }),
    deleteBatches: new Counter({
      name: 'db_maintenance_delete_batches_total',
      help: 'Bounded DELETE ... LIMIT statements issued',
      labelNames: ['database', 'table'],
      registers: [registry],
    }),
    dumps: new Counter({
      name: 'db_maintenance_dumps_total',
      help: 'Table dumps, by outcome',
      labelNames: ['outcome'],
      registers: [registry],
    }),
    uploads: new Counter({
      name: 'db_maintenance_uploads_total',
      help: 'Dump uploads to object storage, by backend and outcome',
      labelNames: ['backend', 'outcome'],
      registers: [registry],
    }),
  };
}

/**
 * Push the run's metrics. Failure is logged and swallowed: metrics never decide
 * the outcome of a maintenance run.
 */
export async function pushMetrics(
  metrics: MaintenanceMetrics,
  gatewayUrl: string,
  logger: Logger
): Promise<void> {
  const gateway = new Pushgateway(gatewayUrl, {}, metrics.registry);
  try {
    await gateway.pushAdd({ jobName: METRICS_JOB_NAME });
    logger.info('Metrics pushed', { gatewayUrl });
  } catch (error) {
    logger.error('Failed to push metrics', { gatewayUrl, error: errorMessage(error) });
  }
}
