#!/usr/bin/env node
/**
 * Database Maintenance Service
 *
 * Main entry point. Loads the environment and the maintenance document, wires
 * the components for the requested mode and runs the plan once (cron job
 * mode). Exit code 0 when the run completed, 1 otherwise.
 */

import { v4 as uuidv4 } from 'uuid';
import { createProgram, type CliOptions } from './cli';
import { loadEnvConfig, type Config } from './config';
import { createLogger, type Logger } from './config/logger';
import { loadMaintenancePlan } from './config/maintenance-config';
import { connectMysql } from './database/client';
import { SqlExecutor } from './database/sql-executor';
import { ConfigurationError, errorMessage } from './errors';
import { createMetrics, pushMetrics, type MaintenanceMetrics } from './metrics';
import { BatchedDeleter } from './services/batched-deleter';
import { DeletionEngine } from './services/deletion-engine';
import { ForeignKeyAuditor } from './services/foreign-key-auditor';
import { MaintenanceOrchestrator } from './services/maintenance-orchestrator';
import { TableDumper } from './services/table-dumper';
import { TableProcessor } from './services/table-processor';
import { createGCSClient, GCSStorage } from './storage/gcs-storage';
import type { ObjectStorage, StorageBackend } from './storage/object-storage.interface';
import { createS3Client, S3Storage } from './storage/s3-storage';
import { AgeDeleteStrategy } from './strategies/age-delete.strategy';
import { ConditionDeleteStrategy } from './strategies/condition-delete.strategy';
import { TruncateStrategy } from './strategies/truncate.strategy';

function createStorages(config: Config, logger: Logger): Map<StorageBackend, ObjectStorage> {
  const storages = new Map<StorageBackend, ObjectStorage>();
  if (config.storage.s3) {
    storages.set('s3', new S3Storage(createS3Client(config.storage.s3), config.storage.s3.bucket, logger));
  }
  if (config.storage.gcs) {
    storages.set('gcs', new GCSStorage(createGCSClient(config.storage.gcs), config.storage.gcs.bucket, logger));
  }
  return storages;
}

function createOrchestrator(
  config: Config,
  logger: Logger,
  metrics: MaintenanceMetrics,
  dryRun: boolean
): MaintenanceOrchestrator {
  const executor = new SqlExecutor(logger, dryRun);
  const deleter = new BatchedDeleter(executor, metrics, logger);
  const deletionEngine = new DeletionEngine(
    {
      truncate: new TruncateStrategy(executor),
      condition: new ConditionDeleteStrategy(deleter, dryRun),
      olderThanDays: new AgeDeleteStrategy(deleter, dryRun),
    },
    dryRun
  );
  const dumper = new TableDumper(
    {
      host: config.database.host,
      user: config.database.user,
      password: config.database.password,
      mysqldumpPath: config.dump.mysqldumpPath,
    },
    createStorages(config, logger),
    metrics,
    logger,
    dryRun
  );
  const processor = new TableProcessor(
    dumper,
    new ForeignKeyAuditor(logger),
    deletionEngine,
    executor,
    metrics,
    logger
  );

  return new MaintenanceOrchestrator(() => connectMysql(config.database), processor, logger, dryRun);
}

async function main(options: CliOptions): Promise<number> {
  const config = loadEnvConfig();
  const logger = createLogger({
    serviceName: config.service.name,
    level: config.logging.level,
    file: config.logging.file,
    defaultMeta: { runId: uuidv4() },
  });

  logger.info(`Loading configuration from ${options.config}`, { dryRun: options.dryRun });

  try {
    const plan = await loadMaintenancePlan(options.config);
    const metrics = createMetrics();
    const report = await createOrchestrator(config, logger, metrics, options.dryRun).run(plan);

    if (config.metrics.pushgatewayUrl && !options.dryRun) {
      await pushMetrics(metrics, config.metrics.pushgatewayUrl, logger);
    }
    return report.status === 'completed' ? 0 : 1;
  } catch (error) {
    logger.error('Database Maintenance Service: Run failed', {
      error: errorMessage(error),
      issues: error instanceof ConfigurationError ? error.issues : undefined,
      stack: error instanceof Error ? error.stack : undefined,
    });
    return 1;
  }
}

createProgram(async (options) => {
  process.exitCode = await main(options);
})
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('Database Maintenance Service: Fatal error', error);
    process.exitCode = 1;
  });
