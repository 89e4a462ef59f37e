/**
 * Maintenance Plan Loader
 *
 * Parses the YAML maintenance document and validates it once into typed
 * TableSpec records. Defaults:
 *   dump_storage=local, dump_path=".", date_column="date", delete_batch_delay=0,
 *   every boolean flag false, delete_batch_size absent (unbounded delete).
 *
 * A condition strategy without delete_condition (or an age strategy without
 * delete_older_than_days) does not fail the load: it becomes a `misconfigured`
 * strategy that the table processor reports when it reaches that table.
 */

import { readFile } from 'node:fs/promises';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors';
import type {
  BatchSettings,
  DeleteStrategyConfig,
  MaintenancePlan,
  TableSpec,
} from '../strategies/delete-strategy.interface';

const lowercase = (value: unknown) => (typeof value === 'string' ? value.toLowerCase() : value);

const TableSchema = z.object({
  name: z.string().min(1),
  dump_before: z.boolean().default(false),
  dump_storage: z.preprocess(lowercase, z.enum(['local', 's3', 'gcs'])).default('local'),
  dump_path: z.string().min(1).default('.'),
  check_foreign_keys: z.boolean().default(false),
  delete_strategy: z
    .preprocess(lowercase, z.enum(['truncate', 'condition', 'older_than_days']))
    .nullish(),
  delete_condition: z.string().nullish(),
  delete_older_than_days: z.number().int().nonnegative().nullish(),
  date_column: z.string().min(1).default('date'),
  delete_batch_size: z.number().int().positive().nullish(),
  delete_batch_delay: z.number().nonnegative().default(0),
  run_optimize: z.boolean().default(false),
});

const DocumentSchema = z.object({
  databases: z
    .array(
      z.object({
        name: z.string().min(1),
        tables: z.array(TableSchema).nullish(),
      })
    )
    .nullish(),
});

type RawTable = z.infer<typeof TableSchema>;

function toStrategy(table: RawTable): DeleteStrategyConfig {
  const batching: BatchSettings = {
    batchSize: table.delete_batch_size ?? undefined,
    delaySeconds: table.delete_batch_delay,
  };

  switch (table.delete_strategy) {
    case 'truncate':
      return { kind: 'truncate' };
    case 'condition':
      if (!table.delete_condition || table.delete_condition.trim() === '') {
        return {
          kind: 'misconfigured',
          strategy: 'condition',
          problem: `No delete_condition provided for \`${table.name}\` with condition strategy.`,
        };
      }
      return { kind: 'condition', predicate: table.delete_condition, batching };
    case 'older_than_days':
      if (table.delete_older_than_days === null || table.delete_older_than_days === undefined) {
        return {
          kind: 'misconfigured',
          strategy: 'older_than_days',
          problem: `No delete_older_than_days provided for \`${table.name}\` with older_than_days strategy.`,
        };
      }
      return {
        kind: 'older_than_days',
        days: table.delete_older_than_days,
        dateColumn: table.date_column,
        batching,
      };
    default:
      return { kind: 'none' };
  }
}

function toTableSpec(table: RawTable): TableSpec {
  return {
    name: table.name,
    dump: table.dump_before ? { storage: table.dump_storage, path: table.dump_path } : undefined,
    checkForeignKeys: table.check_foreign_keys,
    deleteStrategy: toStrategy(table),
    runOptimize: table.run_optimize,
  };
}

/**
 * Parse a YAML maintenance document.
 *
 * @throws ConfigurationError on YAML syntax errors or schema violations
 */
export function parseMaintenancePlan(content: string): MaintenancePlan {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    const path = error instanceof yaml.YAMLException && error.mark ? `line ${error.mark.line + 1}` : '';
    throw new ConfigurationError('YAML syntax error', [{ path, message: errorMessage(error) }], {
      cause: error,
    });
  }

  // Empty document: nothing to maintain
  if (raw === null || raw === undefined) {
    return { databases: [] };
  }

  const parsed = DocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Configuration validation failed',
      parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  return {
    databases: (parsed.data.databases ?? []).map((group) => ({
      name: group.name,
      tables: (group.tables ?? []).map(toTableSpec),
    })),
  };
}

export async function loadMaintenancePlan(filePath: string): Promise<MaintenancePlan> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read configuration file ${filePath}`,
      [{ path: filePath, message: errorMessage(error) }],
      { cause: error }
    );
  }
  return parseMaintenancePlan(content);
}
