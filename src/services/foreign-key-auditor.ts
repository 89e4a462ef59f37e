/**
 * ForeignKeyAuditor
 *
 * Read-only lookup of the columns of a table that reference other tables.
 * Advisory: the table processor reports the outcome and never lets it block
 * the delete step. Runs in dry-run mode too, since it mutates nothing.
 */

import type { Logger } from '../config/logger';
import type { Row, SqlSession } from '../database/client';
import { FOREIGN_KEYS_QUERY } from '../database/statements';

export interface ForeignKeyReference {
  constraintName: string;
  table: string;
  column: string;
  referencedTable: string;
  referencedColumn: string;
}

function text(row: Row, column: string): string {
  const value = row[column];
  return value === null || value === undefined ? '' : String(value);
}

export function formatForeignKey(ref: ForeignKeyReference): string {
  return `${ref.constraintName} (${ref.column} -> ${ref.referencedTable}.${ref.referencedColumn})`;
}

export class ForeignKeyAuditor {
  constructor(private logger: Logger) {}

  async audit(session: SqlSession, database: string, table: string): Promise<ForeignKeyReference[]> {
    this.logger.info(`Checking foreign keys for table \`${database}\`.\`${table}\``);
    const result = await session.execute(FOREIGN_KEYS_QUERY, [database, table]);

    return (result.rows ?? []).map((row) => ({
      constraintName: text(row, 'CONSTRAINT_NAME'),
      table: text(row, 'TABLE_NAME'),
      column: text(row, 'COLUMN_NAME'),
      referencedTable: text(row, 'REFERENCED_TABLE_NAME'),
      referencedColumn: text(row, 'REFERENCED_COLUMN_NAME'),
    }));
  }
}
