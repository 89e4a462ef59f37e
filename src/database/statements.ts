/**
 * SQL Statement Builder
 *
 * Every statement the service sends is built here. Table, database and column
 * names come from the operator-authored maintenance document and are quoted as
 * identifiers. delete_condition is raw SQL from the same document and is
 * inserted as written; it is trusted configuration, never end-user input.
 */

export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

export function useDatabase(database: string): string {
  return `USE ${quoteIdentifier(database)};`;
}

export function truncateTable(table: string): string {
  return `TRUNCATE TABLE ${quoteIdentifier(table)};`;
}

export function deleteRows(table: string, predicate: string, limit?: number): string {
  const limitClause = limit === undefined ? '' : ` LIMIT ${limit}`;
  return `DELETE FROM ${quoteIdentifier(table)} WHERE ${predicate}${limitClause};`;
}

export function optimizeTable(table: string): string {
  return `OPTIMIZE TABLE ${quoteIdentifier(table)};`;
}

/**
 * Parameterised on [schema, table].
 */
export const FOREIGN_KEYS_QUERY = `
  SELECT CONSTRAINT_NAME, TABLE_NAME, COLUMN_NAME,
         REFERENCED_TABLE_NAME, REFERENCED_COLUMN_NAME
  FROM INFORMATION_SCHEMA.KEY_COLUMN_USAGE
  WHERE TABLE_SCHEMA = ?
    AND TABLE_NAME = ?
    AND REFERENCED_TABLE_NAME IS NOT NULL
`;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local calendar date `days` before `now`, as yyyy-MM-dd.
 */
export function cutoffDate(now: Date, days: number): string {
  const cutoff = new Date(now.getFullYear(), now.getMonth(), now.getDate() - days);
  return `${cutoff.getFullYear()}-${pad(cutoff.getMonth() + 1)}-${pad(cutoff.getDate())}`;
}

/**
 * Rows strictly older than the cutoff; a row dated exactly on the cutoff stays.
 */
export function olderThanPredicate(dateColumn: string, days: number, now: Date): string {
  return `${quoteIdentifier(dateColumn)} < '${cutoffDate(now, days)}'`;
}
