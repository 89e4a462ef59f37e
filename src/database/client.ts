/**
 * MySQL Database Client
 *
 * Uses mysql2 for the single connection a maintenance run holds. The rest of
 * the service only sees the SqlSession interface, so tests substitute an
 * in-process fake.
 *
 * Note: mysql2 reads every result set of a statement (stored procedure calls
 * return several) before the query promise resolves, so the connection is
 * ready for the next statement once execute() returns.
 */

import { createConnection } from 'mysql2/promise';
import type { Connection } from 'mysql2/promise';
import { ConnectionError, errorMessage } from '../errors';

export type Row = Record<string, unknown>;

export interface StatementResult {
  /** First row-bearing result set, or null when the statement returned none */
  rows: Row[] | null;
  /** Affected rows reported by the first OK packet */
  affectedRows: number;
}

export interface SqlSession {
  execute(sql: string, params?: readonly unknown[]): Promise<StatementResult>;
  commit(): Promise<void>;
  close(): Promise<void>;
}

export interface ConnectionParams {
  host: string;
  port: number;
  user: string;
  password: string;
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOkPacket(value: unknown): value is { affectedRows: number } {
  return isRow(value) && typeof value.affectedRows === 'number' && 'fieldCount' in value;
}

function isMultiResult(value: unknown): value is unknown[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((item: unknown) => Array.isArray(item) || isOkPacket(item))
  );
}

/**
 * Flattens whatever mysql2 returned (OK packet, row array, or a list of those
 * for multi-result statements) into one StatementResult.
 */
export function toStatementResult(result: unknown): StatementResult {
  const sets: unknown[] = isMultiResult(result) ? result : [result];
  let rows: Row[] | null = null;
  let affectedRows: number | null = null;

  for (const set of sets) {
    if (Array.isArray(set)) {
      if (rows === null) {
        const items: unknown[] = set;
        rows = items.filter(isRow);
      }
    } else if (isOkPacket(set) && affectedRows === null) {
      affectedRows = set.affectedRows;
    }
  }

  return { rows, affectedRows: affectedRows ?? 0 };
}

export class MysqlSession implements SqlSession {
  constructor(private connection: Connection) {}

  async execute(sql: string, params?: readonly unknown[]): Promise<StatementResult> {
    const [result] =
      params === undefined
        ? await this.connection.query(sql)
        : await this.connection.query(sql, [...params]);
    return toStatementResult(result);
  }

  async commit(): Promise<void> {
    await this.connection.commit();
  }

  async close(): Promise<void> {
    await this.connection.end();
  }
}

/**
 * Open the run's connection.
 *
 * @throws ConnectionError when the server cannot be reached or rejects the login
 */
export async function connectMysql(params: ConnectionParams): Promise<SqlSession> {
  try {
    const connection = await createConnection({
      host: params.host,
      port: params.port,
      user: params.user,
      password: params.password,
    });
    return new MysqlSession(connection);
  } catch (error) {
    throw new ConnectionError(`Error connecting to MySQL: ${errorMessage(error)}`, { cause: error });
  }
}
