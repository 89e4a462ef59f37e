/**
 * In-process stand-ins for the database session, the dump subprocess and the
 * logger, shared by the unit tests.
 */

import { PassThrough, Readable } from 'node:stream';
import { createLogger, type Logger } from '../../src/config/logger';
import type { SqlSession, StatementResult } from '../../src/database/client';
import type { DumpProcess, SpawnDump } from '../../src/services/table-dumper';

export type StatementHandler = (
  sql: string,
  params?: readonly unknown[]
) => StatementResult | Promise<StatementResult>;

export const NO_ROWS: StatementResult = { rows: null, affectedRows: 0 };

export class FakeSession implements SqlSession {
  readonly statements: string[] = [];
  readonly params: Array<readonly unknown[] | undefined> = [];
  commits = 0;
  closed = false;

  constructor(private handler: StatementHandler = () => NO_ROWS) {}

  async execute(sql: string, params?: readonly unknown[]): Promise<StatementResult> {
    this.statements.push(sql);
    this.params.push(params);
    return this.handler(sql, params);
  }

  async commit(): Promise<void> {
    this.commits += 1;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  mutatingStatements(): string[] {
    return this.statements.filter((sql) => /^\s*(DELETE|TRUNCATE|OPTIMIZE)\b/i.test(sql));
  }
}

/**
 * Handler for a table holding `matching` rows that satisfy any delete
 * predicate: DELETE ... LIMIT n removes up to n of them, an unbounded DELETE
 * removes the rest.
 */
export function matchingRows(matching: number): StatementHandler {
  let remaining = matching;
  return (sql) => {
    if (!sql.startsWith('DELETE')) {
      return NO_ROWS;
    }
    const limit = /LIMIT (\d+);$/.exec(sql);
    const removed = limit ? Math.min(remaining, Number(limit[1])) : remaining;
    remaining -= removed;
    return { rows: null, affectedRows: removed };
  };
}

export function silentLogger(): Logger {
  return createLogger({ serviceName: 'test', level: 'debug', silent: true });
}

export interface FakeDump {
  spawn: SpawnDump;
  calls: Array<{ command: string; args: readonly string[] }>;
  killed: () => number;
}

/**
 * A dump "process" that writes `output` to stdout, `stderr` to stderr and
 * exits with `exitCode`.
 */
export function fakeDump(options: { output?: string; stderr?: string; exitCode?: number } = {}): FakeDump {
  const calls: Array<{ command: string; args: readonly string[] }> = [];
  let kills = 0;

  const spawn: SpawnDump = (command, args): DumpProcess => {
    calls.push({ command, args });
    return {
      stdout: Readable.from([Buffer.from(options.output ?? '')]),
      stderr: Readable.from(options.stderr ? [Buffer.from(options.stderr)] : []),
      exited: Promise.resolve(options.exitCode ?? 0),
      kill: () => {
        kills += 1;
      },
    };
  };

  return { spawn, calls, killed: () => kills };
}

/**
 * A dump process whose stdout fails mid-stream.
 */
export function brokenDump(): FakeDump {
  const calls: Array<{ command: string; args: readonly string[] }> = [];
  let kills = 0;

  const spawn: SpawnDump = (command, args): DumpProcess => {
    calls.push({ command, args });
    const stdout = new PassThrough();
    stdout.write('-- partial dump\n');
    setImmediate(() => stdout.destroy(new Error('stream reset')));
    return {
      stdout,
      stderr: Readable.from([]),
      exited: new Promise<number | null>((resolve) => setImmediate(() => resolve(null))),
      kill: () => {
        kills += 1;
      },
    };
  };

  return { spawn, calls, killed: () => kills };
}
