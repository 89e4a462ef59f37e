/**
 * TableDumper
 *
 * Backup gate in front of every destructive step: writes a gzip-compressed
 * mysqldump of one table, optionally uploads it to object storage.
 *
 * File name: {db}_{table}_{yyyyMMdd_HHmmss}.sql.gz
 *   - local: written into dump_path (created when missing)
 *   - s3/gcs: written into dump_path, uploaded as db_dumps/{file}, then removed
 *
 * The dump command carries the password (-p<password>). Every rendering of the
 * command that reaches a log, and any stderr text, shows PASSWORD_PLACEHOLDER
 * instead.
 *
 * Dry run logs the masked command and the would-be upload and returns a
 * simulated success, so the table's later steps still run (as simulations).
 */

import { spawn } from 'node:child_process';
import { createWriteStream } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGzip } from 'node:zlib';
import type { Logger } from '../config/logger';
import { DumpError, errorMessage } from '../errors';
import type { MaintenanceMetrics } from '../metrics';
import type { DumpSpec } from '../strategies/delete-strategy.interface';
import type { ObjectStorage, StorageBackend } from '../storage/object-storage.interface';

export const PASSWORD_PLACEHOLDER = '****';
export const REMOTE_DUMP_PREFIX = 'db_dumps/';

export interface DumpConnectionParams {
  host: string;
  user: string;
  password: string;
  mysqldumpPath: string;
}

export interface DumpProcess {
  stdout: Readable;
  stderr: Readable;
  /** Resolves with the exit code; rejects when the process cannot be started */
  exited: Promise<number | null>;
  kill(): void;
}

export type SpawnDump = (command: string, args: readonly string[]) => DumpProcess;

export const spawnDumpProcess: SpawnDump = (command, args) => {
  const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
  const exited = new Promise<number | null>((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (code) => resolve(code));
  });
  return {
    stdout: child.stdout,
    stderr: child.stderr,
    exited,
    kill: () => {
      child.kill();
    },
  };
};

export type DumpResult =
  | {
      ok: true;
      /** Local dump file (removed again after a successful upload) */
      file: string;
      simulated: boolean;
      upload?: { backend: StorageBackend; key: string; error?: string };
    }
  | { ok: false; reason: string };

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function dumpTimestamp(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${date}_${time}`;
}

export function dumpFileName(database: string, table: string, now: Date): string {
  return `${database}_${table}_${dumpTimestamp(now)}.sql.gz`;
}

export function dumpArgs(params: DumpConnectionParams, database: string, table: string): string[] {
  return ['-h', params.host, '-u', params.user, `-p${params.password}`, database, table];
}

/**
 * Replace every occurrence of the secret. An empty secret leaves text as-is.
 */
export function maskSecret(text: string, secret: string): string {
  return secret === '' ? text : text.split(secret).join(PASSWORD_PLACEHOLDER);
}

export function maskedDumpCommand(
  params: DumpConnectionParams,
  database: string,
  table: string,
  destination: string
): string {
  const args = dumpArgs({ ...params, password: PASSWORD_PLACEHOLDER }, database, table);
  return `${params.mysqldumpPath} ${args.join(' ')} | gzip > ${destination}`;
}

export class TableDumper {
  constructor(
    private params: DumpConnectionParams,
    private storages: Map<StorageBackend, ObjectStorage>,
    private metrics: MaintenanceMetrics,
    private logger: Logger,
    private dryRun: boolean,
    private spawnDump: SpawnDump = spawnDumpProcess,
    private now: () => Date = () => new Date()
  ) {}

  async dumpTable(database: string, table: string, dump: DumpSpec): Promise<DumpResult> {
    const fileName = dumpFileName(database, table, this.now());
    const dumpFile = path.join(dump.path, fileName);
    const command = maskedDumpCommand(this.params, database, table, dumpFile);
    const log = this.logger.child({ database, table });

    if (this.dryRun) {
      log.info(`[DRY RUN] Would execute dump command: ${command}`);
      this.metrics.dumps.inc({ outcome: 'simulated' });
      if (dump.storage === 'local') {
        return { ok: true, file: dumpFile, simulated: true };
      }
      const key = `${REMOTE_DUMP_PREFIX}${fileName}`;
      log.info(`[DRY RUN] Would upload ${dumpFile} to ${dump.storage} as ${key}`);
      return { ok: true, file: dumpFile, simulated: true, upload: { backend: dump.storage, key } };
    }

    log.info(`Dumping table \`${database}\`.\`${table}\` to ${dumpFile}`, { command });
    try {
      await mkdir(dump.path, { recursive: true });
      await this.writeDump(dumpFile, dumpArgs(this.params, database, table));
    } catch (error) {
      const reason = maskSecret(errorMessage(error), this.params.password);
      log.error(`Error dumping table \`${table}\`: ${reason}`);
      this.metrics.dumps.inc({ outcome: 'failure' });
      return { ok: false, reason };
    }
    log.info(`Dump successful: ${dumpFile}`);
    this.metrics.dumps.inc({ outcome: 'success' });

    if (dump.storage === 'local') {
      return { ok: true, file: dumpFile, simulated: false };
    }
    return this.upload(dump.storage, dumpFile, `${REMOTE_DUMP_PREFIX}${fileName}`, log);
  }

  /**
   * Streams mysqldump stdout through gzip into the file. On any failure the
   * process is killed and the partial file removed before rethrowing.
   */
  private async writeDump(dumpFile: string, args: string[]): Promise<void> {
    const child = this.spawnDump(this.params.mysqldumpPath, args);
    const stderr: Buffer[] = [];
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    try {
      const [, exitCode] = await Promise.all([
        pipeline(child.stdout, createGzip(), createWriteStream(dumpFile)),
        child.exited,
      ]);
      if (exitCode !== 0) {
        const detail = Buffer.concat(stderr).toString('utf8').trim();
        throw new DumpError(
          `${this.params.mysqldumpPath} exited with code ${exitCode}${detail ? `: ${detail}` : ''}`
        );
      }
    } catch (error) {
      child.kill();
      await rm(dumpFile, { force: true });
      throw error;
    }
  }

  private async upload(
    backend: StorageBackend,
    dumpFile: string,
    key: string,
    log: Logger
  ): Promise<DumpResult> {
    const storage = this.storages.get(backend);
    try {
      if (!storage) {
        throw new Error(`${backend} storage is not configured`);
      }
      await storage.upload(dumpFile, key);
    } catch (error) {
      const message = errorMessage(error);
      log.error(`Error uploading ${dumpFile} to ${backend}: ${message}`);
      this.metrics.uploads.inc({ backend, outcome: 'failure' });
      return { ok: true, file: dumpFile, simulated: false, upload: { backend, key, error: message } };
    }

    log.info(`Uploaded ${dumpFile} to ${backend} as ${key}`);
    this.metrics.uploads.inc({ backend, outcome: 'success' });
    try {
      await rm(dumpFile, { force: true });
    } catch (error) {
      log.warn(`Could not remove local dump ${dumpFile}: ${errorMessage(error)}`);
    }
    return { ok: true, file: dumpFile, simulated: false, upload: { backend, key } };
  }
}
