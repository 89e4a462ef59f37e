/**
 * ResultLog
 *
 * Ordered, append-only record of what the run decided for every configured
 * step. Each entry is also written to the logger at its level; the whole log
 * is replayed at the end of the run.
 */

import type { Logger } from '../config/logger';

export type ResultLevel = 'info' | 'warn' | 'error';

export interface ResultEntry {
  level: ResultLevel;
  message: string;
}

export class ResultLog {
  private readonly items: ResultEntry[] = [];

  constructor(private logger: Logger) {}

  info(message: string): void {
    this.append('info', message);
  }

  warn(message: string): void {
    this.append('warn', message);
  }

  error(message: string): void {
    this.append('error', message);
  }

  entries(): readonly ResultEntry[] {
    return this.items;
  }

  messages(): string[] {
    return this.items.map((entry) => entry.message);
  }

  private append(level: ResultLevel, message: string): void {
    this.items.push({ level, message });
    this.logger.log(level, message);
  }
}
