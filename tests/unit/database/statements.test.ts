/**
 * Statement Builder Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  cutoffDate,
  deleteRows,
  olderThanPredicate,
  optimizeTable,
  quoteIdentifier,
  truncateTable,
  useDatabase,
} from '../../../src/database/statements';

describe('statements', () => {
  it('should quote identifiers with backticks and escape embedded backticks', () => {
    expect(quoteIdentifier('events')).toBe('`events`');
    expect(quoteIdentifier('odd`name')).toBe('`odd``name`');
  });

  it('should build USE, TRUNCATE and OPTIMIZE statements', () => {
    expect(useDatabase('app')).toBe('USE `app`;');
    expect(truncateTable('sessions')).toBe('TRUNCATE TABLE `sessions`;');
    expect(optimizeTable('events')).toBe('OPTIMIZE TABLE `events`;');
  });

  it('should build bounded and unbounded DELETE statements', () => {
    expect(deleteRows('events', "status = 'done'")).toBe("DELETE FROM `events` WHERE status = 'done';");
    expect(deleteRows('events', "status = 'done'", 500)).toBe(
      "DELETE FROM `events` WHERE status = 'done' LIMIT 500;"
    );
  });

  it('should compute the cutoff as a local calendar date', () => {
    const now = new Date(2026, 9, 18, 14, 5, 9);

    expect(cutoffDate(now, 30)).toBe('2026-09-18');
    expect(cutoffDate(now, 7)).toBe('2026-10-11');
    expect(cutoffDate(now, 0)).toBe('2026-10-18');
  });

  it('should roll the cutoff across year boundaries', () => {
    expect(cutoffDate(new Date(2026, 0, 5, 1, 0, 0), 10)).toBe('2025-12-26');
  });

  it('should compare the date column with a strict less-than', () => {
    const now = new Date(2026, 9, 18, 14, 5, 9);

    expect(olderThanPredicate('created_at', 30, now)).toBe("`created_at` < '2026-09-18'");
  });
});
