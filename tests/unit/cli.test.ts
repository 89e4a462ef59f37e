/**
 * CLI Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { createProgram, type CliOptions } from '../../src/cli';

async function parse(args: string[]): Promise<CliOptions[]> {
  const received: CliOptions[] = [];
  await createProgram(async (options) => {
    received.push(options);
  }).parseAsync(args, { from: 'user' });
  return received;
}

describe('createProgram', () => {
  it('should default to a real run with maintenance_config.yml', async () => {
    expect(await parse([])).toEqual([{ dryRun: false, config: 'maintenance_config.yml' }]);
  });

  it('should accept the dry run toggle and a config path', async () => {
    expect(await parse(['--dry-run', '--config', 'prod.yml'])).toEqual([{ dryRun: true, config: 'prod.yml' }]);
  });
});
