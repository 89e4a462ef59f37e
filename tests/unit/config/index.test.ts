/**
 * Configuration Loader Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../../src/config';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.database).toEqual({ host: 'localhost', port: 3306, user: 'root', password: '' });
    expect(config.dump.mysqldumpPath).toBe('mysqldump');
    expect(config.storage).toEqual({ s3: undefined, gcs: undefined });
    expect(config.logging).toEqual({ level: 'debug', file: undefined });
    expect(config.metrics.pushgatewayUrl).toBeUndefined();
    expect(config.service.name).toBe('db-maintenance-service');
  });

  it('should read database and storage settings', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      DB_HOST: 'db.internal',
      DB_PORT: '3307',
      DB_USERNAME: 'maint',
      DB_PASSWORD: 'test-secret',
      MYSQLDUMP_PATH: '/usr/bin/mysqldump',
      AWS_BUCKET: 'dumps',
      AWS_DEFAULT_REGION: 'eu-west-1',
      GCS_BUCKET: 'gcs-dumps',
      LOG_FILE: 'maintenance.log',
    });

    expect(config.database).toEqual({ host: 'db.internal', port: 3307, user: 'maint', password: 'test-secret' });
    expect(config.dump.mysqldumpPath).toBe('/usr/bin/mysqldump');
    expect(config.storage.s3).toEqual({
      bucket: 'dumps',
      region: 'eu-west-1',
      accessKeyId: undefined,
      secretAccessKey: undefined,
    });
    expect(config.storage.gcs).toEqual({ bucket: 'gcs-dumps', projectId: undefined, keyFilename: undefined });
    expect(config.logging).toEqual({ level: 'info', file: 'maintenance.log' });
  });
});
