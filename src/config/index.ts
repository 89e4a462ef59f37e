/**
 * Configuration Loader
 *
 * Loads environment variables and provides typed configuration for the service.
 * Uses dotenv for local development. The maintenance plan itself (databases and
 * tables) lives in a YAML document, see ./maintenance-config.
 */

import dotenv from 'dotenv';

export interface Config {
  nodeEnv: string;

  // Database
  database: {
    host: string;
    port: number;
    user: string;
    password: string;
  };

  // Dump utility
  dump: {
    mysqldumpPath: string;
  };

  // Object storage for dumps; a backend without a bucket is disabled
  storage: {
    s3?: {
      bucket: string;
      region?: string;
      accessKeyId?: string;
      secretAccessKey?: string;
    };
    gcs?: {
      bucket: string;
      projectId?: string;
      keyFilename?: string;
    };
  };

  logging: {
    level: string;
    file?: string;
  };

  metrics: {
    pushgatewayUrl?: string;
  };

  // Service
  service: {
    name: string;
    version: string;
  };
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = env.NODE_ENV || 'development';

  return {
    nodeEnv,

    database: {
      host: env.DB_HOST || 'localhost',
      port: parseInt(env.DB_PORT || '3306', 10),
      user: env.DB_USERNAME || 'root',
      password: env.DB_PASSWORD || '',
    },

    dump: {
      mysqldumpPath: env.MYSQLDUMP_PATH || 'mysqldump',
    },

    storage: {
      s3: env.AWS_BUCKET
        ? {
            bucket: env.AWS_BUCKET,
            region: env.AWS_DEFAULT_REGION,
            accessKeyId: env.AWS_ACCESS_KEY_ID,
            secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
          }
        : undefined,
      gcs: env.GCS_BUCKET
        ? {
            bucket: env.GCS_BUCKET,
            projectId: env.GCS_PROJECT_ID,
            keyFilename: env.GCS_KEY_FILENAME,
          }
        : undefined,
    },

    logging: {
      level: env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),
      file: env.LOG_FILE,
    },

    metrics: {
      pushgatewayUrl: env.PUSHGATEWAY_URL,
    },

    service: {
      name: env.SERVICE_NAME || 'db-maintenance-service',
      version: env.npm_package_version || '1.0.0',
    },
  };
}

/**
 * Reads `.env` into process.env, then builds the config from it.
 */
export function loadEnvConfig(): Config {
  dotenv.config();
  return loadConfig(process.env);
}
