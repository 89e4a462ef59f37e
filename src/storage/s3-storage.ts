/**
 * S3Storage
 *
 * Uploads dumps to an S3 bucket (AWS_BUCKET). The file is streamed from disk
 * with an explicit length, so large dumps are never held in memory.
 */

import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { Logger } from '../config/logger';
import { UploadError, errorMessage } from '../errors';
import type { ObjectStorage } from './object-storage.interface';

export interface S3StorageConfig {
  bucket: string;
  region?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

export function createS3Client(config: S3StorageConfig): S3Client {
  return new S3Client({
    region: config.region,
    credentials:
      config.accessKeyId && config.secretAccessKey
        ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
        : undefined,
  });
}

export class S3Storage implements ObjectStorage {
  readonly name = 's3';

  constructor(
    private client: S3Client,
    private bucket: string,
    private logger: Logger
  ) {}

  async upload(localPath: string, key: string): Promise<void> {
    this.logger.info('Uploading file to S3', { localPath, bucket: this.bucket, key });
    try {
      const { size } = await stat(localPath);
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: createReadStream(localPath),
          ContentLength: size,
          ContentType: 'application/gzip',
        })
      );
    } catch (error) {
      throw new UploadError(`Failed to upload file to S3: ${errorMessage(error)}`, { cause: error });
    }
    this.logger.info('File uploaded to S3', { localPath, key });
  }
}
