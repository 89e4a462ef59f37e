/**
 * GCSStorage
 *
 * Uploads dumps to a Google Cloud Storage bucket (GCS_BUCKET).
 */

import { Storage } from '@google-cloud/storage';
import type { Logger } from '../config/logger';
import { UploadError, errorMessage } from '../errors';
import type { ObjectStorage } from './object-storage.interface';

export interface GCSStorageConfig {
  bucket: string;
  projectId?: string;
  keyFilename?: string;
}

/**
 * The part of the @google-cloud/storage client this backend uses.
 */
export interface GCSClient {
  bucket(name: string): {
    upload(localPath: string, options: { destination: string }): Promise<unknown>;
  };
}

export function createGCSClient(config: GCSStorageConfig): GCSClient {
  return new Storage({
    projectId: config.projectId,
    keyFilename: config.keyFilename,
  });
}

export class GCSStorage implements ObjectStorage {
  readonly name = 'gcs';

  constructor(
    private gcsClient: GCSClient,
    private bucketName: string,
    private logger: Logger
  ) {}

  async upload(localPath: string, key: string): Promise<void> {
    this.logger.info('Uploading file to GCS', { localPath, bucket: this.bucketName, key });
    try {
      await this.gcsClient.bucket(this.bucketName).upload(localPath, { destination: key });
    } catch (error) {
      throw new UploadError(`Failed to upload file to GCS: ${errorMessage(error)}`, { cause: error });
    }
    this.logger.info('File uploaded to GCS', { localPath, key });
  }
}
