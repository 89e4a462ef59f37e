/**
 * Object Storage Interface
 *
 * Remote destination for table dumps. Implementations upload a local file
 * under a key and throw UploadError on failure.
 */

export type StorageBackend = 's3' | 'gcs';

export interface ObjectStorage {
  readonly name: StorageBackend;
  upload(localPath: string, key: string): Promise<void>;
}
