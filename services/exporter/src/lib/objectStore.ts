/**
 * Artifact Store (S3/MinIO)
 *
 * Uploads the CSV files of a successful run so they outlive the local
 * export directory. Retention is left to the bucket's lifecycle rules.
 */

import { S3Client, PutObjectCommand, type S3ClientConfig } from '@aws-sdk/client-s3';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import type { Logger } from 'pino';
import type { Config } from './config.js';
import { ArtifactUploadError, errorMessage } from './errors.js';
import { formatDateStamp } from './exportWindow.js';

export interface UploadedArtifact {
  key: string;
  sizeBytes: number;
}

export interface ArtifactStore {
  readonly bucket: string;
  upload(localPath: string, key: string): Promise<UploadedArtifact>;
}

export type PutObjectSender = (command: PutObjectCommand) => Promise<unknown>;

/**
 * Get S3 client configured for the environment
 */
export function getS3Client(config: Config): S3Client {
  const clientConfig: S3ClientConfig = {
    region: config.s3Region,
  };

  // Fall back to the default credential chain when no static keys are set
  if (config.s3AccessKeyId && config.s3SecretAccessKey) {
    clientConfig.credentials = {
      accessKeyId: config.s3AccessKeyId,
      secretAccessKey: config.s3SecretAccessKey,
    };
  }

  // MinIO configuration
  if (config.s3Endpoint) {
    clientConfig.endpoint = config.s3Endpoint;
    clientConfig.forcePathStyle = config.s3ForcePathStyle;
  }

  return new S3Client(clientConfig);
}

export function createS3ArtifactStore(send: PutObjectSender, bucket: string): ArtifactStore {
  return {
    bucket,
    async upload(localPath, key) {
      const body = await readFile(localPath);

      await send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: 'text/csv',
        })
      );

      return { key, sizeBytes: body.length };
    },
  };
}

/**
 * Artifact store for the configured bucket, or null when uploads are off.
 */
export function createArtifactStoreFromConfig(config: Config): ArtifactStore | null {
  if (!config.artifactBucket) {
    return null;
  }
  const client = getS3Client(config);
  return createS3ArtifactStore((command) => client.send(command), config.artifactBucket);
}

/**
 * `audit-logs-<runId>`, or `audit-logs-<YYYY-MM-DD>` outside CI.
 */
export function getArtifactName(runId: string | undefined, date: Date): string {
  return `audit-logs-${runId ?? formatDateStamp(date)}`;
}

export async function uploadArtifacts(
  store: ArtifactStore,
  files: readonly string[],
  location: { prefix: string; artifactName: string },
  logger: Logger
): Promise<UploadedArtifact[]> {
  const prefix = location.prefix.replace(/\/+$/, '');
  const uploaded: UploadedArtifact[] = [];

  for (const file of files) {
    const key = [prefix, location.artifactName, basename(file)].filter(Boolean).join('/');

    try {
      uploaded.push(await store.upload(file, key));
    } catch (error: unknown) {
      throw new ArtifactUploadError(
        key,
        `Failed to upload ${file} to s3://${store.bucket}/${key}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    logger.info({ bucket: store.bucket, key }, 'Artifact uploaded');
  }

  return uploaded;
}
