/**
 * Report Store
 *
 * Where reports and JSON artifacts land: a local directory, or an S3 bucket
 * under a prefix. Keys are relative paths such as `runs/<id>/leaderboard.md`.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { StorageConfig } from '../config';

export interface ReportStore {
  /** Persist content under key; returns the resulting location. */
  put(key: string, content: string, contentType: string): Promise<string>;
}

export class LocalReportStore implements ReportStore {
  private rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = rootDir;
  }

  async put(key: string, content: string, _contentType: string): Promise<string> {
    const filePath = path.join(this.rootDir, key);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content, 'utf-8');
    return filePath;
  }
}

/**
 * The one S3 call the store makes; an S3Client satisfies it
 */
export interface ObjectClient {
  send(command: PutObjectCommand): Promise<unknown>;
}

export class S3ReportStore implements ReportStore {
  private s3Client: ObjectClient;
  private bucket: string;
  private prefix: string;

  constructor(bucket: string, prefix: string, s3Client: ObjectClient = new S3Client({})) {
    this.s3Client = s3Client;
    this.bucket = bucket;
    this.prefix = prefix;
  }

  async put(key: string, content: string, contentType: string): Promise<string> {
    const objectKey = this.prefix ? `${this.prefix}/${key}` : key;

    await this.s3Client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: objectKey,
        Body: content,
        ContentType: contentType,
      })
    );

    return `s3://${this.bucket}/${objectKey}`;
  }
}

/**
 * Factory function to create the configured report store
 */
export function createReportStore(config: StorageConfig): ReportStore {
  if (config.reportStore === 's3') {
    return new S3ReportStore(config.s3Bucket, config.s3Prefix);
  }
  return new LocalReportStore(config.reportsDir);
}
