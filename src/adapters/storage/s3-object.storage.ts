import {
  CreateBucketCommand,
  GetObjectCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  ListObjectsV2CommandOutput,
  PutObjectCommand,
  S3Client,
  S3ServiceException
} from '@aws-sdk/client-s3';
import { inject, injectable } from 'tsyringe';
import { Result } from '../../types/result.types';
import { isHttpRetryable, isNetworkError, retryWithBackoff, RetryOptions } from '../../utils/retry.util';
import { IObjectStorage } from './object-storage.interface';

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isNotFound(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) return false;
  return error.name === 'NoSuchKey' || error.name === 'NotFound' || error.$metadata.httpStatusCode === 404;
}

@injectable()
export class S3ObjectStorage implements IObjectStorage {
  constructor(
    @inject('S3Client') private readonly client: Pick<S3Client, 'send'>,
    @inject('RetryOptions') private readonly retry: RetryOptions
  ) {}

  async upload(bucket: string, key: string, body: string | Buffer, contentType?: string): Promise<Result<void>> {
    try {
      await this.withRetry(
        () => this.client.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: body, ContentType: contentType })),
        `upload s3://${bucket}/${key}`
      );
      console.log(`[S3 Storage] Uploaded s3://${bucket}/${key}`);
      return { success: true, message: `Uploaded s3://${bucket}/${key}` };
    } catch (error) {
      console.error(`[S3 Storage] Failed to upload s3://${bucket}/${key}:`, messageOf(error));
      return { success: false, message: `Failed to upload s3://${bucket}/${key}: ${messageOf(error)}` };
    }
  }

  async download(bucket: string, key: string): Promise<Result<Buffer>> {
    try {
      const response = await this.withRetry(
        () => this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key })),
        `download s3://${bucket}/${key}`
      );
      if (!response.Body) {
        return { success: false, message: `Empty response body for s3://${bucket}/${key}` };
      }
      const bytes = await response.Body.transformToByteArray();
      return { success: true, data: Buffer.from(bytes), message: `Downloaded s3://${bucket}/${key}` };
    } catch (error) {
      if (isNotFound(error)) {
        return { success: true, message: `Object s3://${bucket}/${key} not found` };
      }
      return { success: false, message: `Failed to download s3://${bucket}/${key}: ${messageOf(error)}` };
    }
  }

  async list(bucket: string, prefix = ''): Promise<Result<string[]>> {
    try {
      const keys: string[] = [];
      let continuationToken: string | undefined;

      do {
        const page: ListObjectsV2CommandOutput = await this.withRetry(
          () => this.client.send(new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix, ContinuationToken: continuationToken })),
          `list s3://${bucket}/${prefix}`
        );
        for (const object of page.Contents ?? []) {
          if (object.Key) keys.push(object.Key);
        }
        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);

      return { success: true, data: keys, message: `Listed ${keys.length} objects in s3://${bucket}/${prefix}` };
    } catch (error) {
      return { success: false, message: `Failed to list s3://${bucket}/${prefix}: ${messageOf(error)}` };
    }
  }

  async createContainer(bucket: string): Promise<Result<void>> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return { success: true, message: `Bucket ${bucket} already exists` };
    } catch (error) {
      if (!isNotFound(error)) {
        return { success: false, message: `Failed to check bucket ${bucket}: ${messageOf(error)}` };
      }
    }

    try {
      await this.client.send(new CreateBucketCommand({ Bucket: bucket }));
      console.log(`[S3 Storage] Created bucket ${bucket}`);
      return { success: true, message: `Created bucket ${bucket}` };
    } catch (error) {
      return { success: false, message: `Failed to create bucket ${bucket}: ${messageOf(error)}` };
    }
  }

  private withRetry<T>(operation: () => Promise<T>, label: string): Promise<T> {
    return retryWithBackoff(operation, this.retry, error => this.isRetryableError(error), label);
  }

  private isRetryableError(error: Error): boolean {
    if (error instanceof S3ServiceException) {
      return isHttpRetryable(error.$metadata.httpStatusCode);
    }
    return isNetworkError(error);
  }
}
