import { createReadStream, createWriteStream } from "node:fs";
import { stat } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import {
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  RestoreObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import { ArchiveError, errorMessage } from "../core/errors.js";
import type { ColdStorageConfig, RetrievalTier, StorageClass } from "../types/config.js";
import type { ProgressFn } from "./backend.js";
import type { ObjectHead, ObjectStorageClient } from "./cold-storage.js";

const MB = 1024 * 1024;
/** Smallest part size multipart upload accepts. */
const MIN_PART_SIZE = 5 * MB;

export type S3ClientOptions = Pick<
  ColdStorageConfig,
  "region" | "multipart_threshold_mb" | "multipart_chunk_mb" | "max_concurrency"
>;

/**
 * ObjectStorageClient over the AWS SDK. Credentials come from the SDK's default
 * provider chain. Bundles at or above the multipart threshold go up in parallel parts.
 */
export class S3ObjectStorageClient implements ObjectStorageClient {
  private readonly s3: S3Client;

  constructor(
    private readonly opts: S3ClientOptions,
    s3?: S3Client,
  ) {
    this.s3 = s3 ?? new S3Client({ region: opts.region });
  }

  async headBucket(bucket: string): Promise<boolean> {
    try {
      await this.s3.send(new HeadBucketCommand({ Bucket: bucket }));
      return true;
    } catch (e: unknown) {
      if (isNotFound(e) || statusOf(e) === 403) return false;
      throw mapError(e, bucket);
    }
  }

  async headObject(bucket: string, key: string): Promise<ObjectHead | null> {
    try {
      const out = await this.s3.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      return {
        storageClass: out.StorageClass ?? "STANDARD",
        restore: out.Restore ?? null,
        size: out.ContentLength ?? 0,
      };
    } catch (e: unknown) {
      if (isNotFound(e)) return null;
      throw mapError(e, `s3://${bucket}/${key}`);
    }
  }

  async uploadObject(
    localPath: string,
    bucket: string,
    key: string,
    storageClass: StorageClass,
    onProgress?: ProgressFn,
  ): Promise<void> {
    const { size } = await stat(localPath);
    const partSize = Math.max(MIN_PART_SIZE, this.opts.multipart_chunk_mb * MB);
    const multipart = size >= this.opts.multipart_threshold_mb * MB;

    const upload = new Upload({
      client: this.s3,
      params: { Bucket: bucket, Key: key, Body: createReadStream(localPath), StorageClass: storageClass },
      // Below the threshold one part covers the whole body, i.e. a single PUT.
      partSize: multipart ? partSize : Math.max(partSize, size + 1),
      queueSize: multipart ? this.opts.max_concurrency : 1,
      leavePartsOnError: false,
    });

    if (onProgress) {
      upload.on("httpUploadProgress", (p) => onProgress(p.loaded ?? 0, p.total ?? size));
    }

    try {
      await upload.done();
    } catch (e: unknown) {
      throw mapError(e, `s3://${bucket}/${key}`);
    }
  }

  async downloadObject(bucket: string, key: string, localPath: string): Promise<void> {
    const subject = `s3://${bucket}/${key}`;
    try {
      const out = await this.s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!(out.Body instanceof Readable)) {
        throw new ArchiveError("TransferFailed", `Empty response body for ${subject}`, { subject });
      }
      await pipeline(out.Body, createWriteStream(localPath));
    } catch (e: unknown) {
      throw mapError(e, subject);
    }
  }

  async restoreObject(bucket: string, key: string, days: number, tier: RetrievalTier): Promise<void> {
    try {
      await this.s3.send(
        new RestoreObjectCommand({
          Bucket: bucket,
          Key: key,
          RestoreRequest: { Days: days, GlacierJobParameters: { Tier: tier } },
        }),
      );
    } catch (e: unknown) {
      throw mapError(e, `s3://${bucket}/${key}`);
    }
  }
}

function statusOf(e: unknown): number | undefined {
  return e instanceof S3ServiceException ? e.$metadata.httpStatusCode : undefined;
}

function isNotFound(e: unknown): boolean {
  return e instanceof S3ServiceException && (e.name === "NotFound" || e.name === "NoSuchKey" || statusOf(e) === 404);
}

function mapError(e: unknown, subject: string): ArchiveError {
  if (e instanceof ArchiveError) return e;
  const status = statusOf(e);
  const credentials = e instanceof Error && (e.name === "CredentialsProviderError" || e.name === "ExpiredToken");
  if (status === 403 || credentials) {
    return new ArchiveError("BackendUnavailable", `Object storage refused access to ${subject}: ${errorMessage(e)}`, {
      subject,
      cause: e,
    });
  }
  return new ArchiveError("TransferFailed", `Object storage request for ${subject} failed: ${errorMessage(e)}`, {
    subject,
    cause: e,
  });
}
