import path from "node:path";
import { ArchiveError } from "../core/errors.js";
import type { RetrievalTier, StorageClass } from "../types/config.js";
import {
  parseRestoreStatus,
  wrongKind,
  describeLocator,
  type BackendDescriptor,
  type ProgressFn,
  type RemoteLocator,
  type RestoreStatus,
  type StorageTier,
  type TransferBackend,
} from "./backend.js";

export type ObjectHead = {
  /** Storage class; object stores omit it for STANDARD. */
  storageClass: string;
  /** Raw restore header, if any. */
  restore: string | null;
  size: number;
};

/** The slice of an object-storage API the cold-storage backend needs. */
export interface ObjectStorageClient {
  headBucket(bucket: string): Promise<boolean>;
  /** Null when the object does not exist. */
  headObject(bucket: string, key: string): Promise<ObjectHead | null>;
  uploadObject(
    localPath: string,
    bucket: string,
    key: string,
    storageClass: StorageClass,
    onProgress?: ProgressFn,
  ): Promise<void>;
  downloadObject(bucket: string, key: string, localPath: string): Promise<void>;
  restoreObject(bucket: string, key: string, days: number, tier: RetrievalTier): Promise<void>;
}

export type RestoreRequestOptions = {
  days: number;
  tier: RetrievalTier;
};

/** Object storage with tiered classes; tier and restore state come from object metadata. */
export class ColdStorageBackend implements TransferBackend {
  readonly kind = "cold_storage";

  constructor(
    private readonly client: ObjectStorageClient,
    private readonly restoreRequest: RestoreRequestOptions,
  ) {}

  async upload(localBundlePath: string, descriptor: BackendDescriptor, onProgress?: ProgressFn): Promise<RemoteLocator> {
    if (descriptor.kind !== "cold_storage") throw wrongKind(this.kind, descriptor.kind);

    const key = path.basename(localBundlePath);
    const locator: RemoteLocator = { kind: this.kind, container: descriptor.bucket, key };

    await this.requireBucket(descriptor.bucket);
    if (!descriptor.overwrite && (await this.client.headObject(descriptor.bucket, key))) {
      throw new ArchiveError(
        "ObjectAlreadyExists",
        `${describeLocator(locator)} already exists; pass overwrite to replace it`,
        { subject: describeLocator(locator) },
      );
    }

    await this.client.uploadObject(localBundlePath, descriptor.bucket, key, descriptor.storageClass, onProgress);
    return locator;
  }

  async locatorExists(descriptor: BackendDescriptor, name: string): Promise<boolean> {
    if (descriptor.kind !== "cold_storage") throw wrongKind(this.kind, descriptor.kind);
    await this.requireBucket(descriptor.bucket);
    return (await this.client.headObject(descriptor.bucket, name)) !== null;
  }

  async tierOf(locator: RemoteLocator): Promise<StorageTier> {
    return (await this.head(locator)).storageClass;
  }

  async restoreStatus(locator: RemoteLocator): Promise<RestoreStatus | null> {
    if (locator.kind !== this.kind) throw wrongKind(this.kind, locator.kind);
    const head = await this.client.headObject(locator.container, locator.key);
    return head ? parseRestoreStatus(head.restore) : null;
  }

  async requestRestore(locator: RemoteLocator): Promise<void> {
    await this.head(locator);
    await this.client.restoreObject(locator.container, locator.key, this.restoreRequest.days, this.restoreRequest.tier);
  }

  async download(locator: RemoteLocator, localPath: string): Promise<void> {
    await this.head(locator);
    await this.client.downloadObject(locator.container, locator.key, localPath);
  }

  private async requireBucket(bucket: string): Promise<void> {
    if (!(await this.client.headBucket(bucket))) {
      throw new ArchiveError("BackendUnavailable", `Bucket ${bucket} does not exist or is not accessible`, {
        subject: bucket,
      });
    }
  }

  private async head(locator: RemoteLocator): Promise<ObjectHead> {
    if (locator.kind !== this.kind) throw wrongKind(this.kind, locator.kind);
    const head = await this.client.headObject(locator.container, locator.key);
    if (!head) {
      throw new ArchiveError("TransferFailed", `${describeLocator(locator)} does not exist`, {
        subject: describeLocator(locator),
      });
    }
    return head;
  }
}
