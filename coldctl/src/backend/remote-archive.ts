import path from "node:path";
import { ArchiveError } from "../core/errors.js";
import {
  describeLocator,
  wrongKind,
  type BackendDescriptor,
  type ProgressFn,
  type RemoteLocator,
  type RestoreStatus,
  type StorageTier,
  type TransferBackend,
} from "./backend.js";

export type TaskStatus = "ACTIVE" | "INACTIVE" | "SUCCEEDED" | "FAILED" | (string & {});

/**
 * A managed file-transfer service. Paths are endpoint-qualified
 * (`<endpoint>:<absolute path>`).
 */
export interface TransferAgent {
  /** Throws BackendUnavailable when the operator has no active session. */
  checkSession(): Promise<void>;
  pathExists(qualifiedPath: string): Promise<boolean>;
  createDirectory(qualifiedPath: string): Promise<void>;
  /** Returns the task id. */
  submitTransfer(source: string, destination: string, opts: { verifyChecksum: boolean; overwrite: boolean }): Promise<string>;
  waitForTask(taskId: string): Promise<void>;
  taskStatus(taskId: string): Promise<TaskStatus>;
}

export function qualify(endpoint: string, p: string): string {
  return `${endpoint}:${p}`;
}

/**
 * Institutional archive reached through a transfer agent. Uploads only:
 * retrieval from this tier is an out-of-band request to the archive operators.
 */
export class RemoteArchiveBackend implements TransferBackend {
  readonly kind = "remote_archive";

  constructor(private readonly agent: TransferAgent) {}

  async upload(localBundlePath: string, descriptor: BackendDescriptor, onProgress?: ProgressFn): Promise<RemoteLocator> {
    if (descriptor.kind !== "remote_archive") throw wrongKind(this.kind, descriptor.kind);

    const key = path.basename(localBundlePath);
    const locator: RemoteLocator = { kind: this.kind, container: descriptor.path, key };
    const destDir = qualify(descriptor.endpoint, descriptor.path);
    const dest = qualify(descriptor.endpoint, path.posix.join(descriptor.path, key));

    await this.agent.checkSession();

    if (!(await this.agent.pathExists(destDir))) {
      await this.agent.createDirectory(destDir);
    } else if (!descriptor.overwrite && (await this.agent.pathExists(dest))) {
      throw new ArchiveError("ObjectAlreadyExists", `${dest} already exists; pass overwrite to replace it`, {
        subject: dest,
      });
    }

    const taskId = await this.agent.submitTransfer(qualify(descriptor.endpoint, path.resolve(localBundlePath)), dest, {
      verifyChecksum: true,
      overwrite: descriptor.overwrite ?? false,
    });
    await this.agent.waitForTask(taskId);

    const status = await this.agent.taskStatus(taskId);
    if (status !== "SUCCEEDED") {
      throw new ArchiveError("TransferFailed", `Transfer task ${taskId} finished with status ${status}`, {
        subject: taskId,
      });
    }
    onProgress?.(1, 1);
    return locator;
  }

  async locatorExists(descriptor: BackendDescriptor, name: string): Promise<boolean> {
    if (descriptor.kind !== "remote_archive") throw wrongKind(this.kind, descriptor.kind);
    return this.agent.pathExists(qualify(descriptor.endpoint, path.posix.join(descriptor.path, name)));
  }

  async tierOf(locator: RemoteLocator): Promise<StorageTier> {
    if (locator.kind !== this.kind) throw wrongKind(this.kind, locator.kind);
    return "REMOTE_ARCHIVE";
  }

  async restoreStatus(locator: RemoteLocator): Promise<RestoreStatus | null> {
    throw unsupported(locator);
  }

  async requestRestore(locator: RemoteLocator): Promise<void> {
    throw unsupported(locator);
  }

  async download(locator: RemoteLocator, _localPath: string): Promise<void> {
    throw unsupported(locator);
  }
}

export function unsupported(locator: RemoteLocator): ArchiveError {
  const where = describeLocator(locator);
  return new ArchiveError(
    "RestoreUnsupported",
    `Restoring from ${where} is not self-service. Open a ticket with the archive operators and ask for ${where} to be retrieved.`,
    { subject: where },
  );
}
