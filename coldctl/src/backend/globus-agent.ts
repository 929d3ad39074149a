import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { ArchiveError, errorMessage } from "../core/errors.js";
import type { TaskStatus, TransferAgent } from "./remote-archive.js";

export type ExecResult = { stdout: string; stderr: string };
export type ExecFn = (file: string, args: string[]) => Promise<ExecResult>;

const pExecFile = promisify(execFile);

const defaultExec: ExecFn = (file, args) =>
  pExecFile(file, args, {
    encoding: "utf8",
    maxBuffer: 10 * 1024 * 1024, // 10MB
  });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** TransferAgent driving the `globus` command-line client. */
export class GlobusTransferAgent implements TransferAgent {
  constructor(
    private readonly exec: ExecFn = defaultExec,
    private readonly command = "globus",
  ) {}

  async checkSession(): Promise<void> {
    try {
      await this.run(["whoami", "-F", "json"]);
    } catch (e: unknown) {
      throw new ArchiveError("BackendUnavailable", `Not logged in to Globus (run 'globus login'): ${errorMessage(e)}`, {
        subject: this.command,
        cause: e,
      });
    }
  }

  async pathExists(qualifiedPath: string): Promise<boolean> {
    try {
      await this.run(["ls", qualifiedPath]);
      return true;
    } catch {
      return false;
    }
  }

  async createDirectory(qualifiedPath: string): Promise<void> {
    try {
      await this.run(["mkdir", qualifiedPath]);
    } catch (e: unknown) {
      throw new ArchiveError("TransferFailed", `Could not create ${qualifiedPath}: ${errorMessage(e)}`, {
        subject: qualifiedPath,
        cause: e,
      });
    }
  }

  async submitTransfer(
    source: string,
    destination: string,
    opts: { verifyChecksum: boolean; overwrite: boolean },
  ): Promise<string> {
    const args = ["transfer", "-F", "json", "--notify", "failed", "-s", "checksum", "--preserve-timestamp"];
    if (opts.verifyChecksum) args.push("--verify-checksum");
    if (opts.overwrite) args.push("--delete");
    args.push(source, destination);

    const out = await this.runJson(args, `Could not start transfer ${source} -> ${destination}`);
    if (typeof out.task_id !== "string") {
      throw new ArchiveError("TransferFailed", `Transfer response has no task id`, { subject: destination });
    }
    return out.task_id;
  }

  async waitForTask(taskId: string): Promise<void> {
    try {
      await this.run(["task", "wait", taskId]);
    } catch (e: unknown) {
      throw new ArchiveError("TransferFailed", `Waiting on transfer task ${taskId} failed: ${errorMessage(e)}`, {
        subject: taskId,
        cause: e,
      });
    }
  }

  async taskStatus(taskId: string): Promise<TaskStatus> {
    const out = await this.runJson(["task", "show", "-F", "json", taskId], `Could not read transfer task ${taskId}`);
    if (typeof out.status !== "string") {
      throw new ArchiveError("TransferFailed", `Transfer task ${taskId} has no status`, { subject: taskId });
    }
    return out.status;
  }

  private async run(args: string[]): Promise<string> {
    const { stdout } = await this.exec(this.command, args);
    return stdout;
  }

  private async runJson(args: string[], failure: string): Promise<Record<string, unknown>> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await this.run(args));
    } catch (e: unknown) {
      throw new ArchiveError("TransferFailed", `${failure}: ${errorMessage(e)}`, { subject: args.join(" "), cause: e });
    }
    if (!isRecord(parsed)) {
      throw new ArchiveError("TransferFailed", `${failure}: unexpected output`, { subject: args.join(" ") });
    }
    return parsed;
  }
}
