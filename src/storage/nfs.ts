/**
 * NFS storage backend
 *
 * The export is mounted on demand and then treated as a local directory tree.
 */

import { mkdir } from "node:fs/promises";
import * as path from "node:path";
import type {
  ConnectionCheck,
  NfsStorageSettings,
  SpaceInfo,
  StorageBackend,
  StoredObject,
} from "../types";
import { errorMessage, TransportError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { stripLeadingSlash, stripPrefix } from "../utils/path";
import { type ProcessRunner, runProcess } from "../utils/process";
import { FileTree } from "./filesystem";

export const DEFAULT_MOUNT_POINT = "/mnt/nfs_backup";
export const DEFAULT_MOUNT_OPTIONS = "rw,sync,hard,intr";

const log = createLogger("storage:nfs");

export interface NfsStorageOptions {
  run?: ProcessRunner;
}

export class NfsStorage implements StorageBackend {
  readonly type = "nfs" as const;
  private readonly tree: FileTree;
  private readonly mountPoint: string;
  private readonly run: ProcessRunner;
  private mounted = false;

  constructor(
    private readonly settings: NfsStorageSettings,
    options: NfsStorageOptions = {},
  ) {
    this.mountPoint = settings.mountPoint ?? DEFAULT_MOUNT_POINT;
    this.tree = new FileTree(path.join(this.mountPoint, settings.basePath ?? ""));
    this.run = options.run ?? runProcess;
  }

  private get uriPrefix(): string {
    const exportPath = this.settings.exportPath.replace(/\/+$/, "");
    return `nfs://${this.settings.server}${exportPath.startsWith("/") ? "" : "/"}${exportPath}/`;
  }

  relativePath(uriOrPath: string): string {
    if (uriOrPath.startsWith("nfs://")) {
      return stripLeadingSlash(stripPrefix(uriOrPath, this.uriPrefix));
    }
    return stripLeadingSlash(uriOrPath);
  }

  /**
   * Mount the export unless the mount point is already a mount
   */
  async ensureMounted(): Promise<void> {
    if (this.mounted) return;

    const check = await this.run("mountpoint", ["-q", this.mountPoint]);
    if (check.exitCode === 0) {
      this.mounted = true;
      return;
    }

    await mkdir(this.mountPoint, { recursive: true });
    const source = `${this.settings.server}:${this.settings.exportPath}`;
    const options = this.settings.options ?? DEFAULT_MOUNT_OPTIONS;

    log.info(`Mounting ${source} at ${this.mountPoint}`);
    const result = await this.run("mount", ["-t", "nfs", "-o", options, source, this.mountPoint]);
    if (result.exitCode !== 0) {
      throw new TransportError(
        `Failed to mount ${source}: ${result.stderr.trim() || `exit code ${result.exitCode}`}`,
        "mount",
      );
    }
    this.mounted = true;
  }

  async upload(localFile: string, remotePath: string): Promise<string> {
    await this.ensureMounted();
    const relative = stripLeadingSlash(remotePath);
    await this.tree.put(localFile, relative);
    const uri = `${this.uriPrefix}${relative}`;
    log.info(`Uploaded to NFS: ${uri}`);
    return uri;
  }

  async download(uriOrPath: string, localFile: string): Promise<void> {
    await this.ensureMounted();
    await this.tree.get(this.relativePath(uriOrPath), localFile);
  }

  async list(prefix?: string): Promise<string[]> {
    return (await this.listDetailed(prefix)).map((o) => o.path);
  }

  async listDetailed(prefix?: string): Promise<StoredObject[]> {
    await this.ensureMounted();
    return this.tree.list(prefix);
  }

  async delete(uriOrPath: string): Promise<void> {
    await this.ensureMounted();
    const relative = this.relativePath(uriOrPath);
    if (!(await this.tree.remove(relative))) {
      log.warn(`NFS file not found (already deleted?): ${relative}`);
    }
  }

  async spaceInfo(): Promise<SpaceInfo> {
    await this.ensureMounted();
    return this.tree.space();
  }

  async testConnection(): Promise<ConnectionCheck> {
    try {
      await this.ensureMounted();
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
    return this.tree.probe();
  }
}
