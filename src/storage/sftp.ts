/**
 * SFTP storage backend
 *
 * Every operation opens its own SSH session and closes it when done.
 */

import { mkdir, readFile } from "node:fs/promises";
import * as path from "node:path";
import { Client, type ConnectConfig, type FileEntryWithStats, type SFTPWrapper } from "ssh2";
import { z } from "zod";
import type {
  ConnectionCheck,
  SftpStorageSettings,
  SpaceInfo,
  StorageBackend,
  StoredObject,
} from "../types";
import { errorMessage, TransportError } from "../utils/errors";
import { bytesToGB } from "../utils/format";
import { createLogger } from "../utils/logger";
import { stripLeadingSlash, stripPrefix } from "../utils/path";
import { normalizePrefix } from "./filesystem";

export const DEFAULT_SFTP_PORT = 22;
const READY_TIMEOUT_MS = 20_000;
const SFTP_NO_SUCH_FILE = 2;
const PROBE_FILE = ".test_write";

const log = createLogger("storage:sftp");

const statvfsSchema = z.object({
  bsize: z.number(),
  frsize: z.number().optional(),
  blocks: z.number(),
  bfree: z.number(),
  bavail: z.number(),
});

function isNoSuchFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === SFTP_NO_SUCH_FILE;
}

function done(resolve: () => void, reject: (err: Error) => void) {
  return (err?: Error | null) => (err ? reject(err) : resolve());
}

export class SftpStorage implements StorageBackend {
  readonly type = "sftp" as const;
  private readonly basePath: string;

  constructor(private readonly settings: SftpStorageSettings) {
    this.basePath = path.posix.normalize(settings.basePath.replace(/\/+$/, "") || "/");
  }

  private remoteAbsolute(relative: string): string {
    return path.posix.join(this.basePath, stripLeadingSlash(relative));
  }

  relativePath(uriOrPath: string): string {
    let remote = uriOrPath;
    if (remote.startsWith("sftp://")) {
      remote = stripPrefix(remote, `sftp://${this.settings.host}`);
    }
    if (remote === this.basePath || remote.startsWith(`${this.basePath}/`)) {
      return stripLeadingSlash(remote.slice(this.basePath.length));
    }
    return stripLeadingSlash(remote);
  }

  private async connectConfig(): Promise<ConnectConfig> {
    const config: ConnectConfig = {
      host: this.settings.host,
      port: this.settings.port ?? DEFAULT_SFTP_PORT,
      username: this.settings.username,
      readyTimeout: READY_TIMEOUT_MS,
    };
    if (this.settings.privateKeyPath) {
      config.privateKey = await readFile(this.settings.privateKeyPath);
    } else if (this.settings.password) {
      config.password = this.settings.password;
    }
    return config;
  }

  private async withSession<T>(operation: string, fn: (sftp: SFTPWrapper) => Promise<T>): Promise<T> {
    const config = await this.connectConfig();
    const client = new Client();

    try {
      await new Promise<void>((resolve, reject) => {
        client.once("ready", () => resolve());
        client.once("error", reject);
        client.connect(config);
      });
      const sftp = await new Promise<SFTPWrapper>((resolve, reject) => {
        client.sftp((err, wrapper) => (err ? reject(err) : resolve(wrapper)));
      });
      return await fn(sftp);
    } catch (err) {
      if (err instanceof TransportError) throw err;
      throw new TransportError(
        `SFTP ${operation} on ${this.settings.host} failed: ${errorMessage(err)}`,
        operation,
        { cause: err },
      );
    } finally {
      client.end();
    }
  }

  private async mkdirp(sftp: SFTPWrapper, dir: string): Promise<void> {
    const segments = dir.split("/").filter((s) => s.length > 0);
    let current = dir.startsWith("/") ? "" : ".";
    for (const segment of segments) {
      current = `${current}/${segment}`;
      const exists = await new Promise<boolean>((resolve) => {
        sftp.stat(current, (err) => resolve(!err));
      });
      if (!exists) {
        await new Promise<void>((resolve, reject) => sftp.mkdir(current, done(resolve, reject)));
      }
    }
  }

  private async walk(sftp: SFTPWrapper, dir: string, into: StoredObject[]): Promise<void> {
    const entries = await listDir(sftp, dir);
    for (const entry of entries) {
      const full = path.posix.join(dir, entry.filename);
      if (entry.attrs.isDirectory()) {
        await this.walk(sftp, full, into);
      } else if (entry.attrs.isFile() && entry.filename !== PROBE_FILE) {
        into.push({
          path: this.relativePath(full),
          sizeBytes: entry.attrs.size,
          modifiedAt: entry.attrs.mtime ? new Date(entry.attrs.mtime * 1000) : null,
        });
      }
    }
  }

  async upload(localFile: string, remotePath: string): Promise<string> {
    const remote = this.remoteAbsolute(remotePath);
    await this.withSession("upload", async (sftp) => {
      await this.mkdirp(sftp, path.posix.dirname(remote));
      await new Promise<void>((resolve, reject) => sftp.fastPut(localFile, remote, done(resolve, reject)));
    });
    const uri = `sftp://${this.settings.host}${remote}`;
    log.info(`Uploaded to ${uri}`);
    return uri;
  }

  async download(uriOrPath: string, localFile: string): Promise<void> {
    const remote = this.remoteAbsolute(this.relativePath(uriOrPath));
    await mkdir(path.dirname(localFile), { recursive: true });
    await this.withSession("download", (sftp) =>
      new Promise<void>((resolve, reject) => sftp.fastGet(remote, localFile, done(resolve, reject))),
    );
  }

  async list(prefix?: string): Promise<string[]> {
    return (await this.listDetailed(prefix)).map((o) => o.path);
  }

  listDetailed(prefix?: string): Promise<StoredObject[]> {
    const start = this.remoteAbsolute(normalizePrefix(prefix));
    return this.withSession("list", async (sftp) => {
      const objects: StoredObject[] = [];
      try {
        await this.walk(sftp, start, objects);
      } catch (err) {
        if (isNoSuchFile(err)) return [];
        throw err;
      }
      return objects.sort((a, b) => a.path.localeCompare(b.path));
    });
  }

  async delete(uriOrPath: string): Promise<void> {
    const remote = this.remoteAbsolute(this.relativePath(uriOrPath));
    const removed = await this.withSession("delete", (sftp) =>
      new Promise<boolean>((resolve, reject) =>
        sftp.unlink(remote, (err) => {
          if (!err) resolve(true);
          else if (isNoSuchFile(err)) resolve(false);
          else reject(err);
        }),
      ),
    );
    if (!removed) {
      log.warn(`SFTP file not found (already deleted?): ${remote}`);
    }
  }

  /**
   * Filesystem statistics from the statvfs extension, falling back to
   * summing file sizes when the server does not support it
   */
  async spaceInfo(): Promise<SpaceInfo> {
    const stats = await this.withSession("spaceInfo", (sftp) =>
      new Promise<unknown>((resolve) => {
        sftp.ext_openssh_statvfs(this.basePath, (err: Error | undefined, info: unknown) =>
          resolve(err ? null : info),
        );
      }),
    );

    const parsed = statvfsSchema.safeParse(stats);
    if (parsed.success) {
      const blockSize = parsed.data.frsize || parsed.data.bsize;
      return {
        usedGB: bytesToGB((parsed.data.blocks - parsed.data.bfree) * blockSize),
        freeGB: bytesToGB(parsed.data.bavail * blockSize),
        totalGB: bytesToGB(parsed.data.blocks * blockSize),
      };
    }

    const objects = await this.listDetailed();
    const used = objects.reduce((sum, o) => sum + o.sizeBytes, 0);
    return { usedGB: bytesToGB(used), freeGB: null, totalGB: null };
  }

  async testConnection(): Promise<ConnectionCheck> {
    const probe = path.posix.join(this.basePath, PROBE_FILE);
    try {
      await this.withSession("testConnection", async (sftp) => {
        await this.mkdirp(sftp, this.basePath);
        await new Promise<void>((resolve, reject) => sftp.writeFile(probe, "test", done(resolve, reject)));
        await new Promise<void>((resolve, reject) => sftp.unlink(probe, done(resolve, reject)));
      });
      return { ok: true, error: null };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }
}

function listDir(sftp: SFTPWrapper, dir: string): Promise<FileEntryWithStats[]> {
  return new Promise((resolve, reject) => {
    sftp.readdir(dir, (err, list) => (err ? reject(err) : resolve(list)));
  });
}
