/**
 * Directory-rooted file operations shared by the local and NFS backends
 */

import { copyFile, mkdir, readdir, stat, statfs, unlink, writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { ConnectionCheck, SpaceInfo, StoredObject } from "../types";
import { computeFileChecksum } from "../utils/crypto";
import { ConfigurationError, errorMessage, TransportError } from "../utils/errors";
import { bytesToGB } from "../utils/format";
import { isPathWithinDir } from "../utils/path";

const PROBE_FILE = ".test_write";

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function isNotFound(err: unknown): boolean {
  return isErrnoException(err) && err.code === "ENOENT";
}

/**
 * Normalize a listing prefix to a directory path without surrounding slashes
 */
export function normalizePrefix(prefix: string | undefined): string {
  return (prefix ?? "").replace(/^\/+|\/+$/g, "");
}

export class FileTree {
  constructor(readonly root: string) {}

  /**
   * Absolute path of a relative path, refusing anything outside the root
   */
  resolve(relativePath: string): string {
    const absolute = path.resolve(this.root, relativePath);
    if (!isPathWithinDir(absolute, this.root)) {
      throw new ConfigurationError(`Path escapes storage root: ${relativePath}`);
    }
    return absolute;
  }

  /**
   * Relative path (forward slashes) of an absolute path under the root
   */
  relative(absolutePath: string): string {
    if (!isPathWithinDir(absolutePath, this.root)) {
      throw new ConfigurationError(`Path is outside storage root: ${absolutePath}`);
    }
    return path.relative(this.root, absolutePath).split(path.sep).join("/");
  }

  async put(localFile: string, relativePath: string): Promise<string> {
    const destination = this.resolve(relativePath);
    try {
      await mkdir(path.dirname(destination), { recursive: true });
      await copyFile(localFile, destination);
    } catch (err) {
      throw new TransportError(`Failed to copy ${localFile} to ${destination}: ${errorMessage(err)}`, "upload", {
        cause: err,
      });
    }

    const [sourceChecksum, destChecksum] = await Promise.all([
      computeFileChecksum(localFile),
      computeFileChecksum(destination),
    ]);
    if (sourceChecksum !== destChecksum) {
      await this.remove(relativePath);
      throw new TransportError(`Checksum mismatch after copying to ${destination}`, "upload");
    }

    return destination;
  }

  async get(relativePath: string, localFile: string): Promise<void> {
    const source = this.resolve(relativePath);
    try {
      await mkdir(path.dirname(localFile), { recursive: true });
      await copyFile(source, localFile);
    } catch (err) {
      throw new TransportError(`Failed to copy ${source} to ${localFile}: ${errorMessage(err)}`, "download", {
        cause: err,
      });
    }
  }

  async list(prefix?: string): Promise<StoredObject[]> {
    const normalized = normalizePrefix(prefix);
    const start = this.resolve(normalized);
    const objects: StoredObject[] = [];

    try {
      await this.walk(start, objects);
    } catch (err) {
      if (isNotFound(err)) {
        return [];
      }
      throw new TransportError(`Failed to list ${start}: ${errorMessage(err)}`, "list", { cause: err });
    }

    return objects.sort((a, b) => a.path.localeCompare(b.path));
  }

  private async walk(dir: string, into: StoredObject[]): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walk(full, into);
      } else if (entry.isFile() && entry.name !== PROBE_FILE) {
        const info = await stat(full);
        into.push({ path: this.relative(full), sizeBytes: info.size, modifiedAt: info.mtime });
      }
    }
  }

  /**
   * Returns false when the file did not exist
   */
  async remove(relativePath: string): Promise<boolean> {
    const target = this.resolve(relativePath);
    try {
      await unlink(target);
      return true;
    } catch (err) {
      if (isNotFound(err)) {
        return false;
      }
      throw new TransportError(`Failed to delete ${target}: ${errorMessage(err)}`, "delete", { cause: err });
    }
  }

  async space(): Promise<SpaceInfo> {
    try {
      await mkdir(this.root, { recursive: true });
      const info = await statfs(this.root);
      const total = info.blocks * info.bsize;
      const free = info.bavail * info.bsize;
      const used = (info.blocks - info.bfree) * info.bsize;
      return { usedGB: bytesToGB(used), freeGB: bytesToGB(free), totalGB: bytesToGB(total) };
    } catch (err) {
      throw new TransportError(`Failed to read filesystem stats for ${this.root}: ${errorMessage(err)}`, "spaceInfo", {
        cause: err,
      });
    }
  }

  /**
   * Create the root and write then remove a throwaway file
   */
  async probe(): Promise<ConnectionCheck> {
    const probePath = path.join(this.root, PROBE_FILE);
    try {
      await mkdir(this.root, { recursive: true });
      await writeFile(probePath, "test");
      await unlink(probePath);
      return { ok: true, error: null };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }
}
