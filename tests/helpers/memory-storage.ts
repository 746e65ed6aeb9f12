import { readFile, writeFile } from "node:fs/promises";
import type { ConnectionCheck, SpaceInfo, StorageBackend, StoredObject } from "../../src/types";

const SCHEME = "object://test-bucket/";

interface MemoryObject {
  content: Buffer;
  modifiedAt: Date | null;
}

/**
 * In-process object store with the object backend's URI shape
 */
export class MemoryStorage implements StorageBackend {
  readonly type = "object" as const;
  readonly objects = new Map<string, MemoryObject>();
  readonly deleted: string[] = [];
  failDeletes = new Set<string>();
  /** Message every upload fails with, when set */
  failUploads: string | null = null;
  readonly uploadAttempts: string[] = [];
  connection: ConnectionCheck = { ok: true, error: null };
  space: SpaceInfo = { usedGB: 1.234, freeGB: null, totalGB: null };

  relativePath(uriOrPath: string): string {
    return uriOrPath.startsWith(SCHEME) ? uriOrPath.slice(SCHEME.length) : uriOrPath.replace(/^\/+/, "");
  }

  put(path: string, modifiedAt: Date | null, content = "artifact"): void {
    this.objects.set(path, { content: Buffer.from(content), modifiedAt });
  }

  async upload(localFile: string, remotePath: string): Promise<string> {
    const key = this.relativePath(remotePath);
    this.uploadAttempts.push(key);
    if (this.failUploads !== null) {
      throw new Error(this.failUploads);
    }
    this.objects.set(key, { content: await readFile(localFile), modifiedAt: new Date() });
    return `${SCHEME}${key}`;
  }

  async download(uriOrPath: string, localFile: string): Promise<void> {
    const object = this.objects.get(this.relativePath(uriOrPath));
    if (!object) {
      throw new Error(`No such object: ${uriOrPath}`);
    }
    await writeFile(localFile, object.content);
  }

  async list(prefix?: string): Promise<string[]> {
    return (await this.listDetailed(prefix)).map((o) => o.path);
  }

  async listDetailed(prefix?: string): Promise<StoredObject[]> {
    const start = prefix ? `${prefix.replace(/\/+$/, "")}/` : "";
    return [...this.objects.entries()]
      .filter(([path]) => path.startsWith(start))
      .map(([path, o]) => ({ path, sizeBytes: o.content.length, modifiedAt: o.modifiedAt }))
      .sort((a, b) => a.path.localeCompare(b.path));
  }

  async delete(uriOrPath: string): Promise<void> {
    const key = this.relativePath(uriOrPath);
    if (this.failDeletes.has(key)) {
      throw new Error("permission denied");
    }
    this.objects.delete(key);
    this.deleted.push(key);
  }

  async spaceInfo(): Promise<SpaceInfo> {
    return this.space;
  }

  async testConnection(): Promise<ConnectionCheck> {
    return this.connection;
  }
}
