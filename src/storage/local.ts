/**
 * Local filesystem storage backend
 */

import * as path from "node:path";
import type {
  ConnectionCheck,
  LocalStorageSettings,
  SpaceInfo,
  StorageBackend,
  StoredObject,
} from "../types";
import { createLogger } from "../utils/logger";
import { stripLeadingSlash, stripPrefix } from "../utils/path";
import { FileTree } from "./filesystem";

const SCHEME = "local://";

export const DEFAULT_LOCAL_BASE_PATH = "/var/backups";

const log = createLogger("storage:local");

export class LocalStorage implements StorageBackend {
  readonly type = "local" as const;
  private readonly tree: FileTree;

  constructor(settings: LocalStorageSettings) {
    this.tree = new FileTree(path.resolve(settings.basePath || DEFAULT_LOCAL_BASE_PATH));
  }

  get basePath(): string {
    return this.tree.root;
  }

  relativePath(uriOrPath: string): string {
    if (uriOrPath.startsWith(SCHEME)) {
      return this.tree.relative(stripPrefix(uriOrPath, SCHEME));
    }
    return stripLeadingSlash(uriOrPath);
  }

  async upload(localFile: string, remotePath: string): Promise<string> {
    const destination = await this.tree.put(localFile, stripLeadingSlash(remotePath));
    log.info(`Saved to local storage: ${destination}`);
    return `${SCHEME}${destination}`;
  }

  async download(uriOrPath: string, localFile: string): Promise<void> {
    await this.tree.get(this.relativePath(uriOrPath), localFile);
    log.debug(`Downloaded ${uriOrPath} to ${localFile}`);
  }

  async list(prefix?: string): Promise<string[]> {
    return (await this.tree.list(prefix)).map((o) => o.path);
  }

  listDetailed(prefix?: string): Promise<StoredObject[]> {
    return this.tree.list(prefix);
  }

  async delete(uriOrPath: string): Promise<void> {
    const relative = this.relativePath(uriOrPath);
    const removed = await this.tree.remove(relative);
    if (!removed) {
      log.warn(`Local file not found (already deleted?): ${relative}`);
      return;
    }
    log.debug(`Deleted local file: ${relative}`);
  }

  spaceInfo(): Promise<SpaceInfo> {
    return this.tree.space();
  }

  testConnection(): Promise<ConnectionCheck> {
    return this.tree.probe();
  }
}
