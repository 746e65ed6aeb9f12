/**
 * Storage backend interface definitions
 */

export type StorageType = "object" | "sftp" | "nfs" | "local";

export interface ObjectStorageSettings {
  endpoint: string;
  accessKey: string;
  secretKey: string;
  bucket: string;
  region: string;
  useSsl?: boolean;
  forcePathStyle?: boolean;
}

export interface SftpStorageSettings {
  host: string;
  port?: number;
  username: string;
  password?: string;
  privateKeyPath?: string;
  basePath: string;
}

export interface NfsStorageSettings {
  server: string;
  exportPath: string;
  mountPoint?: string;
  options?: string;
  basePath?: string;
}

export interface LocalStorageSettings {
  basePath: string;
}

/**
 * Validated `config_data`, tagged by storage type
 */
export type BackendSettings =
  | { type: "object"; settings: ObjectStorageSettings }
  | { type: "sftp"; settings: SftpStorageSettings }
  | { type: "nfs"; settings: NfsStorageSettings }
  | { type: "local"; settings: LocalStorageSettings };

export interface StoredObject {
  /** Path relative to the backend root */
  path: string;
  sizeBytes: number;
  /** Null when the backend could not report a modification time */
  modifiedAt: Date | null;
}

export interface SpaceInfo {
  usedGB: number;
  freeGB: number | null;
  totalGB: number | null;
}

export interface ConnectionCheck {
  ok: boolean;
  error: string | null;
}

export interface StorageBackend {
  readonly type: StorageType;

  /**
   * Copy a local file to the backend and return the URI that identifies it
   */
  upload(localFile: string, remotePath: string): Promise<string>;

  /**
   * Fetch an object by URI or relative path into a local file
   */
  download(uriOrPath: string, localFile: string): Promise<void>;

  /**
   * Recursive listing of relative paths under a prefix
   */
  list(prefix?: string): Promise<string[]>;

  listDetailed(prefix?: string): Promise<StoredObject[]>;

  /**
   * Remove an object. A missing object is logged and treated as deleted.
   */
  delete(uriOrPath: string): Promise<void>;

  spaceInfo(): Promise<SpaceInfo>;

  testConnection(): Promise<ConnectionCheck>;

  /**
   * Strip this backend's scheme, host and root from a URI
   */
  relativePath(uriOrPath: string): string;
}
