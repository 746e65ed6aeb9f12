/**
 * S3-compatible object storage backend
 */

import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import {
  CreateBucketCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import type {
  ConnectionCheck,
  ObjectStorageSettings,
  SpaceInfo,
  StorageBackend,
  StoredObject,
} from "../types";
import { errorMessage, TransportError } from "../utils/errors";
import { bytesToGB } from "../utils/format";
import { createLogger } from "../utils/logger";
import { isKeyWithinPrefix, stripLeadingSlash } from "../utils/path";
import { normalizePrefix } from "./filesystem";

const log = createLogger("storage:object");

const UPLOAD_PART_SIZE = 64 * 1024 * 1024;
const UPLOAD_QUEUE_SIZE = 4;

// Older artifacts were recorded with the s3 scheme
const SCHEMES = ["object://", "s3://"];

export interface ObjectStorageOptions {
  client?: S3Client;
  /** Multipart part size in bytes, at least 5 MiB */
  uploadPartSize?: number;
}

/**
 * Endpoint URL with a scheme chosen by `useSsl` when none is given
 */
export function normalizeEndpoint(endpoint: string, useSsl = true): string {
  if (/^https?:\/\//i.test(endpoint)) {
    return endpoint.replace(/\/+$/, "");
  }
  return `${useSsl ? "https" : "http"}://${endpoint.replace(/\/+$/, "")}`;
}

export function buildObjectUri(bucket: string, key: string): string {
  return `object://${bucket}/${key}`;
}

/**
 * Key of an object URI (`object://bucket/key` or `s3://bucket/key`) or bare key
 */
export function objectKeyFromUri(uriOrKey: string, bucket: string): string {
  for (const scheme of SCHEMES) {
    const prefix = `${scheme}${bucket}/`;
    if (uriOrKey.startsWith(prefix)) {
      return uriOrKey.slice(prefix.length);
    }
  }
  return stripLeadingSlash(uriOrKey);
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof S3ServiceException &&
    (err.name === "NotFound" || err.name === "NoSuchKey" || err.name === "NoSuchBucket" ||
      err.$metadata.httpStatusCode === 404)
  );
}

export class ObjectStorage implements StorageBackend {
  readonly type = "object" as const;
  private readonly client: S3Client;
  private readonly partSize: number;
  private bucketReady = false;

  constructor(
    private readonly settings: ObjectStorageSettings,
    options: ObjectStorageOptions = {},
  ) {
    this.partSize = options.uploadPartSize ?? UPLOAD_PART_SIZE;
    this.client =
      options.client ??
      new S3Client({
        endpoint: normalizeEndpoint(settings.endpoint, settings.useSsl ?? true),
        region: settings.region,
        forcePathStyle: settings.forcePathStyle ?? true,
        credentials: {
          accessKeyId: settings.accessKey,
          secretAccessKey: settings.secretKey,
        },
      });
  }

  get bucket(): string {
    return this.settings.bucket;
  }

  relativePath(uriOrPath: string): string {
    return objectKeyFromUri(uriOrPath, this.settings.bucket);
  }

  /**
   * Create the bucket when it does not exist yet
   */
  async ensureBucket(): Promise<void> {
    if (this.bucketReady) return;

    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch (err) {
      if (!isNotFound(err)) {
        throw new TransportError(`Cannot access bucket ${this.bucket}: ${errorMessage(err)}`, "headBucket", {
          cause: err,
        });
      }
      log.info(`Creating bucket ${this.bucket}`);
      try {
        await this.client.send(new CreateBucketCommand({ Bucket: this.bucket }));
      } catch (createErr) {
        throw new TransportError(
          `Failed to create bucket ${this.bucket}: ${errorMessage(createErr)}`,
          "createBucket",
          { cause: createErr },
        );
      }
    }

    this.bucketReady = true;
  }

  async upload(localFile: string, remotePath: string): Promise<string> {
    await this.ensureBucket();
    const key = stripLeadingSlash(remotePath);
    const uri = buildObjectUri(this.bucket, key);

    log.debug(`Uploading to ${uri}`);
    try {
      // Multipart once the file exceeds one part
      const upload = new Upload({
        client: this.client,
        params: { Bucket: this.bucket, Key: key, Body: createReadStream(localFile) },
        partSize: this.partSize,
        queueSize: UPLOAD_QUEUE_SIZE,
      });
      await upload.done();
    } catch (err) {
      throw new TransportError(`Upload to ${uri} failed: ${errorMessage(err)}`, "upload", { cause: err });
    }

    log.info(`Uploaded to ${uri}`);
    return uri;
  }

  async download(uriOrPath: string, localFile: string): Promise<void> {
    const key = this.relativePath(uriOrPath);
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      const body = response.Body;
      if (!body) {
        throw new Error("empty response body");
      }

      await mkdir(path.dirname(localFile), { recursive: true });
      if (body instanceof Readable) {
        await pipeline(body, createWriteStream(localFile));
      } else {
        await writeFile(localFile, await body.transformToByteArray());
      }
    } catch (err) {
      throw new TransportError(
        `Download of ${buildObjectUri(this.bucket, key)} failed: ${errorMessage(err)}`,
        "download",
        { cause: err },
      );
    }
  }

  async list(prefix?: string): Promise<string[]> {
    return (await this.listDetailed(prefix)).map((o) => o.path);
  }

  async listDetailed(prefix?: string): Promise<StoredObject[]> {
    const normalized = normalizePrefix(prefix);
    const keyPrefix = normalized ? `${normalized}/` : undefined;
    const objects: StoredObject[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const page = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: keyPrefix,
            ContinuationToken: continuationToken,
          }),
        );
        for (const item of page.Contents ?? []) {
          if (!item.Key || item.Key.endsWith("/") || !isKeyWithinPrefix(item.Key, normalized)) continue;
          objects.push({
            path: item.Key,
            sizeBytes: item.Size ?? 0,
            modifiedAt: item.LastModified ?? null,
          });
        }
        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (err) {
      if (isNotFound(err)) {
        return [];
      }
      throw new TransportError(`Listing ${this.bucket} failed: ${errorMessage(err)}`, "list", { cause: err });
    }

    return objects;
  }

  async delete(uriOrPath: string): Promise<void> {
    const key = this.relativePath(uriOrPath);
    const uri = buildObjectUri(this.bucket, key);

    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
    } catch (err) {
      if (isNotFound(err)) {
        log.warn(`Object not found (already deleted?): ${uri}`);
        return;
      }
      throw new TransportError(`Cannot inspect ${uri}: ${errorMessage(err)}`, "delete", { cause: err });
    }

    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
    } catch (err) {
      throw new TransportError(`Delete of ${uri} failed: ${errorMessage(err)}`, "delete", { cause: err });
    }
    log.debug(`Deleted ${uri}`);
  }

  /**
   * Used space is the sum of object sizes; there is no quota to report
   */
  async spaceInfo(): Promise<SpaceInfo> {
    const objects = await this.listDetailed();
    const used = objects.reduce((sum, o) => sum + o.sizeBytes, 0);
    return { usedGB: bytesToGB(used), freeGB: null, totalGB: null };
  }

  async testConnection(): Promise<ConnectionCheck> {
    try {
      await this.ensureBucket();
      return { ok: true, error: null };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }
}
