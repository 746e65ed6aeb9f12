/**
 * Database dump and restore through the external dump tools
 */

import { mkdir, stat, unlink } from "node:fs/promises";
import * as path from "node:path";
import type { DatabaseTaskRecord, DumpResult, RestoreOptions, StorageBackend, ToolsConfig } from "../../types";
import { ExternalToolError, errorMessage, TransportError } from "../../utils/errors";
import { bytesToMB, roundTo } from "../../utils/format";
import { createLogger } from "../../utils/logger";
import { artifactRemotePath, generateArtifactName } from "../../utils/naming";
import { type ProcessResult, type ProcessRunner, runProcess } from "../../utils/process";
import { isErrnoException } from "../../storage/filesystem";

const log = createLogger("dump");

const BINARY_EXTENSIONS = new Set([".dump", ".custom", ".tar"]);

export interface PasswordDecryptor {
  decrypt(ciphertext: string): string;
}

export interface DumpExecutorOptions {
  tools: ToolsConfig;
  tempDir: string;
  backupNamespace: string;
  cipher: PasswordDecryptor;
  run?: ProcessRunner;
  now?: () => Date;
}

export type DumpTask = Pick<
  DatabaseTaskRecord,
  | "id"
  | "host"
  | "port"
  | "username"
  | "password_encrypted"
  | "database_name"
  | "dump_format"
  | "compression_level"
  | "include_schema"
  | "include_data"
  | "include_roles"
  | "include_tablespaces"
>;

function connectionArgs(task: DumpTask, database: string): string[] {
  return [
    `--host=${task.host}`,
    `--port=${task.port}`,
    `--username=${task.username}`,
    `--dbname=${database}`,
  ];
}

/**
 * Arguments for the dump tool. The password is never part of them.
 */
export function buildDumpArgs(task: DumpTask, outputFile: string): string[] {
  const args = [...connectionArgs(task, task.database_name), `--format=${task.dump_format}`, `--file=${outputFile}`];

  if (task.dump_format === "custom") {
    args.push(`--compress=${task.compression_level}`);
  }

  // Both off means both on
  if (!task.include_schema && task.include_data) {
    args.push("--data-only");
  } else if (task.include_schema && !task.include_data) {
    args.push("--schema-only");
  }

  if (!task.include_roles) {
    args.push("--no-owner", "--no-privileges");
  }
  if (!task.include_tablespaces) {
    args.push("--no-tablespaces");
  }

  return args;
}

export function isBinaryArtifact(file: string): boolean {
  return BINARY_EXTENSIONS.has(path.extname(file).toLowerCase());
}

function toolFailure(command: string, result: ProcessResult): ExternalToolError {
  const stderr = result.stderr.trim();
  return new ExternalToolError(
    `${command} exited with code ${result.exitCode ?? "unknown"}${stderr ? `: ${stderr}` : ""}`,
    command,
    result.exitCode,
    stderr,
  );
}

/**
 * Remove a temporary file, logging instead of raising
 */
export async function removeTempFile(file: string): Promise<void> {
  try {
    await unlink(file);
    log.debug(`Removed temporary file ${file}`);
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return;
    log.warn(`Failed to remove temporary file ${file}: ${errorMessage(err)}`);
  }
}

export class DatabaseDumpExecutor {
  private readonly run: ProcessRunner;
  private readonly now: () => Date;

  constructor(private readonly options: DumpExecutorOptions) {
    this.run = options.run ?? runProcess;
    this.now = options.now ?? (() => new Date());
  }

  private childEnv(password: string): NodeJS.ProcessEnv {
    return { ...process.env, PGPASSWORD: password };
  }

  /**
   * Dump the task's database and upload the artifact. Throws on a
   * decryption failure, a non-zero tool exit or a failed upload.
   */
  async dump(task: DumpTask, backend: StorageBackend): Promise<DumpResult> {
    const started = this.now();
    const password = this.options.cipher.decrypt(task.password_encrypted);

    const filename = generateArtifactName(task.database_name, task.dump_format, started);
    await mkdir(this.options.tempDir, { recursive: true });
    const localFile = path.join(this.options.tempDir, filename);

    const command = this.options.tools.dump;
    log.info(`Dumping database ${task.database_name} on ${task.host}:${task.port}`);
    const result = await this.run(command, buildDumpArgs(task, localFile), { env: this.childEnv(password) });

    if (result.exitCode !== 0) {
      await removeTempFile(localFile);
      throw toolFailure(command, result);
    }

    let sizeBytes: number;
    try {
      sizeBytes = (await stat(localFile)).size;
    } catch {
      throw new ExternalToolError(`${command} did not create ${filename}`, command, result.exitCode, result.stderr);
    }

    const remotePath = artifactRemotePath(this.options.backupNamespace, task.database_name, filename);
    let storagePath: string;
    try {
      storagePath = await backend.upload(localFile, remotePath);
    } catch (err) {
      await removeTempFile(localFile);
      if (err instanceof TransportError) throw err;
      throw new TransportError(`Upload of ${filename} failed: ${errorMessage(err)}`, "upload", { cause: err });
    }

    await removeTempFile(localFile);

    const durationSeconds = roundTo((this.now().getTime() - started.getTime()) / 1000, 2);
    return {
      artifactFilename: filename,
      artifactSizeMB: bytesToMB(sizeBytes),
      storagePath,
      durationSeconds,
    };
  }

  /**
   * Download an artifact and load it with the restore tool (custom and tar)
   * or the SQL client (plain)
   */
  async restore(
    task: DumpTask,
    backend: StorageBackend,
    storagePath: string,
    options: RestoreOptions = {},
  ): Promise<void> {
    const password = this.options.cipher.decrypt(task.password_encrypted);
    const database = options.targetDatabase ?? task.database_name;

    await mkdir(this.options.tempDir, { recursive: true });
    const localFile = path.join(this.options.tempDir, path.posix.basename(backend.relativePath(storagePath)));

    await backend.download(storagePath, localFile);
    log.info(`Downloaded ${storagePath} for restore into ${database}`);

    const binary = isBinaryArtifact(localFile);
    const command = binary ? this.options.tools.restore : this.options.tools.sql;
    const args = binary
      ? [...connectionArgs(task, database), "--clean", "--if-exists", localFile]
      : [...connectionArgs(task, database), "--file", localFile];

    try {
      const result = await this.run(command, args, { env: this.childEnv(password) });
      if (result.exitCode !== 0) {
        throw toolFailure(command, result);
      }
      log.info(`Database ${database} restored from ${path.basename(localFile)}`);
    } finally {
      await removeTempFile(localFile);
    }
  }
}
