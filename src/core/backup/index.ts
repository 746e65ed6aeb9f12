/**
 * Backup module exports
 */

export {
  buildDumpArgs,
  DatabaseDumpExecutor,
  type DumpExecutorOptions,
  type DumpTask,
  isBinaryArtifact,
  type PasswordDecryptor,
  removeTempFile,
} from "./dump-executor";
