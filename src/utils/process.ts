/**
 * Subprocess execution with captured output
 */

import { spawn } from "node:child_process";
import { ExternalToolError } from "./errors";

const MAX_CAPTURE = 64 * 1024;

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface ProcessOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export type ProcessRunner = (
  command: string,
  args: string[],
  options?: ProcessOptions,
) => Promise<ProcessResult>;

function appendCapped(buffer: string, chunk: Buffer): string {
  const next = buffer + chunk.toString("utf8");
  return next.length > MAX_CAPTURE ? next.slice(next.length - MAX_CAPTURE) : next;
}

/**
 * Run a command to completion. Resolves with the exit code on any exit and
 * rejects only when the command could not be started.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      env: options.env ?? process.env,
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (chunk: Buffer) => {
      stdout = appendCapped(stdout, chunk);
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr = appendCapped(stderr, chunk);
    });

    child.on("error", (err) => {
      reject(new ExternalToolError(`Failed to start ${command}: ${err.message}`, command, null, ""));
    });

    child.on("close", (code) => {
      resolve({ exitCode: code, stdout, stderr });
    });
  });
