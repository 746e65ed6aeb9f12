/**
 * HTTP client for remote backup agents
 */

import { type Dispatcher, fetch } from "undici";
import type { z } from "zod";
import { DEFAULT_AGENT_PORT } from "../../db/agent-repository";
import { errorMessage, TransportError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import {
  type AgentBackupReport,
  type AgentExecuteResult,
  type AgentFilesystemInfo,
  type AgentSystemInfo,
  type AgentTaskConfig,
  type AgentTaskExecute,
  backupListSchema,
  backupReportSchema,
  executeResultSchema,
  filesystemInfoSchema,
  systemInfoSchema,
} from "./schemas";

const log = createLogger("agent-client");

export const DEFAULT_AGENT_TIMEOUT_MS = 30_000;

export interface AgentClientOptions {
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

type FetchResponse = Awaited<ReturnType<typeof fetch>>;

export class AgentClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(ipAddress: string, port: number = DEFAULT_AGENT_PORT, options: AgentClientOptions = {}) {
    this.baseUrl = `http://${ipAddress}:${port}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_AGENT_TIMEOUT_MS;
    this.dispatcher = options.dispatcher;
  }

  private async request(method: "GET" | "POST", path: string, body?: unknown): Promise<FetchResponse> {
    const requestInit: NonNullable<Parameters<typeof fetch>[1]> = {
      method,
      signal: AbortSignal.timeout(this.timeoutMs),
    };
    if (body !== undefined) {
      requestInit.headers = { "Content-Type": "application/json" };
      requestInit.body = JSON.stringify(body);
    }
    if (this.dispatcher) {
      requestInit.dispatcher = this.dispatcher;
    }

    try {
      return await fetch(`${this.baseUrl}${path}`, requestInit);
    } catch (err) {
      throw new TransportError(`${method} ${this.baseUrl}${path} failed: ${errorMessage(err)}`, path, { cause: err });
    }
  }

  /**
   * GET or POST and validate a 200 JSON body; null on any failure
   */
  private async fetchJson<T extends z.ZodTypeAny>(
    schema: T,
    method: "GET" | "POST",
    path: string,
    body?: unknown,
  ): Promise<z.infer<T> | null> {
    try {
      const response = await this.request(method, path, body);
      if (response.status !== 200) {
        log.warn(`${method} ${this.baseUrl}${path} returned HTTP ${response.status}`);
        return null;
      }
      const parsed = schema.safeParse(await response.json());
      if (!parsed.success) {
        log.warn(`${method} ${this.baseUrl}${path} returned an unexpected payload: ${parsed.error.message}`);
        return null;
      }
      return parsed.data;
    } catch (err) {
      log.error(`Error calling ${this.baseUrl}${path}: ${errorMessage(err)}`);
      return null;
    }
  }

  async ping(): Promise<boolean> {
    try {
      const response = await this.request("GET", "/ping");
      return response.status === 200;
    } catch (err) {
      log.warn(`Agent ${this.baseUrl} unreachable: ${errorMessage(err)}`);
      return false;
    }
  }

  getSystemInfo(): Promise<AgentSystemInfo | null> {
    return this.fetchJson(systemInfoSchema, "GET", "/api/system");
  }

  getFilesystemInfo(path: string): Promise<AgentFilesystemInfo | null> {
    return this.fetchJson(filesystemInfoSchema, "POST", "/api/filesystem", { path });
  }

  async sendTaskConfig(config: AgentTaskConfig): Promise<boolean> {
    try {
      const response = await this.request("POST", "/api/task/config", config);
      if (response.status !== 200) {
        log.warn(`Agent ${this.baseUrl} rejected config for task ${config.task_id}: HTTP ${response.status}`);
      }
      return response.status === 200;
    } catch (err) {
      log.error(`Error sending task ${config.task_id} to ${this.baseUrl}: ${errorMessage(err)}`);
      return false;
    }
  }

  async executeTask(payload: AgentTaskExecute): Promise<AgentExecuteResult> {
    try {
      const response = await this.request("POST", "/api/task/execute", payload);
      if (response.status !== 200) {
        return { success: false, error: `HTTP ${response.status}` };
      }
      const parsed = executeResultSchema.safeParse(await response.json());
      if (!parsed.success) {
        return { success: false, error: `Unexpected response: ${parsed.error.message}` };
      }
      return parsed.data;
    } catch (err) {
      log.error(`Error executing task ${payload.task_id} on ${this.baseUrl}: ${errorMessage(err)}`);
      return { success: false, error: errorMessage(err) };
    }
  }

  /**
   * The agent's backup list; malformed entries are dropped. Null when the
   * list could not be fetched.
   */
  async getBackups(): Promise<AgentBackupReport[] | null> {
    const envelope = await this.fetchJson(backupListSchema, "GET", "/api/backups");
    if (!envelope) return null;

    const reports: AgentBackupReport[] = [];
    for (const item of envelope.backups ?? []) {
      const parsed = backupReportSchema.safeParse(item);
      if (parsed.success) {
        reports.push(parsed.data);
      } else {
        log.warn(`Ignoring malformed backup entry from ${this.baseUrl}: ${parsed.error.message}`);
      }
    }
    return reports;
  }
}
