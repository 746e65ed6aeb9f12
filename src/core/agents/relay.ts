/**
 * Relay of folder backup tasks to the agents that run them
 */

import { getAgentById, getFolderTaskById, getStorageConfigById, updateFolderTaskRunState } from "../../db";
import { parseBackendSettings } from "../../storage/settings";
import type { AgentRecord, FolderTaskRecord, ObjectStorageSettings } from "../../types";
import { ConfigurationError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { AgentClient } from "./client";
import type { AgentExecuteResult, AgentTaskConfig, AgentTaskExecute } from "./schemas";

const log = createLogger("relay");

export type RelayApi = Pick<AgentClient, "sendTaskConfig" | "executeTask">;

export interface FolderTaskRelayOptions {
  requestTimeoutSeconds?: number;
  createClient?: (agent: AgentRecord) => RelayApi;
  now?: () => Date;
}

interface RelayTarget {
  agent: AgentRecord;
  task: FolderTaskRecord;
  storage: ObjectStorageSettings;
}

export function buildExecutePayload(task: FolderTaskRecord, storage: ObjectStorageSettings): AgentTaskExecute {
  return {
    task_id: task.id,
    source_path: task.source_path,
    create_archive: task.create_archive,
    archive_format: task.archive_format,
    s3_endpoint: storage.endpoint,
    s3_access_key: storage.accessKey,
    s3_secret_key: storage.secretKey,
    s3_bucket: storage.bucket,
    s3_region: storage.region,
    cleanup_enabled: task.cleanup_enabled,
    cleanup_days: task.cleanup_days,
    is_docker_compose: task.is_docker_compose,
    docker_compose_path: task.docker_compose_path,
  };
}

export function buildConfigPayload(task: FolderTaskRecord, storage: ObjectStorageSettings): AgentTaskConfig {
  return { ...buildExecutePayload(task, storage), schedule_cron: task.schedule_cron };
}

export class FolderTaskRelay {
  private readonly createClient: (agent: AgentRecord) => RelayApi;
  private readonly now: () => Date;

  constructor(options: FolderTaskRelayOptions = {}) {
    const timeoutMs =
      options.requestTimeoutSeconds !== undefined ? options.requestTimeoutSeconds * 1000 : undefined;
    this.createClient =
      options.createClient ?? ((agent) => new AgentClient(agent.ip_address, agent.port, { timeoutMs }));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Folder task, its agent and its object-storage destination (the task's
   * own storage, else the agent's default)
   */
  resolve(taskId: number): RelayTarget {
    const task = getFolderTaskById(taskId);
    if (!task) {
      throw new ConfigurationError(`Folder backup task ${taskId} not found`);
    }
    const agent = getAgentById(task.agent_id);
    if (!agent) {
      throw new ConfigurationError(`Agent ${task.agent_id} for folder task ${taskId} not found`);
    }

    const storageId = task.storage_config_id ?? agent.storage_config_id;
    if (storageId === null) {
      throw new ConfigurationError(`Folder task ${taskId} has no storage and agent ${agent.name} has no default`);
    }
    const config = getStorageConfigById(storageId);
    if (!config) {
      throw new ConfigurationError(`Storage config ${storageId} for folder task ${taskId} does not exist`);
    }

    const parsed = parseBackendSettings(config.storage_type, config.config_data);
    if (parsed.type !== "object") {
      throw new ConfigurationError(
        `Agents upload to object storage only; storage ${config.name} is ${config.storage_type}`,
      );
    }

    return { agent, task, storage: parsed.settings };
  }

  /**
   * Send the task definition and schedule to its agent
   */
  async push(taskId: number): Promise<boolean> {
    const { agent, task, storage } = this.resolve(taskId);
    const accepted = await this.createClient(agent).sendTaskConfig(buildConfigPayload(task, storage));
    if (accepted) {
      log.info(`Pushed folder task ${task.id} (${task.name}) to agent ${agent.name}`);
    } else {
      log.warn(`Agent ${agent.name} did not accept folder task ${task.id}`);
    }
    return accepted;
  }

  /**
   * Run the task on its agent now and record the outcome on the task
   */
  async trigger(taskId: number): Promise<AgentExecuteResult> {
    const { agent, task, storage } = this.resolve(taskId);
    updateFolderTaskRunState(task.id, {
      last_status: "running",
      last_run: this.now().toISOString(),
      last_error: null,
    });

    const result = await this.createClient(agent).executeTask(buildExecutePayload(task, storage));
    const finishedAt = this.now().toISOString();

    if (result.success) {
      updateFolderTaskRunState(task.id, { last_status: "success", last_run: finishedAt, last_error: null });
      log.info(`Folder task ${task.id} (${task.name}) completed on agent ${agent.name}`);
    } else {
      const error = result.error ?? "Unknown error";
      updateFolderTaskRunState(task.id, { last_status: "error", last_run: finishedAt, last_error: error });
      log.error(`Folder task ${task.id} (${task.name}) failed on agent ${agent.name}: ${error}`);
    }

    return result;
  }
}
