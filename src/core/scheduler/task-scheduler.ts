/**
 * Scheduler for database backup tasks
 *
 * Keeps one timer per active task, armed to the task's next cron occurrence,
 * and rebuilds the job set from the store on every resync pass.
 */

import {
  beginTaskRun,
  finishTaskRun,
  getDatabaseTaskById,
  getSchedulableDatabaseTasks,
  updateTaskNextRun,
} from "../../db";
import { createStorageBackend, resolveTaskStorage } from "../../storage";
import type { NormalizedStorageConfig } from "../../storage/settings";
import type {
  DatabaseTaskRecord,
  DumpResult,
  RetentionResult,
  StorageBackend,
  TaskRunOutcome,
} from "../../types";
import { ConfigurationError, errorMessage } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { jobIdForTask } from "../../utils/naming";
import type { DumpTask } from "../backup/dump-executor";
import { runRetention } from "../cleanup";
import { IntervalLoop } from "../loop";
import { getNextRun, type ParsedCron, parseCron } from "./cron-parser";

const log = createLogger("scheduler");

// Largest delay setTimeout accepts
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface TaskDumper {
  dump(task: DumpTask, backend: StorageBackend): Promise<DumpResult>;
}

export interface TaskSchedulerOptions {
  executor: TaskDumper;
  backupNamespace: string;
  resyncIntervalSeconds: number;
  resolveStorage?: (task: DatabaseTaskRecord) => NormalizedStorageConfig;
  createBackend?: (target: NormalizedStorageConfig) => StorageBackend;
  now?: () => Date;
}

interface ScheduledJob {
  jobId: string;
  taskId: number;
  cron: ParsedCron;
  nextRun: Date;
  timer: NodeJS.Timeout | null;
}

export interface JobStatus {
  jobId: string;
  taskId: number;
  cron: string;
  nextRun: Date;
}

export class TaskScheduler {
  private readonly jobs = new Map<string, ScheduledJob>();
  private readonly runningTasks = new Set<number>();
  private readonly loop: IntervalLoop;
  private readonly resolveStorage: (task: DatabaseTaskRecord) => NormalizedStorageConfig;
  private readonly createBackend: (target: NormalizedStorageConfig) => StorageBackend;
  private readonly now: () => Date;

  constructor(private readonly options: TaskSchedulerOptions) {
    this.resolveStorage = options.resolveStorage ?? resolveTaskStorage;
    this.createBackend = options.createBackend ?? ((target) => createStorageBackend(target));
    this.now = options.now ?? (() => new Date());
    this.loop = new IntervalLoop("scheduler resync", options.resyncIntervalSeconds * 1000, () => this.resync());
  }

  start(): void {
    if (this.loop.running) {
      log.warn("Scheduler is already running");
      return;
    }
    this.loop.start();
    log.info("Scheduler started");
  }

  stop(): void {
    this.loop.stop();
    for (const jobId of [...this.jobs.keys()]) {
      this.removeJob(jobId);
    }
    log.info("Scheduler stopped");
  }

  /**
   * Bring the job set in line with the active task catalog
   */
  resync(): void {
    const tasks = getSchedulableDatabaseTasks();
    const activeJobIds = new Set(tasks.map((task) => jobIdForTask(task.id)));

    for (const jobId of [...this.jobs.keys()]) {
      if (!activeJobIds.has(jobId)) {
        this.removeJob(jobId);
        log.info(`Removed job ${jobId}`);
      }
    }

    for (const task of tasks) {
      const jobId = jobIdForTask(task.id);
      this.removeJob(jobId);

      let cron: ParsedCron;
      try {
        cron = parseCron(task.schedule_cron);
      } catch (error) {
        log.error(`Skipping task ${task.id} (${task.name}): ${errorMessage(error)}`);
        continue;
      }

      const job: ScheduledJob = { jobId, taskId: task.id, cron, nextRun: this.now(), timer: null };
      this.jobs.set(jobId, job);
      this.arm(job);
      log.debug(`Scheduled ${jobId} (${cron.expression}), next run ${job.nextRun.toISOString()}`);
    }
  }

  getStatus(): JobStatus[] {
    return [...this.jobs.values()]
      .map((job) => ({ jobId: job.jobId, taskId: job.taskId, cron: job.cron.expression, nextRun: job.nextRun }))
      .sort((a, b) => a.taskId - b.taskId);
  }

  hasJob(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  private removeJob(jobId: string): void {
    const job = this.jobs.get(jobId);
    if (!job) return;
    if (job.timer) {
      clearTimeout(job.timer);
    }
    this.jobs.delete(jobId);
  }

  private arm(job: ScheduledJob): void {
    job.nextRun = getNextRun(job.cron, this.now());
    updateTaskNextRun(job.taskId, job.nextRun.toISOString());
    this.setTimer(job);
  }

  private setTimer(job: ScheduledJob): void {
    const delay = job.nextRun.getTime() - this.now().getTime();
    if (delay > MAX_TIMER_DELAY_MS) {
      job.timer = setTimeout(() => this.setTimer(job), MAX_TIMER_DELAY_MS);
      return;
    }
    job.timer = setTimeout(() => this.onTrigger(job.jobId), Math.max(0, delay));
  }

  private onTrigger(jobId: string): void {
    const job = this.jobs.get(jobId);
    if (!job) return;

    this.arm(job);
    this.runTaskNow(job.taskId).catch((error: unknown) => {
      log.error(`Job ${jobId} failed: ${errorMessage(error)}`);
    });
  }

  /**
   * Execute a task immediately: dump, upload, record history and apply
   * retention. Returns null when the task is already running.
   */
  async runTaskNow(taskId: number): Promise<TaskRunOutcome | null> {
    if (this.runningTasks.has(taskId)) {
      log.warn(`Task ${taskId} is still running, skipping this run`);
      return null;
    }

    const task = getDatabaseTaskById(taskId);
    if (!task) {
      throw new ConfigurationError(`Database backup task ${taskId} not found`);
    }

    this.runningTasks.add(taskId);
    try {
      return await this.execute(task);
    } finally {
      this.runningTasks.delete(taskId);
    }
  }

  private async execute(task: DatabaseTaskRecord): Promise<TaskRunOutcome> {
    const historyId = beginTaskRun(task.id, this.now().toISOString());
    log.info(`Running task ${task.id} (${task.name})`);

    let storage: NormalizedStorageConfig;
    let backend: StorageBackend;
    let result: DumpResult;
    try {
      storage = this.resolveStorage(task);
      backend = this.createBackend(storage);
      result = await this.options.executor.dump(task, backend);
    } catch (error) {
      const message = errorMessage(error);
      finishTaskRun(task.id, historyId, { status: "error", finishedAt: this.now().toISOString(), error: message });
      log.error(`Task ${task.id} (${task.name}) failed: ${message}`);
      return { taskId: task.id, historyId, status: "error", error: message, result: null, retention: null };
    }

    finishTaskRun(task.id, historyId, { status: "success", finishedAt: this.now().toISOString(), result });
    log.info(`Task ${task.id} (${task.name}) uploaded ${result.artifactFilename} to ${result.storagePath}`);

    let retention: RetentionResult | null = null;
    if (task.cleanup_enabled) {
      try {
        retention = await runRetention(task, backend, {
          backupNamespace: this.options.backupNamespace,
          storageConfigId: storage.id,
          now: this.now(),
        });
      } catch (error) {
        log.error(`Retention for task ${task.id} failed: ${errorMessage(error)}`);
      }
    }

    return { taskId: task.id, historyId, status: "success", error: null, result, retention };
  }
}
