/**
 * Scheduler daemon
 *
 * Composes the backup scheduler, agent poller, report scheduler and storage
 * check. Each runs its own loop; none blocks another.
 */

import type { Dispatcher } from "undici";
import type { BackhaulConfig } from "../../types";
import { createCredentialCipher } from "../../utils/crypto";
import { createLogger } from "../../utils/logger";
import type { ProcessRunner } from "../../utils/process";
import { AgentReconciler } from "../agents/reconciler";
import { DatabaseDumpExecutor } from "../backup/dump-executor";
import { createNotifier, type Notifier } from "../notifications/webhook";
import { ReportScheduler } from "../reports/scheduler";
import { StorageMonitor } from "../storage-monitor";
import { TaskScheduler } from "./task-scheduler";

const log = createLogger("daemon");

export interface DaemonOptions {
  /** Replaces the webhook notifier built from config */
  notifier?: Notifier | null;
  dispatcher?: Dispatcher;
  run?: ProcessRunner;
}

export class Daemon {
  readonly scheduler: TaskScheduler;
  readonly agents: AgentReconciler;
  readonly reports: ReportScheduler;
  readonly storage: StorageMonitor;
  private running = false;

  constructor(config: BackhaulConfig, options: DaemonOptions = {}) {
    const notifier =
      options.notifier !== undefined ? options.notifier : createNotifier(config.notifications, options.dispatcher);

    const executor = new DatabaseDumpExecutor({
      tools: config.tools,
      tempDir: config.scheduler.tempDir,
      backupNamespace: config.scheduler.backupNamespace,
      cipher: createCredentialCipher(config.security.encryptionKey),
      run: options.run,
    });

    this.scheduler = new TaskScheduler({
      executor,
      backupNamespace: config.scheduler.backupNamespace,
      resyncIntervalSeconds: config.scheduler.resyncIntervalSeconds,
    });
    this.agents = new AgentReconciler({
      pollIntervalSeconds: config.agents.pollIntervalSeconds,
      requestTimeoutSeconds: config.agents.requestTimeoutSeconds,
      notifier,
    });
    this.reports = new ReportScheduler({
      checkIntervalSeconds: config.reports.checkIntervalSeconds,
      notifier,
    });
    this.storage = new StorageMonitor({ intervalSeconds: config.storageCheck.intervalSeconds });

    if (!notifier) {
      log.info("Notifications disabled; reports and failure alerts will not be sent");
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      log.warn("Daemon is already running");
      return;
    }

    this.running = true;
    this.scheduler.start();
    this.agents.start();
    this.reports.start();
    this.storage.start();
    log.info("Daemon started");
  }

  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.scheduler.stop();
    this.agents.stop();
    this.reports.stop();
    this.storage.stop();
    log.info("Daemon stopped");
  }
}
