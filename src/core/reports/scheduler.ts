/**
 * Report delivery loop
 */

import { getDeliverableReports, recordReportSend, updateReportNextSend } from "../../db";
import type { ReportDefinitionRecord } from "../../types";
import { errorMessage } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { IntervalLoop } from "../loop";
import type { Notifier } from "../notifications/webhook";
import { computeNextSend, shouldFire } from "./cadence";
import { generateReport } from "./generator";

const log = createLogger("reports");

export interface ReportSchedulerOptions {
  checkIntervalSeconds: number;
  notifier: Notifier | null;
  now?: () => Date;
}

/**
 * Start of the minute containing `date`
 */
export function floorToMinute(date: Date): Date {
  const floored = new Date(date.getTime());
  floored.setUTCSeconds(0, 0);
  return floored;
}

export class ReportScheduler {
  private readonly loop: IntervalLoop;
  private readonly now: () => Date;

  constructor(private readonly options: ReportSchedulerOptions) {
    this.now = options.now ?? (() => new Date());
    this.loop = new IntervalLoop("report check", options.checkIntervalSeconds * 1000, async () => {
      await this.checkReports();
    });
  }

  start(): void {
    this.loop.start();
    log.info("Report scheduler started");
  }

  stop(): void {
    this.loop.stop();
    log.info("Report scheduler stopped");
  }

  /**
   * Send every report whose cadence matches the current minute. Returns the
   * ids of reports that were attempted.
   */
  async checkReports(): Promise<number[]> {
    if (!this.options.notifier) {
      return [];
    }

    const now = floorToMinute(this.now());
    const attempted: number[] = [];

    for (const report of getDeliverableReports()) {
      try {
        if (shouldFire(report, now)) {
          attempted.push(report.id);
          await this.send(report, this.options.notifier, now);
        } else if (!report.next_send) {
          updateReportNextSend(report.id, computeNextSend(report, now).toISOString());
        }
      } catch (err) {
        log.error(`Error processing report ${report.id}: ${errorMessage(err)}`);
      }
    }

    return attempted;
  }

  private async send(report: ReportDefinitionRecord, notifier: Notifier, now: Date): Promise<void> {
    const sentAt = now.toISOString();
    const nextSend = computeNextSend({ ...report, last_sent: sentAt }, now).toISOString();

    let text: string;
    try {
      text = generateReport(report, now);
    } catch (err) {
      const message = `Report generation failed: ${errorMessage(err)}`;
      recordReportSend(report.id, { sentAt, status: "error", error: message, nextSend });
      log.error(`Report ${report.id} (${report.name}): ${message}`);
      return;
    }

    const delivered = await notifier.sendMessage(text);
    recordReportSend(report.id, {
      sentAt,
      status: delivered ? "success" : "error",
      error: delivered ? null : "Webhook delivery failed",
      nextSend,
    });

    if (delivered) {
      log.info(`Report ${report.id} (${report.name}) sent`);
    } else {
      log.warn(`Report ${report.id} (${report.name}) could not be delivered`);
    }
  }
}
