/**
 * Chat webhook notifications
 */

import { type Dispatcher, fetch } from "undici";
import type { NotificationsConfig } from "../../types";
import { errorMessage } from "../../utils/errors";
import { createLogger } from "../../utils/logger";

const log = createLogger("notify");

export const DEFAULT_WEBHOOK_USERNAME = "Backup Server";
export const DEFAULT_WEBHOOK_TIMEOUT_MS = 10_000;

export interface Notifier {
  sendMessage(text: string): Promise<boolean>;
  sendBackupAlert(taskName: string, errorMessage: string): Promise<boolean>;
}

export interface WebhookNotifierOptions {
  webhookUrl: string;
  username?: string;
  iconUrl?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  now?: () => Date;
}

/**
 * `YYYY-MM-DD HH:MM:SS` in UTC
 */
export function formatAlertTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export function formatBackupAlert(taskName: string, error: string, at: Date): string {
  return [
    "⚠️ **Backup problem**",
    "",
    `**Task:** ${taskName}`,
    `**Error:** ${error}`,
    `**Time:** ${formatAlertTime(at)} UTC`,
  ].join("\n");
}

export class WebhookNotifier implements Notifier {
  private readonly now: () => Date;

  constructor(private readonly options: WebhookNotifierOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * POST a message. Failures are logged and reported as false; nothing is retried.
   */
  async sendMessage(text: string): Promise<boolean> {
    const payload: Record<string, string> = {
      text,
      username: this.options.username ?? DEFAULT_WEBHOOK_USERNAME,
    };
    if (this.options.iconUrl) {
      payload.icon_url = this.options.iconUrl;
    }

    const requestInit: NonNullable<Parameters<typeof fetch>[1]> = {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_WEBHOOK_TIMEOUT_MS),
    };
    if (this.options.dispatcher) {
      requestInit.dispatcher = this.options.dispatcher;
    }

    try {
      const res = await fetch(this.options.webhookUrl, requestInit);
      if (!res.ok) {
        log.error(`Webhook returned status ${res.status}`);
        return false;
      }
      return true;
    } catch (err) {
      log.error(`Error sending webhook message: ${errorMessage(err)}`);
      return false;
    }
  }

  sendBackupAlert(taskName: string, error: string): Promise<boolean> {
    return this.sendMessage(formatBackupAlert(taskName, error, this.now()));
  }
}

/**
 * Notifier for the configured webhook, or null when notifications are off
 */
export function createNotifier(config: NotificationsConfig, dispatcher?: Dispatcher): WebhookNotifier | null {
  if (!config.enabled || !config.webhookUrl) {
    return null;
  }
  return new WebhookNotifier({
    webhookUrl: config.webhookUrl,
    username: config.username,
    iconUrl: config.iconUrl,
    timeoutMs: config.timeoutSeconds !== undefined ? config.timeoutSeconds * 1000 : undefined,
    dispatcher,
  });
}
