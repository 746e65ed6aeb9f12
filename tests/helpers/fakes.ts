import { vi } from "vitest";
import type { AgentApi } from "../../src/core/agents/reconciler";
import type { AgentBackupReport, AgentSystemInfo } from "../../src/core/agents/schemas";
import type { Notifier } from "../../src/core/notifications/webhook";

export class FakeAgent implements AgentApi {
  online = true;
  system: AgentSystemInfo | null = { disk_free_gb: 100, disk_total_gb: 250, memory_free_mb: 1024, memory_total_mb: 4096 };
  backups: AgentBackupReport[] | null = [];

  async ping(): Promise<boolean> {
    return this.online;
  }

  async getSystemInfo(): Promise<AgentSystemInfo | null> {
    return this.system;
  }

  async getBackups(): Promise<AgentBackupReport[] | null> {
    return this.backups;
  }
}

export function fakeNotifier(delivered = true) {
  return {
    sendMessage: vi.fn<Notifier["sendMessage"]>(async () => delivered),
    sendBackupAlert: vi.fn<Notifier["sendBackupAlert"]>(async () => delivered),
  };
}
