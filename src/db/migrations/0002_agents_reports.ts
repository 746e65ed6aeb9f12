import type { Migration } from "../../types/database";

export const migration: Migration = {
  version: 2,
  name: "agents_reports",
  description: "Remote agents, agent telemetry and backup snapshots, report definitions",
  up: `
CREATE TABLE agents (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    ip_address TEXT NOT NULL,
    port INTEGER NOT NULL DEFAULT 11540,
    hostname TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    last_seen TEXT,
    storage_config_id INTEGER REFERENCES storage_configs(id) ON DELETE SET NULL
);

CREATE TABLE agent_status (
    agent_id INTEGER PRIMARY KEY REFERENCES agents(id) ON DELETE CASCADE,
    disk_free_gb REAL,
    disk_total_gb REAL,
    memory_free_mb REAL,
    memory_total_mb REAL,
    cpu_load_percent REAL,
    network_rx_mb REAL,
    network_tx_mb REAL,
    is_online INTEGER NOT NULL DEFAULT 0,
    last_update TEXT
);

CREATE TABLE folder_backup_tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    agent_id INTEGER NOT NULL REFERENCES agents(id) ON DELETE CASCADE,
    storage_config_id INTEGER REFERENCES storage_configs(id) ON DELETE SET NULL,
    source_path TEXT NOT NULL,
    schedule_cron TEXT NOT NULL,
    schedule_enabled INTEGER NOT NULL DEFAULT 1,
    create_archive INTEGER NOT NULL DEFAULT 1,
    archive_format TEXT NOT NULL DEFAULT 'tar.gz',
    is_docker_compose INTEGER NOT NULL DEFAULT 0,
    docker_compose_path TEXT,
    cleanup_enabled INTEGER NOT NULL DEFAULT 1,
    cleanup_days INTEGER NOT NULL DEFAULT 30,
    is_active INTEGER NOT NULL DEFAULT 1,
    last_run TEXT,
    last_status TEXT CHECK (last_status IN ('running', 'success', 'error')),
    last_error TEXT
);

CREATE INDEX idx_folder_tasks_agent_source ON folder_backup_tasks(agent_id, source_path);

CREATE TABLE agent_backup_records (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    agent_id INTEGER NOT NULL REFERENCES agents(id) ON DELETE CASCADE,
    task_id INTEGER NOT NULL REFERENCES folder_backup_tasks(id) ON DELETE CASCADE,
    source_path TEXT NOT NULL,
    archive_name TEXT,
    backup_date TEXT,
    upload_date TEXT,
    artifact_size_mb REAL,
    storage_path TEXT,
    status TEXT NOT NULL CHECK (status IN ('success', 'error', 'uploading')),
    error_message TEXT,
    UNIQUE (agent_id, task_id)
);

CREATE TABLE reports (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    selected_agent_ids TEXT NOT NULL DEFAULT '[]',
    selected_database_task_ids TEXT NOT NULL DEFAULT '[]',
    cadence TEXT NOT NULL CHECK (cadence IN ('daily', 'weekly', 'hourly', 'customHours')),
    cadence_hour INTEGER NOT NULL DEFAULT 9,
    cadence_minute INTEGER NOT NULL DEFAULT 0,
    cadence_day_of_week INTEGER NOT NULL DEFAULT 1,
    cadence_hours_interval INTEGER NOT NULL DEFAULT 24,
    enabled INTEGER NOT NULL DEFAULT 1,
    send_enabled INTEGER NOT NULL DEFAULT 1,
    last_sent TEXT,
    next_send TEXT
);

CREATE TABLE report_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    report_id INTEGER NOT NULL REFERENCES reports(id) ON DELETE CASCADE,
    sent_at TEXT NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('success', 'error')),
    error_message TEXT
);

CREATE INDEX idx_report_history_report ON report_history(report_id, sent_at DESC);
`,
};
