import type { Migration } from "../../types/database";

export const migration: Migration = {
  version: 1,
  name: "initial",
  description: "Storage configs, database tasks with history, and deletion log",
  up: `
CREATE TABLE storage_configs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT UNIQUE NOT NULL,
    storage_type TEXT NOT NULL CHECK (storage_type IN ('object', 'sftp', 'nfs', 'local')),
    config_data TEXT NOT NULL DEFAULT '{}',
    last_check TEXT,
    free_space_gb REAL,
    total_space_gb REAL,
    used_space_gb REAL,
    connection_error TEXT,
    created_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE TABLE legacy_object_configs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT UNIQUE NOT NULL,
    endpoint TEXT NOT NULL,
    access_key TEXT NOT NULL,
    secret_key TEXT NOT NULL,
    bucket_name TEXT NOT NULL,
    region TEXT NOT NULL DEFAULT 'us-east-1',
    use_ssl INTEGER NOT NULL DEFAULT 1
);

CREATE TABLE database_backup_tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    storage_config_id INTEGER REFERENCES storage_configs(id) ON DELETE SET NULL,
    legacy_config_id INTEGER REFERENCES legacy_object_configs(id) ON DELETE SET NULL,
    host TEXT NOT NULL,
    port INTEGER NOT NULL DEFAULT 5432,
    username TEXT NOT NULL,
    password_encrypted TEXT NOT NULL,
    database_name TEXT NOT NULL,
    dump_format TEXT NOT NULL DEFAULT 'custom' CHECK (dump_format IN ('custom', 'plain', 'tar')),
    compression_level INTEGER NOT NULL DEFAULT 6,
    include_schema INTEGER NOT NULL DEFAULT 1,
    include_data INTEGER NOT NULL DEFAULT 1,
    include_roles INTEGER NOT NULL DEFAULT 0,
    include_tablespaces INTEGER NOT NULL DEFAULT 0,
    schedule_cron TEXT NOT NULL,
    schedule_enabled INTEGER NOT NULL DEFAULT 1,
    cleanup_enabled INTEGER NOT NULL DEFAULT 1,
    cleanup_days INTEGER NOT NULL DEFAULT 30,
    is_active INTEGER NOT NULL DEFAULT 1,
    last_run TEXT,
    next_run TEXT,
    last_status TEXT CHECK (last_status IN ('running', 'success', 'error')),
    last_error TEXT,
    created_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE TABLE database_backup_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id INTEGER NOT NULL REFERENCES database_backup_tasks(id) ON DELETE CASCADE,
    status TEXT NOT NULL CHECK (status IN ('running', 'success', 'error')),
    started_at TEXT NOT NULL,
    finished_at TEXT,
    duration_seconds REAL,
    artifact_size_mb REAL,
    storage_path TEXT,
    artifact_filename TEXT,
    error_message TEXT
);

CREATE INDEX idx_history_task_started ON database_backup_history(task_id, started_at DESC);
CREATE INDEX idx_history_started ON database_backup_history(started_at);

CREATE TABLE deletion_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id INTEGER NOT NULL,
    storage_config_id INTEGER,
    storage_path TEXT NOT NULL,
    reason TEXT NOT NULL,
    deleted_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    success INTEGER NOT NULL,
    error_message TEXT
);

CREATE INDEX idx_deletion_log_task ON deletion_log(task_id);

CREATE TABLE schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT DEFAULT (datetime('now'))
);
`,
};
