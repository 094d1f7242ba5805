// ── SQLite schema ───────────────────────────────────────────────────────────
//
// All core tables live in one database file. Ownership is expressed with
// foreign keys so that deleting a community cascades to its plugin
// instances, their processes, and its identities. State stores are owned
// "backwards" (the owner points at the store), so AFTER DELETE triggers drop
// a store together with whichever row owned it.
//
//   communities ─┬─ plugins ──── governance_processes
//                │     └ state_stores ─ state_entries   (one per plugin/process)
//                └─ metagov_ids ─┬─ metagov_links (symmetric, both directions)
//                                └─ linked_accounts
//
import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS communities (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    slug TEXT NOT NULL UNIQUE,
    readable_name TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS state_stores (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS state_entries (
    state_id INTEGER NOT NULL REFERENCES state_stores(id) ON DELETE CASCADE,
    key TEXT NOT NULL,
    value_json TEXT NOT NULL,
    PRIMARY KEY (state_id, key)
  );

  CREATE TABLE IF NOT EXISTS plugins (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    community_id INTEGER NOT NULL REFERENCES communities(id) ON DELETE CASCADE,
    config_json TEXT NOT NULL DEFAULT '{}',
    community_platform_id TEXT,
    state_id INTEGER NOT NULL REFERENCES state_stores(id),
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE UNIQUE INDEX IF NOT EXISTS ux_plugins_identity
    ON plugins (name, community_id, IFNULL(community_platform_id, ''));

  CREATE TABLE IF NOT EXISTS governance_processes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    plugin_id INTEGER NOT NULL REFERENCES plugins(id) ON DELETE CASCADE,
    url TEXT,
    callback_url TEXT,
    status TEXT NOT NULL DEFAULT 'created' CHECK(status IN ('created', 'pending', 'completed')),
    errors_json TEXT NOT NULL DEFAULT '{}',
    outcome_json TEXT NOT NULL DEFAULT '{}',
    state_id INTEGER NOT NULL REFERENCES state_stores(id),
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS ix_processes_plugin ON governance_processes (plugin_id, name);
  CREATE INDEX IF NOT EXISTS ix_processes_status ON governance_processes (status);

  CREATE TABLE IF NOT EXISTS metagov_ids (
    internal_id INTEGER PRIMARY KEY,
    external_id INTEGER NOT NULL UNIQUE,
    community_id INTEGER NOT NULL REFERENCES communities(id) ON DELETE CASCADE,
    is_primary INTEGER NOT NULL DEFAULT 1
  );

  CREATE TABLE IF NOT EXISTS metagov_links (
    from_internal_id INTEGER NOT NULL REFERENCES metagov_ids(internal_id) ON DELETE CASCADE,
    to_internal_id INTEGER NOT NULL REFERENCES metagov_ids(internal_id) ON DELETE CASCADE,
    PRIMARY KEY (from_internal_id, to_internal_id),
    CHECK (from_internal_id <> to_internal_id)
  );

  CREATE TABLE IF NOT EXISTS linked_accounts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    internal_id INTEGER NOT NULL REFERENCES metagov_ids(internal_id) ON DELETE CASCADE,
    community_id INTEGER NOT NULL REFERENCES communities(id) ON DELETE CASCADE,
    community_platform_id TEXT,
    platform_type TEXT NOT NULL,
    platform_identifier TEXT NOT NULL,
    custom_data_json TEXT NOT NULL DEFAULT '{}',
    link_type TEXT NOT NULL DEFAULT 'unknown'
      CHECK(link_type IN ('oauth', 'manual-admin', 'email-matching', 'unknown')),
    link_quality TEXT NOT NULL DEFAULT 'unknown'
      CHECK(link_quality IN ('unknown', 'unconfirmed', 'weak-confirm', 'strong-confirm'))
  );
  CREATE UNIQUE INDEX IF NOT EXISTS ux_linked_accounts_handle
    ON linked_accounts (community_id, platform_type, platform_identifier, IFNULL(community_platform_id, ''));
  CREATE INDEX IF NOT EXISTS ix_linked_accounts_owner ON linked_accounts (internal_id);

  CREATE TRIGGER IF NOT EXISTS tr_plugins_drop_state
    AFTER DELETE ON plugins
    BEGIN
      DELETE FROM state_stores WHERE id = OLD.state_id;
    END;

  CREATE TRIGGER IF NOT EXISTS tr_processes_drop_state
    AFTER DELETE ON governance_processes
    BEGIN
      DELETE FROM state_stores WHERE id = OLD.state_id;
    END;
`;

/**
 * Open (creating if needed) the core database and apply the schema.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  let db: SqliteDatabase;
  if (dbPath === ":memory:") {
    db = new Database(dbPath);
  } else {
    const resolved = path.resolve(dbPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    db = new Database(resolved);
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
  }
  db.pragma("busy_timeout = 5000");
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA);
  return db;
}

/** Current time as an ISO string; every row timestamp goes through here. */
export function nowIso(): string {
  return new Date().toISOString();
}
