// ── Key-value state store ───────────────────────────────────────────────────
//
// Private scratch space owned by exactly one plugin instance or governance
// process. Values are stored as JSON text, one row per key, so any
// composition of objects, arrays and scalars reads back deep-equal.
//
import { nowIso, type SqliteDatabase } from "./database.js";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

type StateEntryRow = { key: string; value_json: string };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalize a validated value into plain JSON: drops undefined fields and
 * turns dates into strings, exactly as the value will read back from the
 * database. Returns null when the value is not an object.
 */
export function toJsonObject(value: unknown): JsonObject | null {
  if (!isPlainObject(value)) return null;
  return JSON.parse(JSON.stringify(value)) as JsonObject;
}

/** Allocate an empty store and return its id. Callers do this inside the owner's insert transaction. */
export function createStateStore(db: SqliteDatabase): number {
  const result = db.prepare("INSERT INTO state_stores (created_at) VALUES (?)").run(nowIso());
  return Number(result.lastInsertRowid);
}

export function stateStoreExists(db: SqliteDatabase, stateId: number): boolean {
  return db.prepare("SELECT 1 FROM state_stores WHERE id = ?").get(stateId) !== undefined;
}

export class StateStore {
  /** `assertWritable` runs before every write; hook-scoped stores throw from it once the hook expires. */
  constructor(
    private readonly db: SqliteDatabase,
    readonly id: number,
    private readonly assertWritable: () => void = () => undefined,
  ) {}

  /** Returns undefined when the key was never set (or was removed). */
  get(key: string): JsonValue | undefined {
    const row = this.db
      .prepare("SELECT value_json FROM state_entries WHERE state_id = ? AND key = ?")
      .get(this.id, key) as Pick<StateEntryRow, "value_json"> | undefined;
    if (!row) return undefined;
    return JSON.parse(row.value_json) as JsonValue;
  }

  set(key: string, value: JsonValue): void {
    this.assertWritable();
    this.db
      .prepare(`
        INSERT INTO state_entries (state_id, key, value_json) VALUES (?, ?, ?)
        ON CONFLICT(state_id, key) DO UPDATE SET value_json = excluded.value_json
      `)
      .run(this.id, key, JSON.stringify(value));
  }

  /** Returns true when a value was actually removed. */
  remove(key: string): boolean {
    this.assertWritable();
    const result = this.db.prepare("DELETE FROM state_entries WHERE state_id = ? AND key = ?").run(this.id, key);
    return result.changes > 0;
  }

  keys(): string[] {
    const rows = this.db
      .prepare("SELECT key FROM state_entries WHERE state_id = ? ORDER BY key")
      .all(this.id) as Array<Pick<StateEntryRow, "key">>;
    return rows.map((row) => row.key);
  }

  toJSON(): JsonObject {
    const rows = this.db
      .prepare("SELECT key, value_json FROM state_entries WHERE state_id = ? ORDER BY key")
      .all(this.id) as StateEntryRow[];
    const snapshot: JsonObject = {};
    for (const row of rows) {
      snapshot[row.key] = JSON.parse(row.value_json) as JsonValue;
    }
    return snapshot;
  }
}
