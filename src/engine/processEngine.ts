// ── Governance process engine ───────────────────────────────────────────────
//
// Drives long-running external decision processes through their lifecycle:
//
//   created ──start──▶ pending ──close / receiveWebhook / update──▶ completed
//
// `completed` is terminal: close, update and receiveWebhook on a completed
// process return it unchanged. Every lifecycle call on one process runs under
// that process's lock, so start, close, webhooks and scheduled updates never
// interleave for the same row. Different processes proceed in parallel.
//
// start() brackets the plugin's hook explicitly: the row and its state store
// are inserted first, the hook runs, and on any failure both are deleted
// before the failure is returned. A process that failed to start is never
// visible afterwards.
//
// Known gap: if the external system accepted a start but this process dies
// before the row is saved as pending, the external process is orphaned.
// The row is saved immediately after the hook returns to keep that window
// small; it cannot be closed without a distributed transaction.
//
import { nowIso, type SqliteDatabase } from "./database.js";
import {
  GovernanceError,
  InvalidParametersError,
  InvalidResultError,
  NotFoundError,
  NotSupportedError,
  PluginInternalError,
  toViolations,
} from "./errors.js";
import type { EventForwarder } from "./eventForwarder.js";
import type { KeyedLock } from "./keyedLock.js";
import { logError, logInfo, logWarn } from "./log.js";
import type { PluginInstanceManager } from "./pluginManager.js";
import type {
  PluginContext,
  PluginInstance,
  PluginRegistry,
  ProcessContext,
  ProcessStatus,
  ProcessTypeDescriptor,
} from "./pluginRegistry.js";
import { createStateStore, StateStore, type JsonObject } from "./stateStore.js";
import { HookLease, withTimeout } from "./timeout.js";

// ── Types ───────────────────────────────────────────────────────────────────

export type GovernanceProcess = {
  id: number;
  name: string;
  pluginId: number;
  pluginName: string;
  communitySlug: string;
  url: string | null;
  callbackUrl: string | null;
  status: ProcessStatus;
  errors: JsonObject;
  outcome: JsonObject;
  stateId: number;
  createdAt: string;
  updatedAt: string;
};

export type SerializedProcess = {
  id: number;
  name: string;
  plugin: string;
  community: string;
  status: ProcessStatus;
  url: string | null;
  callbackUrl: string | null;
  outcome: JsonObject;
  errors: JsonObject;
};

/** Either the committed, started process or the failure with nothing committed. */
export type ProcessStartResult =
  | { ok: true; process: GovernanceProcess }
  | { ok: false; error: GovernanceError };

export type StartProcessOptions = {
  callbackUrl?: string | null;
};

export type WebhookFanOutResult = {
  offered: number;
  failed: number;
};

export type ProcessEngineOptions = {
  db: SqliteDatabase;
  registry: PluginRegistry;
  plugins: PluginInstanceManager;
  events: EventForwarder;
  locks: KeyedLock;
  hookTimeoutMs: number;
};

type ProcessRow = {
  id: number;
  name: string;
  plugin_id: number;
  plugin_name: string;
  community_slug: string;
  url: string | null;
  callback_url: string | null;
  status: ProcessStatus;
  errors_json: string;
  outcome_json: string;
  state_id: number;
  created_at: string;
  updated_at: string;
};

type Hook = "close" | "receiveWebhook" | "update";

const PROCESS_SELECT = `
  SELECT gp.*, p.name AS plugin_name, c.slug AS community_slug
  FROM governance_processes gp
  JOIN plugins p ON p.id = gp.plugin_id
  JOIN communities c ON c.id = p.community_id
`;

function toProcess(row: ProcessRow): GovernanceProcess {
  return {
    id: row.id,
    name: row.name,
    pluginId: row.plugin_id,
    pluginName: row.plugin_name,
    communitySlug: row.community_slug,
    url: row.url,
    callbackUrl: row.callback_url,
    status: row.status,
    errors: JSON.parse(row.errors_json) as JsonObject,
    outcome: JSON.parse(row.outcome_json) as JsonObject,
    stateId: row.state_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function serializeProcess(process: GovernanceProcess): SerializedProcess {
  return {
    id: process.id,
    name: process.name,
    plugin: process.pluginName,
    community: process.communitySlug,
    status: process.status,
    url: process.url,
    callbackUrl: process.callbackUrl,
    outcome: process.outcome,
    errors: process.errors,
  };
}

export function describeProcess(process: GovernanceProcess): string {
  return `${process.pluginName}.${process.name} for '${process.communitySlug}' (${process.id}, ${process.status})`;
}

function fingerprint(process: GovernanceProcess): string {
  return JSON.stringify([process.status, process.url, process.outcome, process.errors]);
}

function errorPayload(error: GovernanceError): JsonObject {
  return { code: error.code, message: error.message };
}

// ── Hook handle ─────────────────────────────────────────────────────────────

/**
 * The mutable view a hook works on. Nothing is written until save(), and
 * nothing at all once the hook's lease is revoked.
 */
class ProcessHandle implements ProcessContext {
  readonly id: number;
  readonly name: string;
  readonly callbackUrl: string | null;
  readonly state: StateStore;
  status: ProcessStatus;
  url: string | null;
  outcome: JsonObject;
  errors: JsonObject;

  constructor(
    private readonly db: SqliteDatabase,
    record: GovernanceProcess,
    readonly plugin: PluginContext,
    private readonly lease: HookLease,
  ) {
    this.id = record.id;
    this.name = record.name;
    this.callbackUrl = record.callbackUrl;
    this.state = new StateStore(db, record.stateId, () => lease.assertActive());
    this.status = record.status;
    this.url = record.url;
    this.outcome = record.outcome;
    this.errors = record.errors;
  }

  save(): void {
    this.lease.assertActive();
    const result = this.db
      .prepare(`
        UPDATE governance_processes
        SET status = ?, url = ?, outcome_json = ?, errors_json = ?, updated_at = ?
        WHERE id = ?
      `)
      .run(this.status, this.url, JSON.stringify(this.outcome), JSON.stringify(this.errors), nowIso(), this.id);
    if (result.changes === 0) {
      throw new NotFoundError("process", `Process ${this.id} no longer exists`);
    }
  }
}

// ── Engine ──────────────────────────────────────────────────────────────────

export class GovernanceProcessEngine {
  private readonly db: SqliteDatabase;

  constructor(private readonly options: ProcessEngineOptions) {
    this.db = options.db;
  }

  resolveProcessType(pluginName: string, processType: string): ProcessTypeDescriptor {
    const descriptor = this.options.registry.require(pluginName);
    const processDescriptor = Object.prototype.hasOwnProperty.call(descriptor.processes, processType)
      ? descriptor.processes[processType]
      : undefined;
    if (!processDescriptor) {
      const available = Object.keys(descriptor.processes);
      throw new NotFoundError(
        "process",
        `No such process '${processType}' for ${pluginName} plugin. Available processes: ${available.join(", ") || "none"}`,
      );
    }
    return processDescriptor;
  }

  // ── Start ───────────────────────────────────────────────────────────────

  async startProcess(
    plugin: PluginInstance,
    processType: string,
    rawParameters: unknown,
    options: StartProcessOptions = {},
  ): Promise<ProcessStartResult> {
    let descriptor: ProcessTypeDescriptor;
    try {
      descriptor = this.resolveProcessType(plugin.name, processType);
    } catch (error) {
      return { ok: false, error: PluginInternalError.from(error, `${plugin.name}.${processType}`) };
    }

    let parameters: unknown = rawParameters ?? {};
    if (descriptor.inputSchema) {
      const parsed = descriptor.inputSchema.safeParse(parameters);
      if (!parsed.success) {
        return {
          ok: false,
          error: new InvalidParametersError(
            `parameters for ${plugin.name}.${processType}`,
            toViolations(parsed.error.issues),
          ),
        };
      }
      parameters = parsed.data;
    }

    const processId = this.insertCreated(plugin, processType, options.callbackUrl ?? null);
    const scope = `${plugin.name}.${processType}.start`;

    return this.options.locks.run(`process:${processId}`, async (): Promise<ProcessStartResult> => {
      const lease = new HookLease(scope);
      const handle = this.handleFor(this.requireById(processId), lease);
      try {
        await withTimeout(descriptor.start(handle, parameters), this.options.hookTimeoutMs, scope);
        handle.save();
      } catch (error) {
        this.deleteRow(processId);
        logError("processes.start", error, { process: processId, type: `${plugin.name}.${processType}` });
        return { ok: false, error: PluginInternalError.from(error, scope) };
      } finally {
        lease.revoke();
      }

      const process = this.requireById(processId);
      if (process.status === "created") {
        logWarn("processes.start", { process: describeProcess(process), message: "start hook left status 'created'" });
      }
      logInfo("processes.started", { process: describeProcess(process) });
      return { ok: true, process };
    });
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  /** Caller-initiated close. Fails with NotSupported when the type has no close hook. */
  async closeProcess(processId: number): Promise<GovernanceProcess> {
    return this.runHook(processId, "close", undefined);
  }

  /** Offer a webhook payload to one process. Irrelevant payloads are the hook's no-op. */
  async receiveWebhook(processId: number, payload: unknown): Promise<GovernanceProcess> {
    return this.runHook(processId, "receiveWebhook", payload);
  }

  /** Poll entrypoint for the scheduler. Safe to repeat; a completed process is untouched. */
  async updateProcess(processId: number): Promise<GovernanceProcess> {
    return this.runHook(processId, "update", undefined);
  }

  /**
   * Offer a webhook to every pending process of a plugin instance. A failing
   * process has its errors recorded by runHook; the rest still get the payload.
   */
  async receivePluginWebhook(plugin: PluginInstance, payload: unknown): Promise<WebhookFanOutResult> {
    const pending = this.db
      .prepare("SELECT id FROM governance_processes WHERE plugin_id = ? AND status = 'pending' ORDER BY id")
      .all(plugin.id) as Array<{ id: number }>;

    const results = await Promise.allSettled(pending.map((row) => this.receiveWebhook(row.id, payload)));
    const failed = results.filter((r) => r.status === "rejected").length;
    return { offered: pending.length, failed };
  }

  // ── Queries ─────────────────────────────────────────────────────────────

  /** A process of the given type on the given plugin; any other match is NotFound. */
  getProcess(plugin: PluginInstance, processType: string, processId: number): GovernanceProcess {
    this.resolveProcessType(plugin.name, processType);
    const row = this.db
      .prepare(`${PROCESS_SELECT} WHERE gp.id = ? AND gp.name = ? AND gp.plugin_id = ?`)
      .get(processId, processType, plugin.id) as ProcessRow | undefined;
    if (!row) {
      throw new NotFoundError("process", `No ${plugin.name}.${processType} process with id ${processId}`);
    }
    return toProcess(row);
  }

  listProcesses(plugin: PluginInstance, processType: string): GovernanceProcess[] {
    this.resolveProcessType(plugin.name, processType);
    const rows = this.db
      .prepare(`${PROCESS_SELECT} WHERE gp.plugin_id = ? AND gp.name = ? ORDER BY gp.id`)
      .all(plugin.id, processType) as ProcessRow[];
    return rows.map(toProcess);
  }

  /** Every process the scheduler should poll. */
  listPendingProcesses(): GovernanceProcess[] {
    const rows = this.db
      .prepare(`${PROCESS_SELECT} WHERE gp.status = 'pending' ORDER BY gp.id`)
      .all() as ProcessRow[];
    return rows.map(toProcess);
  }

  findById(processId: number): GovernanceProcess | null {
    const row = this.db.prepare(`${PROCESS_SELECT} WHERE gp.id = ?`).get(processId) as ProcessRow | undefined;
    return row ? toProcess(row) : null;
  }

  requireById(processId: number): GovernanceProcess {
    const process = this.findById(processId);
    if (!process) throw new NotFoundError("process", `Process ${processId} not found`);
    return process;
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private insertCreated(plugin: PluginInstance, processType: string, callbackUrl: string | null): number {
    const insert = this.db.transaction(() => {
      const stateId = createStateStore(this.db);
      const now = nowIso();
      const result = this.db
        .prepare(`
          INSERT INTO governance_processes (name, plugin_id, callback_url, status, state_id, created_at, updated_at)
          VALUES (?, ?, ?, 'created', ?, ?, ?)
        `)
        .run(processType, plugin.id, callbackUrl, stateId, now, now);
      return Number(result.lastInsertRowid);
    });
    return insert();
  }

  private deleteRow(processId: number): void {
    this.db.prepare("DELETE FROM governance_processes WHERE id = ?").run(processId);
  }

  private handleFor(process: GovernanceProcess, lease: HookLease): ProcessHandle {
    const plugin = this.options.plugins.requireById(process.pluginId);
    return new ProcessHandle(this.db, process, this.options.plugins.contextFor(plugin, lease), lease);
  }

  private async runHook(processId: number, hook: Hook, payload: unknown): Promise<GovernanceProcess> {
    return this.options.locks.run(`process:${processId}`, async () => {
      const before = this.requireById(processId);
      if (before.status === "completed") return before;

      const descriptor = this.resolveProcessType(before.pluginName, before.name);
      const scope = `${before.pluginName}.${before.name}.${hook}`;
      const lease = new HookLease(scope);
      const handle = this.handleFor(before, lease);

      let failure: GovernanceError | undefined;
      try {
        if (hook === "close") {
          if (!descriptor.close) {
            throw new NotSupportedError(`${before.pluginName}.${before.name} does not support close`);
          }
          await withTimeout(descriptor.close(handle), this.options.hookTimeoutMs, scope);
        } else if (hook === "receiveWebhook") {
          if (!descriptor.receiveWebhook) return before;
          await withTimeout(descriptor.receiveWebhook(handle, payload), this.options.hookTimeoutMs, scope);
        } else {
          if (!descriptor.update) return before;
          await withTimeout(descriptor.update(handle), this.options.hookTimeoutMs, scope);
        }
        handle.save();
      } catch (error) {
        if (error instanceof NotSupportedError) throw error;
        failure = PluginInternalError.from(error, scope);
        logError(`processes.${hook}`, error, { process: describeProcess(before) });
      } finally {
        lease.revoke();
      }

      if (failure) {
        this.recordErrors(processId, failure);
        await this.notifyIfChanged(before);
        throw failure;
      }

      const after = this.requireById(processId);
      if (after.status === "completed" && descriptor.outcomeSchema) {
        const parsed = descriptor.outcomeSchema.safeParse(after.outcome);
        if (!parsed.success) {
          const invalid = new InvalidResultError(`${scope} outcome`, toViolations(parsed.error.issues));
          this.recordErrors(processId, invalid);
          logError(`processes.${hook}`, invalid, { process: describeProcess(after) });
          await this.notifyIfChanged(before);
          throw invalid;
        }
      }

      if (after.status !== before.status) {
        logInfo("processes.transition", { process: describeProcess(after), from: before.status, via: hook });
      }
      return this.notifyIfChanged(before);
    });
  }

  private recordErrors(processId: number, error: GovernanceError): void {
    this.db
      .prepare("UPDATE governance_processes SET errors_json = ?, updated_at = ? WHERE id = ?")
      .run(JSON.stringify(errorPayload(error)), nowIso(), processId);
  }

  /** POST the serialized process to its callback URL when status, url, outcome or errors moved. */
  private async notifyIfChanged(before: GovernanceProcess): Promise<GovernanceProcess> {
    const after = this.requireById(before.id);
    if (after.callbackUrl && fingerprint(after) !== fingerprint(before)) {
      await this.options.events.postJson(after.callbackUrl, serializeProcess(after), "processes.callback");
    }
    return after;
  }
}
