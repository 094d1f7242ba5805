// ── Plugin instance manager ─────────────────────────────────────────────────
//
// Enables, re-enables and disables plugin instances per community. An
// instance is unique on (plugin name, community, communityPlatformId) and
// owns one state store; deleting the row drops the store and, by cascade,
// every governance process the instance started.
//
import type { CommunityRef } from "./communityStore.js";
import { nowIso, type SqliteDatabase } from "./database.js";
import { InvalidParametersError, NotFoundError, PluginInternalError, toViolations } from "./errors.js";
import type { EventForwarder } from "./eventForwarder.js";
import { serializeLinkedAccount, type IdentityEngine } from "./identity.js";
import type { KeyedLock } from "./keyedLock.js";
import { logError, logInfo } from "./log.js";
import type { AuthType, PluginContext, PluginDescriptor, PluginInstance, PluginRegistry } from "./pluginRegistry.js";
import { createStateStore, StateStore, toJsonObject, type JsonObject } from "./stateStore.js";
import { HookLease, withTimeout } from "./timeout.js";

// ── Types ───────────────────────────────────────────────────────────────────

export type PluginLookup = {
  communityPlatformId?: string | null;
  id?: number;
};

export type EnableResult = {
  plugin: PluginInstance;
  created: boolean;
};

export type SerializedPlugin = {
  id: number;
  name: string;
  community: string;
  communityPlatformId: string | null;
  authType: AuthType;
  config: JsonObject;
};

export type PluginManagerOptions = {
  db: SqliteDatabase;
  registry: PluginRegistry;
  identity: IdentityEngine;
  events: EventForwarder;
  locks: KeyedLock;
  hookTimeoutMs: number;
};

type PluginRow = {
  id: number;
  name: string;
  community_id: number;
  community_slug: string;
  config_json: string;
  community_platform_id: string | null;
  state_id: number;
  created_at: string;
  updated_at: string;
};

const PLUGIN_SELECT = `
  SELECT p.*, c.slug AS community_slug
  FROM plugins p
  JOIN communities c ON c.id = p.community_id
`;

function toInstance(row: PluginRow): PluginInstance {
  return {
    id: row.id,
    name: row.name,
    communityId: row.community_id,
    communitySlug: row.community_slug,
    config: JSON.parse(row.config_json) as JsonObject,
    communityPlatformId: row.community_platform_id,
    stateId: row.state_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function pluginLockKey(communityId: number, name: string, communityPlatformId: string | null): string {
  return `plugin:${communityId}:${name}:${communityPlatformId ?? ""}`;
}

export function describePlugin(instance: PluginInstance): string {
  const platform = instance.communityPlatformId ? ` (${instance.communityPlatformId})` : "";
  return `${instance.name}${platform} for '${instance.communitySlug}'`;
}

// ── Manager ─────────────────────────────────────────────────────────────────

export class PluginInstanceManager {
  private readonly db: SqliteDatabase;
  private readonly registry: PluginRegistry;

  constructor(private readonly options: PluginManagerOptions) {
    this.db = options.db;
    this.registry = options.registry;
  }

  /**
   * Create the instance, or update its config if one already exists for the
   * same uniqueness tuple. `initialize` runs only after a create; if it fails
   * the new instance is deleted again.
   */
  async enable(community: CommunityRef, name: string, rawConfig: unknown = {}): Promise<EnableResult> {
    const descriptor = this.registry.require(name);
    const config = this.validateConfig(descriptor, rawConfig);
    const communityPlatformId = this.extractCommunityPlatformId(descriptor, config);

    return this.options.locks.run(pluginLockKey(community.id, name, communityPlatformId), async () => {
      const existing = this.find(community, name, communityPlatformId);
      if (existing) {
        this.db
          .prepare("UPDATE plugins SET config_json = ?, updated_at = ? WHERE id = ?")
          .run(JSON.stringify(config), nowIso(), existing.id);
        logInfo("plugins.updated", { plugin: describePlugin(existing) });
        return { plugin: this.requireById(existing.id), created: false };
      }

      const insert = this.db.transaction(() => {
        const stateId = createStateStore(this.db);
        const now = nowIso();
        const result = this.db
          .prepare(`
            INSERT INTO plugins (name, community_id, config_json, community_platform_id, state_id, created_at, updated_at)
            VALUES (?, ?, ?, ?, ?, ?, ?)
          `)
          .run(name, community.id, JSON.stringify(config), communityPlatformId, stateId, now, now);
        return Number(result.lastInsertRowid);
      });
      const plugin = this.requireById(insert());

      if (descriptor.initialize) {
        const lease = new HookLease(`${name}.initialize`);
        try {
          await withTimeout(descriptor.initialize(this.contextFor(plugin, lease)), this.options.hookTimeoutMs, lease.scope);
        } catch (error) {
          this.deleteRow(plugin.id);
          logError("plugins.initialize", error, { plugin: describePlugin(plugin) });
          throw PluginInternalError.from(error, `Failed to initialize ${name}`);
        } finally {
          lease.revoke();
        }
      }

      logInfo("plugins.enabled", { plugin: describePlugin(plugin) });
      return { plugin, created: true };
    });
  }

  async disable(community: CommunityRef, name: string, lookup: PluginLookup = {}): Promise<PluginInstance> {
    const plugin = this.get(community, name, lookup);
    return this.options.locks.run(this.lockKeyFor(plugin), () => {
      this.deleteRow(plugin.id);
      logInfo("plugins.disabled", { plugin: describePlugin(plugin) });
      return plugin;
    });
  }

  /**
   * Resolve an instance. With no lookup fields, the community must have
   * exactly one instance of the plugin.
   */
  get(community: CommunityRef, name: string, lookup: PluginLookup = {}): PluginInstance {
    this.registry.require(name);

    if (lookup.id !== undefined) {
      const row = this.db
        .prepare(`${PLUGIN_SELECT} WHERE p.id = ? AND p.name = ? AND p.community_id = ?`)
        .get(lookup.id, name, community.id) as PluginRow | undefined;
      if (!row) throw new NotFoundError("plugin", `Plugin ${name} #${lookup.id} not enabled for '${community.slug}'`);
      return toInstance(row);
    }

    if (lookup.communityPlatformId) {
      const found = this.find(community, name, lookup.communityPlatformId);
      if (!found) {
        throw new NotFoundError(
          "plugin",
          `Plugin ${name} (${lookup.communityPlatformId}) not enabled for '${community.slug}'`,
        );
      }
      return found;
    }

    const rows = this.db
      .prepare(`${PLUGIN_SELECT} WHERE p.name = ? AND p.community_id = ? ORDER BY p.id`)
      .all(name, community.id) as PluginRow[];
    if (rows.length === 0) throw new NotFoundError("plugin", `Plugin ${name} not enabled for '${community.slug}'`);
    if (rows.length > 1) {
      throw new NotFoundError(
        "plugin",
        `Plugin ${name} has ${rows.length} instances in '${community.slug}'; specify a communityPlatformId`,
      );
    }
    return toInstance(rows[0]);
  }

  requireById(id: number): PluginInstance {
    const row = this.db.prepare(`${PLUGIN_SELECT} WHERE p.id = ?`).get(id) as PluginRow | undefined;
    if (!row) throw new NotFoundError("plugin", `Plugin instance ${id} not found`);
    return toInstance(row);
  }

  list(community: CommunityRef): PluginInstance[] {
    const rows = this.db
      .prepare(`${PLUGIN_SELECT} WHERE p.community_id = ? ORDER BY p.id`)
      .all(community.id) as PluginRow[];
    return rows.map(toInstance);
  }

  /** Key under which enable, disable and actions on one instance are serialized. */
  lockKeyFor(instance: PluginInstance): string {
    return pluginLockKey(instance.communityId, instance.name, instance.communityPlatformId);
  }

  /**
   * The capabilities handed to one hook or action handler of this instance.
   * Every write checks the lease first.
   */
  contextFor(instance: PluginInstance, lease: HookLease): PluginContext {
    const { identity, events } = this.options;
    const assertWritable = (): void => lease.assertActive();
    return {
      instance,
      state: new StateStore(this.db, instance.stateId, assertWritable),
      addLinkedAccount: (input) => {
        assertWritable();
        return serializeLinkedAccount(identity.addLinkedAccount(instance, input));
      },
      sendEventToDriver: async (eventType, data, initiator) => {
        assertWritable();
        await events.emit({ community: instance.communitySlug, source: instance.name, eventType, data, initiator });
      },
    };
  }

  serialize(instance: PluginInstance): SerializedPlugin {
    return {
      id: instance.id,
      name: instance.name,
      community: instance.communitySlug,
      communityPlatformId: instance.communityPlatformId,
      authType: this.registry.require(instance.name).authType,
      config: instance.config,
    };
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private validateConfig(descriptor: PluginDescriptor, rawConfig: unknown): JsonObject {
    let value: unknown = rawConfig ?? {};
    if (descriptor.configSchema) {
      const parsed = descriptor.configSchema.safeParse(value);
      if (!parsed.success) {
        throw new InvalidParametersError(`config for ${descriptor.name}`, toViolations(parsed.error.issues));
      }
      value = parsed.data;
    }
    const config = toJsonObject(value);
    if (!config) {
      throw new InvalidParametersError(`config for ${descriptor.name}`, [
        { path: "(root)", message: "Expected an object" },
      ]);
    }
    return config;
  }

  private extractCommunityPlatformId(descriptor: PluginDescriptor, config: JsonObject): string | null {
    if (!descriptor.communityPlatformIdKey) return null;
    const value = config[descriptor.communityPlatformIdKey];
    if (typeof value === "string" && value.trim()) return value.trim();
    if (typeof value === "number") return String(value);
    return null;
  }

  private find(community: CommunityRef, name: string, communityPlatformId: string | null): PluginInstance | null {
    const row = this.db
      .prepare(`${PLUGIN_SELECT}
        WHERE p.name = ? AND p.community_id = ? AND IFNULL(p.community_platform_id, '') = IFNULL(?, '')`)
      .get(name, community.id, communityPlatformId) as PluginRow | undefined;
    return row ? toInstance(row) : null;
  }

  private deleteRow(id: number): void {
    this.db.prepare("DELETE FROM plugins WHERE id = ?").run(id);
  }
}
