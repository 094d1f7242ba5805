// ── Governance core ─────────────────────────────────────────────────────────
//
// Wires the stores, engines and forwarder around one SQLite database. The
// HTTP layer and tests build exactly one of these and talk to its parts.
//
import { CommunityStore, type Community } from "./communityStore.js";
import { openDatabase, type SqliteDatabase } from "./database.js";
import { ActionDispatcher, type DispatchOptions } from "./actionDispatcher.js";
import { EventForwarder } from "./eventForwarder.js";
import { IdentityEngine } from "./identity.js";
import { KeyedLock } from "./keyedLock.js";
import { PluginInstanceManager, type PluginLookup } from "./pluginManager.js";
import { createPluginRegistry, PluginRegistry, type PluginDescriptor, type PluginInstance } from "./pluginRegistry.js";
import { GovernanceProcessEngine } from "./processEngine.js";
import { ProcessUpdateScheduler } from "./scheduler.js";

export type GovernanceCoreOptions = {
  dbPath: string;
  /** Descriptors to register, or an already frozen registry. */
  plugins: PluginDescriptor[] | PluginRegistry;
  receiverUrl?: string;
  outboundTimeoutMs?: number;
  hookTimeoutMs?: number;
  /** 0 disables the scheduler. */
  updateIntervalMs?: number;
  fetchImpl?: typeof fetch;
};

export type PerformActionOptions = DispatchOptions & PluginLookup;

export const DEFAULT_OUTBOUND_TIMEOUT_MS = 10_000;
export const DEFAULT_HOOK_TIMEOUT_MS = 30_000;

export class GovernanceCore {
  readonly db: SqliteDatabase;
  readonly registry: PluginRegistry;
  readonly locks = new KeyedLock();
  readonly communities: CommunityStore;
  readonly identity: IdentityEngine;
  readonly events: EventForwarder;
  readonly plugins: PluginInstanceManager;
  readonly actions: ActionDispatcher;
  readonly processes: GovernanceProcessEngine;
  readonly scheduler: ProcessUpdateScheduler;

  constructor(options: GovernanceCoreOptions) {
    const hookTimeoutMs = options.hookTimeoutMs ?? DEFAULT_HOOK_TIMEOUT_MS;

    this.db = openDatabase(options.dbPath);
    this.registry = options.plugins instanceof PluginRegistry ? options.plugins : createPluginRegistry(options.plugins);
    this.communities = new CommunityStore(this.db);
    this.identity = new IdentityEngine(this.db);
    this.events = new EventForwarder({
      receiverUrl: options.receiverUrl,
      timeoutMs: options.outboundTimeoutMs ?? DEFAULT_OUTBOUND_TIMEOUT_MS,
      fetchImpl: options.fetchImpl,
    });
    this.plugins = new PluginInstanceManager({
      db: this.db,
      registry: this.registry,
      identity: this.identity,
      events: this.events,
      locks: this.locks,
      hookTimeoutMs,
    });
    this.actions = new ActionDispatcher({
      registry: this.registry,
      plugins: this.plugins,
      locks: this.locks,
      hookTimeoutMs,
    });
    this.processes = new GovernanceProcessEngine({
      db: this.db,
      registry: this.registry,
      plugins: this.plugins,
      events: this.events,
      locks: this.locks,
      hookTimeoutMs,
    });
    this.scheduler = new ProcessUpdateScheduler({
      processes: this.processes,
      intervalMs: options.updateIntervalMs ?? 0,
    });
  }

  /** Resolve the community and its plugin instance in one step. */
  resolvePlugin(communitySlug: string, pluginName: string, lookup: PluginLookup = {}): {
    community: Community;
    plugin: PluginInstance;
  } {
    const community = this.communities.require(communitySlug);
    return { community, plugin: this.plugins.get(community, pluginName, lookup) };
  }

  async performAction(
    communitySlug: string,
    pluginName: string,
    actionId: string,
    parameters: unknown,
    options: PerformActionOptions = {},
  ): Promise<unknown> {
    const { plugin } = this.resolvePlugin(communitySlug, pluginName, {
      communityPlatformId: options.communityPlatformId,
      id: options.id,
    });
    return this.actions.dispatch(plugin, actionId, parameters, { validate: options.validate });
  }

  close(): void {
    this.scheduler.stop();
    this.db.close();
  }
}

export function createGovernanceCore(options: GovernanceCoreOptions): GovernanceCore {
  return new GovernanceCore(options);
}
