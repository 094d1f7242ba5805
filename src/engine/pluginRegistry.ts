// ── Plugin contract + registry ──────────────────────────────────────────────
//
// A plugin is a descriptor, not a subclass: a table of action handlers and a
// table of process types, each carrying its zod schemas and lifecycle hooks.
// Every integration module exports one descriptor; startup registers them
// all in a single pass and freezes the registry. Nothing registers later.
//
import type { z } from "zod";
import { DuplicateRegistrationError, NotFoundError, RegistryFrozenError } from "./errors.js";
import type { JsonObject, JsonValue, StateStore } from "./stateStore.js";
import type { AddLinkedAccountInput, LinkedAccountView } from "./identity.js";

// ── Types ───────────────────────────────────────────────────────────────────

export type AuthType = "none" | "api-key" | "oauth";

export type ProcessStatus = "created" | "pending" | "completed";

/** A configured integration for one community, as handed to hooks. */
export type PluginInstance = {
  id: number;
  name: string;
  communityId: number;
  communitySlug: string;
  config: JsonObject;
  communityPlatformId: string | null;
  stateId: number;
  createdAt: string;
  updatedAt: string;
};

/** Who triggered a platform event, as reported to the driver. */
export type EventInitiator = {
  userId?: string;
  provider?: string;
  isMetagovBot?: boolean;
  [key: string]: JsonValue | undefined;
};

/** Everything a plugin hook may touch. Bound to one plugin instance. */
export interface PluginContext {
  readonly instance: PluginInstance;
  readonly state: StateStore;
  /** Create or upgrade the linked account for a platform user of this instance. */
  addLinkedAccount(input: AddLinkedAccountInput): LinkedAccountView;
  sendEventToDriver(eventType: string, data: JsonObject, initiator: EventInitiator): Promise<void>;
}

/** Hook-facing view of one governance process. Hooks mutate fields, then call save(). */
export interface ProcessContext {
  readonly id: number;
  readonly name: string;
  readonly callbackUrl: string | null;
  readonly plugin: PluginContext;
  readonly state: StateStore;
  status: ProcessStatus;
  url: string | null;
  outcome: JsonObject;
  errors: JsonObject;
  save(): void;
}

export interface ActionDescriptor {
  description?: string;
  inputSchema?: z.ZodTypeAny;
  outputSchema?: z.ZodTypeAny;
  handler(plugin: PluginContext, parameters: unknown): unknown;
}

/**
 * One kind of long-running decision process. `start` is required; the other
 * hooks are optional. A missing `close` makes close() a NotSupported error;
 * a missing `receiveWebhook` or `update` is a no-op.
 */
export interface ProcessTypeDescriptor {
  description?: string;
  inputSchema?: z.ZodTypeAny;
  outcomeSchema?: z.ZodTypeAny;
  start(process: ProcessContext, parameters: unknown): Promise<void> | void;
  close?(process: ProcessContext): Promise<void> | void;
  receiveWebhook?(process: ProcessContext, payload: unknown): Promise<void> | void;
  update?(process: ProcessContext): Promise<void> | void;
}

export interface PluginDescriptor {
  readonly name: string;
  readonly description?: string;
  readonly authType: AuthType;
  readonly configSchema?: z.ZodTypeAny;
  /** Config field whose value becomes the instance's communityPlatformId. */
  readonly communityPlatformIdKey?: string;
  readonly actions: Readonly<Record<string, ActionDescriptor>>;
  readonly processes: Readonly<Record<string, ProcessTypeDescriptor>>;
  /** Runs once, right after the instance is first created. Not on re-enable. */
  initialize?(plugin: PluginContext): Promise<void> | void;
}

export type PluginSummary = {
  name: string;
  description: string | null;
  authType: AuthType;
  actions: Array<{ id: string; description: string | null }>;
  processes: Array<{ name: string; description: string | null }>;
};

// ── Registry ────────────────────────────────────────────────────────────────

export class PluginRegistry {
  private readonly descriptors = new Map<string, PluginDescriptor>();
  private frozen = false;

  register(descriptor: PluginDescriptor): void {
    if (this.frozen) throw new RegistryFrozenError(descriptor.name);
    if (this.descriptors.has(descriptor.name)) throw new DuplicateRegistrationError(descriptor.name);
    this.descriptors.set(
      descriptor.name,
      Object.freeze({
        ...descriptor,
        actions: Object.freeze({ ...descriptor.actions }),
        processes: Object.freeze({ ...descriptor.processes }),
      }),
    );
  }

  /** Seal the registry once startup registration is done. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get(name: string): PluginDescriptor | undefined {
    return this.descriptors.get(name);
  }

  require(name: string): PluginDescriptor {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) throw new NotFoundError("plugin", `Plugin '${name}' not found`);
    return descriptor;
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  listRegistered(): string[] {
    return Array.from(this.descriptors.keys());
  }

  describe(): PluginSummary[] {
    return Array.from(this.descriptors.values()).map((descriptor) => ({
      name: descriptor.name,
      description: descriptor.description ?? null,
      authType: descriptor.authType,
      actions: Object.entries(descriptor.actions).map(([id, action]) => ({
        id,
        description: action.description ?? null,
      })),
      processes: Object.entries(descriptor.processes).map(([name, process]) => ({
        name,
        description: process.description ?? null,
      })),
    }));
  }
}

/** Register every descriptor in one pass and return the frozen registry. */
export function createPluginRegistry(descriptors: PluginDescriptor[]): PluginRegistry {
  const registry = new PluginRegistry();
  for (const descriptor of descriptors) {
    registry.register(descriptor);
  }
  return registry.freeze();
}
