// ── Action dispatch ─────────────────────────────────────────────────────────
//
// Synchronous, schema-checked calls into a plugin instance:
//
//   resolve descriptor → find action → validate input → run handler → validate output
//
// Input that fails its schema never reaches the handler. Output that fails
// its schema is the integration's bug, reported as InvalidResult. Handlers on
// one plugin instance run one at a time, under the same lock as enable and
// disable.
//
import {
  InvalidParametersError,
  InvalidResultError,
  PluginInternalError,
  UnknownActionError,
  toViolations,
} from "./errors.js";
import type { KeyedLock } from "./keyedLock.js";
import { logInfo } from "./log.js";
import type { PluginInstanceManager } from "./pluginManager.js";
import type { ActionDescriptor, PluginInstance, PluginRegistry } from "./pluginRegistry.js";
import { HookLease, withTimeout } from "./timeout.js";

// ── Types ───────────────────────────────────────────────────────────────────

export type DispatchOptions = {
  /** Check parameters and result against the action's schemas. Default: true. */
  validate?: boolean;
};

export type ActionDispatcherOptions = {
  registry: PluginRegistry;
  plugins: PluginInstanceManager;
  locks: KeyedLock;
  hookTimeoutMs: number;
};

// ── Dispatcher ──────────────────────────────────────────────────────────────

export class ActionDispatcher {
  constructor(private readonly options: ActionDispatcherOptions) {}

  resolveAction(pluginName: string, actionId: string): ActionDescriptor {
    const descriptor = this.options.registry.require(pluginName);
    const action = Object.prototype.hasOwnProperty.call(descriptor.actions, actionId)
      ? descriptor.actions[actionId]
      : undefined;
    if (!action) {
      throw new UnknownActionError(pluginName, actionId, Object.keys(descriptor.actions));
    }
    return action;
  }

  async dispatch(
    plugin: PluginInstance,
    actionId: string,
    parameters: unknown,
    options: DispatchOptions = {},
  ): Promise<unknown> {
    const validate = options.validate ?? true;
    const action = this.resolveAction(plugin.name, actionId);
    const scope = `${plugin.name}.${actionId}`;

    let input: unknown = parameters ?? {};
    if (validate && action.inputSchema) {
      const parsed = action.inputSchema.safeParse(input);
      if (!parsed.success) {
        throw new InvalidParametersError(`parameters for ${scope}`, toViolations(parsed.error.issues));
      }
      input = parsed.data;
    }

    let result = await this.options.locks.run(this.options.plugins.lockKeyFor(plugin), async () => {
      // A disable may have won the lock first.
      const current = this.options.plugins.requireById(plugin.id);
      const lease = new HookLease(scope);
      try {
        return await withTimeout(
          action.handler(this.options.plugins.contextFor(current, lease), input),
          this.options.hookTimeoutMs,
          scope,
        );
      } catch (error) {
        throw PluginInternalError.from(error, scope);
      } finally {
        lease.revoke();
      }
    });

    if (validate && action.outputSchema) {
      const parsed = action.outputSchema.safeParse(result);
      if (!parsed.success) {
        throw new InvalidResultError(scope, toViolations(parsed.error.issues));
      }
      result = parsed.data;
    }

    logInfo("actions.performed", { action: scope, community: plugin.communitySlug, pluginId: plugin.id });
    return result;
  }
}
