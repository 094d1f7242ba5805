// A plugin built for tests: every hook counts its calls, and dedicated
// actions and process types fail in each way the engine must handle.
import { z } from "zod";
import { GovernanceError } from "../../src/engine/errors.js";
import type { PluginContext, PluginDescriptor, ProcessContext } from "../../src/engine/pluginRegistry.js";

export type SandboxCalls = {
  initialize: number;
  echo: number;
  start: number;
  close: number;
  webhook: number;
  update: number;
  /** Codes of writes refused to hooks that outlived their timeout. */
  rejectedWrites: string[];
};

/** How long the slow hooks take; tests run them against a shorter hook timeout. */
export const SLOW_HOOK_MS = 200;

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const echoInput = z.object({
  message: z.string().min(1),
  times: z.number().int().min(1).default(1),
});

const ticketInput = z.object({
  subject: z.string().min(1),
  priority: z.enum(["low", "normal", "high"]).default("normal"),
});

const ticketWebhook = z.object({
  ticket: z.number().int(),
  resolution: z.string(),
});

type EchoInput = z.infer<typeof echoInput>;
type TicketInput = z.infer<typeof ticketInput>;

export function createSandboxPlugin(): { descriptor: PluginDescriptor; calls: SandboxCalls } {
  const calls: SandboxCalls = { initialize: 0, echo: 0, start: 0, close: 0, webhook: 0, update: 0, rejectedWrites: [] };

  const lateWrite = (write: () => void) => {
    try {
      write();
    } catch (error) {
      calls.rejectedWrites.push(error instanceof GovernanceError ? error.code : "unknown");
      throw error;
    }
  };

  const markPending = (process: ProcessContext) => {
    process.url = `https://sandbox.example.test/${process.name}/${process.id}`;
    process.status = "pending";
    process.save();
  };

  const descriptor: PluginDescriptor = {
    name: "sandbox",
    description: "Test integration",
    authType: "none",
    configSchema: z.object({
      team: z.string().optional(),
      failInitialize: z.boolean().default(false),
    }),
    communityPlatformIdKey: "team",

    initialize(plugin: PluginContext) {
      calls.initialize += 1;
      if (plugin.instance.config.failInitialize === true) {
        throw new Error("initialize exploded");
      }
      plugin.state.set("initialized", true);
    },

    actions: {
      echo: {
        description: "Repeat a message",
        inputSchema: echoInput,
        outputSchema: z.object({ echoed: z.string() }),
        handler(_plugin: PluginContext, input: EchoInput) {
          calls.echo += 1;
          return { echoed: input.message.repeat(input.times) };
        },
      },
      "broken-output": {
        outputSchema: z.object({ count: z.number() }),
        handler() {
          return { count: "many" };
        },
      },
      explode: {
        handler() {
          throw new Error("kaboom");
        },
      },
      slow: {
        handler() {
          return new Promise((resolve) => setTimeout(() => resolve({ done: true }), SLOW_HOOK_MS));
        },
      },
      "slow-write": {
        async handler(plugin: PluginContext) {
          await delay(SLOW_HOOK_MS);
          lateWrite(() => plugin.state.set("late", true));
          return { written: true };
        },
      },
      bump: {
        async handler(plugin: PluginContext) {
          const current = plugin.state.get("counter");
          const next = (typeof current === "number" ? current : 0) + 1;
          await delay(20);
          plugin.state.set("counter", next);
          return { counter: next };
        },
      },
      emit: {
        async handler(plugin: PluginContext) {
          await plugin.sendEventToDriver("thing_happened", { n: 1 }, { userId: "u-1", provider: "sandbox" });
          return { emitted: true };
        },
      },
    },

    processes: {
      ticket: {
        description: "Resolved by webhook or on update once flagged",
        inputSchema: ticketInput,
        outcomeSchema: z.object({ subject: z.string(), priority: z.string() }).passthrough(),
        start(process: ProcessContext, input: TicketInput) {
          calls.start += 1;
          process.outcome = { subject: input.subject, priority: input.priority };
          markPending(process);
        },
        close(process: ProcessContext) {
          calls.close += 1;
          process.outcome = { ...process.outcome, closedBy: "caller" };
          process.status = "completed";
          process.save();
        },
        receiveWebhook(process: ProcessContext, payload: unknown) {
          calls.webhook += 1;
          const parsed = ticketWebhook.safeParse(payload);
          if (!parsed.success || parsed.data.ticket !== process.id) return;
          process.outcome = { ...process.outcome, resolution: parsed.data.resolution };
          process.status = "completed";
          process.save();
        },
        update(process: ProcessContext) {
          calls.update += 1;
          if (process.state.get("resolveOnUpdate") !== true) return;
          process.outcome = { ...process.outcome, resolution: "timed out" };
          process.status = "completed";
          process.save();
        },
      },
      "failing-start": {
        start(process: ProcessContext) {
          process.state.set("attempted", true);
          throw new Error("external system rejected the request");
        },
      },
      "no-close": {
        start: markPending,
      },
      "bad-outcome": {
        outcomeSchema: z.object({ answer: z.number() }),
        start: markPending,
        close(process: ProcessContext) {
          process.outcome = { answer: "forty-two" };
          process.status = "completed";
          process.save();
        },
      },
      "slow-start": {
        async start(process: ProcessContext) {
          await delay(SLOW_HOOK_MS);
          lateWrite(() => {
            process.state.set("late", true);
            markPending(process);
          });
        },
      },
      "slow-close": {
        start: markPending,
        async close(process: ProcessContext) {
          await delay(SLOW_HOOK_MS);
          lateWrite(() => {
            process.outcome = { late: true };
            process.status = "completed";
            process.save();
          });
        },
      },
      "flaky-webhook": {
        start: markPending,
        receiveWebhook() {
          throw new Error("webhook handler crashed");
        },
      },
    },
  };

  return { descriptor, calls };
}
