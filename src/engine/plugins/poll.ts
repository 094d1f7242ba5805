// ── Poll integration ────────────────────────────────────────────────────────
//
// Reference plugin for a hosted polling service. It exercises every part of
// the plugin contract: config with a platform id, an initialize hook, an
// action that links accounts and emits an event, and a process type with all
// four lifecycle hooks. Tallying happens on the polling service; this side
// only records what it reports.
//
import { z } from "zod";
import type { JsonObject } from "../stateStore.js";
import type { PluginContext, PluginDescriptor, ProcessContext } from "../pluginRegistry.js";

// ── Schemas ─────────────────────────────────────────────────────────────────

export const pollConfigSchema = z.object({
  apiKey: z.string().trim().min(1),
  baseUrl: z.string().url().default("https://polls.example.test"),
  /** Workspace on the polling service; becomes the instance's communityPlatformId. */
  workspace: z.string().trim().min(1).optional(),
});

const linkQualitySchema = z.enum(["unknown", "unconfirmed", "weak-confirm", "strong-confirm"]);

export const registerVoterInput = z.object({
  userId: z.string().trim().min(1),
  displayName: z.string().trim().min(1).optional(),
  linkQuality: linkQualitySchema.default("unconfirmed"),
});

export const registerVoterOutput = z.object({
  externalId: z.number().int(),
  platformIdentifier: z.string(),
  linkQuality: linkQualitySchema,
});

export const voteParameters = z.object({
  title: z.string().trim().min(1),
  options: z.array(z.string().trim().min(1)).min(2).default(["yes", "no"]),
  closingAt: z.string().datetime().optional(),
});

export const voteOutcome = z.object({
  voteId: z.string(),
  result: z.string().nullable(),
  votes: z.record(z.number().int().nonnegative()),
  timedOut: z.boolean(),
});

const voteWebhook = z.object({
  voteId: z.string(),
  result: z.string().optional(),
  votes: z.record(z.number().int().nonnegative()).optional(),
});

type RegisterVoterInput = z.infer<typeof registerVoterInput>;
type VoteParameters = z.infer<typeof voteParameters>;

// ── Helpers ─────────────────────────────────────────────────────────────────

function baseUrlOf(plugin: PluginContext): string {
  const value = plugin.instance.config.baseUrl;
  return typeof value === "string" ? value.replace(/\/+$/, "") : "https://polls.example.test";
}

function nextVoteNumber(plugin: PluginContext): number {
  const current = plugin.state.get("voteCounter");
  return (typeof current === "number" ? current : 0) + 1;
}

function currentVotes(process: ProcessContext): JsonObject {
  const votes = process.outcome.votes;
  return typeof votes === "object" && votes !== null && !Array.isArray(votes) ? votes : {};
}

function complete(process: ProcessContext, timedOut: boolean): void {
  process.outcome = { ...process.outcome, timedOut };
  process.status = "completed";
  process.save();
}

// ── Descriptor ──────────────────────────────────────────────────────────────

export const pollPlugin: PluginDescriptor = {
  name: "poll",
  description: "Hosted polls: register voters and run votes",
  authType: "api-key",
  configSchema: pollConfigSchema,
  communityPlatformIdKey: "workspace",

  initialize(plugin: PluginContext) {
    plugin.state.set("voteCounter", 0);
  },

  actions: {
    "register-voter": {
      description: "Link a polling-service user to a participant",
      inputSchema: registerVoterInput,
      outputSchema: registerVoterOutput,
      async handler(plugin: PluginContext, input: RegisterVoterInput) {
        const customData: JsonObject = input.displayName ? { displayName: input.displayName } : {};
        const account = plugin.addLinkedAccount({
          platformIdentifier: input.userId,
          customData,
          linkType: "oauth",
          linkQuality: input.linkQuality,
        });
        await plugin.sendEventToDriver(
          "voter_registered",
          { externalId: account.externalId, userId: input.userId },
          { userId: input.userId, provider: "poll" },
        );
        return {
          externalId: account.externalId,
          platformIdentifier: account.platformIdentifier,
          linkQuality: account.linkQuality,
        };
      },
    },
  },

  processes: {
    vote: {
      description: "A single-question vote; the service reports the result by webhook",
      inputSchema: voteParameters,
      outcomeSchema: voteOutcome,

      start(process: ProcessContext, parameters: VoteParameters) {
        if (parameters.closingAt && Date.parse(parameters.closingAt) <= Date.now()) {
          throw new Error(`closingAt ${parameters.closingAt} has already passed`);
        }

        const voteNumber = nextVoteNumber(process.plugin);
        const voteId = `vote-${process.plugin.instance.id}-${voteNumber}`;
        process.state.set("voteId", voteId);
        process.state.set("title", parameters.title);
        process.state.set("options", parameters.options);
        if (parameters.closingAt) process.state.set("closingAt", parameters.closingAt);

        process.url = `${baseUrlOf(process.plugin)}/votes/${voteId}`;
        process.outcome = { voteId, result: null, votes: {}, timedOut: false };
        process.status = "pending";
        process.save();
        // Claimed only once the vote itself is saved.
        process.plugin.state.set("voteCounter", voteNumber);
      },

      receiveWebhook(process: ProcessContext, payload: unknown) {
        const parsed = voteWebhook.safeParse(payload);
        if (!parsed.success || parsed.data.voteId !== process.state.get("voteId")) return;

        const { result, votes } = parsed.data;
        process.outcome = {
          ...process.outcome,
          votes: votes ?? currentVotes(process),
          result: result ?? process.outcome.result ?? null,
        };
        if (result !== undefined) {
          complete(process, false);
          return;
        }
        process.save();
      },

      update(process: ProcessContext) {
        const closingAt = process.state.get("closingAt");
        if (typeof closingAt !== "string") return;
        if (Date.parse(closingAt) > Date.now()) return;
        complete(process, true);
      },

      close(process: ProcessContext) {
        complete(process, false);
      },
    },
  },
};
