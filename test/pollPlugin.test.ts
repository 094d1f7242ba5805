import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { DriverEvent } from "../src/engine/eventForwarder.js";
import { InvalidParametersError } from "../src/engine/errors.js";
import type { PluginInstance } from "../src/engine/pluginRegistry.js";
import { builtInPlugins } from "../src/engine/plugins/index.js";
import type { GovernanceProcess } from "../src/engine/processEngine.js";
import { StateStore } from "../src/engine/stateStore.js";
import { createTestCore, type TestCore } from "./helpers.js";

let ctx: TestCore;
let plugin: PluginInstance;

async function startVote(parameters: unknown): Promise<GovernanceProcess> {
  const result = await ctx.core.processes.startProcess(plugin, "vote", parameters);
  if (!result.ok) throw result.error;
  return result.process;
}

beforeEach(async () => {
  ctx = createTestCore({ plugins: builtInPlugins });
  const community = ctx.core.communities.create({ slug: "riverside" });
  ({ plugin } = await ctx.core.plugins.enable(community, "poll", { apiKey: "test-key", workspace: "ws-1" }));
});

afterEach(() => {
  vi.useRealTimers();
  ctx.cleanup();
});

describe("poll plugin", () => {
  it("fills config defaults and takes the workspace as platform id", () => {
    expect(plugin.communityPlatformId).toBe("ws-1");
    expect(plugin.config).toEqual({ apiKey: "test-key", baseUrl: "https://polls.example.test", workspace: "ws-1" });
    expect(new StateStore(ctx.core.db, plugin.stateId).get("voteCounter")).toBe(0);
  });

  it("requires an api key", async () => {
    const community = ctx.core.communities.create({ slug: "hillside" });
    const error = await ctx.core.plugins.enable(community, "poll", {}).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(InvalidParametersError);
    expect(error).toMatchObject({ violations: [{ path: "apiKey", message: "Required" }] });
  });

  // ── register-voter ──────────────────────────────────────────────────────

  it("registers a voter as a linked account and tells the driver", async () => {
    const events: DriverEvent[] = [];
    ctx.core.events.onEvent((event) => events.push(event));

    const result = await ctx.core.performAction("riverside", "poll", "register-voter", {
      userId: "voter-1",
      displayName: "Ada",
    });

    const account = ctx.core.identity.retrieveAccount(
      ctx.core.communities.require("riverside"),
      "poll",
      "voter-1",
      "ws-1",
    );
    expect(result).toEqual({ externalId: account.externalId, platformIdentifier: "voter-1", linkQuality: "unconfirmed" });
    expect(account).toMatchObject({ linkType: "oauth", customData: { displayName: "Ada" } });
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      community: "riverside",
      source: "poll",
      eventType: "voter_registered",
      data: { externalId: account.externalId, userId: "voter-1" },
      initiator: { userId: "voter-1", provider: "poll" },
    });
  });

  // ── vote ────────────────────────────────────────────────────────────────

  it("starts votes with sequential ids and a default yes/no ballot", async () => {
    const first = await startVote({ title: "Adopt the budget" });
    const second = await startVote({ title: "Elect a chair", options: ["Ada", "Grace"] });

    expect(first.status).toBe("pending");
    expect(first.url).toBe(`https://polls.example.test/votes/vote-${plugin.id}-1`);
    expect(first.outcome).toEqual({ voteId: `vote-${plugin.id}-1`, result: null, votes: {}, timedOut: false });
    expect(new StateStore(ctx.core.db, first.stateId).get("options")).toEqual(["yes", "no"]);
    expect(second.url).toBe(`https://polls.example.test/votes/vote-${plugin.id}-2`);
  });

  it("rejects a ballot with fewer than two options", async () => {
    const result = await ctx.core.processes.startProcess(plugin, "vote", { title: "Pick one", options: ["only"] });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(InvalidParametersError);
  });

  it("records tallies and completes when the service reports a result", async () => {
    const vote = await startVote({ title: "Adopt the budget" });
    const voteId = `vote-${plugin.id}-1`;

    const tallied = await ctx.core.processes.receiveWebhook(vote.id, { voteId, votes: { yes: 2, no: 1 } });
    expect(tallied.status).toBe("pending");
    expect(tallied.outcome).toEqual({ voteId, result: null, votes: { yes: 2, no: 1 }, timedOut: false });

    const done = await ctx.core.processes.receiveWebhook(vote.id, { voteId, result: "yes" });
    expect(done.status).toBe("completed");
    expect(done.outcome).toEqual({ voteId, result: "yes", votes: { yes: 2, no: 1 }, timedOut: false });
  });

  it("ignores webhooks for other votes", async () => {
    const vote = await startVote({ title: "Adopt the budget" });
    const after = await ctx.core.processes.receiveWebhook(vote.id, { voteId: "vote-elsewhere", result: "no" });
    expect(after.status).toBe("pending");
    expect(after.outcome.result).toBeNull();
  });

  it("refuses a closingAt in the past without spending a vote number", async () => {
    await startVote({ title: "First" });
    const result = await ctx.core.processes.startProcess(plugin, "vote", {
      title: "Too late",
      closingAt: "2020-01-01T00:00:00Z",
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("poll.vote.start: closingAt 2020-01-01T00:00:00Z has already passed");
    expect(new StateStore(ctx.core.db, plugin.stateId).get("voteCounter")).toBe(1);

    const next = await startVote({ title: "Second" });
    expect(next.outcome.voteId).toBe(`vote-${plugin.id}-2`);
  });

  it("times out on update once closingAt has passed", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-05-01T00:00:00Z"));
    const open = await startVote({ title: "Later", closingAt: "2026-06-01T00:00:00Z" });
    const expired = await startVote({ title: "Earlier", closingAt: "2026-05-02T00:00:00Z" });

    vi.setSystemTime(new Date("2026-05-10T00:00:00Z"));
    expect((await ctx.core.processes.updateProcess(open.id)).status).toBe("pending");
    const timedOut = await ctx.core.processes.updateProcess(expired.id);
    expect(timedOut.status).toBe("completed");
    expect(timedOut.outcome).toMatchObject({ result: null, timedOut: true });
  });

  it("closes with the last reported result", async () => {
    const vote = await startVote({ title: "Adopt the budget" });
    const closed = await ctx.core.processes.closeProcess(vote.id);
    expect(closed.status).toBe("completed");
    expect(closed.outcome).toEqual({ voteId: `vote-${plugin.id}-1`, result: null, votes: {}, timedOut: false });
  });
});
