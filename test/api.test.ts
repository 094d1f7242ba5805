// ── HTTP boundary ───────────────────────────────────────────────────────────
//
// Drives the real routers through supertest against a core on a temp
// database. Outbound requests go to a recording fetch stand-in.
//
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type express from "express";
import request from "supertest";
import { createApp } from "../src/api/server.js";
import { builtInPlugins } from "../src/engine/plugins/index.js";
import { createSandboxPlugin } from "./fixtures/sandboxPlugin.js";
import { createFetchRecorder, createTestCore, type RecordedRequest, type TestCore } from "./helpers.js";

let ctx: TestCore;
let app: express.Express;
let requests: RecordedRequest[];

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  const recorder = createFetchRecorder();
  requests = recorder.requests;
  ctx = createTestCore({
    plugins: [...builtInPlugins, createSandboxPlugin().descriptor],
    fetchImpl: recorder.fetchImpl,
  });
  app = createApp(ctx.core);
});

afterEach(() => {
  vi.restoreAllMocks();
  ctx.cleanup();
});

async function withCommunity(slug = "riverside"): Promise<void> {
  await request(app).post("/api/communities").send({ slug, readableName: "Riverside Co-op" }).expect(201);
}

async function withSandbox(slug = "riverside"): Promise<void> {
  await withCommunity(slug);
  await request(app).post(`/api/communities/${slug}/plugins/sandbox`).send({}).expect(201);
}

describe("GET /health", () => {
  it("reports registered plugins and scheduler state", async () => {
    const res = await request(app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: "ok", plugins: ["poll", "sandbox"], scheduler: "stopped" });
  });
});

describe("envelope", () => {
  it("echoes a valid incoming correlation id", async () => {
    const res = await request(app).get("/api/communities").set("x-correlation-id", "corr-test-0001");
    expect(res.headers["x-correlation-id"]).toBe("corr-test-0001");
    expect(res.body).toEqual({ success: true, correlationId: "corr-test-0001", data: { communities: [] } });
  });

  it("rejects malformed JSON bodies", async () => {
    const res = await request(app)
      .post("/api/communities")
      .set("content-type", "application/json")
      .send("{not json");
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ success: false, error: "Invalid JSON body" });
  });

  it("answers unknown API routes with 404", async () => {
    const res = await request(app).get("/api/nowhere");
    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ success: false, error: "No route for GET /api/nowhere" });
  });
});

describe("communities", () => {
  it("creates, lists, renames and deletes a community", async () => {
    const created = await request(app).post("/api/communities").send({ slug: "riverside", readableName: "Riverside" });
    expect(created.status).toBe(201);
    expect(created.body.data).toMatchObject({ slug: "riverside", readableName: "Riverside" });

    const listed = await request(app).get("/api/communities");
    expect(listed.body.data.communities).toHaveLength(1);

    const renamed = await request(app).patch("/api/communities/riverside").send({ readableName: "Riverside Co-op" });
    expect(renamed.body.data.readableName).toBe("Riverside Co-op");

    await request(app).delete("/api/communities/riverside").expect(200);
    const missing = await request(app).get("/api/communities/riverside");
    expect(missing.status).toBe(404);
    expect(missing.body).toMatchObject({ success: false, code: "NotFound", error: "Community 'riverside' not found" });
  });

  it("rejects a duplicate slug with 409", async () => {
    await withCommunity();
    const res = await request(app).post("/api/communities").send({ slug: "riverside" });
    expect(res.status).toBe(409);
    expect(res.body.error).toBe("Community 'riverside' already exists");
  });

  it("validates the request body", async () => {
    const res = await request(app).post("/api/communities").send({ slug: "not a slug!" });
    expect(res.status).toBe(400);
    expect(res.body.code).toBe("InvalidParameters");
    expect(res.body.details.violations[0].path).toBe("slug");
  });
});

describe("plugins", () => {
  it("lists registered plugin types", async () => {
    const res = await request(app).get("/api/plugins");
    expect(res.body.data.plugins.map((p: { name: string }) => p.name)).toEqual(["poll", "sandbox"]);
  });

  it("enables, re-enables and disables an instance", async () => {
    await withCommunity();
    const first = await request(app).post("/api/communities/riverside/plugins/poll").send({ apiKey: "test-key", workspace: "ws-1" });
    expect(first.status).toBe(201);
    expect(first.body.data).toMatchObject({ name: "poll", communityPlatformId: "ws-1", authType: "api-key" });

    const again = await request(app).post("/api/communities/riverside/plugins/poll").send({ apiKey: "test-key-2", workspace: "ws-1" });
    expect(again.status).toBe(200);
    expect(again.body.data.id).toBe(first.body.data.id);

    const listed = await request(app).get("/api/communities/riverside/plugins");
    expect(listed.body.data.plugins).toHaveLength(1);

    await request(app).delete("/api/communities/riverside/plugins/poll?communityPlatformId=ws-1").expect(200);
    const after = await request(app).get("/api/communities/riverside/plugins");
    expect(after.body.data.plugins).toEqual([]);
  });

  it("maps an unknown plugin to 404 PluginNotFound", async () => {
    await withCommunity();
    const res = await request(app).post("/api/communities/riverside/plugins/ghost").send({});
    expect(res.status).toBe(404);
    expect(res.body.code).toBe("PluginNotFound");
  });
});

describe("actions", () => {
  it("performs an action and returns its result", async () => {
    await withSandbox();
    const res = await request(app).post("/api/communities/riverside/actions/sandbox/echo").send({ message: "hi", times: 2 });
    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({ echoed: "hihi" });
  });

  it("maps dispatcher errors onto statuses", async () => {
    await withSandbox();
    const invalid = await request(app).post("/api/communities/riverside/actions/sandbox/echo").send({});
    expect(invalid.status).toBe(400);
    expect(invalid.body.code).toBe("InvalidParameters");

    const unknown = await request(app).post("/api/communities/riverside/actions/sandbox/nope").send({});
    expect(unknown.status).toBe(404);
    expect(unknown.body.code).toBe("UnknownAction");

    const broken = await request(app).post("/api/communities/riverside/actions/sandbox/explode").send({});
    expect(broken.status).toBe(502);
    expect(broken.body).toMatchObject({ code: "PluginInternalError", error: "sandbox.explode: kaboom" });
  });
});

describe("processes", () => {
  const base = "/api/communities/riverside/processes/sandbox";

  it("starts, reads and closes a process", async () => {
    await withSandbox();
    const started = await request(app)
      .post(`${base}/ticket`)
      .send({ parameters: { subject: "Printer" }, callbackUrl: "https://driver.example.test/callback" });
    expect(started.status).toBe(201);
    expect(started.body.data).toMatchObject({ name: "ticket", plugin: "sandbox", community: "riverside", status: "pending" });
    const id: number = started.body.data.id;

    const fetched = await request(app).get(`${base}/ticket/${id}`);
    expect(fetched.body.data.outcome).toEqual({ subject: "Printer", priority: "normal" });

    const wrongType = await request(app).get(`${base}/no-close/${id}`);
    expect(wrongType.status).toBe(404);

    const closed = await request(app).delete(`${base}/ticket/${id}`);
    expect(closed.status).toBe(200);
    expect(closed.body.data.status).toBe("completed");
    expect(requests.map((r) => r.url)).toEqual(["https://driver.example.test/callback"]);
  });

  it("returns the start failure and keeps nothing", async () => {
    await withSandbox();
    const res = await request(app).post(`${base}/failing-start`).send({});
    expect(res.status).toBe(502);
    expect(res.body.error).toBe("sandbox.failing-start.start: external system rejected the request");
    const listed = await request(app).get(`${base}/failing-start`);
    expect(listed.body.data.processes).toEqual([]);
  });

  it("rejects closing a type without close", async () => {
    await withSandbox();
    const started = await request(app).post(`${base}/no-close`).send({});
    const res = await request(app).delete(`${base}/no-close/${started.body.data.id}`);
    expect(res.status).toBe(400);
    expect(res.body.code).toBe("NotSupported");
  });

  it("fans plugin webhooks out to pending processes", async () => {
    await withSandbox();
    const started = await request(app).post(`${base}/ticket`).send({ parameters: { subject: "Printer" } });
    const id: number = started.body.data.id;

    const res = await request(app).post("/api/webhooks/riverside/sandbox").send({ ticket: id, resolution: "fixed" });
    expect(res.body.data).toEqual({ offered: 1, failed: 0 });
    const fetched = await request(app).get(`${base}/ticket/${id}`);
    expect(fetched.body.data.status).toBe("completed");
  });
});

describe("identity", () => {
  it("mints ids, links accounts, merges and resolves users", async () => {
    await withCommunity();
    const minted = await request(app).post("/api/communities/riverside/identity/ids").send({ count: 2 });
    expect(minted.status).toBe(201);
    const [first, second]: number[] = minted.body.data.externalIds;

    await request(app)
      .post("/api/communities/riverside/identity/accounts")
      .send({ externalId: first, platformType: "chat", platformIdentifier: "ada" })
      .expect(201);
    await request(app)
      .post("/api/communities/riverside/identity/accounts")
      .send({ externalId: second, platformType: "forum", platformIdentifier: "ada-f", linkQuality: "strong-confirm" })
      .expect(201);

    const duplicate = await request(app)
      .post("/api/communities/riverside/identity/accounts")
      .send({ externalId: second, platformType: "chat", platformIdentifier: "ada" });
    expect(duplicate.status).toBe(409);
    expect(duplicate.body.code).toBe("DuplicateLink");

    const merged = await request(app).post("/api/identity/merge").send({ primaryExternalId: first, secondaryExternalId: second });
    expect(merged.status).toBe(200);
    expect(merged.body.data.externalId).toBe(first);
    expect(merged.body.data.linkedAccounts).toHaveLength(2);

    const again = await request(app).post("/api/identity/merge").send({ primaryExternalId: second, secondaryExternalId: first });
    expect(again.status).toBe(409);
    expect(again.body.code).toBe("IntegrityViolation");

    const user = await request(app).get(`/api/identity/${second}`);
    expect(user.body.data.externalId).toBe(first);

    const forum = await request(app).get(`/api/identity/${first}/accounts/forum`);
    expect(forum.body.data).toMatchObject({ platformIdentifier: "ada-f", linkQuality: "strong-confirm" });
  });

  it("returns 404 for an unknown external id", async () => {
    const res = await request(app).get("/api/identity/12345");
    expect(res.status).toBe(404);
    expect(res.body.code).toBe("NotFound");
  });
});
