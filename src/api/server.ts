// ── API server (orchestrator) ───────────────────────────────────────────────
//
// Wires the governance core into express. Each area lives in its own file:
//
//   startupConfig.ts      – env validation
//   serverMiddleware.ts   – correlation-id, logging, response envelope
//   routes/communities.ts – communities, plugin registry, plugin instances
//   routes/actions.ts     – synchronous plugin actions
//   routes/processes.ts   – governance processes and plugin webhooks
//   routes/identity.ts    – MetagovIds, linked accounts, merges
//
import express from "express";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createGovernanceCore, type GovernanceCore } from "../engine/core.js";
import { builtInPlugins } from "../engine/plugins/index.js";
import { createActionRoutes } from "./routes/actions.js";
import { createCommunityRoutes } from "./routes/communities.js";
import { createIdentityRoutes } from "./routes/identity.js";
import { createProcessRoutes } from "./routes/processes.js";
import { getCorrelationId, logServerError, sendError, withCorrelationId } from "./serverMiddleware.js";
import { loadConfig, StartupConfigError, type AppConfig } from "./startupConfig.js";

const __filename = fileURLToPath(import.meta.url);

// ── createApp ───────────────────────────────────────────────────────────────
export function createApp(core: GovernanceCore): express.Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(withCorrelationId);
  app.use(express.json({ limit: "2mb" }));

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      correlationId: getCorrelationId(res),
      plugins: core.registry.listRegistered(),
      scheduler: core.scheduler.running ? "running" : "stopped",
    });
  });

  app.use("/api", createCommunityRoutes({ core }));
  app.use("/api", createActionRoutes({ core }));
  app.use("/api", createProcessRoutes({ core }));
  app.use("/api", createIdentityRoutes({ core }));

  app.use("/api", (req, res) => {
    res.status(404).json({
      success: false,
      correlationId: getCorrelationId(res),
      error: `No route for ${req.method} ${req.originalUrl}`,
    });
  });

  // ── Global error handler ──────────────────────────────────────────────
  app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ success: false, correlationId: getCorrelationId(res), error: "Invalid JSON body" });
      return;
    }
    sendError(req, res, error);
  });

  return app;
}

// ── Standalone launcher ─────────────────────────────────────────────────────
function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof StartupConfigError) {
      // eslint-disable-next-line no-console
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

export function startServer(): void {
  // Validate env before anything touches the database
  const config = loadConfigOrExit();

  const core = createGovernanceCore({
    dbPath: config.GOVBRIDGE_DB_PATH,
    plugins: builtInPlugins,
    receiverUrl: config.DRIVER_EVENT_RECEIVER_URL,
    outboundTimeoutMs: config.OUTBOUND_TIMEOUT_MS,
    hookTimeoutMs: config.PLUGIN_HOOK_TIMEOUT_MS,
    updateIntervalMs: config.PROCESS_UPDATE_INTERVAL_MS,
  });
  core.scheduler.start();

  const app = createApp(core);
  const server = app.listen(config.PORT, () => {
    // eslint-disable-next-line no-console
    console.log(`Governance bridge running on http://localhost:${config.PORT}`);
  });

  const shutdown = (signal: string) => {
    server.close((error) => {
      if (error) logServerError("server.shutdown", signal, error);
      core.close();
      process.exit(error ? 1 : 0);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

if (process.argv[1] && path.resolve(process.argv[1]) === __filename) {
  startServer();
}
