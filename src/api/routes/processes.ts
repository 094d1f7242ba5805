// ── Governance process routes ───────────────────────────────────────────────
//
//   POST   /api/communities/:slug/processes/:type/:processType       start
//   GET    /api/communities/:slug/processes/:type/:processType       list
//   GET    /api/communities/:slug/processes/:type/:processType/:id   one
//   DELETE /api/communities/:slug/processes/:type/:processType/:id   close
//   POST   /api/webhooks/:slug/:type                                 offer a webhook to pending processes
//
// Every route takes ?communityPlatformId= or ?id= to pick the plugin instance.
//
import express from "express";
import { z } from "zod";
import type { GovernanceCore } from "../../engine/core.js";
import { NotFoundError } from "../../engine/errors.js";
import { serializeProcess } from "../../engine/processEngine.js";
import {
  getCorrelationId,
  handle,
  logServerInfo,
  parseId,
  parseRequest,
  sendData,
  sendError,
} from "../serverMiddleware.js";
import { pluginLookupFromQuery } from "./communities.js";

const startProcessSchema = z.object({
  callbackUrl: z.string().url().max(2048).optional(),
  parameters: z.unknown().optional(),
});

export type ProcessRouteOptions = {
  core: GovernanceCore;
};

function requireProcessId(value: string): number {
  const id = parseId(value);
  if (id === null) throw new NotFoundError("process", `Process '${value}' not found`);
  return id;
}

export function createProcessRoutes(opts: ProcessRouteOptions): express.Router {
  const router = express.Router();
  const { core } = opts;

  router.post("/communities/:slug/processes/:type/:processType", handle(async (req, res) => {
    const { slug, type, processType } = req.params;
    const input = parseRequest(startProcessSchema, req.body);
    const { plugin } = core.resolvePlugin(slug, type, pluginLookupFromQuery(req.query));

    const started = await core.processes.startProcess(plugin, processType, input.parameters, {
      callbackUrl: input.callbackUrl,
    });
    if (!started.ok) {
      sendError(req, res, started.error);
      return;
    }
    logServerInfo("processes.request", getCorrelationId(res), {
      community: slug,
      process: `${type}.${processType}`,
      id: started.process.id,
    });
    sendData(res, serializeProcess(started.process), 201);
  }));

  router.get("/communities/:slug/processes/:type/:processType", handle((req, res) => {
    const { slug, type, processType } = req.params;
    const { plugin } = core.resolvePlugin(slug, type, pluginLookupFromQuery(req.query));
    sendData(res, { processes: core.processes.listProcesses(plugin, processType).map(serializeProcess) });
  }));

  router.get("/communities/:slug/processes/:type/:processType/:id", handle((req, res) => {
    const { slug, type, processType, id } = req.params;
    const { plugin } = core.resolvePlugin(slug, type, pluginLookupFromQuery(req.query));
    sendData(res, serializeProcess(core.processes.getProcess(plugin, processType, requireProcessId(id))));
  }));

  router.delete("/communities/:slug/processes/:type/:processType/:id", handle(async (req, res) => {
    const { slug, type, processType, id } = req.params;
    const { plugin } = core.resolvePlugin(slug, type, pluginLookupFromQuery(req.query));
    const process = core.processes.getProcess(plugin, processType, requireProcessId(id));
    sendData(res, serializeProcess(await core.processes.closeProcess(process.id)));
  }));

  router.post("/webhooks/:slug/:type", handle(async (req, res) => {
    const { slug, type } = req.params;
    const { plugin } = core.resolvePlugin(slug, type, pluginLookupFromQuery(req.query));
    const result = await core.processes.receivePluginWebhook(plugin, req.body ?? {});
    logServerInfo("webhooks.received", getCorrelationId(res), { community: slug, plugin: type, ...result });
    sendData(res, result);
  }));

  return router;
}
