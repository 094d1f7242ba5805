// ── Action routes ───────────────────────────────────────────────────────────
//
//   POST /api/communities/:slug/actions/:type/:actionId
//        body = action parameters; ?communityPlatformId= | ?id= picks the instance
//
import express from "express";
import type { GovernanceCore } from "../../engine/core.js";
import { getCorrelationId, handle, logServerInfo, sendData } from "../serverMiddleware.js";
import { pluginLookupFromQuery } from "./communities.js";

export type ActionRouteOptions = {
  core: GovernanceCore;
};

export function createActionRoutes(opts: ActionRouteOptions): express.Router {
  const router = express.Router();
  const { core } = opts;

  router.post("/communities/:slug/actions/:type/:actionId", handle(async (req, res) => {
    const { slug, type, actionId } = req.params;
    const result = await core.performAction(slug, type, actionId, req.body, pluginLookupFromQuery(req.query));
    logServerInfo("actions.request", getCorrelationId(res), { community: slug, action: `${type}.${actionId}` });
    sendData(res, result ?? null);
  }));

  return router;
}
