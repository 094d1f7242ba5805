// ── Community + plugin instance routes ──────────────────────────────────────
//
//   POST   /api/communities                     create
//   GET    /api/communities                     list
//   GET    /api/communities/:slug               one community with its plugins
//   PATCH  /api/communities/:slug               rename
//   DELETE /api/communities/:slug               delete (cascades)
//   GET    /api/plugins                         registered plugin types
//   GET    /api/communities/:slug/plugins       enabled instances
//   POST   /api/communities/:slug/plugins/:type enable or reconfigure
//   DELETE /api/communities/:slug/plugins/:type disable (?communityPlatformId= | ?id=)
//
import express from "express";
import { z } from "zod";
import type { GovernanceCore } from "../../engine/core.js";
import type { PluginLookup } from "../../engine/pluginManager.js";
import { getCorrelationId, handle, logServerInfo, parseId, parseRequest, sendData } from "../serverMiddleware.js";

const createCommunitySchema = z.object({
  slug: z.string().trim().min(1).max(128).regex(/^[A-Za-z0-9_-]+$/).optional(),
  readableName: z.string().max(256).optional(),
});

const updateCommunitySchema = z.object({
  readableName: z.string().max(256),
});

export type CommunityRouteOptions = {
  core: GovernanceCore;
};

/** `?communityPlatformId=` or `?id=`; both absent means "the only instance". */
export function pluginLookupFromQuery(query: express.Request["query"]): PluginLookup {
  const lookup: PluginLookup = {};
  if (typeof query.communityPlatformId === "string" && query.communityPlatformId.trim()) {
    lookup.communityPlatformId = query.communityPlatformId.trim();
  }
  const id = parseId(query.id);
  if (id !== null) lookup.id = id;
  return lookup;
}

export function createCommunityRoutes(opts: CommunityRouteOptions): express.Router {
  const router = express.Router();
  const { core } = opts;

  // ── Communities ─────────────────────────────────────────────────────

  router.post("/communities", handle((req, res) => {
    const input = parseRequest(createCommunitySchema, req.body);
    if (input.slug && core.communities.findBySlug(input.slug)) {
      res.status(409).json({
        success: false,
        correlationId: getCorrelationId(res),
        error: `Community '${input.slug}' already exists`,
      });
      return;
    }
    const community = core.communities.create(input);
    logServerInfo("communities.created", getCorrelationId(res), { community: community.slug });
    sendData(res, community, 201);
  }));

  router.get("/communities", handle((_req, res) => {
    sendData(res, { communities: core.communities.list() });
  }));

  router.get("/communities/:slug", handle((req, res) => {
    const community = core.communities.require(req.params.slug);
    const plugins = core.plugins.list(community).map((plugin) => core.plugins.serialize(plugin));
    sendData(res, { ...community, plugins });
  }));

  router.patch("/communities/:slug", handle((req, res) => {
    const changes = parseRequest(updateCommunitySchema, req.body);
    sendData(res, core.communities.update(req.params.slug, changes));
  }));

  router.delete("/communities/:slug", handle((req, res) => {
    core.communities.delete(req.params.slug);
    logServerInfo("communities.deleted", getCorrelationId(res), { community: req.params.slug });
    sendData(res, { deleted: req.params.slug });
  }));

  // ── Plugins ─────────────────────────────────────────────────────────

  router.get("/plugins", handle((_req, res) => {
    sendData(res, { plugins: core.registry.describe() });
  }));

  router.get("/communities/:slug/plugins", handle((req, res) => {
    const community = core.communities.require(req.params.slug);
    sendData(res, { plugins: core.plugins.list(community).map((plugin) => core.plugins.serialize(plugin)) });
  }));

  router.post("/communities/:slug/plugins/:type", handle(async (req, res) => {
    const community = core.communities.require(req.params.slug);
    const { plugin, created } = await core.plugins.enable(community, req.params.type, req.body);
    sendData(res, core.plugins.serialize(plugin), created ? 201 : 200);
  }));

  router.delete("/communities/:slug/plugins/:type", handle(async (req, res) => {
    const community = core.communities.require(req.params.slug);
    const plugin = await core.plugins.disable(community, req.params.type, pluginLookupFromQuery(req.query));
    sendData(res, core.plugins.serialize(plugin));
  }));

  return router;
}
