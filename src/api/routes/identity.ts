// ── Identity routes ─────────────────────────────────────────────────────────
//
//   POST   /api/communities/:slug/identity/ids        mint MetagovIds
//   POST   /api/communities/:slug/identity/accounts   link an account to an id
//   DELETE /api/communities/:slug/identity/accounts   unlink (query identifies the account)
//   GET    /api/communities/:slug/identity/users      users, optionally by platform
//   GET    /api/identity/:externalId                  one user with every linked account
//   GET    /api/identity/:externalId/accounts/:platformType
//   POST   /api/identity/merge                        merge two ids' groups
//
import express from "express";
import { z } from "zod";
import type { GovernanceCore } from "../../engine/core.js";
import { NotFoundError } from "../../engine/errors.js";
import { LINK_QUALITY_ORDER, LINK_TYPES, serializeLinkedAccount } from "../../engine/identity.js";
import { toJsonObject } from "../../engine/stateStore.js";
import { getCorrelationId, handle, logServerInfo, parseId, parseRequest, sendData } from "../serverMiddleware.js";

const linkTypeSchema = z.enum(["oauth", "manual-admin", "email-matching", "unknown"]);
const linkQualitySchema = z.enum(["unknown", "unconfirmed", "weak-confirm", "strong-confirm"]);
const jsonObjectSchema = z.record(z.unknown()).transform((value) => toJsonObject(value) ?? {});

const createIdsSchema = z.object({
  count: z.number().int().min(1).max(100).default(1),
});

const linkAccountSchema = z.object({
  externalId: z.number().int().positive(),
  platformType: z.string().trim().min(1),
  platformIdentifier: z.string().trim().min(1),
  communityPlatformId: z.string().trim().min(1).optional(),
  customData: jsonObjectSchema.optional(),
  linkType: linkTypeSchema.optional(),
  linkQuality: linkQualitySchema.optional(),
});

const accountQuerySchema = z.object({
  platformType: z.string().trim().min(1),
  platformIdentifier: z.string().trim().min(1),
  communityPlatformId: z.string().trim().min(1).optional(),
});

const usersQuerySchema = z.object({
  platformType: z.string().trim().min(1).optional(),
  communityPlatformId: z.string().trim().min(1).optional(),
});

const mergeSchema = z.object({
  primaryExternalId: z.number().int().positive(),
  secondaryExternalId: z.number().int().positive(),
});

export type IdentityRouteOptions = {
  core: GovernanceCore;
};

function requireExternalId(value: string): number {
  const id = parseId(value);
  if (id === null) throw new NotFoundError("metagov-id", `No MetagovId with external id '${value}'`);
  return id;
}

export function createIdentityRoutes(opts: IdentityRouteOptions): express.Router {
  const router = express.Router();
  const { core } = opts;

  router.post("/communities/:slug/identity/ids", handle((req, res) => {
    const community = core.communities.require(req.params.slug);
    const { count } = parseRequest(createIdsSchema, req.body);
    const ids = core.identity.createIds(community, count);
    sendData(res, { externalIds: ids.map((id) => id.externalId) }, 201);
  }));

  router.post("/communities/:slug/identity/accounts", handle((req, res) => {
    const community = core.communities.require(req.params.slug);
    const input = parseRequest(linkAccountSchema, req.body);
    const account = core.identity.linkAccount(input.externalId, community, input.platformType, input.platformIdentifier, {
      communityPlatformId: input.communityPlatformId,
      customData: input.customData,
      linkType: input.linkType,
      linkQuality: input.linkQuality,
    });
    logServerInfo("identity.linked", getCorrelationId(res), {
      community: community.slug,
      platformType: account.platformType,
      externalId: account.externalId,
    });
    sendData(res, serializeLinkedAccount(account), 201);
  }));

  router.delete("/communities/:slug/identity/accounts", handle((req, res) => {
    const community = core.communities.require(req.params.slug);
    const query = parseRequest(accountQuerySchema, req.query, "query");
    const account = core.identity.unlinkAccount(
      community,
      query.platformType,
      query.platformIdentifier,
      query.communityPlatformId,
    );
    sendData(res, serializeLinkedAccount(account));
  }));

  router.get("/communities/:slug/identity/users", handle((req, res) => {
    const community = core.communities.require(req.params.slug);
    const filter = parseRequest(usersQuerySchema, req.query, "query");
    sendData(res, { users: core.identity.getUsers(community, filter) });
  }));

  router.get("/identity/link-options", handle((_req, res) => {
    sendData(res, { linkTypes: LINK_TYPES, linkQualities: LINK_QUALITY_ORDER });
  }));

  router.get("/identity/:externalId", handle((req, res) => {
    sendData(res, core.identity.getUser(requireExternalId(req.params.externalId)));
  }));

  router.get("/identity/:externalId/accounts/:platformType", handle((req, res) => {
    const communityPlatformId =
      typeof req.query.communityPlatformId === "string" ? req.query.communityPlatformId : undefined;
    sendData(
      res,
      core.identity.getLinkedAccount(
        requireExternalId(req.params.externalId),
        req.params.platformType,
        communityPlatformId,
      ),
    );
  }));

  router.post("/identity/merge", handle((req, res) => {
    const input = parseRequest(mergeSchema, req.body);
    const primary = core.identity.mergeIds(input.primaryExternalId, input.secondaryExternalId);
    logServerInfo("identity.merged", getCorrelationId(res), {
      primaryExternalId: primary.externalId,
      secondaryExternalId: input.secondaryExternalId,
    });
    sendData(res, core.identity.getUser(primary.externalId));
  }));

  return router;
}
