// ── Identity resolution ─────────────────────────────────────────────────────
//
// A MetagovId is the canonical node for one participant. Platform accounts
// (LinkedAccount rows) hang off a node; nodes that turn out to be the same
// person are merged into a link-group. Links are stored as an adjacency
// table keyed by internal id, in both directions, and a merged group is kept
// fully meshed so every member links directly to the group's primary.
//
// Invariant: in any group of two or more nodes exactly one has primary = 1.
// A node with no links is primary whatever its flag says.
//
import crypto from "node:crypto";
import type { CommunityRef } from "./communityStore.js";
import type { SqliteDatabase } from "./database.js";
import {
  DuplicateLinkError,
  IntegrityViolationError,
  NoPrimaryFoundError,
  NotFoundError,
} from "./errors.js";
import type { PluginInstance } from "./pluginRegistry.js";
import type { JsonObject } from "./stateStore.js";

// ── Types ───────────────────────────────────────────────────────────────────

export type LinkType = "oauth" | "manual-admin" | "email-matching" | "unknown";

export type LinkQuality = "unknown" | "unconfirmed" | "weak-confirm" | "strong-confirm";

/** Ascending confidence. */
export const LINK_QUALITY_ORDER: readonly LinkQuality[] = ["unknown", "unconfirmed", "weak-confirm", "strong-confirm"];

export const LINK_TYPES: readonly LinkType[] = ["oauth", "manual-admin", "email-matching", "unknown"];

export function qualityIsGreater(candidate: LinkQuality, existing: LinkQuality): boolean {
  return LINK_QUALITY_ORDER.indexOf(candidate) > LINK_QUALITY_ORDER.indexOf(existing);
}

export type MetagovId = {
  internalId: number;
  externalId: number;
  communityId: number;
  primary: boolean;
  linkedInternalIds: number[];
};

export type LinkedAccount = {
  id: number;
  internalId: number;
  externalId: number;
  communityId: number;
  communitySlug: string;
  communityPlatformId: string | null;
  platformType: string;
  platformIdentifier: string;
  customData: JsonObject;
  linkType: LinkType;
  linkQuality: LinkQuality;
};

/** What the driver and integrations see. The internal id never leaves the engine. */
export type LinkedAccountView = {
  externalId: number;
  community: string;
  communityPlatformId: string | null;
  platformType: string;
  platformIdentifier: string;
  customData: JsonObject;
  linkType: LinkType;
  linkQuality: LinkQuality;
};

export type UserView = {
  externalId: number;
  community: string;
  linkedAccounts: LinkedAccountView[];
};

export type AccountOptions = {
  communityPlatformId?: string | null;
  customData?: JsonObject;
  linkType?: LinkType;
  linkQuality?: LinkQuality;
};

export type AccountChanges = Pick<AccountOptions, "customData" | "linkType" | "linkQuality">;

export type AddLinkedAccountInput = {
  platformIdentifier: string;
  externalId?: number;
  customData?: JsonObject;
  linkType?: LinkType;
  linkQuality?: LinkQuality;
};

export type UserFilter = {
  platformType?: string;
  communityPlatformId?: string | null;
};

type MetagovIdRow = {
  internal_id: number;
  external_id: number;
  community_id: number;
  is_primary: number;
};

type LinkedAccountRow = {
  id: number;
  internal_id: number;
  external_id: number;
  community_id: number;
  community_slug: string;
  community_platform_id: string | null;
  platform_type: string;
  platform_identifier: string;
  custom_data_json: string;
  link_type: LinkType;
  link_quality: LinkQuality;
};

// ── Helpers ─────────────────────────────────────────────────────────────────

const MAX_ID = 2_147_483_647;

const ACCOUNT_SELECT = `
  SELECT la.*, m.external_id, c.slug AS community_slug
  FROM linked_accounts la
  JOIN metagov_ids m ON m.internal_id = la.internal_id
  JOIN communities c ON c.id = la.community_id
`;

function normalizePlatformId(value: string | null | undefined): string | null {
  const trimmed = (value ?? "").trim();
  return trimmed || null;
}

function toLinkedAccount(row: LinkedAccountRow): LinkedAccount {
  return {
    id: row.id,
    internalId: row.internal_id,
    externalId: row.external_id,
    communityId: row.community_id,
    communitySlug: row.community_slug,
    communityPlatformId: row.community_platform_id,
    platformType: row.platform_type,
    platformIdentifier: row.platform_identifier,
    customData: JSON.parse(row.custom_data_json) as JsonObject,
    linkType: row.link_type,
    linkQuality: row.link_quality,
  };
}

export function serializeLinkedAccount(account: LinkedAccount): LinkedAccountView {
  return {
    externalId: account.externalId,
    community: account.communitySlug,
    communityPlatformId: account.communityPlatformId,
    platformType: account.platformType,
    platformIdentifier: account.platformIdentifier,
    customData: account.customData,
    linkType: account.linkType,
    linkQuality: account.linkQuality,
  };
}

export function isPrimary(node: MetagovId): boolean {
  return node.primary || node.linkedInternalIds.length === 0;
}

// ── Engine ──────────────────────────────────────────────────────────────────

export class IdentityEngine {
  constructor(private readonly db: SqliteDatabase) {}

  // ── MetagovIds ──────────────────────────────────────────────────────────

  /** Mint one fresh, unlinked, primary MetagovId. */
  createId(community: CommunityRef): MetagovId {
    const [created] = this.createIds(community, 1);
    return created;
  }

  createIds(community: CommunityRef, count: number): MetagovId[] {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`count must be a positive integer, got ${count}`);
    }
    const mint = this.db.transaction(() => {
      const created: number[] = [];
      for (let i = 0; i < count; i++) {
        const internalId = this.unusedId("internal_id");
        const externalId = this.unusedId("external_id");
        this.db
          .prepare("INSERT INTO metagov_ids (internal_id, external_id, community_id, is_primary) VALUES (?, ?, ?, 1)")
          .run(internalId, externalId, community.id);
        created.push(internalId);
      }
      return created;
    });
    return mint().map((internalId) => this.requireByInternalId(internalId));
  }

  findByExternalId(externalId: number): MetagovId | null {
    const row = this.db
      .prepare("SELECT * FROM metagov_ids WHERE external_id = ?")
      .get(externalId) as MetagovIdRow | undefined;
    return row ? this.toMetagovId(row) : null;
  }

  requireByExternalId(externalId: number): MetagovId {
    const node = this.findByExternalId(externalId);
    if (!node) throw new NotFoundError("metagov-id", `No MetagovId with external id ${externalId}`);
    return node;
  }

  /** The node itself if it is primary, otherwise the primary among its direct links. */
  getPrimaryId(node: MetagovId): MetagovId {
    if (isPrimary(node)) return node;
    for (const linkedId of node.linkedInternalIds) {
      const linked = this.requireByInternalId(linkedId);
      if (isPrimary(linked)) return linked;
    }
    throw new NoPrimaryFoundError(node.externalId);
  }

  /** Every node reachable from `node` through links, including itself. */
  getGroup(node: MetagovId): MetagovId[] {
    const seen = new Set<number>([node.internalId]);
    const queue = [node.internalId];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const next of this.linksOf(current)) {
        if (!seen.has(next)) {
          seen.add(next);
          queue.push(next);
        }
      }
    }
    return Array.from(seen).map((internalId) => this.requireByInternalId(internalId));
  }

  /**
   * Join the group of `secondaryExternalId` onto the group of
   * `primaryExternalId`. The first group keeps its primary; every node of
   * the second group is demoted. The combined group is re-checked before
   * commit and the whole merge is rolled back on any violation.
   */
  mergeIds(primaryExternalId: number, secondaryExternalId: number): MetagovId {
    const merge = this.db.transaction(() => {
      const primaryNode = this.requireByExternalId(primaryExternalId);
      const secondaryNode = this.requireByExternalId(secondaryExternalId);
      if (primaryNode.internalId === secondaryNode.internalId) {
        throw new IntegrityViolationError(`Cannot merge ${primaryExternalId} with itself`);
      }
      if (primaryNode.communityId !== secondaryNode.communityId) {
        throw new IntegrityViolationError(
          `Cannot merge ${primaryExternalId} and ${secondaryExternalId}: they belong to different communities`,
        );
      }

      const primaryGroup = this.getGroup(primaryNode);
      const secondaryGroup = this.getGroup(secondaryNode);
      const leader = this.getPrimaryId(primaryNode);

      const demote = this.db.prepare("UPDATE metagov_ids SET is_primary = 0 WHERE internal_id = ?");
      for (const member of secondaryGroup) {
        demote.run(member.internalId);
      }
      if (primaryGroup.length === 1) {
        this.db.prepare("UPDATE metagov_ids SET is_primary = 1 WHERE internal_id = ?").run(leader.internalId);
      }

      const members = Array.from(new Set([...primaryGroup, ...secondaryGroup].map((m) => m.internalId)));
      const link = this.db.prepare(
        "INSERT OR IGNORE INTO metagov_links (from_internal_id, to_internal_id) VALUES (?, ?)",
      );
      for (const from of members) {
        for (const to of members) {
          if (from !== to) link.run(from, to);
        }
      }

      this.assertGroupIntegrity(leader.internalId);
      return leader.internalId;
    });
    return this.requireByInternalId(merge.immediate());
  }

  /** Throws IntegrityViolation unless the group has exactly one primary flag (or is a single node). */
  assertGroupIntegrity(internalId: number): void {
    const group = this.getGroup(this.requireByInternalId(internalId));
    if (group.length < 2) return;
    const primaries = group.filter((member) => member.primary).length;
    if (primaries === 0) {
      throw new IntegrityViolationError("At least one linked ID must have 'primary' set to true", {
        externalIds: group.map((m) => m.externalId),
      });
    }
    if (primaries > 1) {
      throw new IntegrityViolationError("More than one linked ID has 'primary' set to true", {
        externalIds: group.map((m) => m.externalId),
      });
    }
  }

  // ── Linked accounts ─────────────────────────────────────────────────────

  findAccount(
    community: CommunityRef,
    platformType: string,
    platformIdentifier: string,
    communityPlatformId?: string | null,
  ): LinkedAccount | null {
    const row = this.db
      .prepare(`${ACCOUNT_SELECT}
        WHERE la.community_id = ? AND la.platform_type = ? AND la.platform_identifier = ?
          AND IFNULL(la.community_platform_id, '') = IFNULL(?, '')`)
      .get(community.id, platformType, platformIdentifier, normalizePlatformId(communityPlatformId)) as
      | LinkedAccountRow
      | undefined;
    return row ? toLinkedAccount(row) : null;
  }

  retrieveAccount(
    community: CommunityRef,
    platformType: string,
    platformIdentifier: string,
    communityPlatformId?: string | null,
  ): LinkedAccount {
    const account = this.findAccount(community, platformType, platformIdentifier, communityPlatformId);
    if (!account) {
      throw new NotFoundError(
        "account",
        `No LinkedAccount for ${platformType} '${platformIdentifier}' in community ${community.slug}`,
      );
    }
    return account;
  }

  linkAccount(
    externalId: number,
    community: CommunityRef,
    platformType: string,
    platformIdentifier: string,
    options: AccountOptions = {},
  ): LinkedAccount {
    const link = this.db.transaction(() => {
      const node = this.requireByExternalId(externalId);
      if (node.communityId !== community.id) {
        throw new NotFoundError("metagov-id", `No MetagovId with external id ${externalId} in community ${community.slug}`);
      }
      const communityPlatformId = normalizePlatformId(options.communityPlatformId);
      if (this.findAccount(community, platformType, platformIdentifier, communityPlatformId)) {
        throw new DuplicateLinkError(
          `LinkedAccount already exists for ${platformType} '${platformIdentifier}' in community ${community.slug}`,
          { platformType, platformIdentifier, communityPlatformId },
        );
      }
      const result = this.db
        .prepare(`
          INSERT INTO linked_accounts (
            internal_id, community_id, community_platform_id, platform_type, platform_identifier,
            custom_data_json, link_type, link_quality
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          node.internalId,
          community.id,
          communityPlatformId,
          platformType,
          platformIdentifier,
          JSON.stringify(options.customData ?? {}),
          options.linkType ?? "unknown",
          options.linkQuality ?? "unknown",
        );
      return Number(result.lastInsertRowid);
    });
    return this.requireAccountById(link.immediate());
  }

  updateLinkedAccount(
    community: CommunityRef,
    platformType: string,
    platformIdentifier: string,
    communityPlatformId: string | null | undefined,
    changes: AccountChanges,
  ): LinkedAccount {
    const account = this.retrieveAccount(community, platformType, platformIdentifier, communityPlatformId);
    this.db
      .prepare("UPDATE linked_accounts SET custom_data_json = ?, link_type = ?, link_quality = ? WHERE id = ?")
      .run(
        JSON.stringify(changes.customData ?? account.customData),
        changes.linkType ?? account.linkType,
        changes.linkQuality ?? account.linkQuality,
        account.id,
      );
    return this.requireAccountById(account.id);
  }

  unlinkAccount(
    community: CommunityRef,
    platformType: string,
    platformIdentifier: string,
    communityPlatformId?: string | null,
  ): LinkedAccount {
    const account = this.retrieveAccount(community, platformType, platformIdentifier, communityPlatformId);
    this.db.prepare("DELETE FROM linked_accounts WHERE id = ?").run(account.id);
    return account;
  }

  /**
   * Upsert entrypoint used by plugins. An existing account is only rewritten
   * when the new link quality is strictly higher; otherwise it is returned
   * untouched. A missing account is created, minting a MetagovId when no
   * external id was given. Runs as one IMMEDIATE transaction, so two callers
   * racing on the same handle cannot both insert.
   */
  addLinkedAccount(plugin: PluginInstance, input: AddLinkedAccountInput): LinkedAccount {
    const community: CommunityRef = { id: plugin.communityId, slug: plugin.communitySlug };
    const upsert = this.db.transaction((): LinkedAccount => {
      const existing = this.findAccount(community, plugin.name, input.platformIdentifier, plugin.communityPlatformId);
      if (existing) {
        if (input.linkQuality && qualityIsGreater(input.linkQuality, existing.linkQuality)) {
          return this.updateLinkedAccount(
            community,
            plugin.name,
            input.platformIdentifier,
            plugin.communityPlatformId,
            { customData: input.customData, linkType: input.linkType, linkQuality: input.linkQuality },
          );
        }
        return existing;
      }
      const externalId = input.externalId ?? this.createId(community).externalId;
      return this.linkAccount(externalId, community, plugin.name, input.platformIdentifier, {
        communityPlatformId: plugin.communityPlatformId,
        customData: input.customData,
        linkType: input.linkType,
        linkQuality: input.linkQuality,
      });
    });
    return upsert.immediate();
  }

  // ── Users ───────────────────────────────────────────────────────────────

  /** The participant behind `externalId`: its primary id plus every account in its group. */
  getUser(externalId: number): UserView {
    const node = this.requireByExternalId(externalId);
    const primary = this.getPrimaryId(node);
    const group = this.getGroup(node);
    const placeholders = group.map(() => "?").join(", ");
    const rows = this.db
      .prepare(`${ACCOUNT_SELECT} WHERE la.internal_id IN (${placeholders}) ORDER BY la.id`)
      .all(...group.map((m) => m.internalId)) as LinkedAccountRow[];
    const community = this.db.prepare("SELECT slug FROM communities WHERE id = ?").get(primary.communityId) as
      | { slug: string }
      | undefined;
    return {
      externalId: primary.externalId,
      community: community?.slug ?? "",
      linkedAccounts: rows.map((row) => serializeLinkedAccount(toLinkedAccount(row))),
    };
  }

  /** Primary participants of a community, optionally narrowed to those with a matching account. */
  getUsers(community: CommunityRef, filter: UserFilter = {}): UserView[] {
    const conditions = ["m.community_id = ?"];
    const params: Array<string | number | null> = [community.id];
    if (filter.platformType) {
      conditions.push("la.platform_type = ?");
      params.push(filter.platformType);
    }
    if (filter.communityPlatformId !== undefined) {
      conditions.push("IFNULL(la.community_platform_id, '') = IFNULL(?, '')");
      params.push(normalizePlatformId(filter.communityPlatformId));
    }
    const join = filter.platformType || filter.communityPlatformId !== undefined ? "JOIN" : "LEFT JOIN";
    const rows = this.db
      .prepare(`
        SELECT DISTINCT m.external_id FROM metagov_ids m
        ${join} linked_accounts la ON la.internal_id = m.internal_id
        WHERE ${conditions.join(" AND ")}
        ORDER BY m.internal_id
      `)
      .all(...params) as Array<{ external_id: number }>;

    const users = new Map<number, UserView>();
    for (const row of rows) {
      const user = this.getUser(row.external_id);
      users.set(user.externalId, user);
    }
    return Array.from(users.values());
  }

  /** The account of one platform type held anywhere in the participant's group. */
  getLinkedAccount(externalId: number, platformType: string, communityPlatformId?: string | null): LinkedAccountView {
    const user = this.getUser(externalId);
    const wanted = normalizePlatformId(communityPlatformId);
    const match = user.linkedAccounts.find(
      (account) =>
        account.platformType === platformType && (communityPlatformId === undefined || account.communityPlatformId === wanted),
    );
    if (!match) {
      throw new NotFoundError("account", `No ${platformType} account linked to ${externalId}`);
    }
    return match;
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private unusedId(column: "internal_id" | "external_id"): number {
    const lookup = this.db.prepare(`SELECT 1 FROM metagov_ids WHERE ${column} = ?`);
    for (;;) {
      const candidate = crypto.randomInt(1, MAX_ID);
      if (lookup.get(candidate) === undefined) return candidate;
    }
  }

  private linksOf(internalId: number): number[] {
    const rows = this.db
      .prepare("SELECT to_internal_id FROM metagov_links WHERE from_internal_id = ? ORDER BY to_internal_id")
      .all(internalId) as Array<{ to_internal_id: number }>;
    return rows.map((row) => row.to_internal_id);
  }

  private toMetagovId(row: MetagovIdRow): MetagovId {
    return {
      internalId: row.internal_id,
      externalId: row.external_id,
      communityId: row.community_id,
      primary: row.is_primary === 1,
      linkedInternalIds: this.linksOf(row.internal_id),
    };
  }

  private requireByInternalId(internalId: number): MetagovId {
    const row = this.db
      .prepare("SELECT * FROM metagov_ids WHERE internal_id = ?")
      .get(internalId) as MetagovIdRow | undefined;
    if (!row) throw new NotFoundError("metagov-id", `No MetagovId with internal id ${internalId}`);
    return this.toMetagovId(row);
  }

  private requireAccountById(id: number): LinkedAccount {
    const row = this.db.prepare(`${ACCOUNT_SELECT} WHERE la.id = ?`).get(id) as LinkedAccountRow | undefined;
    if (!row) throw new NotFoundError("account", `No LinkedAccount with id ${id}`);
    return toLinkedAccount(row);
  }
}
