import crypto from "node:crypto";
import { nowIso, type SqliteDatabase } from "./database.js";
import { NotFoundError } from "./errors.js";
import { logInfo } from "./log.js";

// ── Types ───────────────────────────────────────────────────────────────────

export type Community = {
  id: number;
  slug: string;
  readableName: string;
  createdAt: string;
};

/** The two fields other stores need to scope a row to a community. */
export type CommunityRef = Pick<Community, "id" | "slug">;

type CommunityRow = {
  id: number;
  slug: string;
  readable_name: string;
  created_at: string;
};

export type CreateCommunityInput = {
  slug?: string;
  readableName?: string;
};

function toCommunity(row: CommunityRow): Community {
  return {
    id: row.id,
    slug: row.slug,
    readableName: row.readable_name,
    createdAt: row.created_at,
  };
}

export function describeCommunity(community: Community): string {
  return community.readableName ? `${community.readableName} (${community.slug})` : community.slug;
}

// ── Store ───────────────────────────────────────────────────────────────────

/** Tenant boundary. Deleting a community cascades through every table that references it. */
export class CommunityStore {
  constructor(private readonly db: SqliteDatabase) {}

  create(input: CreateCommunityInput = {}): Community {
    const slug = (input.slug ?? "").trim() || crypto.randomUUID();
    const result = this.db
      .prepare("INSERT INTO communities (slug, readable_name, created_at) VALUES (?, ?, ?)")
      .run(slug, (input.readableName ?? "").trim(), nowIso());
    const community = this.requireById(Number(result.lastInsertRowid));
    logInfo("communities.created", { community: describeCommunity(community) });
    return community;
  }

  findBySlug(slug: string): Community | null {
    const row = this.db.prepare("SELECT * FROM communities WHERE slug = ?").get(slug) as CommunityRow | undefined;
    return row ? toCommunity(row) : null;
  }

  findById(id: number): Community | null {
    const row = this.db.prepare("SELECT * FROM communities WHERE id = ?").get(id) as CommunityRow | undefined;
    return row ? toCommunity(row) : null;
  }

  require(slug: string): Community {
    const community = this.findBySlug(slug);
    if (!community) throw new NotFoundError("community", `Community '${slug}' not found`);
    return community;
  }

  requireById(id: number): Community {
    const community = this.findById(id);
    if (!community) throw new NotFoundError("community", `Community ${id} not found`);
    return community;
  }

  list(): Community[] {
    const rows = this.db.prepare("SELECT * FROM communities ORDER BY id").all() as CommunityRow[];
    return rows.map(toCommunity);
  }

  update(slug: string, changes: { readableName?: string }): Community {
    const community = this.require(slug);
    if (changes.readableName !== undefined) {
      this.db
        .prepare("UPDATE communities SET readable_name = ? WHERE id = ?")
        .run(changes.readableName.trim(), community.id);
    }
    return this.requireById(community.id);
  }

  delete(slug: string): void {
    const community = this.require(slug);
    this.db.prepare("DELETE FROM communities WHERE id = ?").run(community.id);
    logInfo("communities.deleted", { community: describeCommunity(community) });
  }
}
