import type { SqliteDatabase } from "../lib/database";
import type { MediaSortField } from "../schemas/media";
import {
  isMediaCategory,
  type MediaCategory,
  type MediaEntry,
  type MediaEntryWithRelations,
  type PageRequest,
  type PaginatedResult,
} from "../types/entities";
import { buildPage, pageOffset } from "../utils/pagination";

interface MediaRow {
  id: string;
  title: string;
  description: string | null;
  category: string;
  thumbnail_url: string | null;
  content_url: string;
  creator_id: string;
  created_at: string;
  updated_at: string;
}

interface MediaDetailRow extends MediaRow {
  creator_username: string;
  total_ratings: number;
  average_rating: number | null;
}

export interface CreateMediaInput {
  id: string;
  title: string;
  description: string | null;
  category: MediaCategory;
  thumbnailUrl: string | null;
  contentUrl: string;
  creatorId: string;
  createdAt: string;
}

export interface MediaChanges {
  title?: string;
  description?: string | null;
  category?: MediaCategory;
  thumbnailUrl?: string | null;
  contentUrl?: string;
}

export interface MediaListFilters {
  category?: MediaCategory;
  creatorId?: string;
  search?: string;
  sortBy: MediaSortField;
  order: "asc" | "desc";
}

const CHANGE_COLUMNS: ReadonlyArray<[keyof MediaChanges, string]> = [
  ["title", "title"],
  ["description", "description"],
  ["category", "category"],
  ["thumbnailUrl", "thumbnail_url"],
  ["contentUrl", "content_url"],
];

const DETAIL_SELECT = `
  SELECT m.*,
         a.username AS creator_username,
         COUNT(r.id) AS total_ratings,
         AVG(r.score) AS average_rating
    FROM media_entries m
    JOIN accounts a ON a.id = m.creator_id
    LEFT JOIN ratings r ON r.media_id = m.id`;

function toCategory(value: string): MediaCategory {
  if (!isMediaCategory(value)) {
    throw new Error(`Unknown media category in storage: ${value}`);
  }
  return value;
}

function toMediaEntry(row: MediaRow): MediaEntry {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    category: toCategory(row.category),
    thumbnailUrl: row.thumbnail_url,
    contentUrl: row.content_url,
    creatorId: row.creator_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toMediaWithRelations(row: MediaDetailRow): MediaEntryWithRelations {
  return {
    ...toMediaEntry(row),
    creator: { id: row.creator_id, username: row.creator_username },
    stats: {
      totalRatings: row.total_ratings,
      averageRating: row.average_rating ?? 0,
    },
  };
}

export class MediaRepository {
  constructor(private readonly db: SqliteDatabase) {}

  create(input: CreateMediaInput): MediaEntry {
    this.db
      .prepare(
        `INSERT INTO media_entries
           (id, title, description, category, thumbnail_url, content_url,
            creator_id, created_at, updated_at)
         VALUES (@id, @title, @description, @category, @thumbnailUrl,
                 @contentUrl, @creatorId, @createdAt, @createdAt)`
      )
      .run(input);
    return { ...input, updatedAt: input.createdAt };
  }

  findById(id: string): MediaEntry | null {
    const row = this.db
      .prepare<[string], MediaRow>("SELECT * FROM media_entries WHERE id = ?")
      .get(id);
    return row ? toMediaEntry(row) : null;
  }

  findDetailedById(id: string): MediaEntryWithRelations | null {
    const row = this.db
      .prepare<[string], MediaDetailRow>(
        `${DETAIL_SELECT} WHERE m.id = ? GROUP BY m.id`
      )
      .get(id);
    return row ? toMediaWithRelations(row) : null;
  }

  list(
    filters: MediaListFilters,
    page: PageRequest
  ): PaginatedResult<MediaEntryWithRelations> {
    const clauses: string[] = [];
    const params: unknown[] = [];

    if (filters.category) {
      clauses.push("m.category = ?");
      params.push(filters.category);
    }
    if (filters.creatorId) {
      clauses.push("m.creator_id = ?");
      params.push(filters.creatorId);
    }
    if (filters.search) {
      const needle = filters.search.toLowerCase();
      clauses.push(
        "(instr(casefold(m.title), ?) > 0 OR instr(casefold(m.description), ?) > 0)"
      );
      params.push(needle, needle);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const direction = filters.order === "asc" ? "ASC" : "DESC";

    const total = this.db
      .prepare<unknown[], { total: number }>(
        `SELECT COUNT(*) AS total FROM media_entries m ${where}`
      )
      .get(...params);
    const totalItems = total?.total ?? 0;

    const offset = pageOffset(page);
    if (offset >= totalItems) {
      return buildPage([], totalItems, page);
    }

    // rowid breaks ties between rows written in the same millisecond.
    const rows = this.db
      .prepare<unknown[], MediaDetailRow>(
        `${DETAIL_SELECT} ${where}
         GROUP BY m.id
         ORDER BY m.${filters.sortBy} ${direction}, m.rowid ${direction}
         LIMIT ? OFFSET ?`
      )
      .all(...params, page.perPage, offset);

    return buildPage(rows.map(toMediaWithRelations), totalItems, page);
  }

  update(id: string, changes: MediaChanges, updatedAt: string): void {
    const assignments: string[] = [];
    const params: unknown[] = [];
    for (const [key, column] of CHANGE_COLUMNS) {
      const value = changes[key];
      if (value === undefined) {
        continue;
      }
      assignments.push(`${column} = ?`);
      params.push(value);
    }
    assignments.push("updated_at = ?");
    params.push(updatedAt, id);

    this.db
      .prepare(
        `UPDATE media_entries SET ${assignments.join(", ")} WHERE id = ?`
      )
      .run(...params);
  }

  delete(id: string): boolean {
    const result = this.db
      .prepare("DELETE FROM media_entries WHERE id = ?")
      .run(id);
    return result.changes > 0;
  }

  deleteByCreator(creatorId: string): number {
    return this.db
      .prepare("DELETE FROM media_entries WHERE creator_id = ?")
      .run(creatorId).changes;
  }
}
