import type { SqliteDatabase } from "../lib/database";
import { isUniqueViolation } from "../lib/database";
import {
  isMediaCategory,
  type PageRequest,
  type PaginatedResult,
  type Rating,
  type RatingWithRelations,
  type ScoreDistribution,
} from "../types/entities";
import { ApiError } from "../utils/errors";
import { buildPage, pageOffset } from "../utils/pagination";

interface RatingRow {
  id: string;
  media_id: string;
  account_id: string;
  score: number;
  comment: string | null;
  created_at: string;
  updated_at: string;
}

interface RatingDetailRow extends RatingRow {
  username: string;
  media_title: string;
  media_category: string;
}

export interface CreateRatingInput {
  id: string;
  mediaId: string;
  accountId: string;
  score: number;
  comment: string | null;
  createdAt: string;
}

export interface RatingChanges {
  score?: number;
  comment?: string | null;
}

export interface RatingListFilters {
  mediaId?: string;
  accountId?: string;
}

export interface ScoreTally {
  totalRatings: number;
  scoreSum: number;
  distribution: ScoreDistribution;
}

export const DUPLICATE_RATING_MESSAGE = "You have already rated this content";

const DETAIL_SELECT = `
  SELECT r.*,
         a.username AS username,
         m.title    AS media_title,
         m.category AS media_category
    FROM ratings r
    JOIN accounts a      ON a.id = r.account_id
    JOIN media_entries m ON m.id = r.media_id`;

function toRating(row: RatingRow): Rating {
  return {
    id: row.id,
    mediaId: row.media_id,
    accountId: row.account_id,
    score: row.score,
    comment: row.comment,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toRatingWithRelations(row: RatingDetailRow): RatingWithRelations {
  if (!isMediaCategory(row.media_category)) {
    throw new Error(
      `Unknown media category in storage: ${row.media_category}`
    );
  }
  return {
    ...toRating(row),
    user: { id: row.account_id, username: row.username },
    media: {
      id: row.media_id,
      title: row.media_title,
      category: row.media_category,
    },
  };
}

function emptyDistribution(): ScoreDistribution {
  return { "1": 0, "2": 0, "3": 0, "4": 0, "5": 0 };
}

export class RatingRepository {
  constructor(private readonly db: SqliteDatabase) {}

  create(input: CreateRatingInput): Rating {
    try {
      this.db
        .prepare(
          `INSERT INTO ratings
             (id, media_id, account_id, score, comment, created_at, updated_at)
           VALUES (@id, @mediaId, @accountId, @score, @comment,
                   @createdAt, @createdAt)`
        )
        .run(input);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ApiError("DUPLICATE_RATING", DUPLICATE_RATING_MESSAGE);
      }
      throw error;
    }
    return { ...input, updatedAt: input.createdAt };
  }

  findById(id: string): Rating | null {
    const row = this.db
      .prepare<[string], RatingRow>("SELECT * FROM ratings WHERE id = ?")
      .get(id);
    return row ? toRating(row) : null;
  }

  findDetailedById(id: string): RatingWithRelations | null {
    const row = this.db
      .prepare<[string], RatingDetailRow>(`${DETAIL_SELECT} WHERE r.id = ?`)
      .get(id);
    return row ? toRatingWithRelations(row) : null;
  }

  findByMediaAndAccount(mediaId: string, accountId: string): Rating | null {
    const row = this.db
      .prepare<[string, string], RatingRow>(
        "SELECT * FROM ratings WHERE media_id = ? AND account_id = ?"
      )
      .get(mediaId, accountId);
    return row ? toRating(row) : null;
  }

  list(
    filters: RatingListFilters,
    page: PageRequest
  ): PaginatedResult<RatingWithRelations> {
    const clauses: string[] = [];
    const params: unknown[] = [];

    if (filters.mediaId) {
      clauses.push("r.media_id = ?");
      params.push(filters.mediaId);
    }
    if (filters.accountId) {
      clauses.push("r.account_id = ?");
      params.push(filters.accountId);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";

    const total = this.db
      .prepare<unknown[], { total: number }>(
        `SELECT COUNT(*) AS total FROM ratings r ${where}`
      )
      .get(...params);
    const totalItems = total?.total ?? 0;

    const offset = pageOffset(page);
    if (offset >= totalItems) {
      return buildPage([], totalItems, page);
    }

    const rows = this.db
      .prepare<unknown[], RatingDetailRow>(
        `${DETAIL_SELECT} ${where}
         ORDER BY r.created_at DESC, r.rowid DESC
         LIMIT ? OFFSET ?`
      )
      .all(...params, page.perPage, offset);

    return buildPage(rows.map(toRatingWithRelations), totalItems, page);
  }

  update(id: string, changes: RatingChanges, updatedAt: string): void {
    const assignments: string[] = [];
    const params: unknown[] = [];
    if (changes.score !== undefined) {
      assignments.push("score = ?");
      params.push(changes.score);
    }
    if (changes.comment !== undefined) {
      assignments.push("comment = ?");
      params.push(changes.comment);
    }
    assignments.push("updated_at = ?");
    params.push(updatedAt, id);

    this.db
      .prepare(`UPDATE ratings SET ${assignments.join(", ")} WHERE id = ?`)
      .run(...params);
  }

  delete(id: string): boolean {
    return this.db.prepare("DELETE FROM ratings WHERE id = ?").run(id)
      .changes > 0;
  }

  /** Removes every rating on a media entry and releases each rater's count. */
  deleteByMedia(mediaId: string): number {
    this.db
      .prepare(
        `UPDATE accounts
            SET rating_count = MAX(rating_count - (
                  SELECT COUNT(*) FROM ratings r
                   WHERE r.account_id = accounts.id AND r.media_id = @mediaId
                ), 0)
          WHERE id IN (SELECT account_id FROM ratings WHERE media_id = @mediaId)`
      )
      .run({ mediaId });
    return this.db
      .prepare("DELETE FROM ratings WHERE media_id = ?")
      .run(mediaId).changes;
  }

  /** Same as `deleteByMedia`, for every media entry the creator owns. */
  deleteByMediaCreator(creatorId: string): number {
    this.db
      .prepare(
        `UPDATE accounts
            SET rating_count = MAX(rating_count - (
                  SELECT COUNT(*) FROM ratings r
                    JOIN media_entries m ON m.id = r.media_id
                   WHERE r.account_id = accounts.id AND m.creator_id = @creatorId
                ), 0)
          WHERE id IN (
                SELECT r.account_id FROM ratings r
                  JOIN media_entries m ON m.id = r.media_id
                 WHERE m.creator_id = @creatorId)`
      )
      .run({ creatorId });
    return this.db
      .prepare(
        `DELETE FROM ratings
          WHERE media_id IN (SELECT id FROM media_entries WHERE creator_id = ?)`
      )
      .run(creatorId).changes;
  }

  deleteByAccount(accountId: string): number {
    return this.db
      .prepare("DELETE FROM ratings WHERE account_id = ?")
      .run(accountId).changes;
  }

  tallyForMedia(mediaId: string): ScoreTally {
    const rows = this.db
      .prepare<[string], { score: number; count: number }>(
        `SELECT score, COUNT(*) AS count
           FROM ratings
          WHERE media_id = ?
          GROUP BY score`
      )
      .all(mediaId);

    const distribution = emptyDistribution();
    let totalRatings = 0;
    let scoreSum = 0;
    for (const row of rows) {
      const bucket = String(row.score);
      if (
        bucket === "1" ||
        bucket === "2" ||
        bucket === "3" ||
        bucket === "4" ||
        bucket === "5"
      ) {
        distribution[bucket] = row.count;
      }
      totalRatings += row.count;
      scoreSum += row.score * row.count;
    }

    return { totalRatings, scoreSum, distribution };
  }
}
