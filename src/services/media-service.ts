import { randomUUID } from "node:crypto";
import type { SqliteDatabase } from "../lib/database";
import { nowIso, withTransaction } from "../lib/database";
import { AccountRepository } from "../repositories/account-repository";
import {
  MediaRepository,
  type MediaChanges,
} from "../repositories/media-repository";
import { RatingRepository } from "../repositories/rating-repository";
import { parseInput } from "../schemas/common";
import {
  createMediaBodySchema,
  listMediaQuerySchema,
  updateMediaBodySchema,
} from "../schemas/media";
import {
  MEDIA_CATEGORIES,
  type MediaCategory,
  type MediaEntry,
  type MediaEntryWithRelations,
  type PaginatedResult,
} from "../types/entities";
import { ApiError } from "../utils/errors";
import {
  resolvePageRequest,
  type PaginationLimits,
} from "../utils/pagination";

export type MediaServiceOptions = {
  db: SqliteDatabase;
  pagination: PaginationLimits;
};

export class MediaService {
  private readonly db: SqliteDatabase;
  private readonly pagination: PaginationLimits;
  private readonly accounts: AccountRepository;
  private readonly media: MediaRepository;
  private readonly ratings: RatingRepository;

  constructor(options: MediaServiceOptions) {
    this.db = options.db;
    this.pagination = options.pagination;
    this.accounts = new AccountRepository(options.db);
    this.media = new MediaRepository(options.db);
    this.ratings = new RatingRepository(options.db);
  }

  listCategories(): readonly MediaCategory[] {
    return MEDIA_CATEGORIES;
  }

  create(creatorId: string, body: unknown): MediaEntryWithRelations {
    const input = parseInput(createMediaBodySchema, body);
    return withTransaction(this.db, () => {
      if (!this.accounts.findById(creatorId)) {
        throw new ApiError("UNAUTHORIZED", "Account no longer exists");
      }
      const entry = this.media.create({
        id: randomUUID(),
        title: input.title,
        description: input.description ?? null,
        category: input.category,
        thumbnailUrl: input.thumbnail_url ?? null,
        contentUrl: input.content_url,
        creatorId,
        createdAt: nowIso(),
      });
      return this.requireDetailed(entry.id);
    });
  }

  list(query: unknown): PaginatedResult<MediaEntryWithRelations> {
    const filters = parseInput(listMediaQuerySchema, query);
    return this.media.list(
      {
        category: filters.category,
        creatorId: filters.creator_id,
        search: filters.search,
        sortBy: filters.sort_by,
        order: filters.order,
      },
      resolvePageRequest(filters, this.pagination)
    );
  }

  get(mediaId: string): MediaEntryWithRelations {
    return this.requireDetailed(mediaId);
  }

  update(
    callerId: string,
    mediaId: string,
    body: unknown
  ): MediaEntryWithRelations {
    return withTransaction(this.db, () => {
      this.requireOwned(callerId, mediaId, "update");
      const input = parseInput(updateMediaBodySchema, body);

      const changes: MediaChanges = {};
      if (input.title !== undefined) changes.title = input.title;
      if (input.description !== undefined) {
        changes.description = input.description;
      }
      if (input.category !== undefined) changes.category = input.category;
      if (input.thumbnail_url !== undefined) {
        changes.thumbnailUrl = input.thumbnail_url;
      }
      if (input.content_url !== undefined) {
        changes.contentUrl = input.content_url;
      }

      this.media.update(mediaId, changes, nowIso());
      return this.requireDetailed(mediaId);
    });
  }

  /** Deletes the entry's ratings first, then the entry itself. */
  delete(callerId: string, mediaId: string): { deletedRatings: number } {
    return withTransaction(this.db, () => {
      this.requireOwned(callerId, mediaId, "delete");
      const deletedRatings = this.ratings.deleteByMedia(mediaId);
      this.media.delete(mediaId);
      return { deletedRatings };
    });
  }

  // Existence is checked before ownership, so strangers see 404 before 403.
  private requireOwned(
    callerId: string,
    mediaId: string,
    action: "update" | "delete"
  ): MediaEntry {
    const entry = this.media.findById(mediaId);
    if (!entry) {
      throw new ApiError("NOT_FOUND", "Content not found");
    }
    if (entry.creatorId !== callerId) {
      throw new ApiError(
        "FORBIDDEN",
        `Forbidden: You can only ${action} your own content`
      );
    }
    return entry;
  }

  private requireDetailed(mediaId: string): MediaEntryWithRelations {
    const entry = this.media.findDetailedById(mediaId);
    if (!entry) {
      throw new ApiError("NOT_FOUND", "Content not found");
    }
    return entry;
  }
}
