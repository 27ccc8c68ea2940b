import { randomUUID } from "node:crypto";
import type { SqliteDatabase } from "../lib/database";
import { nowIso, withTransaction } from "../lib/database";
import { AccountRepository } from "../repositories/account-repository";
import { MediaRepository } from "../repositories/media-repository";
import {
  DUPLICATE_RATING_MESSAGE,
  RatingRepository,
  type RatingChanges,
} from "../repositories/rating-repository";
import { parseInput } from "../schemas/common";
import {
  createRatingBodySchema,
  listRatingsQuerySchema,
  updateRatingBodySchema,
} from "../schemas/ratings";
import type {
  MediaRatingStats,
  PaginatedResult,
  Rating,
  RatingWithRelations,
} from "../types/entities";
import { ApiError } from "../utils/errors";
import {
  resolvePageRequest,
  type PaginationLimits,
} from "../utils/pagination";

export type RatingServiceOptions = {
  db: SqliteDatabase;
  pagination: PaginationLimits;
  repository?: RatingRepository;
};

export interface MediaStatsResult {
  mediaId: string;
  mediaTitle: string;
  stats: MediaRatingStats;
}

/**
 * Mean of `sum / count` to two decimals, rounded from the exact value of the
 * double quotient with ties to even.
 */
export function meanToHundredths(sum: number, count: number): number {
  if (count === 0) {
    return 0;
  }
  const scaled = sum * 100;
  const floor = Math.floor(scaled / count);
  const remainder = scaled - floor * count;
  // A halfway quotient is exact in binary only when 25 divides its numerator
  // over 200; any other halfway rational lands just above or below it.
  if (remainder * 2 === count && (floor * 2 + 1) % 25 === 0) {
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }
  return Number((sum / count).toFixed(2));
}

export class RatingService {
  private readonly db: SqliteDatabase;
  private readonly pagination: PaginationLimits;
  private readonly accounts: AccountRepository;
  private readonly media: MediaRepository;
  private readonly ratings: RatingRepository;

  constructor(options: RatingServiceOptions) {
    this.db = options.db;
    this.pagination = options.pagination;
    this.accounts = new AccountRepository(options.db);
    this.media = new MediaRepository(options.db);
    this.ratings = options.repository ?? new RatingRepository(options.db);
  }

  create(accountId: string, body: unknown): RatingWithRelations {
    const input = parseInput(createRatingBodySchema, body);
    return withTransaction(this.db, () => {
      if (!this.accounts.findById(accountId)) {
        throw new ApiError("UNAUTHORIZED", "Account no longer exists");
      }
      if (!this.media.findById(input.media_id)) {
        throw new ApiError("NOT_FOUND", "Media content not found");
      }
      if (this.ratings.findByMediaAndAccount(input.media_id, accountId)) {
        throw new ApiError("DUPLICATE_RATING", DUPLICATE_RATING_MESSAGE);
      }

      // A concurrent insert that slipped past the check above surfaces
      // here as DUPLICATE_RATING from the unique constraint.
      const rating = this.ratings.create({
        id: randomUUID(),
        mediaId: input.media_id,
        accountId,
        score: input.score,
        comment: input.comment ?? null,
        createdAt: nowIso(),
      });
      this.accounts.adjustRatingCount(accountId, 1);
      return this.requireDetailed(rating.id);
    });
  }

  list(query: unknown): PaginatedResult<RatingWithRelations> {
    const filters = parseInput(listRatingsQuerySchema, query);
    return this.ratings.list(
      { mediaId: filters.media_id, accountId: filters.user_id },
      resolvePageRequest(filters, this.pagination)
    );
  }

  get(ratingId: string): RatingWithRelations {
    return this.requireDetailed(ratingId);
  }

  update(
    callerId: string,
    ratingId: string,
    body: unknown
  ): RatingWithRelations {
    return withTransaction(this.db, () => {
      this.requireOwned(callerId, ratingId, "update");
      const input = parseInput(updateRatingBodySchema, body);

      const changes: RatingChanges = {};
      if (input.score !== undefined) changes.score = input.score;
      if (input.comment !== undefined) changes.comment = input.comment;

      this.ratings.update(ratingId, changes, nowIso());
      return this.requireDetailed(ratingId);
    });
  }

  delete(callerId: string, ratingId: string): void {
    withTransaction(this.db, () => {
      const rating = this.requireOwned(callerId, ratingId, "delete");
      this.ratings.delete(ratingId);
      this.accounts.adjustRatingCount(rating.accountId, -1);
    });
  }

  statsForMedia(mediaId: string): MediaStatsResult {
    const entry = this.media.findById(mediaId);
    if (!entry) {
      throw new ApiError("NOT_FOUND", "Media content not found");
    }
    const tally = this.ratings.tallyForMedia(mediaId);
    return {
      mediaId: entry.id,
      mediaTitle: entry.title,
      stats: {
        totalRatings: tally.totalRatings,
        averageRating: meanToHundredths(tally.scoreSum, tally.totalRatings),
        distribution: tally.distribution,
      },
    };
  }

  private requireOwned(
    callerId: string,
    ratingId: string,
    action: "update" | "delete"
  ): Rating {
    const rating = this.ratings.findById(ratingId);
    if (!rating) {
      throw new ApiError("NOT_FOUND", "Rating not found");
    }
    if (rating.accountId !== callerId) {
      throw new ApiError(
        "FORBIDDEN",
        `Forbidden: You can only ${action} your own ratings`
      );
    }
    return rating;
  }

  private requireDetailed(ratingId: string): RatingWithRelations {
    const rating = this.ratings.findDetailedById(ratingId);
    if (!rating) {
      throw new ApiError("NOT_FOUND", "Rating not found");
    }
    return rating;
  }
}
