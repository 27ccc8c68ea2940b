import type {
  Account,
  AccountSummary,
  MediaCategory,
  MediaEntryWithRelations,
  PaginatedResult,
  RatingWithRelations,
  ScoreDistribution,
} from "../types/entities";
import type { MediaStatsResult } from "../services/rating-service";

export interface AccountResponse {
  id: string;
  username: string;
  email?: string;
  rating_count: number;
  last_login: string | null;
  created_at: string;
  updated_at: string;
}

export interface MediaResponse {
  id: string;
  title: string;
  description: string | null;
  category: MediaCategory;
  thumbnail_url: string | null;
  content_url: string;
  creator_id: string;
  creator: AccountSummary;
  stats: {
    total_ratings: number;
    average_rating: number;
  };
  created_at: string;
  updated_at: string;
}

export interface RatingResponse {
  id: string;
  media_id: string;
  user_id: string;
  score: number;
  comment: string | null;
  user: AccountSummary;
  media: {
    id: string;
    title: string;
    category: MediaCategory;
  };
  created_at: string;
  updated_at: string;
}

export interface PaginationResponse {
  page: number;
  per_page: number;
  total_pages: number;
  total_items: number;
}

export interface MediaStatsResponse {
  media_id: string;
  media_title: string;
  stats: {
    total_ratings: number;
    average_rating: number;
    rating_distribution: ScoreDistribution;
  };
}

export function serializeAccount(
  account: Account,
  options: { includeEmail?: boolean } = {}
): AccountResponse {
  const response: AccountResponse = {
    id: account.id,
    username: account.username,
    rating_count: account.ratingCount,
    last_login: account.lastLogin,
    created_at: account.createdAt,
    updated_at: account.updatedAt,
  };
  if (options.includeEmail) {
    response.email = account.email;
  }
  return response;
}

export function serializeMediaEntry(
  entry: MediaEntryWithRelations
): MediaResponse {
  return {
    id: entry.id,
    title: entry.title,
    description: entry.description,
    category: entry.category,
    thumbnail_url: entry.thumbnailUrl,
    content_url: entry.contentUrl,
    creator_id: entry.creatorId,
    creator: { id: entry.creator.id, username: entry.creator.username },
    stats: {
      total_ratings: entry.stats.totalRatings,
      average_rating: entry.stats.averageRating,
    },
    created_at: entry.createdAt,
    updated_at: entry.updatedAt,
  };
}

export function serializeRating(rating: RatingWithRelations): RatingResponse {
  return {
    id: rating.id,
    media_id: rating.mediaId,
    user_id: rating.accountId,
    score: rating.score,
    comment: rating.comment,
    user: { id: rating.user.id, username: rating.user.username },
    media: {
      id: rating.media.id,
      title: rating.media.title,
      category: rating.media.category,
    },
    created_at: rating.createdAt,
    updated_at: rating.updatedAt,
  };
}

export function serializePagination<T>(
  page: PaginatedResult<T>
): PaginationResponse {
  return {
    page: page.page,
    per_page: page.perPage,
    total_pages: page.totalPages,
    total_items: page.totalItems,
  };
}

export function serializeMediaStats(result: MediaStatsResult): MediaStatsResponse {
  return {
    media_id: result.mediaId,
    media_title: result.mediaTitle,
    stats: {
      total_ratings: result.stats.totalRatings,
      average_rating: result.stats.averageRating,
      rating_distribution: { ...result.stats.distribution },
    },
  };
}
