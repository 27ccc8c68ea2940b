export const MEDIA_CATEGORIES = ["game", "video", "artwork", "music"] as const;

export type MediaCategory = (typeof MEDIA_CATEGORIES)[number];

export function isMediaCategory(value: string): value is MediaCategory {
  return MEDIA_CATEGORIES.some((category) => category === value);
}

export interface Account {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  ratingCount: number;
  lastLogin: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface AccountSummary {
  id: string;
  username: string;
}

export interface MediaEntry {
  id: string;
  title: string;
  description: string | null;
  category: MediaCategory;
  thumbnailUrl: string | null;
  contentUrl: string;
  creatorId: string;
  createdAt: string;
  updatedAt: string;
}

export interface RatingSummary {
  totalRatings: number;
  averageRating: number;
}

export interface MediaEntryWithRelations extends MediaEntry {
  creator: AccountSummary;
  stats: RatingSummary;
}

export interface Rating {
  id: string;
  mediaId: string;
  accountId: string;
  score: number;
  comment: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface RatingWithRelations extends Rating {
  user: AccountSummary;
  media: {
    id: string;
    title: string;
    category: MediaCategory;
  };
}

export type ScoreDistribution = Record<"1" | "2" | "3" | "4" | "5", number>;

export interface MediaRatingStats extends RatingSummary {
  distribution: ScoreDistribution;
}

export interface PageRequest {
  page: number;
  perPage: number;
}

export interface PaginatedResult<T> {
  items: T[];
  page: number;
  perPage: number;
  totalItems: number;
  totalPages: number;
}
