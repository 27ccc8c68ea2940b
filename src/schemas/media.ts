import { z } from "zod";
import { MEDIA_CATEGORIES } from "../types/entities";
import { httpUrlSchema, paginationQuerySchema, updateBody } from "./common";

export const mediaCategorySchema = z.enum(MEDIA_CATEGORIES);

const mediaFields = {
  title: z.string().min(1).max(255),
  description: z.string().nullable(),
  category: mediaCategorySchema,
  thumbnail_url: httpUrlSchema.nullable(),
  content_url: httpUrlSchema,
};

export const createMediaBodySchema = z
  .object({
    title: mediaFields.title,
    description: mediaFields.description.optional(),
    category: mediaFields.category,
    thumbnail_url: mediaFields.thumbnail_url.optional(),
    content_url: mediaFields.content_url,
  })
  .strict();

export const updateMediaBodySchema = updateBody({
  title: mediaFields.title.optional(),
  description: mediaFields.description.optional(),
  category: mediaFields.category.optional(),
  thumbnail_url: mediaFields.thumbnail_url.optional(),
  content_url: mediaFields.content_url.optional(),
});

export const MEDIA_SORT_FIELDS = [
  "title",
  "category",
  "created_at",
  "updated_at",
] as const;

export type MediaSortField = (typeof MEDIA_SORT_FIELDS)[number];

function toSortField(value: string | undefined): MediaSortField {
  return MEDIA_SORT_FIELDS.find((field) => field === value) ?? "created_at";
}

export const listMediaQuerySchema = paginationQuerySchema.extend({
  category: mediaCategorySchema.optional(),
  creator_id: z.string().min(1).optional(),
  search: z.string().optional(),
  // Unknown sort fields fall back to creation time instead of failing.
  sort_by: z.string().optional().transform(toSortField),
  order: z.enum(["asc", "desc"]).default("desc"),
});

export type CreateMediaBody = z.infer<typeof createMediaBodySchema>;
export type UpdateMediaBody = z.infer<typeof updateMediaBodySchema>;
export type ListMediaQuery = z.infer<typeof listMediaQuerySchema>;
