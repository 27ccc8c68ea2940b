import { z } from "zod";
import { paginationQuerySchema, updateBody } from "./common";

const scoreSchema = z.number().int().min(1).max(5);
const commentSchema = z.string().nullable();

export const createRatingBodySchema = z
  .object({
    media_id: z.string().min(1),
    score: scoreSchema,
    comment: commentSchema.optional(),
  })
  .strict();

export const updateRatingBodySchema = updateBody({
  score: scoreSchema.optional(),
  comment: commentSchema.optional(),
});

export const listRatingsQuerySchema = paginationQuerySchema.extend({
  media_id: z.string().min(1).optional(),
  user_id: z.string().min(1).optional(),
});

export const mediaStatsParamsSchema = z.object({
  media_id: z.string().min(1),
});

export type CreateRatingBody = z.infer<typeof createRatingBodySchema>;
export type UpdateRatingBody = z.infer<typeof updateRatingBodySchema>;
export type ListRatingsQuery = z.infer<typeof listRatingsQuerySchema>;
