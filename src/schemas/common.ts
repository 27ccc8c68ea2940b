import { z } from "zod";
import { validationFailed } from "../utils/errors";

export const EMPTY_UPDATE_MESSAGE =
  "At least one field must be provided for update";

export const idParamsSchema = z.object({
  id: z.string().min(1),
});

export const paginationQuerySchema = z.object({
  page: z.coerce.number().int().min(1).optional(),
  per_page: z.coerce.number().int().min(1).optional(),
});

export const httpUrlSchema = z
  .string()
  .max(512)
  .url()
  .refine((value) => /^https?:\/\//i.test(value), {
    message: "URL must use http or https",
  });

/**
 * An absent body counts as an empty update, so both reach the
 * at-least-one-field rule instead of failing on type.
 */
export function updateBody<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess(
    (value) => (value === undefined || value === null ? {} : value),
    z
      .object(shape)
      .strict()
      .refine((value) => Object.keys(value).length > 0, {
        message: EMPTY_UPDATE_MESSAGE,
      })
  );
}

export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw validationFailed(result.error);
  }
  return result.data;
}

export type IdParams = z.infer<typeof idParamsSchema>;
export type PaginationQuery = z.infer<typeof paginationQuerySchema>;
