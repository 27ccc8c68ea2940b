import { z } from "zod";

export const registerBodySchema = z
  .object({
    username: z.string().min(3).max(50),
    email: z.string().email().max(255),
    password: z.string().min(6),
  })
  .strict();

export const loginBodySchema = z
  .object({
    username: z.string().min(1),
    password: z.string().min(1),
  })
  .strict();

export type RegisterBody = z.infer<typeof registerBodySchema>;
export type LoginBody = z.infer<typeof loginBodySchema>;
