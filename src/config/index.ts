import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const envSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),
    HTTP_HOST: z.string().default("0.0.0.0"),
    HTTP_PORT: z.coerce.number().int().positive().default(5000),
    HTTP_BODY_LIMIT: z.coerce.number().int().positive().default(1_048_576),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    DATABASE_PATH: z.string().min(1).default("data/media-share.sqlite"),
    JWT_SECRET_KEY: z.string().min(1, "JWT_SECRET_KEY is required"),
    JWT_ACCESS_TOKEN_EXPIRES: z.coerce.number().int().positive().default(3600),
    CORS_ORIGIN: z
      .string()
      .optional()
      .transform((value) =>
        value && value.trim().length > 0 ? value : "*"
      ),
    DEFAULT_PAGE_SIZE: z.coerce.number().int().positive().default(10),
    MAX_PAGE_SIZE: z.coerce.number().int().positive().default(100),
  })
  .refine((env) => env.DEFAULT_PAGE_SIZE <= env.MAX_PAGE_SIZE, {
    message: "DEFAULT_PAGE_SIZE must not exceed MAX_PAGE_SIZE",
    path: ["DEFAULT_PAGE_SIZE"],
  });

export type Env = z.infer<typeof envSchema>;

let cachedConfig: Env | null = null;

export function loadConfig(): Env {
  if (cachedConfig) {
    return cachedConfig;
  }
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`MediaShareService configuration invalid: ${message}`);
  }
  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache() {
  cachedConfig = null;
}
