import type { ZodError } from "zod";

export type ApiErrorCode =
  | "VALIDATION_FAILED"
  | "DUPLICATE_IDENTITY"
  | "DUPLICATE_RATING"
  | "INVALID_CREDENTIALS"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "INTERNAL";

export type FieldErrors = Record<string, string[]>;

const STATUS_BY_CODE: Record<ApiErrorCode, number> = {
  VALIDATION_FAILED: 400,
  DUPLICATE_IDENTITY: 400,
  DUPLICATE_RATING: 400,
  INVALID_CREDENTIALS: 401,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  INTERNAL: 500,
};

export const SCHEMA_ERROR_KEY = "_schema";

export class ApiError extends Error {
  constructor(
    public readonly code: ApiErrorCode,
    message: string,
    public readonly fieldErrors?: FieldErrors
  ) {
    super(message);
    this.name = "ApiError";
  }

  get statusCode(): number {
    return STATUS_BY_CODE[this.code];
  }
}

export function collectFieldErrors(error: ZodError): FieldErrors {
  const messages: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : SCHEMA_ERROR_KEY;
    const bucket = messages[key] ?? [];
    bucket.push(issue.message);
    messages[key] = bucket;
  }
  return messages;
}

export function validationFailed(error: ZodError): ApiError {
  return new ApiError(
    "VALIDATION_FAILED",
    "Validation failed",
    collectFieldErrors(error)
  );
}

export interface ErrorBody {
  error: string;
  messages?: FieldErrors;
}

export function toErrorBody(error: ApiError): ErrorBody {
  if (error.fieldErrors) {
    return { error: error.message, messages: error.fieldErrors };
  }
  return { error: error.message };
}
