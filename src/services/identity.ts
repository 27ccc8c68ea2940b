import { randomUUID } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import { z } from "zod";
import type { SqliteDatabase } from "../lib/database";
import { nowIso, withTransaction } from "../lib/database";
import { AccountRepository } from "../repositories/account-repository";
import type { Account } from "../types/entities";
import { ApiError } from "../utils/errors";
import { hashPassword, verifyPassword } from "../utils/password";

export type SignAccessToken = (accountId: string) => Promise<string>;
export type VerifyAccessToken = (token: string) => unknown;

export interface SessionResult {
  account: Account;
  accessToken: string;
}

const accessTokenPayloadSchema = z.object({
  sub: z.string().min(1),
});

export async function registerAccount(params: {
  db: SqliteDatabase;
  username: string;
  email: string;
  password: string;
  signAccessToken: SignAccessToken;
}): Promise<SessionResult> {
  const { db, username, email, password, signAccessToken } = params;
  const accounts = new AccountRepository(db);

  // Rechecked inside the transaction; the UNIQUE constraints decide races.
  assertIdentityAvailable(accounts, username, email);
  const passwordHash = await hashPassword(password);

  const account = withTransaction(db, () => {
    assertIdentityAvailable(accounts, username, email);
    return accounts.create({
      id: randomUUID(),
      username,
      email,
      passwordHash,
      createdAt: nowIso(),
    });
  });

  return { account, accessToken: await signAccessToken(account.id) };
}

function assertIdentityAvailable(
  accounts: AccountRepository,
  username: string,
  email: string
) {
  if (accounts.findByUsername(username)) {
    throw new ApiError("DUPLICATE_IDENTITY", "Username already exists");
  }
  if (accounts.findByEmail(email)) {
    throw new ApiError("DUPLICATE_IDENTITY", "Email already exists");
  }
}

export async function loginAccount(params: {
  db: SqliteDatabase;
  username: string;
  password: string;
  signAccessToken: SignAccessToken;
}): Promise<SessionResult> {
  const { db, username, password, signAccessToken } = params;
  const accounts = new AccountRepository(db);

  const existing = accounts.findByUsername(username);
  if (!existing || !(await verifyPassword(password, existing.passwordHash))) {
    throw new ApiError("INVALID_CREDENTIALS", "Invalid username or password");
  }

  const loggedInAt = nowIso();
  withTransaction(db, () => accounts.recordLogin(existing.id, loggedInAt));

  const account: Account = {
    ...existing,
    lastLogin: loggedInAt,
    updatedAt: loggedInAt,
  };
  return { account, accessToken: await signAccessToken(account.id) };
}

/**
 * Resolves the caller's account id from a bearer token. The token is the
 * only thing consulted: a deleted account's unexpired token still resolves.
 */
export function authenticateToken(params: {
  token: string | null;
  verifyAccessToken: VerifyAccessToken;
  logger: FastifyBaseLogger;
}): string {
  const { token, verifyAccessToken, logger } = params;
  if (!token) {
    throw new ApiError(
      "UNAUTHORIZED",
      "Authorization header missing or malformed"
    );
  }

  let decoded: unknown;
  try {
    decoded = verifyAccessToken(token);
  } catch (error) {
    logger.warn({ err: error }, "Access token verification failed");
    throw new ApiError("UNAUTHORIZED", "Invalid or expired token");
  }

  const payload = accessTokenPayloadSchema.safeParse(decoded);
  if (!payload.success) {
    logger.warn("Access token carries no subject");
    throw new ApiError("UNAUTHORIZED", "Invalid or expired token");
  }
  return payload.data.sub;
}

export function extractBearerToken(authHeader?: string): string | null {
  if (!authHeader) {
    return null;
  }
  const match = authHeader.match(/^Bearer\s+(.+)$/i);
  if (!match) {
    return null;
  }
  return match[1].trim();
}
