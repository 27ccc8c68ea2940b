import type { SqliteDatabase } from "../lib/database";
import { isUniqueViolation } from "../lib/database";
import type { Account } from "../types/entities";
import { ApiError } from "../utils/errors";

interface AccountRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  rating_count: number;
  last_login: string | null;
  created_at: string;
  updated_at: string;
}

export interface CreateAccountInput {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  createdAt: string;
}

function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    ratingCount: row.rating_count,
    lastLogin: row.last_login,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class AccountRepository {
  constructor(private readonly db: SqliteDatabase) {}

  findById(id: string): Account | null {
    const row = this.db
      .prepare<[string], AccountRow>("SELECT * FROM accounts WHERE id = ?")
      .get(id);
    return row ? toAccount(row) : null;
  }

  findByUsername(username: string): Account | null {
    const row = this.db
      .prepare<[string], AccountRow>(
        "SELECT * FROM accounts WHERE username = ?"
      )
      .get(username);
    return row ? toAccount(row) : null;
  }

  findByEmail(email: string): Account | null {
    const row = this.db
      .prepare<[string], AccountRow>("SELECT * FROM accounts WHERE email = ?")
      .get(email);
    return row ? toAccount(row) : null;
  }

  create(input: CreateAccountInput): Account {
    try {
      this.db
        .prepare(
          `INSERT INTO accounts
             (id, username, email, password_hash, rating_count, created_at, updated_at)
           VALUES (@id, @username, @email, @passwordHash, 0, @createdAt, @createdAt)`
        )
        .run(input);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ApiError("DUPLICATE_IDENTITY", "Account already exists");
      }
      throw error;
    }
    return {
      id: input.id,
      username: input.username,
      email: input.email,
      passwordHash: input.passwordHash,
      ratingCount: 0,
      lastLogin: null,
      createdAt: input.createdAt,
      updatedAt: input.createdAt,
    };
  }

  recordLogin(id: string, at: string): void {
    this.db
      .prepare(
        "UPDATE accounts SET last_login = @at, updated_at = @at WHERE id = @id"
      )
      .run({ id, at });
  }

  adjustRatingCount(id: string, delta: number): void {
    this.db
      .prepare(
        "UPDATE accounts SET rating_count = MAX(rating_count + @delta, 0) WHERE id = @id"
      )
      .run({ id, delta });
  }

  delete(id: string): boolean {
    const result = this.db.prepare("DELETE FROM accounts WHERE id = ?").run(id);
    return result.changes > 0;
  }
}
