import type { SqliteDatabase } from "../lib/database";
import { withTransaction } from "../lib/database";
import { AccountRepository } from "../repositories/account-repository";
import { MediaRepository } from "../repositories/media-repository";
import { RatingRepository } from "../repositories/rating-repository";
import type { Account } from "../types/entities";
import { ApiError } from "../utils/errors";

export interface AccountDeletionSummary {
  deletedMedia: number;
  deletedRatings: number;
}

export class AccountService {
  private readonly db: SqliteDatabase;
  private readonly accounts: AccountRepository;
  private readonly media: MediaRepository;
  private readonly ratings: RatingRepository;

  constructor(options: { db: SqliteDatabase }) {
    this.db = options.db;
    this.accounts = new AccountRepository(options.db);
    this.media = new MediaRepository(options.db);
    this.ratings = new RatingRepository(options.db);
  }

  getAccount(accountId: string): Account {
    const account = this.accounts.findById(accountId);
    if (!account) {
      throw new ApiError("NOT_FOUND", "Account not found");
    }
    return account;
  }

  /**
   * Deletes the account with everything it owns: ratings on its media
   * entries (other raters' counts are released), its media entries and its
   * own ratings.
   */
  deleteAccount(accountId: string): AccountDeletionSummary {
    return withTransaction(this.db, () => {
      if (!this.accounts.findById(accountId)) {
        throw new ApiError("NOT_FOUND", "Account not found");
      }
      const ratingsOnMedia = this.ratings.deleteByMediaCreator(accountId);
      const ownRatings = this.ratings.deleteByAccount(accountId);
      const deletedMedia = this.media.deleteByCreator(accountId);
      this.accounts.delete(accountId);
      return { deletedMedia, deletedRatings: ratingsOnMedia + ownRatings };
    });
  }
}
