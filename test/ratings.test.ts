import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildApp } from "../src/app";
import { openDatabase } from "../src/lib/database";
import { AccountRepository } from "../src/repositories/account-repository";
import { MediaRepository } from "../src/repositories/media-repository";
import { RatingRepository } from "../src/repositories/rating-repository";
import { meanToHundredths, RatingService } from "../src/services/rating-service";
import { ApiError } from "../src/utils/errors";
import {
  bearer,
  createAccount,
  createMedia,
  createRating,
  type TestAccount,
  type TestApp,
} from "./helpers";

describe("rating routes", () => {
  let app: TestApp;
  let alice: TestAccount;
  let bob: TestAccount;
  let mediaId: string;

  beforeEach(async () => {
    app = await buildApp();
    alice = await createAccount(app, "alice");
    bob = await createAccount(app, "bob");
    mediaId = await createMedia(app, alice, { title: "Harbor Lights" });
  });

  afterEach(async () => {
    await app.close();
  });

  async function ratingCount(account: TestAccount): Promise<number> {
    const response = await app.inject({
      method: "GET",
      url: "/accounts/me",
      headers: bearer(account.token),
    });
    return response.json().account.rating_count;
  }

  async function totalRatings(): Promise<number> {
    const response = await app.inject({ method: "GET", url: "/ratings" });
    return response.json().pagination.total_items;
  }

  describe("POST /ratings", () => {
    it("creates a rating with user and media summaries", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/ratings",
        headers: bearer(bob.token),
        payload: { media_id: mediaId, score: 4, comment: "Lovely colours" },
      });

      expect(response.statusCode).toBe(201);
      const body = response.json();
      expect(body.message).toBe("Rating created successfully");
      expect(body.rating).toMatchObject({
        media_id: mediaId,
        user_id: bob.id,
        score: 4,
        comment: "Lovely colours",
        user: { id: bob.id, username: "bob" },
        media: { id: mediaId, title: "Harbor Lights", category: "artwork" },
      });
      expect(await ratingCount(bob)).toBe(1);
    });

    it("stores a missing comment as null", async () => {
      const ratingId = await createRating(app, bob, mediaId, 3);
      const response = await app.inject({ method: "GET", url: `/ratings/${ratingId}` });
      expect(response.json().rating.comment).toBeNull();
    });

    it.each([
      [0, "Number must be greater than or equal to 1"],
      [6, "Number must be less than or equal to 5"],
    ])("rejects score %s and stores nothing", async (score, message) => {
      const response = await app.inject({
        method: "POST",
        url: "/ratings",
        headers: bearer(bob.token),
        payload: { media_id: mediaId, score },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: "Validation failed",
        messages: { score: [message] },
      });
      expect(await totalRatings()).toBe(0);
      expect(await ratingCount(bob)).toBe(0);
    });

    it("returns 404 for unknown media", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/ratings",
        headers: bearer(bob.token),
        payload: { media_id: "missing", score: 3 },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: "Media content not found" });
    });

    it("allows one rating per account and entry", async () => {
      await createRating(app, bob, mediaId, 4);

      const response = await app.inject({
        method: "POST",
        url: "/ratings",
        headers: bearer(bob.token),
        payload: { media_id: mediaId, score: 2 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: "You have already rated this content",
      });
      expect(await totalRatings()).toBe(1);
      expect(await ratingCount(bob)).toBe(1);
    });
  });

  describe("GET /ratings", () => {
    it("filters by media and user, newest first", async () => {
      const otherMedia = await createMedia(app, bob, { title: "Tide Pool" });
      const first = await createRating(app, bob, mediaId, 5);
      const second = await createRating(app, alice, mediaId, 3);
      const third = await createRating(app, alice, otherMedia, 4);

      const ids = async (query: Record<string, string>) => {
        const response = await app.inject({ method: "GET", url: "/ratings", query });
        return response.json().ratings.map((rating: { id: string }) => rating.id);
      };

      expect(await ids({})).toEqual([third, second, first]);
      expect(await ids({ media_id: mediaId })).toEqual([second, first]);
      expect(await ids({ user_id: alice.id })).toEqual([third, second]);
      expect(await ids({ media_id: mediaId, user_id: bob.id })).toEqual([first]);
    });

    it("paginates like the media list", async () => {
      await createRating(app, bob, mediaId, 5);
      await createRating(app, alice, mediaId, 3);

      const response = await app.inject({
        method: "GET",
        url: "/ratings",
        query: { per_page: "1", page: "2" },
      });

      expect(response.json().ratings).toHaveLength(1);
      expect(response.json().pagination).toEqual({
        page: 2,
        per_page: 1,
        total_pages: 2,
        total_items: 2,
      });
    });

    it("answers an empty page for a huge page number", async () => {
      await createRating(app, bob, mediaId, 5);

      const response = await app.inject({
        method: "GET",
        url: "/ratings",
        query: { page: "100000000000000000000" },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().ratings).toEqual([]);
      expect(response.json().pagination).toEqual({
        page: 1e20,
        per_page: 10,
        total_pages: 1,
        total_items: 1,
      });
    });

    it("returns 404 for an unknown id", async () => {
      const response = await app.inject({ method: "GET", url: "/ratings/missing" });
      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: "Rating not found" });
    });
  });

  describe("GET /ratings/media/:media_id/stats", () => {
    it("reports zeroes for an unrated entry", async () => {
      const response = await app.inject({
        method: "GET",
        url: `/ratings/media/${mediaId}/stats`,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        media_id: mediaId,
        media_title: "Harbor Lights",
        stats: {
          total_ratings: 0,
          average_rating: 0,
          rating_distribution: { "1": 0, "2": 0, "3": 0, "4": 0, "5": 0 },
        },
      });
    });

    it("rounds the mean and fills every bucket", async () => {
      const carol = await createAccount(app, "carol");
      await createRating(app, alice, mediaId, 5);
      await createRating(app, bob, mediaId, 5);
      await createRating(app, carol, mediaId, 4);

      const response = await app.inject({
        method: "GET",
        url: `/ratings/media/${mediaId}/stats`,
      });

      expect(response.json().stats).toEqual({
        total_ratings: 3,
        average_rating: 4.67,
        rating_distribution: { "1": 0, "2": 0, "3": 0, "4": 1, "5": 2 },
      });
    });

    it("returns 404 for unknown media", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/ratings/media/missing/stats",
      });
      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: "Media content not found" });
    });
  });

  describe("PUT /ratings/:id", () => {
    it("updates the owner's rating", async () => {
      const ratingId = await createRating(app, bob, mediaId, 2, "meh");

      const response = await app.inject({
        method: "PUT",
        url: `/ratings/${ratingId}`,
        headers: bearer(bob.token),
        payload: { score: 5 },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.message).toBe("Rating updated successfully");
      expect(body.rating.score).toBe(5);
      expect(body.rating.comment).toBe("meh");
    });

    it("forbids strangers and leaves the rating unchanged", async () => {
      const ratingId = await createRating(app, bob, mediaId, 2);
      const before = (
        await app.inject({ method: "GET", url: `/ratings/${ratingId}` })
      ).json().rating;

      const response = await app.inject({
        method: "PUT",
        url: `/ratings/${ratingId}`,
        headers: bearer(alice.token),
        payload: { score: 1 },
      });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({
        error: "Forbidden: You can only update your own ratings",
      });
      const after = (
        await app.inject({ method: "GET", url: `/ratings/${ratingId}` })
      ).json().rating;
      expect(after).toEqual(before);
    });

    it("checks existence first", async () => {
      const response = await app.inject({
        method: "PUT",
        url: "/ratings/missing",
        headers: bearer(bob.token),
        payload: { score: 9 },
      });
      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: "Rating not found" });
    });

    it("validates the body after ownership", async () => {
      const ratingId = await createRating(app, bob, mediaId, 2);

      const empty = await app.inject({
        method: "PUT",
        url: `/ratings/${ratingId}`,
        headers: bearer(bob.token),
        payload: {},
      });
      expect(empty.statusCode).toBe(400);
      expect(empty.json().messages).toEqual({
        _schema: ["At least one field must be provided for update"],
      });

      const outOfRange = await app.inject({
        method: "PUT",
        url: `/ratings/${ratingId}`,
        headers: bearer(bob.token),
        payload: { score: 6 },
      });
      expect(outOfRange.statusCode).toBe(400);
      expect(outOfRange.json().messages).toEqual({
        score: ["Number must be less than or equal to 5"],
      });
    });
  });

  describe("DELETE /ratings/:id", () => {
    it("removes the rating and releases the count", async () => {
      const ratingId = await createRating(app, bob, mediaId, 4);

      const response = await app.inject({
        method: "DELETE",
        url: `/ratings/${ratingId}`,
        headers: bearer(bob.token),
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ message: "Rating deleted successfully" });
      expect(await totalRatings()).toBe(0);
      expect(await ratingCount(bob)).toBe(0);
    });

    it("forbids strangers", async () => {
      const ratingId = await createRating(app, bob, mediaId, 4);

      const response = await app.inject({
        method: "DELETE",
        url: `/ratings/${ratingId}`,
        headers: bearer(alice.token),
      });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({
        error: "Forbidden: You can only delete your own ratings",
      });
      expect(await totalRatings()).toBe(1);
      expect(await ratingCount(bob)).toBe(1);
    });
  });
});

describe("meanToHundredths", () => {
  it.each([
    [0, 0, 0],
    [14, 3, 4.67],
    [9, 8, 1.12],
    [3, 8, 0.38],
    [5, 8, 0.62],
    [107, 40, 2.67],
  ])("rounds %s / %s to %s", (sum, count, expected) => {
    expect(meanToHundredths(sum, count)).toBe(expected);
  });
});

describe("RatingService", () => {
  it("rounds an exact half in the stats mean to even", () => {
    const db = openDatabase(":memory:");
    const createdAt = "2026-01-01T00:00:00.000Z";
    const accounts = new AccountRepository(db);
    const ratings = new RatingRepository(db);
    accounts.create({
      id: "creator",
      username: "creator",
      email: "creator@example.com",
      passwordHash: "scrypt$00$00",
      createdAt,
    });
    new MediaRepository(db).create({
      id: "m1",
      title: "Harbor Lights",
      description: null,
      category: "artwork",
      thumbnailUrl: null,
      contentUrl: "https://cdn.example.com/harbor.png",
      creatorId: "creator",
      createdAt,
    });
    const scores = [2, 1, 1, 1, 1, 1, 1, 1];
    scores.forEach((score, index) => {
      const id = `rater-${index}`;
      accounts.create({
        id,
        username: id,
        email: `${id}@example.com`,
        passwordHash: "scrypt$00$00",
        createdAt,
      });
      ratings.create({
        id: `r-${index}`,
        mediaId: "m1",
        accountId: id,
        score,
        comment: null,
        createdAt,
      });
    });

    const service = new RatingService({
      db,
      pagination: { defaultPerPage: 10, maxPerPage: 100 },
    });
    expect(service.statsForMedia("m1").stats).toEqual({
      totalRatings: 8,
      averageRating: 1.12,
      distribution: { "1": 7, "2": 1, "3": 0, "4": 0, "5": 0 },
    });

    db.close();
  });


  it("reports a duplicate even when the explicit check misses it", () => {
    const db = openDatabase(":memory:");
    const createdAt = "2026-01-01T00:00:00.000Z";
    const accounts = new AccountRepository(db);
    accounts.create({
      id: "rater",
      username: "rater",
      email: "rater@example.com",
      passwordHash: "scrypt$00$00",
      createdAt,
    });
    new MediaRepository(db).create({
      id: "m1",
      title: "Harbor Lights",
      description: null,
      category: "artwork",
      thumbnailUrl: null,
      contentUrl: "https://cdn.example.com/harbor.png",
      creatorId: "rater",
      createdAt,
    });

    const repository = new RatingRepository(db);
    vi.spyOn(repository, "findByMediaAndAccount").mockReturnValue(null);
    const service = new RatingService({
      db,
      pagination: { defaultPerPage: 10, maxPerPage: 100 },
      repository,
    });

    service.create("rater", { media_id: "m1", score: 4 });

    let caught: unknown;
    try {
      service.create("rater", { media_id: "m1", score: 2 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ApiError);
    if (caught instanceof ApiError) {
      expect(caught.code).toBe("DUPLICATE_RATING");
      expect(caught.message).toBe("You have already rated this content");
    }
    expect(accounts.findById("rater")?.ratingCount).toBe(1);

    db.close();
  });
});
