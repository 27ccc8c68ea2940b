import type { FastifyInstance } from "fastify";
import { loadConfig } from "../config";
import { idParamsSchema, parseInput } from "../schemas/common";
import {
  createRatingBodySchema,
  listRatingsQuerySchema,
  mediaStatsParamsSchema,
} from "../schemas/ratings";
import { RatingService } from "../services/rating-service";
import {
  serializeMediaStats,
  serializePagination,
  serializeRating,
} from "../utils/serialize";

export default async function ratingRoutes(fastify: FastifyInstance) {
  const config = loadConfig();
  const ratings = new RatingService({
    db: fastify.db,
    pagination: {
      defaultPerPage: config.DEFAULT_PAGE_SIZE,
      maxPerPage: config.MAX_PAGE_SIZE,
    },
  });

  fastify.post("/", {
    onRequest: [fastify.authenticate],
    schema: {
      body: createRatingBodySchema,
    },
    handler: async (request, reply) => {
      const rating = ratings.create(request.user.id, request.body);
      request.log.info(
        { ratingId: rating.id, mediaId: rating.mediaId },
        "Rating created"
      );
      return reply.status(201).send({
        message: "Rating created successfully",
        rating: serializeRating(rating),
      });
    },
  });

  fastify.get("/", {
    schema: {
      querystring: listRatingsQuerySchema,
    },
    handler: async (request) => {
      const page = ratings.list(request.query);
      return {
        ratings: page.items.map(serializeRating),
        pagination: serializePagination(page),
      };
    },
  });

  fastify.get("/media/:media_id/stats", {
    schema: {
      params: mediaStatsParamsSchema,
    },
    handler: async (request) => {
      const params = parseInput(mediaStatsParamsSchema, request.params);
      return serializeMediaStats(ratings.statsForMedia(params.media_id));
    },
  });

  fastify.get("/:id", {
    schema: {
      params: idParamsSchema,
    },
    handler: async (request) => {
      const params = parseInput(idParamsSchema, request.params);
      return { rating: serializeRating(ratings.get(params.id)) };
    },
  });

  fastify.put("/:id", {
    onRequest: [fastify.authenticate],
    schema: {
      params: idParamsSchema,
    },
    handler: async (request) => {
      const params = parseInput(idParamsSchema, request.params);
      const rating = ratings.update(request.user.id, params.id, request.body);
      return {
        message: "Rating updated successfully",
        rating: serializeRating(rating),
      };
    },
  });

  fastify.delete("/:id", {
    onRequest: [fastify.authenticate],
    schema: {
      params: idParamsSchema,
    },
    handler: async (request) => {
      const params = parseInput(idParamsSchema, request.params);
      ratings.delete(request.user.id, params.id);
      request.log.info(
        { ratingId: params.id, accountId: request.user.id },
        "Rating deleted"
      );
      return { message: "Rating deleted successfully" };
    },
  });
}
