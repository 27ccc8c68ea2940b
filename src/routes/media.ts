import type { FastifyInstance } from "fastify";
import { loadConfig } from "../config";
import { idParamsSchema, parseInput } from "../schemas/common";
import { createMediaBodySchema, listMediaQuerySchema } from "../schemas/media";
import { MediaService } from "../services/media-service";
import {
  serializeMediaEntry,
  serializePagination,
} from "../utils/serialize";

export default async function mediaRoutes(fastify: FastifyInstance) {
  const config = loadConfig();
  const media = new MediaService({
    db: fastify.db,
    pagination: {
      defaultPerPage: config.DEFAULT_PAGE_SIZE,
      maxPerPage: config.MAX_PAGE_SIZE,
    },
  });

  fastify.post("/", {
    onRequest: [fastify.authenticate],
    schema: {
      body: createMediaBodySchema,
    },
    handler: async (request, reply) => {
      const entry = media.create(request.user.id, request.body);
      request.log.info(
        { mediaId: entry.id, accountId: request.user.id },
        "Media entry created"
      );
      return reply.status(201).send({
        message: "Content created successfully",
        media: serializeMediaEntry(entry),
      });
    },
  });

  fastify.get("/", {
    schema: {
      querystring: listMediaQuerySchema,
    },
    handler: async (request) => {
      const page = media.list(request.query);
      return {
        media: page.items.map(serializeMediaEntry),
        pagination: serializePagination(page),
      };
    },
  });

  fastify.get("/categories", async () => {
    return { categories: [...media.listCategories()] };
  });

  fastify.get("/:id", {
    schema: {
      params: idParamsSchema,
    },
    handler: async (request) => {
      const params = parseInput(idParamsSchema, request.params);
      return { media: serializeMediaEntry(media.get(params.id)) };
    },
  });

  // Body validation happens after the existence and ownership checks.
  fastify.put("/:id", {
    onRequest: [fastify.authenticate],
    schema: {
      params: idParamsSchema,
    },
    handler: async (request) => {
      const params = parseInput(idParamsSchema, request.params);
      const entry = media.update(request.user.id, params.id, request.body);
      request.log.info(
        { mediaId: entry.id, accountId: request.user.id },
        "Media entry updated"
      );
      return {
        message: "Content updated successfully",
        media: serializeMediaEntry(entry),
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
      const result = media.delete(request.user.id, params.id);
      request.log.info(
        { mediaId: params.id, accountId: request.user.id, ...result },
        "Media entry deleted"
      );
      return { message: "Content deleted successfully" };
    },
  });
}
