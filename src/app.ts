import Fastify, { type FastifyError } from "fastify";
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from "fastify-type-provider-zod";
import sensible from "@fastify/sensible";
import helmet from "@fastify/helmet";
import cors from "@fastify/cors";
import { ZodError } from "zod";
import { loadConfig } from "./config";
import databasePlugin from "./plugins/database";
import jwtPlugin from "./plugins/jwt";
import authPlugin from "./plugins/auth";
import accountRoutes from "./routes/accounts";
import sessionRoutes from "./routes/sessions";
import mediaRoutes from "./routes/media";
import ratingRoutes from "./routes/ratings";
import { ApiError, toErrorBody, validationFailed } from "./utils/errors";

function isClientError(error: FastifyError): boolean {
  return (
    typeof error.statusCode === "number" &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  );
}

export async function buildApp() {
  const config = loadConfig();

  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      transport:
        config.NODE_ENV === "development"
          ? {
              target: "pino-pretty",
              options: {
                colorize: true,
                translateTime: "SYS:standard",
              },
            }
          : undefined,
    },
    trustProxy: true,
    bodyLimit: config.HTTP_BODY_LIMIT,
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.setErrorHandler(async (error, request, reply) => {
    const apiError =
      error instanceof ZodError
        ? validationFailed(error)
        : error instanceof ApiError
          ? error
          : null;

    if (apiError) {
      if (apiError.code === "UNAUTHORIZED") {
        request.log.warn({ reason: apiError.message }, "Unauthorized request");
      }
      return reply.status(apiError.statusCode).send(toErrorBody(apiError));
    }

    if (isClientError(error)) {
      return reply.status(error.statusCode ?? 400).send({ error: error.message });
    }

    request.log.error({ err: error }, "Request failed");
    const internal = new ApiError("INTERNAL", "Internal server error");
    return reply.status(internal.statusCode).send(toErrorBody(internal));
  });

  app.setNotFoundHandler(async (_request, reply) => {
    return reply.notFound("Not found");
  });

  await app.register(sensible);
  await app.register(cors, { origin: config.CORS_ORIGIN });
  await app.register(helmet, { contentSecurityPolicy: false });
  await app.register(databasePlugin);
  await app.register(jwtPlugin);
  await app.register(authPlugin);

  await app.register(accountRoutes, { prefix: "/accounts" });
  await app.register(sessionRoutes, { prefix: "/sessions" });
  await app.register(mediaRoutes, { prefix: "/media" });
  await app.register(ratingRoutes, { prefix: "/ratings" });

  app.get("/health", async () => ({ status: "ok" }));

  return app;
}
