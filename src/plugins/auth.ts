import fp from "fastify-plugin";
import type { FastifyInstance, FastifyRequest } from "fastify";
import { authenticateToken, extractBearerToken } from "../services/identity";

declare module "fastify" {
  interface FastifyInstance {
    authenticate(request: FastifyRequest): Promise<void>;
  }
}

async function authPlugin(fastify: FastifyInstance) {
  fastify.decorate("authenticate", async (request: FastifyRequest) => {
    const accountId = authenticateToken({
      token: extractBearerToken(request.headers.authorization),
      verifyAccessToken: (token) => fastify.jwt.verify(token),
      logger: request.log,
    });
    request.user = { id: accountId };
  });
}

export default fp(authPlugin, {
  name: "auth",
  dependencies: ["jwt"],
});
