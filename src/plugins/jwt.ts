import fp from "fastify-plugin";
import fastifyJwt from "@fastify/jwt";
import type { FastifyInstance } from "fastify";
import { loadConfig } from "../config";

export type AccessTokenPayload = {
  sub: string;
};

export type AuthenticatedAccount = {
  id: string;
};

declare module "@fastify/jwt" {
  interface FastifyJWT {
    payload: AccessTokenPayload;
    user: AuthenticatedAccount;
  }
}

async function jwtPlugin(fastify: FastifyInstance) {
  const config = loadConfig();

  await fastify.register(fastifyJwt, {
    secret: config.JWT_SECRET_KEY,
    sign: {
      algorithm: "HS256",
    },
    verify: {
      algorithms: ["HS256"],
    },
  });

  fastify.decorate("signAccessToken", async (accountId: string) => {
    return fastify.jwt.sign(
      { sub: accountId },
      { expiresIn: `${config.JWT_ACCESS_TOKEN_EXPIRES}s` }
    );
  });
}

declare module "fastify" {
  interface FastifyInstance {
    signAccessToken(accountId: string): Promise<string>;
  }
}

export default fp(jwtPlugin, {
  name: "jwt",
});
