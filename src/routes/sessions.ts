import type { FastifyInstance } from "fastify";
import { loadConfig } from "../config";
import { loginBodySchema } from "../schemas/accounts";
import { parseInput } from "../schemas/common";
import { loginAccount } from "../services/identity";
import { serializeAccount } from "../utils/serialize";

export default async function sessionRoutes(fastify: FastifyInstance) {
  const config = loadConfig();

  fastify.post("/", {
    schema: {
      body: loginBodySchema,
    },
    handler: async (request) => {
      const body = parseInput(loginBodySchema, request.body);
      const { account, accessToken } = await loginAccount({
        db: fastify.db,
        username: body.username,
        password: body.password,
        signAccessToken: fastify.signAccessToken,
      });
      request.log.info({ accountId: account.id }, "Account logged in");
      return {
        message: "Login successful",
        account: serializeAccount(account, { includeEmail: true }),
        access_token: accessToken,
        token_type: "Bearer",
        expires_in: config.JWT_ACCESS_TOKEN_EXPIRES,
      };
    },
  });
}
