import type { FastifyInstance } from "fastify";
import { loadConfig } from "../config";
import { registerBodySchema } from "../schemas/accounts";
import { parseInput } from "../schemas/common";
import { AccountService } from "../services/account-service";
import { registerAccount } from "../services/identity";
import { serializeAccount } from "../utils/serialize";

export default async function accountRoutes(fastify: FastifyInstance) {
  const config = loadConfig();
  const accounts = new AccountService({ db: fastify.db });

  fastify.post("/", {
    schema: {
      body: registerBodySchema,
    },
    handler: async (request, reply) => {
      const body = parseInput(registerBodySchema, request.body);
      const { account, accessToken } = await registerAccount({
        db: fastify.db,
        username: body.username,
        email: body.email,
        password: body.password,
        signAccessToken: fastify.signAccessToken,
      });
      request.log.info({ accountId: account.id }, "Account registered");
      return reply.status(201).send({
        message: "Account created successfully",
        account: serializeAccount(account, { includeEmail: true }),
        access_token: accessToken,
        token_type: "Bearer",
        expires_in: config.JWT_ACCESS_TOKEN_EXPIRES,
      });
    },
  });

  fastify.get("/me", {
    onRequest: [fastify.authenticate],
    handler: async (request) => {
      const account = accounts.getAccount(request.user.id);
      return { account: serializeAccount(account, { includeEmail: true }) };
    },
  });

  fastify.delete("/me", {
    onRequest: [fastify.authenticate],
    handler: async (request) => {
      const summary = accounts.deleteAccount(request.user.id);
      request.log.info(
        { accountId: request.user.id, ...summary },
        "Account deleted"
      );
      return { message: "Account deleted successfully" };
    },
  });
}
