import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import { openDatabase, type SqliteDatabase } from "../lib/database";
import { loadConfig } from "../config";

declare module "fastify" {
  interface FastifyInstance {
    db: SqliteDatabase;
  }
}

async function databasePlugin(fastify: FastifyInstance) {
  const config = loadConfig();
  const db = openDatabase(config.DATABASE_PATH);
  fastify.decorate("db", db);
  fastify.log.debug({ database: db.name }, "Database opened");

  fastify.addHook("onClose", async () => {
    db.close();
  });
}

export default fp(databasePlugin, {
  name: "database",
});
