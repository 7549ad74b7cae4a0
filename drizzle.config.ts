import "dotenv/config";
import { defineConfig } from "drizzle-kit";
import { loadDatabaseEngineConfig } from "./server/config";

const { databaseUrl } = loadDatabaseEngineConfig();

export default defineConfig({
  out: "./server/db/migrations",
  schema: "./shared/schema.ts",
  dialect: "postgresql",
  migrations: {
    table: "__order_engine_migrations",
    schema: "public",
  },
  dbCredentials: {
    url: databaseUrl,
  },
});
