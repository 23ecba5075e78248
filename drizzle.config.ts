import { defineConfig } from "drizzle-kit";
import { DATABASE_URL } from "./src/env";

export default defineConfig({
  dialect: "mysql",
  schema: "./src/infrastructure/db/schema",
  casing: "snake_case",
  dbCredentials: {
    url: DATABASE_URL,
  },
});
