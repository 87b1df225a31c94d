// backend/services/pizza/src/bootstrap.ts
/**
 * Load env (ENV_FILE, else .env.dev when present) and assert the minimum
 * required variables before config/logger are imported.
 */
import { loadEnvCascade, assertRequiredEnv } from "@shared/config/env";

const SERVICE_NAME = "pizza";

const loaded = loadEnvCascade(".env.dev");
process.env.SERVICE_NAME ??= SERVICE_NAME;

assertRequiredEnv([
  "LOG_LEVEL",
  "PIZZA_PORT",
  "PIZZA_MONGO_URI",
  "JWT_SECRET_KEY",
  "JWT_REFRESH_SECRET_KEY",
]);

console.log(`[${SERVICE_NAME}] env loaded from: ${loaded ?? "process environment"}`);
