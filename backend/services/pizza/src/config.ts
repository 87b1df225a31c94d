// backend/services/pizza/src/config.ts
/**
 * - No dotenv loading here (bootstrap.ts loads env; tests seed process.env).
 * - Secrets and endpoints are required; tunables have defaults.
 * - Fail fast at import time if something is missing/invalid.
 */
import {
  requireEnv,
  requireNumber,
  optionalNumber,
  optionalBool,
} from "@shared/config/env";

export const SERVICE_NAME = "pizza" as const;

const jwtSecret = requireEnv("JWT_SECRET_KEY");
const jwtRefreshSecret = requireEnv("JWT_REFRESH_SECRET_KEY");
if (jwtSecret === jwtRefreshSecret) {
  throw new Error(
    "JWT_SECRET_KEY and JWT_REFRESH_SECRET_KEY must differ so refresh tokens cannot pass as access tokens"
  );
}

const bcryptRounds = optionalNumber("BCRYPT_ROUNDS", 10);
if (!Number.isInteger(bcryptRounds) || bcryptRounds < 4 || bcryptRounds > 31) {
  throw new Error(`BCRYPT_ROUNDS must be an integer in 4..31, got ${bcryptRounds}`);
}

export const config = {
  // required
  port: requireNumber("PIZZA_PORT"),
  mongoUri: requireEnv("PIZZA_MONGO_URI"),
  jwtSecret,
  jwtRefreshSecret,

  // optional
  accessTokenExpireMinutes: optionalNumber("ACCESS_TOKEN_EXPIRE_MINUTES", 30),
  refreshTokenExpireMinutes: optionalNumber("REFRESH_TOKEN_EXPIRE_MINUTES", 60 * 24 * 7),
  bcryptRounds,
  mongoTransactions: optionalBool("MONGO_TRANSACTIONS", false),
} as const;
