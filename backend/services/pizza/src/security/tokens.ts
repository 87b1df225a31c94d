// backend/services/pizza/src/security/tokens.ts
/**
 * Access and refresh tokens are two signing purposes:
 * - distinct secrets and expiries
 * - a `typ` claim checked on verify
 * so one can never stand in for the other.
 */
import jwt from "jsonwebtoken";
import { config } from "../config";

export type TokenPurpose = "access" | "refresh";

type PurposeSettings = { secret: string; expiresInMinutes: number };

function settingsFor(purpose: TokenPurpose): PurposeSettings {
  return purpose === "access"
    ? { secret: config.jwtSecret, expiresInMinutes: config.accessTokenExpireMinutes }
    : {
        secret: config.jwtRefreshSecret,
        expiresInMinutes: config.refreshTokenExpireMinutes,
      };
}

function issue(purpose: TokenPurpose, subject: string): string {
  const { secret, expiresInMinutes } = settingsFor(purpose);
  return jwt.sign({ typ: purpose }, secret, {
    algorithm: "HS256",
    subject,
    expiresIn: Math.round(expiresInMinutes * 60),
  });
}

/** Returns the subject, or null when the token is invalid, expired or of the other purpose. */
function verify(purpose: TokenPurpose, token: string): string | null {
  const { secret } = settingsFor(purpose);
  try {
    const decoded = jwt.verify(token, secret, { algorithms: ["HS256"] });
    if (typeof decoded !== "object" || decoded === null) return null;
    if (decoded["typ"] !== purpose) return null;
    return typeof decoded.sub === "string" && decoded.sub !== ""
      ? decoded.sub
      : null;
  } catch (err) {
    // TokenExpiredError and NotBeforeError extend JsonWebTokenError
    if (err instanceof jwt.JsonWebTokenError) return null;
    throw err;
  }
}

export function issueAccessToken(subject: string): string {
  return issue("access", subject);
}

export function issueRefreshToken(subject: string): string {
  return issue("refresh", subject);
}

export function verifyAccessToken(token: string): string | null {
  return verify("access", token);
}

export function verifyRefreshToken(token: string): string | null {
  return verify("refresh", token);
}
