// backend/services/shared/utils/logger.ts
import type { IncomingMessage } from "node:http";
import pino, { type LoggerOptions, type LevelWithSilent } from "pino";

// ─────────────────────────── Env (fail fast for required) ─────────────────────
function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || v.trim() === "")
    throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

const validLevels: ReadonlySet<string> = new Set<LevelWithSilent>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

const LOG_LEVEL = requireEnv("LOG_LEVEL");
if (!isLevel(LOG_LEVEL)) {
  throw new Error(`Invalid LOG_LEVEL: "${LOG_LEVEL}"`);
}
const SERVICE_NAME = process.env.SERVICE_NAME?.trim();

// ────────────────────────────── Pino (stdout only) ────────────────────────────
const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: SERVICE_NAME ? { service: SERVICE_NAME } : undefined,
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "req.body.password",
      "req.body.token",
      "req.body.access_token",
      "req.body.refresh_token",
      "res.headers['set-cookie']",
      "res.headers['Set-Cookie']",
      "password",
      "passwordHash",
      "token",
    ],
  },
};
export const logger = pino(pinoOptions);

// ───────────────────────────── Request context helper ─────────────────────────
const ID_HEADERS = ["x-request-id", "x-correlation-id", "x-amzn-trace-id"];

/** Canonical request id: pino-http's req.id, else a correlation header, else "". */
export function requestIdOf(req: IncomingMessage): string {
  if (typeof req.id === "string" || typeof req.id === "number") {
    return String(req.id);
  }
  for (const name of ID_HEADERS) {
    const hdr = req.headers[name];
    const v = Array.isArray(hdr) ? hdr[0] : hdr;
    if (v) return v;
  }
  return "";
}
