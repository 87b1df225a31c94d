// backend/services/shared/config/env.ts

import path from "path";
import fs from "fs";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

/** Load a specific env file. Throws if the file is missing or invalid. */
export function loadEnvFromFileOrThrow(envFilePath: string): string {
  if (!envFilePath || envFilePath.trim() === "") {
    throw new Error("ENV_FILE is required but was not provided.");
  }
  const resolved = path.resolve(process.cwd(), envFilePath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`ENV_FILE not found at: ${resolved}`);
  }

  const parsed = dotenv.config({ path: resolved });
  if (parsed.error) {
    throw new Error(
      `Failed to load ENV_FILE: ${resolved}: ${String(parsed.error)}`
    );
  }
  dotenvExpand.expand(parsed);
  return resolved;
}

/**
 * Explicit ENV_FILE must exist; otherwise the fallback file is loaded only
 * when present (containers inject env directly).
 */
export function loadEnvCascade(fallbackFile = ".env.dev"): string | null {
  const explicit = process.env.ENV_FILE?.trim();
  if (explicit) return loadEnvFromFileOrThrow(explicit);

  const resolved = path.resolve(process.cwd(), fallbackFile);
  if (!fs.existsSync(resolved)) return null;
  return loadEnvFromFileOrThrow(resolved);
}

/** Assert required environment variables are present (non-empty). */
export function assertRequiredEnv(keys: string[]) {
  const missing: string[] = [];
  for (const k of keys) {
    const v = process.env[k];
    if (!v || v.trim() === "") missing.push(k);
  }
  if (missing.length) {
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
  }
}

/** Require a non-empty env var; returns trimmed string. */
export function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

/** Require an env var that parses to a finite number. */
export function requireNumber(name: string): number {
  const v = requireEnv(name);
  const n = Number(v);
  if (!Number.isFinite(n))
    throw new Error(`Invalid number for env var ${name}: "${v}"`);
  return n;
}

/** Optional number with a default; a present but non-numeric value still fails. */
export function optionalNumber(name: string, fallback: number): number {
  const v = process.env[name];
  if (v == null || v.trim() === "") return fallback;
  const n = Number(v);
  if (!Number.isFinite(n))
    throw new Error(`Invalid number for env var ${name}: "${v}"`);
  return n;
}

/** "true"/"1"/"yes" → true, "false"/"0"/"no" → false, unset → fallback. */
export function optionalBool(name: string, fallback: boolean): boolean {
  const v = process.env[name];
  if (v == null || v.trim() === "") return fallback;
  const s = v.trim().toLowerCase();
  if (s === "1" || s === "true" || s === "yes") return true;
  if (s === "0" || s === "false" || s === "no") return false;
  throw new Error(`Invalid boolean for env var ${name}: "${v}"`);
}
