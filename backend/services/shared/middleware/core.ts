// backend/services/shared/middleware/core.ts
import express, { type RequestHandler } from "express";
import cors from "cors";

export function coreMiddleware(): RequestHandler[] {
  return [
    cors({ origin: true, credentials: true }),
    express.json({ limit: "2mb" }),
    // login posts OAuth2-style form bodies
    express.urlencoded({ extended: true }),
  ];
}
