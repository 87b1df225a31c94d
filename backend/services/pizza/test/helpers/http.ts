// backend/services/pizza/test/helpers/http.ts
import request from "supertest";
import type { Express } from "express";
import { createApp } from "../../src/app";
import { MemoryStoreProvider } from "./memoryStore";

export type TestContext = { app: Express; stores: MemoryStoreProvider };

export function makeTestApp(): TestContext {
  const stores = new MemoryStoreProvider();
  return { app: createApp({ stores }), stores };
}

export const DEFAULT_PASSWORD = "test-password";

/** Sign up then log in; returns the Authorization header value. */
export async function bearerFor(
  app: Express,
  username = "mario",
  email = `${username}@example.com`
): Promise<string> {
  await request(app)
    .post("/signup")
    .send({ username, email, password: DEFAULT_PASSWORD })
    .expect(201);
  const r = await request(app)
    .post("/login")
    .type("form")
    .send({ username, password: DEFAULT_PASSWORD })
    .expect(200);
  return `Bearer ${String(r.body.access_token)}`;
}
