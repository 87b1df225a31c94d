// backend/services/pizza/test/app.spec.ts
import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import { Types } from "mongoose";
import { zProblem } from "@shared/contracts/common";
import { makeTestApp, bearerFor, type TestContext } from "./helpers/http";

let ctx: TestContext;

beforeEach(() => {
  ctx = makeTestApp();
});

describe("health", () => {
  it("GET /health → 200 liveness", async () => {
    const r = await request(ctx.app).get("/health").expect(200);
    expect(r.body.ok).toBe(true);
    expect(r.body.service).toBe("pizza");
  });

  it("GET /readyz → 200 with store details", async () => {
    const r = await request(ctx.app).get("/readyz").expect(200);
    expect(r.body.ok).toBe(true);
    expect(r.body.store).toBe("memory");
  });

  it("GET /health/ready → 503 when the store is unavailable", async () => {
    ctx.stores.unavailable = "store offline";
    const r = await request(ctx.app).get("/health/ready").expect(503);
    expect(r.body.ok).toBe(false);
    expect(r.body.error).toBe("store offline");
  });
});

describe("problem+json", () => {
  it("unknown route under a known prefix → 404 ROUTE_NOT_FOUND", async () => {
    const r = await request(ctx.app).get("/pizzas/a/b/c").expect(404);
    expect(r.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(zProblem.parse(r.body).code).toBe("ROUTE_NOT_FOUND");
  });

  it("unknown route elsewhere → bare 404", async () => {
    const r = await request(ctx.app).get("/nowhere").expect(404);
    expect(r.text).toBe("");
  });

  it("malformed JSON → 400 VALIDATION_ERROR", async () => {
    const r = await request(ctx.app)
      .post("/signup")
      .set("Content-Type", "application/json")
      .send('{"username": ')
      .expect(400);
    expect(zProblem.parse(r.body).code).toBe("VALIDATION_ERROR");
  });

  it("echoes the caller's request id as the problem instance", async () => {
    const r = await request(ctx.app)
      .get(`/pizzas/${new Types.ObjectId().toHexString()}`)
      .set("x-request-id", "req-123")
      .expect(404);
    expect(r.headers["x-request-id"]).toBe("req-123");
    expect(zProblem.parse(r.body).instance).toBe("req-123");
  });
});

describe("store scopes", () => {
  it("every acquired scope is released, on success and on failure", async () => {
    const auth = await bearerFor(ctx.app);
    await request(ctx.app)
      .post("/pizzas")
      .set("Authorization", auth)
      .send({ name: "Margherita", price: 900 })
      .expect(201);
    await request(ctx.app)
      .patch(`/pizzas/${new Types.ObjectId().toHexString()}`)
      .set("Authorization", auth)
      .send({ price: 1 })
      .expect(404);
    await request(ctx.app)
      .post("/signup")
      .send({ username: "mario", email: "x@example.com", password: "secret1" })
      .expect(400);

    expect(ctx.stores.acquired).toBeGreaterThan(0);
    expect(ctx.stores.released).toBe(ctx.stores.acquired);
  });

  it("a scope whose work throws is still released", async () => {
    await expect(
      ctx.stores.withStore(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(ctx.stores.acquired).toBe(1);
    expect(ctx.stores.released).toBe(1);
  });
});
