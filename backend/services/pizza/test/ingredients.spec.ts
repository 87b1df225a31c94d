// backend/services/pizza/test/ingredients.spec.ts
import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import { Types } from "mongoose";
import { zProblem } from "@shared/contracts/common";
import { zIngredientWire } from "@shared/contracts/ingredient.contract";
import { makeTestApp, bearerFor, type TestContext } from "./helpers/http";

let ctx: TestContext;
let auth: string;

const missingId = () => new Types.ObjectId().toHexString();

async function createIngredient(name: string, category: string) {
  const r = await request(ctx.app)
    .post("/ingredients")
    .set("Authorization", auth)
    .send({ name, category })
    .expect(201);
  return zIngredientWire.parse(r.body);
}

beforeEach(async () => {
  ctx = makeTestApp();
  auth = await bearerFor(ctx.app);
});

describe("POST /ingredients", () => {
  it("creates an ingredient", async () => {
    const basil = await createIngredient("Basil", "herb");
    expect(basil).toEqual({ id: basil.id, name: "Basil", category: "herb" });
    expect(ctx.stores.ingredients.has(basil.id)).toBe(true);
  });

  it("401 without a token", async () => {
    await request(ctx.app)
      .post("/ingredients")
      .send({ name: "Basil", category: "herb" })
      .expect(401);
  });

  it("400 when category is missing", async () => {
    const r = await request(ctx.app)
      .post("/ingredients")
      .set("Authorization", auth)
      .send({ name: "Basil" })
      .expect(400);
    expect(zProblem.parse(r.body).errors?.map((e) => e.path)).toEqual(["category"]);
  });
});

describe("PATCH /ingredients/:id", () => {
  it("changes only the supplied field", async () => {
    const basil = await createIngredient("Basil", "herb");
    const r = await request(ctx.app)
      .patch(`/ingredients/${basil.id}`)
      .set("Authorization", auth)
      .send({ category: "leaf" })
      .expect(200);
    expect(r.body).toEqual({ id: basil.id, name: "Basil", category: "leaf" });
  });

  it("applies fields passed as query parameters", async () => {
    const basil = await createIngredient("Basil", "herb");
    const r = await request(ctx.app)
      .patch(`/ingredients/${basil.id}?name=Oregano`)
      .set("Authorization", auth)
      .expect(200);
    expect(zIngredientWire.parse(r.body)).toEqual({
      id: basil.id,
      name: "Oregano",
      category: "herb",
    });
  });

  it("400 for an unknown query parameter", async () => {
    const basil = await createIngredient("Basil", "herb");
    const r = await request(ctx.app)
      .patch(`/ingredients/${basil.id}?colour=green`)
      .set("Authorization", auth)
      .expect(400);
    expect(zProblem.parse(r.body).code).toBe("VALIDATION_ERROR");
    expect(ctx.stores.ingredients.get(basil.id)?.name).toBe("Basil");
  });

  it("404 for an unknown id", async () => {
    const r = await request(ctx.app)
      .patch(`/ingredients/${missingId()}`)
      .set("Authorization", auth)
      .send({ name: "Oregano" })
      .expect(404);
    expect(zProblem.parse(r.body).detail).toBe("Ingredient not found.");
  });
});

describe("DELETE /ingredients/:id", () => {
  it("deletes an unused ingredient", async () => {
    const basil = await createIngredient("Basil", "herb");
    const r = await request(ctx.app)
      .delete(`/ingredients/${basil.id}`)
      .set("Authorization", auth)
      .expect(200);
    expect(r.body).toEqual({
      status: "completed",
      detail: `Ingredient Basil with id ${basil.id} deleted`,
    });
    expect(ctx.stores.ingredients.size).toBe(0);
  });

  it("404 once already deleted", async () => {
    const basil = await createIngredient("Basil", "herb");
    await request(ctx.app).delete(`/ingredients/${basil.id}`).set("Authorization", auth).expect(200);
    const r = await request(ctx.app)
      .delete(`/ingredients/${basil.id}`)
      .set("Authorization", auth)
      .expect(404);
    expect(zProblem.parse(r.body).detail).toBe("Ingredient not found.");

    await request(ctx.app)
      .patch(`/ingredients/${basil.id}`)
      .set("Authorization", auth)
      .send({ name: "Oregano" })
      .expect(404);
  });

  it("refuses while a pizza lists the ingredient, even an inactive one", async () => {
    const basil = await createIngredient("Basil", "herb");
    const pizza = await request(ctx.app)
      .post("/pizzas")
      .set("Authorization", auth)
      .send({ name: "Seasonal", price: 1200, is_active: false })
      .expect(201);
    const pizzaId = String(pizza.body.id);
    await request(ctx.app)
      .post(`/pizzas/ingredients/${pizzaId}/${basil.id}`)
      .set("Authorization", auth)
      .expect(201);

    const blocked = await request(ctx.app)
      .delete(`/ingredients/${basil.id}`)
      .set("Authorization", auth)
      .expect(400);
    const prob = zProblem.parse(blocked.body);
    expect(prob.code).toBe("CONFLICT");
    expect(prob.detail).toBe("Cannot delete an ingredient in an active pizza");
    expect(ctx.stores.ingredients.has(basil.id)).toBe(true);

    await request(ctx.app)
      .delete(`/pizzas/ingredients/${pizzaId}/${basil.id}`)
      .set("Authorization", auth)
      .expect(200);
    await request(ctx.app).delete(`/ingredients/${basil.id}`).set("Authorization", auth).expect(200);
  });
});
