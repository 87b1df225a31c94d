// backend/services/pizza/src/routes/pizzaRoutes.ts
import { Router } from "express";
import type { ServiceDeps } from "../deps";
import { requireUser } from "../middleware/currentUser";

import { list } from "../controllers/pizza/handlers/list";
import { findById } from "../controllers/pizza/handlers/findById";
import { create } from "../controllers/pizza/handlers/create";
import { update } from "../controllers/pizza/handlers/update";
import { add as addIngredient } from "../controllers/pizzaIngredient/handlers/add";
import { remove as removeIngredient } from "../controllers/pizzaIngredient/handlers/remove";

/**
 * Policy:
 * - GET /:id is public; every other route needs a bearer access token
 * - Update = PATCH /:id (partial)
 * - Association routes live under /ingredients/:pizzaId/:ingredientId
 */
export function pizzaRoutes(deps: ServiceDeps): Router {
  const router = Router();
  const auth = requireUser(deps.stores);

  // association routes first so "/ingredients" never matches "/:id"
  router.post("/ingredients/:pizzaId/:ingredientId", auth, addIngredient(deps));
  router.delete("/ingredients/:pizzaId/:ingredientId", auth, removeIngredient(deps));

  router.get("/", auth, list(deps));
  router.get("/:id", findById(deps));
  router.post("/", auth, create(deps));
  router.patch("/:id", auth, update(deps));

  return router;
}
