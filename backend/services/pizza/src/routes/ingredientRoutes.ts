// backend/services/pizza/src/routes/ingredientRoutes.ts
import { Router } from "express";
import type { ServiceDeps } from "../deps";
import { requireUser } from "../middleware/currentUser";

import { create } from "../controllers/ingredient/handlers/create";
import { update } from "../controllers/ingredient/handlers/update";
import { remove } from "../controllers/ingredient/handlers/remove";

export function ingredientRoutes(deps: ServiceDeps): Router {
  const router = Router();

  // every ingredient route is authenticated
  router.use(requireUser(deps.stores));

  router.post("/", create(deps));
  router.patch("/:id", update(deps));
  router.delete("/:id", remove(deps));

  return router;
}
