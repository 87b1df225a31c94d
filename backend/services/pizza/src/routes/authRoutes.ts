// backend/services/pizza/src/routes/authRoutes.ts
import { Router } from "express";
import type { ServiceDeps } from "../deps";

// Direct handler imports (no barrels, no adapters)
import { signup } from "../controllers/auth/handlers/signup";
import { login } from "../controllers/auth/handlers/login";

export function authRoutes(deps: ServiceDeps): Router {
  const router = Router();

  // one-liners only, no logic here
  router.post("/signup", signup(deps));
  router.post("/login", login(deps));

  return router;
}
