// backend/services/pizza/src/app.ts
/**
 * Assembly order: httpLogger → parsers → health (open) → routes → 404 → error.
 * The store provider is injected so tests can run the full HTTP surface
 * against an in-process store.
 */
import express, { type Express } from "express";
import { makeHttpLogger } from "@shared/middleware/httpLogger";
import { coreMiddleware } from "@shared/middleware/core";
import {
  notFoundProblemJson,
  errorProblemJson,
} from "@shared/middleware/problemJson";
import { createHealthRouter } from "@shared/health";
import { SERVICE_NAME } from "./config";
import type { ServiceDeps } from "./deps";
import { welcome } from "./controllers/root/handlers/welcome";
import { authRoutes } from "./routes/authRoutes";
import { pizzaRoutes } from "./routes/pizzaRoutes";
import { ingredientRoutes } from "./routes/ingredientRoutes";

const ROUTE_PREFIXES = ["/pizzas", "/ingredients", "/signup", "/login", "/health"];

export function createApp(deps: ServiceDeps): Express {
  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", true);

  app.use(makeHttpLogger(SERVICE_NAME));
  app.use(coreMiddleware());

  app.use(
    createHealthRouter({
      service: SERVICE_NAME,
      version: process.env.npm_package_version,
      readiness: () => deps.stores.readiness(),
    })
  );

  // one-liners only, no logic here
  app.get("/", welcome);
  app.use(authRoutes(deps));
  app.use("/pizzas", pizzaRoutes(deps));
  app.use("/ingredients", ingredientRoutes(deps));

  app.use(notFoundProblemJson(ROUTE_PREFIXES));
  app.use(errorProblemJson());

  return app;
}
