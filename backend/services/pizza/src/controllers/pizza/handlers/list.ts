// backend/services/pizza/src/controllers/pizza/handlers/list.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { logger, requestIdOf } from "@shared/utils/logger";
import type { ServiceDeps } from "../../../deps";
import { pizzaSummaryToWire } from "../../../mappers/wire.mapper";

/**
 * GET /pizzas (auth)
 * Every caller currently sees all pizzas, inactive ones included.
 */
export function list({ stores }: ServiceDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    logger.debug({ requestId, userId: req.user?.id }, "[PizzaHandlers.list] enter");

    const getAll = true;
    const items = await stores.withStore((store) => store.pizzas.list(getAll));

    logger.debug({ requestId, count: items.length }, "[PizzaHandlers.list] exit");
    res.json(items.map(pizzaSummaryToWire));
  });
}
