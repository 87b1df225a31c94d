// backend/services/pizza/src/controllers/pizza/handlers/create.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { logger, requestIdOf } from "@shared/utils/logger";
import type { ServiceDeps } from "../../../deps";
import { createPizzaDto } from "../../../validators/pizza.dto";
import { pizzaToWire } from "../../../mappers/wire.mapper";

export function create({ stores }: ServiceDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    logger.debug({ requestId, userId: req.user?.id }, "[PizzaHandlers.create] enter");

    const dto = createPizzaDto.parse(req.body);
    const created = await stores.withStore((store) => store.pizzas.create(dto));

    logger.debug({ requestId, pizzaId: created.id }, "[PizzaHandlers.create] exit");
    res.status(201).json(pizzaToWire(created));
  });
}
