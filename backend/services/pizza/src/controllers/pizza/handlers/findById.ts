// backend/services/pizza/src/controllers/pizza/handlers/findById.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { logger, requestIdOf } from "@shared/utils/logger";
import { NotFoundError } from "@shared/http/errors";
import type { ServiceDeps } from "../../../deps";
import { findByIdDto } from "../../../validators/params.dto";
import { pizzaDetailsToWire } from "../../../mappers/wire.mapper";

export function findById({ stores }: ServiceDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    const { id } = findByIdDto.parse(req.params);
    logger.debug({ requestId, pizzaId: id }, "[PizzaHandlers.findById] enter");

    const details = await stores.withStore((store) => store.pizzas.findDetails(id));
    if (!details) {
      logger.debug({ requestId, pizzaId: id }, "[PizzaHandlers.findById] not_found");
      throw new NotFoundError("Pizza not found");
    }

    logger.debug({ requestId, pizzaId: id }, "[PizzaHandlers.findById] exit");
    res.json(pizzaDetailsToWire(details));
  });
}
