// backend/services/pizza/src/controllers/pizza/handlers/update.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { logger, requestIdOf } from "@shared/utils/logger";
import { NotFoundError } from "@shared/http/errors";
import type { ServiceDeps } from "../../../deps";
import { findByIdDto } from "../../../validators/params.dto";
import { pizzaPatchFrom } from "../../../validators/pizza.dto";
import { pizzaDetailsToWire } from "../../../mappers/wire.mapper";

/**
 * PATCH /pizzas/:id (auth)
 * Fields come as query parameters or a JSON body. Only supplied fields
 * change; responds with the full pizza detail.
 */
export function update({ stores }: ServiceDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    const { id } = findByIdDto.parse(req.params);
    const patch = pizzaPatchFrom(req.body, req.query);
    logger.debug({ requestId, pizzaId: id }, "[PizzaHandlers.update] enter");

    const details = await stores.withStore(async (store) => {
      const updated = await store.pizzas.update(id, patch);
      if (!updated) return null;
      return store.pizzas.findDetails(id);
    });
    if (!details) {
      logger.debug({ requestId, pizzaId: id }, "[PizzaHandlers.update] not_found");
      throw new NotFoundError("Pizza not found.");
    }

    logger.debug({ requestId, pizzaId: id }, "[PizzaHandlers.update] exit");
    res.json(pizzaDetailsToWire(details));
  });
}
