// backend/services/pizza/src/controllers/pizzaIngredient/handlers/remove.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { logger, requestIdOf } from "@shared/utils/logger";
import { NotFoundError } from "@shared/http/errors";
import type { Completion } from "@shared/contracts/pizza.contract";
import type { ServiceDeps } from "../../../deps";
import { pizzaIngredientParamsDto } from "../../../validators/params.dto";

export function remove({ stores }: ServiceDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    const { pizzaId, ingredientId } = pizzaIngredientParamsDto.parse(req.params);
    logger.debug({ requestId, pizzaId, ingredientId }, "[PizzaIngredientHandlers.remove] enter");

    const removed = await stores.withStore((store) =>
      store.pizzaIngredients.delete(pizzaId, ingredientId)
    );
    if (!removed) {
      logger.debug(
        { requestId, pizzaId, ingredientId },
        "[PizzaIngredientHandlers.remove] not_found"
      );
      throw new NotFoundError("Association not found");
    }

    const body: Completion = {
      status: "completed",
      detail: `Ingredient ${ingredientId} removed from pizza ${pizzaId}`,
    };
    logger.debug({ requestId, pizzaId, ingredientId }, "[PizzaIngredientHandlers.remove] exit");
    res.json(body);
  });
}
