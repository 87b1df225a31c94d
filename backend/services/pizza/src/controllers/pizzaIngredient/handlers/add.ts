// backend/services/pizza/src/controllers/pizzaIngredient/handlers/add.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { logger, requestIdOf } from "@shared/utils/logger";
import { ConflictError, NotFoundError } from "@shared/http/errors";
import { DuplicateKeyError } from "@shared/db/dupeKeyError";
import type { ServiceDeps } from "../../../deps";
import { pizzaIngredientParamsDto } from "../../../validators/params.dto";
import { pizzaIngredientToWire } from "../../../mappers/wire.mapper";

const DUPLICATE = "Association already exists";
const INGREDIENT_MISSING = "Ingredient not found";

/**
 * POST /pizzas/ingredients/:pizzaId/:ingredientId (auth)
 * Both parents must exist; a pair may be linked once.
 */
export function add({ stores }: ServiceDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    const { pizzaId, ingredientId } = pizzaIngredientParamsDto.parse(req.params);
    logger.debug({ requestId, pizzaId, ingredientId }, "[PizzaIngredientHandlers.add] enter");

    const created = await stores.withStore(async (store) => {
      if (!(await store.pizzas.findById(pizzaId))) {
        throw new NotFoundError("Pizza not found");
      }
      if (!(await store.ingredients.findById(ingredientId))) {
        throw new NotFoundError(INGREDIENT_MISSING);
      }
      if (await store.pizzaIngredients.find(pizzaId, ingredientId)) {
        throw new ConflictError(DUPLICATE);
      }
      try {
        return await store.pizzaIngredients.create(pizzaId, ingredientId);
      } catch (err) {
        if (err instanceof DuplicateKeyError) throw new ConflictError(DUPLICATE);
        throw err;
      }
    });
    // deleted between the existence check and the link
    if (!created) throw new NotFoundError(INGREDIENT_MISSING);

    logger.debug({ requestId, pizzaId, ingredientId }, "[PizzaIngredientHandlers.add] exit");
    res.status(201).json(pizzaIngredientToWire(created));
  });
}
