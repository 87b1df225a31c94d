// backend/services/pizza/src/controllers/ingredient/handlers/remove.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { logger, requestIdOf } from "@shared/utils/logger";
import { ConflictError, NotFoundError } from "@shared/http/errors";
import type { Completion } from "@shared/contracts/pizza.contract";
import type { ServiceDeps } from "../../../deps";
import { findByIdDto } from "../../../validators/params.dto";

/**
 * DELETE /ingredients/:id (auth)
 * Refused while any pizza still lists the ingredient.
 */
export function remove({ stores }: ServiceDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    const { id } = findByIdDto.parse(req.params);
    logger.debug({ requestId, ingredientId: id }, "[IngredientHandlers.remove] enter");

    const result = await stores.withStore((store) => store.ingredients.delete(id));
    switch (result.outcome) {
      case "missing":
        logger.debug({ requestId, ingredientId: id }, "[IngredientHandlers.remove] not_found");
        throw new NotFoundError("Ingredient not found.");
      case "blocked":
        logger.debug(
          { requestId, ingredientId: id, references: result.references },
          "[IngredientHandlers.remove] conflict"
        );
        throw new ConflictError("Cannot delete an ingredient in an active pizza");
      case "deleted": {
        const { ingredient } = result;
        const body: Completion = {
          status: "completed",
          detail: `Ingredient ${ingredient.name} with id ${ingredient.id} deleted`,
        };
        logger.debug({ requestId, ingredientId: id }, "[IngredientHandlers.remove] exit");
        res.json(body);
      }
    }
  });
}
