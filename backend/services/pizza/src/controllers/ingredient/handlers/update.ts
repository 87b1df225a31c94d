// backend/services/pizza/src/controllers/ingredient/handlers/update.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { logger, requestIdOf } from "@shared/utils/logger";
import { NotFoundError } from "@shared/http/errors";
import type { ServiceDeps } from "../../../deps";
import { findByIdDto } from "../../../validators/params.dto";
import { ingredientPatchFrom } from "../../../validators/ingredient.dto";
import { ingredientToWire } from "../../../mappers/wire.mapper";

export function update({ stores }: ServiceDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    const { id } = findByIdDto.parse(req.params);
    const patch = ingredientPatchFrom(req.body, req.query);
    logger.debug({ requestId, ingredientId: id }, "[IngredientHandlers.update] enter");

    const updated = await stores.withStore((store) => store.ingredients.update(id, patch));
    if (!updated) {
      logger.debug({ requestId, ingredientId: id }, "[IngredientHandlers.update] not_found");
      throw new NotFoundError("Ingredient not found.");
    }

    logger.debug({ requestId, ingredientId: id }, "[IngredientHandlers.update] exit");
    res.json(ingredientToWire(updated));
  });
}
