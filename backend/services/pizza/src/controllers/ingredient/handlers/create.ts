// backend/services/pizza/src/controllers/ingredient/handlers/create.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { logger, requestIdOf } from "@shared/utils/logger";
import type { ServiceDeps } from "../../../deps";
import { createIngredientDto } from "../../../validators/ingredient.dto";
import { ingredientToWire } from "../../../mappers/wire.mapper";

export function create({ stores }: ServiceDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    logger.debug({ requestId, userId: req.user?.id }, "[IngredientHandlers.create] enter");

    const dto = createIngredientDto.parse(req.body);
    const created = await stores.withStore((store) => store.ingredients.create(dto));

    logger.debug({ requestId, ingredientId: created.id }, "[IngredientHandlers.create] exit");
    res.status(201).json(ingredientToWire(created));
  });
}
