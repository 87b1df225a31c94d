// backend/services/pizza/src/validators/params.dto.ts
import { z } from "zod";
import { zObjectId } from "@shared/contracts/common";

/** PARAMS: /:id */
export const findByIdDto = z.object({ id: zObjectId });

/** PARAMS: /ingredients/:pizzaId/:ingredientId */
export const pizzaIngredientParamsDto = z.object({
  pizzaId: zObjectId,
  ingredientId: zObjectId,
});
