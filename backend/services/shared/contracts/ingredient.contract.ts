// backend/services/shared/contracts/ingredient.contract.ts
import { z } from "zod";
import { zObjectId } from "./common";

export const zIngredientWire = z.object({
  id: zObjectId,
  name: z.string().min(1),
  category: z.string().min(1),
});
export type IngredientWire = z.infer<typeof zIngredientWire>;

export const zIngredientCreate = z
  .object({
    name: z.string().trim().min(1).max(100),
    category: z.string().trim().min(1).max(100),
  })
  .strict();
export type IngredientCreate = z.infer<typeof zIngredientCreate>;

/** Absent = leave unchanged. null is rejected: fields cannot be cleared. */
export const zIngredientPatch = zIngredientCreate.partial().strict();
export type IngredientPatchInput = z.infer<typeof zIngredientPatch>;
