// backend/services/shared/contracts/pizza.contract.ts
import { z } from "zod";
import { zObjectId } from "./common";
import { zIngredientWire } from "./ingredient.contract";

/** Price is an integer amount in the smallest currency unit. */
const zPrice = z.number().int().min(0);

export const zPizzaWire = z.object({
  id: zObjectId,
  name: z.string().min(1),
  price: zPrice,
  is_active: z.boolean(),
});
export type PizzaWire = z.infer<typeof zPizzaWire>;

export const zPizzaListItem = zPizzaWire.extend({
  ingredient_number: z.number().int().min(0),
});
export type PizzaListItem = z.infer<typeof zPizzaListItem>;

export const zPizzaDetails = zPizzaListItem.extend({
  ingredients: z.array(zIngredientWire),
});
export type PizzaDetailsWire = z.infer<typeof zPizzaDetails>;

export const zPizzaCreate = z
  .object({
    name: z.string().trim().min(1).max(100),
    price: zPrice,
    is_active: z.boolean().default(true),
  })
  .strict();
export type PizzaCreate = z.infer<typeof zPizzaCreate>;

/** Absent = leave unchanged. null is rejected: fields cannot be cleared. */
export const zPizzaPatch = z
  .object({
    name: z.string().trim().min(1).max(100).optional(),
    price: zPrice.optional(),
    is_active: z.boolean().optional(),
  })
  .strict();
export type PizzaPatchInput = z.infer<typeof zPizzaPatch>;

/**
 * Same fields as zPizzaPatch, as query-string values:
 * `?price=1000&is_active=false`.
 */
export const zPizzaPatchQuery = z
  .object({
    name: z.string().trim().min(1).max(100).optional(),
    price: z.coerce.number().int().min(0).optional(),
    is_active: z
      .enum(["true", "false"])
      .transform((v) => v === "true")
      .optional(),
  })
  .strict();

export const zPizzaIngredientWire = z.object({
  pizza_id: zObjectId,
  ingredient_id: zObjectId,
});
export type PizzaIngredientWire = z.infer<typeof zPizzaIngredientWire>;

export const zCompletion = z.object({
  status: z.literal("completed"),
  detail: z.string(),
});
export type Completion = z.infer<typeof zCompletion>;
