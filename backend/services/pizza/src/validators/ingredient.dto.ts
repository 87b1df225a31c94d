import {
  zIngredientCreate,
  zIngredientPatch,
  type IngredientPatchInput,
} from "@shared/contracts/ingredient.contract";
import { keep, setTo, type IngredientPatch } from "../contracts/catalog";
import { singleSource } from "./patchSource";

export const createIngredientDto = zIngredientCreate;

export function toIngredientPatch(input: IngredientPatchInput): IngredientPatch {
  return {
    name: input.name === undefined ? keep : setTo(input.name),
    category: input.category === undefined ? keep : setTo(input.category),
  };
}

export const updateIngredientDto = zIngredientPatch.transform(toIngredientPatch);

/** Query values are plain strings, so the body schema reads both. */
export function ingredientPatchFrom(body: unknown, query: unknown): IngredientPatch {
  return toIngredientPatch(
    singleSource(zIngredientPatch.parse(body ?? {}), zIngredientPatch.parse(query ?? {}))
  );
}
