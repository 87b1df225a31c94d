// backend/services/pizza/src/repo/ingredientRepo.ts
import type { ClientSession } from "mongoose";
import { IngredientModel, type IngredientDoc } from "../models/Ingredient";
import { ingredientFromDb } from "../mappers/db.mapper";
import type { IngredientRepo } from "./store";

export function createIngredientRepo(session: ClientSession): IngredientRepo {
  return {
    async findById(id) {
      const doc = await IngredientModel.findById(id).session(session).exec();
      return doc ? ingredientFromDb(doc) : null;
    },

    async create(input) {
      const saved = await new IngredientModel(input).save({ session });
      return ingredientFromDb(saved);
    },

    async update(id, patch) {
      const $set: Partial<Pick<IngredientDoc, "name" | "category">> = {};
      if (patch.name.kind === "set") $set.name = patch.name.value;
      if (patch.category.kind === "set") $set.category = patch.category.value;

      const doc = await IngredientModel.findByIdAndUpdate(
        id,
        { $set },
        { new: true, runValidators: true, session }
      ).exec();
      return doc ? ingredientFromDb(doc) : null;
    },

    async delete(id) {
      // single-document delete gated on the counter the link path increments
      const doc = await IngredientModel.findOneAndDelete(
        { _id: id, refCount: 0 },
        { session }
      ).exec();
      if (doc) return { outcome: "deleted", ingredient: ingredientFromDb(doc) };

      const existing = await IngredientModel.findById(id).session(session).exec();
      return existing
        ? { outcome: "blocked", references: existing.refCount }
        : { outcome: "missing" };
    },
  };
}
