// backend/services/pizza/src/repo/pizzaIngredientRepo.ts
import type { ClientSession } from "mongoose";
import { PizzaIngredientModel } from "../models/PizzaIngredient";
import { IngredientModel } from "../models/Ingredient";
import { pizzaIngredientFromDb } from "../mappers/db.mapper";
import { rethrowDuplicate } from "@shared/db/dupeKeyError";
import type { PizzaIngredientRepo } from "./store";

/**
 * Lookups are by the exact (pizzaId, ingredientId) pair, never one side alone.
 * Every link holds one unit of its ingredient's refCount, taken before the
 * insert and given back on removal, so the ingredient document itself
 * arbitrates between linking and deleting.
 */
export function createPizzaIngredientRepo(
  session: ClientSession
): PizzaIngredientRepo {
  function releaseRef(ingredientId: string) {
    return IngredientModel.updateOne(
      { _id: ingredientId, refCount: { $gt: 0 } },
      { $inc: { refCount: -1 } },
      { session }
    ).exec();
  }

  return {
    async find(pizzaId, ingredientId) {
      const doc = await PizzaIngredientModel.findOne({ pizzaId, ingredientId })
        .session(session)
        .exec();
      return doc ? pizzaIngredientFromDb(doc) : null;
    },

    async create(pizzaId, ingredientId) {
      const claimed = await IngredientModel.updateOne(
        { _id: ingredientId },
        { $inc: { refCount: 1 } },
        { session }
      ).exec();
      if (claimed.matchedCount === 0) return null;

      try {
        const saved = await new PizzaIngredientModel({
          pizzaId,
          ingredientId,
        }).save({ session });
        return pizzaIngredientFromDb(saved);
      } catch (err) {
        await releaseRef(ingredientId);
        return rethrowDuplicate(err);
      }
    },

    async delete(pizzaId, ingredientId) {
      const res = await PizzaIngredientModel.deleteOne(
        { pizzaId, ingredientId },
        { session }
      ).exec();
      if (res.deletedCount === 0) return false;
      await releaseRef(ingredientId);
      return true;
    },
  };
}
