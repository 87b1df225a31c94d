// backend/services/pizza/src/repo/pizzaRepo.ts
import { Types, type ClientSession } from "mongoose";
import { PizzaModel, type PizzaDoc } from "../models/Pizza";
import { IngredientModel } from "../models/Ingredient";
import { PizzaIngredientModel } from "../models/PizzaIngredient";
import { ingredientFromDb, pizzaFromDb } from "../mappers/db.mapper";
import type { Ingredient } from "../contracts/catalog";
import type { PizzaRepo } from "./store";

type CountRow = { _id: Types.ObjectId; count: number };

export function createPizzaRepo(session: ClientSession): PizzaRepo {
  async function countIngredients(
    pizzaIds: Types.ObjectId[]
  ): Promise<Map<string, number>> {
    const rows = await PizzaIngredientModel.aggregate<CountRow>([
      { $match: { pizzaId: { $in: pizzaIds } } },
      { $group: { _id: "$pizzaId", count: { $sum: 1 } } },
    ]).session(session);
    return new Map(rows.map((r) => [r._id.toHexString(), r.count]));
  }

  return {
    async list(getAll) {
      const filter = getAll ? {} : { isActive: true };
      const docs = await PizzaModel.find(filter)
        .sort({ _id: 1 })
        .session(session)
        .exec();
      const counts = await countIngredients(docs.map((d) => d._id));
      return docs.map((d) => ({
        ...pizzaFromDb(d),
        ingredientNumber: counts.get(d._id.toHexString()) ?? 0,
      }));
    },

    async findById(id) {
      const doc = await PizzaModel.findById(id).session(session).exec();
      return doc ? pizzaFromDb(doc) : null;
    },

    async findDetails(id) {
      const doc = await PizzaModel.findById(id).session(session).exec();
      if (!doc) return null;

      const links = await PizzaIngredientModel.find({ pizzaId: doc._id })
        .sort({ _id: 1 })
        .session(session)
        .exec();
      const ingredientDocs = await IngredientModel.find({
        _id: { $in: links.map((l) => l.ingredientId) },
      })
        .session(session)
        .exec();

      const byId = new Map(
        ingredientDocs.map((i) => [i._id.toHexString(), ingredientFromDb(i)])
      );
      const ingredients: Ingredient[] = [];
      for (const link of links) {
        const ingredient = byId.get(link.ingredientId.toHexString());
        if (ingredient) ingredients.push(ingredient);
      }

      return {
        ...pizzaFromDb(doc),
        ingredientNumber: links.length,
        ingredients,
      };
    },

    async create(input) {
      const saved = await new PizzaModel(input).save({ session });
      return pizzaFromDb(saved);
    },

    async update(id, patch) {
      const $set: Partial<Pick<PizzaDoc, "name" | "price" | "isActive">> = {};
      if (patch.name.kind === "set") $set.name = patch.name.value;
      if (patch.price.kind === "set") $set.price = patch.price.value;
      if (patch.isActive.kind === "set") $set.isActive = patch.isActive.value;

      const doc = await PizzaModel.findByIdAndUpdate(
        id,
        { $set },
        { new: true, runValidators: true, session }
      ).exec();
      return doc ? pizzaFromDb(doc) : null;
    },
  };
}
