// backend/services/pizza/src/repo/mongoStore.ts
import mongoose, { type ClientSession } from "mongoose";
import { logger } from "@shared/utils/logger";
import { createUserRepo } from "./userRepo";
import { createPizzaRepo } from "./pizzaRepo";
import { createIngredientRepo } from "./ingredientRepo";
import { createPizzaIngredientRepo } from "./pizzaIngredientRepo";
import type { CatalogStore, StoreProvider } from "./store";

function bindStore(session: ClientSession): CatalogStore {
  return {
    users: createUserRepo(session),
    pizzas: createPizzaRepo(session),
    ingredients: createIngredientRepo(session),
    pizzaIngredients: createPizzaIngredientRepo(session),
  };
}

/**
 * One Mongo session per unit of work. With transactions on (replica set
 * required) the whole unit commits or aborts together.
 */
export class MongoStoreProvider implements StoreProvider {
  constructor(private readonly opts: { transactions: boolean }) {}

  async withStore<T>(work: (store: CatalogStore) => Promise<T>): Promise<T> {
    const session = await mongoose.startSession();
    try {
      const store = bindStore(session);
      if (!this.opts.transactions) return await work(store);

      const holder: { result?: { value: T } } = {};
      await session.withTransaction(async () => {
        holder.result = { value: await work(store) };
      });
      if (!holder.result) {
        throw new Error("transaction completed without a result");
      }
      return holder.result.value;
    } finally {
      await session.endSession().catch((err: unknown) => {
        logger.warn({ err }, "[mongoStore] endSession failed");
      });
    }
  }

  async readiness(): Promise<Record<string, unknown>> {
    const state = mongoose.connection.readyState; // 1 = connected
    if (state !== 1) throw new Error(`mongo not connected (state=${state})`);
    return { mongo: "ok", transactions: this.opts.transactions };
  }
}
