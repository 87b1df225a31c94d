// backend/services/pizza/test/helpers/memoryStore.ts
/**
 * In-process StoreProvider with the same observable rules as the Mongo
 * store: unique username/email/pair (raised as DuplicateKeyError with the
 * Mongo index names), live ingredient counts, blocked ingredient deletes.
 */
import { Types } from "mongoose";
import { DuplicateKeyError } from "@shared/db/dupeKeyError";
import {
  applyField,
  type Ingredient,
  type Pizza,
  type PizzaIngredient,
  type User,
  type UserRecord,
} from "../../src/contracts/catalog";
import type { CatalogStore, StoreProvider } from "../../src/repo/store";

function newId(): string {
  return new Types.ObjectId().toHexString();
}

function duplicate(index: string, key: Record<string, unknown>): DuplicateKeyError {
  return new DuplicateKeyError({
    index,
    key,
    message: `E11000 duplicate key error collection: index: ${index} dup key: ${JSON.stringify(key)}`,
  });
}

function publicUser(record: UserRecord): User {
  const { passwordHash: _hash, ...user } = record;
  return user;
}

export class MemoryStoreProvider implements StoreProvider {
  readonly users = new Map<string, UserRecord>();
  readonly pizzas = new Map<string, Pizza>();
  readonly ingredients = new Map<string, Ingredient>();
  links: PizzaIngredient[] = [];

  acquired = 0;
  released = 0;
  /** When set, readiness() throws this message. */
  unavailable: string | null = null;

  async withStore<T>(work: (store: CatalogStore) => Promise<T>): Promise<T> {
    this.acquired += 1;
    try {
      return await work(this.bind());
    } finally {
      this.released += 1;
    }
  }

  async readiness(): Promise<Record<string, unknown>> {
    if (this.unavailable) throw new Error(this.unavailable);
    return { store: "memory" };
  }

  private countFor(pizzaId: string): number {
    return this.links.filter((l) => l.pizzaId === pizzaId).length;
  }

  private bind(): CatalogStore {
    return {
      users: {
        findByUsername: async (username) =>
          [...this.users.values()].find((u) => u.username === username) ?? null,
        findByEmail: async (email) =>
          [...this.users.values()].find((u) => u.email === email) ?? null,
        create: async (input) => {
          for (const u of this.users.values()) {
            if (u.username === input.username) {
              throw duplicate("uniq_username", { username: input.username });
            }
            if (u.email === input.email) {
              throw duplicate("uniq_email", { email: input.email });
            }
          }
          const record: UserRecord = { id: newId(), ...input };
          this.users.set(record.id, record);
          return publicUser(record);
        },
      },

      pizzas: {
        list: async (getAll) =>
          [...this.pizzas.values()]
            .filter((p) => getAll || p.isActive)
            .map((p) => ({ ...p, ingredientNumber: this.countFor(p.id) })),
        findById: async (id) => this.pizzas.get(id) ?? null,
        findDetails: async (id) => {
          const pizza = this.pizzas.get(id);
          if (!pizza) return null;
          const ingredients: Ingredient[] = [];
          for (const link of this.links) {
            const ingredient =
              link.pizzaId === id ? this.ingredients.get(link.ingredientId) : undefined;
            if (ingredient) ingredients.push(ingredient);
          }
          return { ...pizza, ingredientNumber: this.countFor(id), ingredients };
        },
        create: async (input) => {
          const pizza: Pizza = { id: newId(), ...input };
          this.pizzas.set(pizza.id, pizza);
          return pizza;
        },
        update: async (id, patch) => {
          const current = this.pizzas.get(id);
          if (!current) return null;
          const next: Pizza = {
            id,
            name: applyField(current.name, patch.name),
            price: applyField(current.price, patch.price),
            isActive: applyField(current.isActive, patch.isActive),
          };
          this.pizzas.set(id, next);
          return next;
        },
      },

      ingredients: {
        findById: async (id) => this.ingredients.get(id) ?? null,
        create: async (input) => {
          const ingredient: Ingredient = { id: newId(), ...input };
          this.ingredients.set(ingredient.id, ingredient);
          return ingredient;
        },
        update: async (id, patch) => {
          const current = this.ingredients.get(id);
          if (!current) return null;
          const next: Ingredient = {
            id,
            name: applyField(current.name, patch.name),
            category: applyField(current.category, patch.category),
          };
          this.ingredients.set(id, next);
          return next;
        },
        delete: async (id) => {
          const references = this.links.filter((l) => l.ingredientId === id).length;
          if (references > 0) return { outcome: "blocked", references };
          const ingredient = this.ingredients.get(id);
          if (!ingredient) return { outcome: "missing" };
          this.ingredients.delete(id);
          return { outcome: "deleted", ingredient };
        },
      },

      pizzaIngredients: {
        find: async (pizzaId, ingredientId) =>
          this.links.find(
            (l) => l.pizzaId === pizzaId && l.ingredientId === ingredientId
          ) ?? null,
        create: async (pizzaId, ingredientId) => {
          if (!this.ingredients.has(ingredientId)) return null;
          if (
            this.links.some(
              (l) => l.pizzaId === pizzaId && l.ingredientId === ingredientId
            )
          ) {
            throw duplicate("uniq_pizzaId_ingredientId", { pizzaId, ingredientId });
          }
          const link: PizzaIngredient = { pizzaId, ingredientId };
          this.links.push(link);
          return link;
        },
        delete: async (pizzaId, ingredientId) => {
          const before = this.links.length;
          this.links = this.links.filter(
            (l) => !(l.pizzaId === pizzaId && l.ingredientId === ingredientId)
          );
          return this.links.length < before;
        },
      },
    };
  }
}
