// backend/services/pizza/src/mappers/db.mapper.ts
/**
 * DB → domain mappers. Keep thin; no business logic here.
 */
import type { HydratedDocument } from "mongoose";
import type { UserDoc } from "../models/User";
import type { PizzaDoc } from "../models/Pizza";
import type { IngredientDoc } from "../models/Ingredient";
import type { PizzaIngredientDoc } from "../models/PizzaIngredient";
import type {
  Ingredient,
  PermissionLevel,
  Pizza,
  PizzaIngredient,
  User,
  UserRecord,
} from "../contracts/catalog";

function toPermissionLevel(v: number): PermissionLevel {
  return v === 1 ? 1 : 0;
}

export function userFromDb(doc: HydratedDocument<UserDoc>): User {
  return {
    id: doc._id.toHexString(),
    username: doc.username,
    email: doc.email,
    permissionLevel: toPermissionLevel(doc.permissionLevel),
  };
}

export function userRecordFromDb(doc: HydratedDocument<UserDoc>): UserRecord {
  return { ...userFromDb(doc), passwordHash: doc.passwordHash };
}

export function pizzaFromDb(doc: HydratedDocument<PizzaDoc>): Pizza {
  return {
    id: doc._id.toHexString(),
    name: doc.name,
    price: doc.price,
    isActive: doc.isActive,
  };
}

export function ingredientFromDb(doc: HydratedDocument<IngredientDoc>): Ingredient {
  return {
    id: doc._id.toHexString(),
    name: doc.name,
    category: doc.category,
  };
}

export function pizzaIngredientFromDb(
  doc: HydratedDocument<PizzaIngredientDoc>
): PizzaIngredient {
  return {
    pizzaId: doc.pizzaId.toHexString(),
    ingredientId: doc.ingredientId.toHexString(),
  };
}
