// backend/services/pizza/src/contracts/catalog.ts
/**
 * Domain shapes shared by the store layer and the handlers.
 * Wire (snake_case) shapes live in @shared/contracts; mappers convert.
 */

export type PermissionLevel = 0 | 1;

export type User = {
  id: string;
  username: string;
  email: string;
  permissionLevel: PermissionLevel;
};

/** Only the login path and identity resolution ever see the hash. */
export type UserRecord = User & { passwordHash: string };

export type NewUser = Omit<UserRecord, "id">;

export type Pizza = {
  id: string;
  name: string;
  price: number;
  isActive: boolean;
};

export type NewPizza = Omit<Pizza, "id">;

export type PizzaSummary = Pizza & {
  /** Live count of associations, never stored. */
  ingredientNumber: number;
};

export type Ingredient = {
  id: string;
  name: string;
  category: string;
};

export type NewIngredient = Omit<Ingredient, "id">;

export type PizzaDetails = PizzaSummary & { ingredients: Ingredient[] };

export type PizzaIngredient = {
  pizzaId: string;
  ingredientId: string;
};

/**
 * Partial-update slot: "keep" leaves the stored value alone, "set" replaces it.
 * Keeps "absent" distinct from any value, null included.
 */
export type FieldUpdate<T> = { kind: "keep" } | { kind: "set"; value: T };

export const keep: { kind: "keep" } = { kind: "keep" };

export function setTo<T>(value: T): FieldUpdate<T> {
  return { kind: "set", value };
}

export function applyField<T>(current: T, update: FieldUpdate<T>): T {
  return update.kind === "set" ? update.value : current;
}

export type PizzaPatch = {
  name: FieldUpdate<string>;
  price: FieldUpdate<number>;
  isActive: FieldUpdate<boolean>;
};

export type IngredientPatch = {
  name: FieldUpdate<string>;
  category: FieldUpdate<string>;
};

export type IngredientDeleteResult =
  | { outcome: "deleted"; ingredient: Ingredient }
  | { outcome: "blocked"; references: number }
  | { outcome: "missing" };
