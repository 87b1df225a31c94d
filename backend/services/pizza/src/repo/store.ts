// backend/services/pizza/src/repo/store.ts
/**
 * Store access layer contracts. Repos return domain objects only
 * (no raw mongoose docs) and raise DuplicateKeyError when a unique
 * index rejects a write.
 */
import type {
  Ingredient,
  IngredientDeleteResult,
  IngredientPatch,
  NewIngredient,
  NewPizza,
  NewUser,
  Pizza,
  PizzaDetails,
  PizzaIngredient,
  PizzaPatch,
  PizzaSummary,
  User,
  UserRecord,
} from "../contracts/catalog";

export interface UserRepo {
  findByUsername(username: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  create(input: NewUser): Promise<User>;
}

export interface PizzaRepo {
  /** getAll=false keeps only active pizzas. */
  list(getAll: boolean): Promise<PizzaSummary[]>;
  findById(id: string): Promise<Pizza | null>;
  findDetails(id: string): Promise<PizzaDetails | null>;
  create(input: NewPizza): Promise<Pizza>;
  update(id: string, patch: PizzaPatch): Promise<Pizza | null>;
}

export interface IngredientRepo {
  findById(id: string): Promise<Ingredient | null>;
  create(input: NewIngredient): Promise<Ingredient>;
  update(id: string, patch: IngredientPatch): Promise<Ingredient | null>;
  /**
   * Never throws for the still-referenced case; reports it as "blocked".
   * Must be atomic with PizzaIngredientRepo.create: a link can never be
   * added to an ingredient that this call removed.
   */
  delete(id: string): Promise<IngredientDeleteResult>;
}

export interface PizzaIngredientRepo {
  find(pizzaId: string, ingredientId: string): Promise<PizzaIngredient | null>;
  /** null when the ingredient no longer exists. */
  create(pizzaId: string, ingredientId: string): Promise<PizzaIngredient | null>;
  /** true when a row was removed. */
  delete(pizzaId: string, ingredientId: string): Promise<boolean>;
}

export interface CatalogStore {
  users: UserRepo;
  pizzas: PizzaRepo;
  ingredients: IngredientRepo;
  pizzaIngredients: PizzaIngredientRepo;
}

export interface StoreProvider {
  /**
   * Acquire a store scope for one unit of work; released on every exit path.
   */
  withStore<T>(work: (store: CatalogStore) => Promise<T>): Promise<T>;
  /** Readiness details; throws when the backing store is unavailable. */
  readiness(): Promise<Record<string, unknown>>;
}
