// backend/services/pizza/src/mappers/wire.mapper.ts
/**
 * Domain → wire (snake_case) mappers for response bodies.
 */
import type { UserWire } from "@shared/contracts/user.contract";
import type { IngredientWire } from "@shared/contracts/ingredient.contract";
import type {
  PizzaDetailsWire,
  PizzaIngredientWire,
  PizzaListItem,
  PizzaWire,
} from "@shared/contracts/pizza.contract";
import type {
  Ingredient,
  Pizza,
  PizzaDetails,
  PizzaIngredient,
  PizzaSummary,
  User,
} from "../contracts/catalog";

export function userToWire(user: User): UserWire {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    permission_level: user.permissionLevel,
  };
}

export function pizzaToWire(pizza: Pizza): PizzaWire {
  return {
    id: pizza.id,
    name: pizza.name,
    price: pizza.price,
    is_active: pizza.isActive,
  };
}

export function pizzaSummaryToWire(pizza: PizzaSummary): PizzaListItem {
  return { ...pizzaToWire(pizza), ingredient_number: pizza.ingredientNumber };
}

export function ingredientToWire(ingredient: Ingredient): IngredientWire {
  return {
    id: ingredient.id,
    name: ingredient.name,
    category: ingredient.category,
  };
}

export function pizzaDetailsToWire(pizza: PizzaDetails): PizzaDetailsWire {
  return {
    ...pizzaSummaryToWire(pizza),
    ingredients: pizza.ingredients.map(ingredientToWire),
  };
}

export function pizzaIngredientToWire(link: PizzaIngredient): PizzaIngredientWire {
  return { pizza_id: link.pizzaId, ingredient_id: link.ingredientId };
}
