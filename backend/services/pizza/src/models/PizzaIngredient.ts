// backend/services/pizza/src/models/PizzaIngredient.ts
import { Schema, model, type Types } from "mongoose";

export interface PizzaIngredientDoc {
  pizzaId: Types.ObjectId;
  ingredientId: Types.ObjectId;
  dateCreated: Date;
}

const PizzaIngredientSchema = new Schema<PizzaIngredientDoc>(
  {
    pizzaId: { type: Schema.Types.ObjectId, ref: "Pizza", required: true },
    ingredientId: { type: Schema.Types.ObjectId, ref: "Ingredient", required: true },
  },
  {
    collection: "pizza_ingredients",
    strict: true,
    versionKey: false,
    timestamps: { createdAt: "dateCreated", updatedAt: false },
  }
);

PizzaIngredientSchema.index(
  { pizzaId: 1, ingredientId: 1 },
  { unique: true, name: "uniq_pizzaId_ingredientId" }
);

export const PizzaIngredientModel = model<PizzaIngredientDoc>(
  "PizzaIngredient",
  PizzaIngredientSchema
);
