// backend/services/pizza/src/models/Ingredient.ts
import { Schema, model } from "mongoose";

export interface IngredientDoc {
  name: string;
  category: string;
  /** Live association count; deletion only matches at 0. */
  refCount: number;
  dateCreated: Date;
  dateLastUpdated: Date;
}

const IngredientSchema = new Schema<IngredientDoc>(
  {
    name: { type: String, required: true, trim: true, index: true },
    category: { type: String, required: true, trim: true },
    refCount: { type: Number, required: true, default: 0, min: 0 },
  },
  {
    collection: "ingredients",
    strict: true,
    versionKey: false,
    timestamps: { createdAt: "dateCreated", updatedAt: "dateLastUpdated" },
  }
);

export const IngredientModel = model<IngredientDoc>("Ingredient", IngredientSchema);
