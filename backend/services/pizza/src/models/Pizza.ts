// backend/services/pizza/src/models/Pizza.ts
import { Schema, model } from "mongoose";

export interface PizzaDoc {
  name: string;
  price: number;
  isActive: boolean;
  dateCreated: Date;
  dateLastUpdated: Date;
}

const PizzaSchema = new Schema<PizzaDoc>(
  {
    name: { type: String, required: true, trim: true, index: true },
    price: {
      type: Number,
      required: true,
      min: 0,
      validate: {
        validator: (v: number) => Number.isInteger(v),
        message: "price must be an integer amount of the smallest currency unit",
      },
    },
    isActive: { type: Boolean, required: true, default: true, index: true },
  },
  {
    collection: "pizzas",
    strict: true,
    versionKey: false,
    timestamps: { createdAt: "dateCreated", updatedAt: "dateLastUpdated" },
  }
);

export const PizzaModel = model<PizzaDoc>("Pizza", PizzaSchema);
