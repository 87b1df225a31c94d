import {
  zPizzaCreate,
  zPizzaPatch,
  zPizzaPatchQuery,
  type PizzaPatchInput,
} from "@shared/contracts/pizza.contract";
import { keep, setTo, type NewPizza, type PizzaPatch } from "../contracts/catalog";
import { singleSource } from "./patchSource";

export const createPizzaDto = zPizzaCreate.transform(
  (v): NewPizza => ({ name: v.name, price: v.price, isActive: v.is_active })
);

export function toPizzaPatch(input: PizzaPatchInput): PizzaPatch {
  return {
    name: input.name === undefined ? keep : setTo(input.name),
    price: input.price === undefined ? keep : setTo(input.price),
    isActive: input.is_active === undefined ? keep : setTo(input.is_active),
  };
}

/** UPDATE: partial; absent fields stay as stored. */
export const updatePizzaDto = zPizzaPatch.transform(toPizzaPatch);

export function pizzaPatchFrom(body: unknown, query: unknown): PizzaPatch {
  return toPizzaPatch(
    singleSource(zPizzaPatch.parse(body ?? {}), zPizzaPatchQuery.parse(query ?? {}))
  );
}
