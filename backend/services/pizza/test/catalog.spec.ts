// backend/services/pizza/test/catalog.spec.ts
import { describe, it, expect } from "vitest";
import { applyField, keep, setTo } from "../src/contracts/catalog";
import { updatePizzaDto } from "../src/validators/pizza.dto";
import { updateIngredientDto } from "../src/validators/ingredient.dto";

describe("FieldUpdate", () => {
  it("keep leaves the current value", () => {
    expect(applyField("Margherita", keep)).toBe("Margherita");
  });

  it("set replaces it, falsy values included", () => {
    expect(applyField(true, setTo(false))).toBe(false);
    expect(applyField(900, setTo(0))).toBe(0);
  });
});

describe("patch DTOs", () => {
  it("absent pizza fields become keep", () => {
    expect(updatePizzaDto.parse({ price: 1000 })).toEqual({
      name: keep,
      price: { kind: "set", value: 1000 },
      isActive: keep,
    });
  });

  it("trims a supplied ingredient name", () => {
    expect(updateIngredientDto.parse({ name: "  Basil " })).toEqual({
      name: { kind: "set", value: "Basil" },
      category: keep,
    });
  });

  it("rejects null and empty names", () => {
    expect(updatePizzaDto.safeParse({ name: null }).success).toBe(false);
    expect(updateIngredientDto.safeParse({ name: "   " }).success).toBe(false);
  });
});
