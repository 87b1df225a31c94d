// backend/services/pizza/src/deps.ts
import type { StoreProvider } from "./repo/store";

/** What routes/handlers are built from; index.ts wires Mongo, tests an in-memory store. */
export type ServiceDeps = {
  stores: StoreProvider;
};
