// backend/services/pizza/src/controllers/root/handlers/welcome.ts
import type { Request, Response } from "express";

export function welcome(_req: Request, res: Response) {
  res.json({ Welcome: "to the pizza app" });
}
