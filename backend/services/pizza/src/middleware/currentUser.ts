// backend/services/pizza/src/middleware/currentUser.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { logger, requestIdOf } from "@shared/utils/logger";
import { UnauthorizedError } from "@shared/http/errors";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import type { User } from "../contracts/catalog";
import type { StoreProvider } from "../repo/store";
import { verifyAccessToken } from "../security/tokens";

/** Module augmentation: add `user` to Express.Request */
declare module "express-serve-static-core" {
  interface Request {
    user?: User;
  }
}

function bearerToken(req: Request): string | null {
  const auth = req.headers.authorization;
  if (!auth) return null;
  const [scheme, token] = auth.trim().split(/\s+/, 2);
  if (!scheme || scheme.toLowerCase() !== "bearer" || !token) return null;
  return token;
}

/**
 * Resolve the calling user from a bearer access token.
 * Missing/invalid/expired token, a refresh token, or an unknown subject → 401.
 */
export async function resolveCurrentUser(
  stores: StoreProvider,
  token: string | null
): Promise<User> {
  if (!token) throw new UnauthorizedError("Not authenticated");

  const subject = verifyAccessToken(token);
  if (!subject) throw new UnauthorizedError();

  const record = await stores.withStore((store) =>
    store.users.findByEmail(subject)
  );
  if (!record) throw new UnauthorizedError();

  const { passwordHash: _hash, ...user } = record;
  return user;
}

export function requireUser(stores: StoreProvider): RequestHandler {
  return asyncHandler(async (req: Request, _res: Response, next: NextFunction) => {
    req.user = await resolveCurrentUser(stores, bearerToken(req));
    logger.debug(
      { requestId: requestIdOf(req), userId: req.user.id },
      "[requireUser] resolved"
    );
    next();
  });
}
