// backend/services/pizza/src/controllers/auth/handlers/login.ts
/**
 * POST /login
 * Body (form or JSON): { username, password }
 * Unknown user and wrong password fail with the same generic error and
 * the same bcrypt work.
 */
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { logger, requestIdOf } from "@shared/utils/logger";
import { InvalidCredentialsError } from "@shared/http/errors";
import type { TokenPair } from "@shared/contracts/user.contract";
import type { ServiceDeps } from "../../../deps";
import { loginDto } from "../../../validators/user.dto";
import { verifyPassword } from "../../../security/password";
import { issueAccessToken, issueRefreshToken } from "../../../security/tokens";

export function login({ stores }: ServiceDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[AuthHandlers.login] enter");
    const dto = loginDto.parse(req.body);

    const user = await stores.withStore((store) =>
      store.users.findByUsername(dto.username)
    );
    const matches = await verifyPassword(dto.password, user?.passwordHash ?? null);
    if (!user || !matches) {
      logger.debug({ requestId }, "[AuthHandlers.login] rejected");
      throw new InvalidCredentialsError();
    }

    const body: TokenPair = {
      access_token: issueAccessToken(user.email),
      refresh_token: issueRefreshToken(user.email),
      token_type: "bearer",
    };

    logger.debug({ requestId, userId: user.id }, "[AuthHandlers.login] exit");
    res.json(body);
  });
}
