// backend/services/pizza/src/controllers/auth/handlers/signup.ts
/**
 * POST /signup
 * Body: { username, email, password }
 * Behavior: reject a taken username, hash the password, create the user.
 * The unique indexes settle races the pre-check cannot see.
 */
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { logger, requestIdOf } from "@shared/utils/logger";
import { ConflictError } from "@shared/http/errors";
import { DuplicateKeyError } from "@shared/db/dupeKeyError";
import { PERMISSION_ORDINARY } from "@shared/contracts/user.contract";
import type { ServiceDeps } from "../../../deps";
import { signupDto } from "../../../validators/user.dto";
import { hashPassword } from "../../../security/password";
import { userToWire } from "../../../mappers/wire.mapper";

const USERNAME_TAKEN = "The username already exists";
const EMAIL_TAKEN = "The email is already registered";

function conflictFor(err: DuplicateKeyError): ConflictError {
  const onEmail = err.index?.includes("email") || (err.key !== undefined && "email" in err.key);
  return new ConflictError(onEmail ? EMAIL_TAKEN : USERNAME_TAKEN);
}

export function signup({ stores }: ServiceDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[AuthHandlers.signup] enter");
    const dto = signupDto.parse(req.body);

    const created = await stores.withStore(async (store) => {
      const existing = await store.users.findByUsername(dto.username);
      if (existing) throw new ConflictError(USERNAME_TAKEN);

      const passwordHash = await hashPassword(dto.password);
      try {
        return await store.users.create({
          username: dto.username,
          email: dto.email,
          passwordHash,
          permissionLevel: PERMISSION_ORDINARY,
        });
      } catch (err) {
        if (err instanceof DuplicateKeyError) throw conflictFor(err);
        throw err;
      }
    });

    logger.debug({ requestId, userId: created.id }, "[AuthHandlers.signup] exit");
    res.status(201).json(userToWire(created));
  });
}
