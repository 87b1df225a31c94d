// backend/services/shared/contracts/user.contract.ts
import { z } from "zod";
import { zObjectId } from "./common";

export const PERMISSION_ORDINARY = 0;
export const PERMISSION_ELEVATED = 1;

/**
 * User as returned to clients. The password hash never leaves the service.
 */
export const zUserWire = z.object({
  id: zObjectId,
  username: z.string().min(1),
  email: z.string().email(),
  permission_level: z.union([
    z.literal(PERMISSION_ORDINARY),
    z.literal(PERMISSION_ELEVATED),
  ]),
});
export type UserWire = z.infer<typeof zUserWire>;

/**
 * Inputs
 * - Signup is JSON; permission level is not caller-controlled.
 * - Login mirrors an OAuth2 password form: extra form fields are ignored.
 */
export const zUserCreate = z.object({
  username: z.string().trim().min(1).max(64),
  email: z.string().trim().toLowerCase().email(),
  password: z.string().min(6).max(128),
});
export type UserCreate = z.infer<typeof zUserCreate>;

export const zLogin = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});
export type Login = z.infer<typeof zLogin>;

export const zTokenPair = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  token_type: z.literal("bearer"),
});
export type TokenPair = z.infer<typeof zTokenPair>;
