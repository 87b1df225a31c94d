import bcrypt from "bcrypt";
import { config } from "../config";

/** Salted bcrypt hash; produced once, at signup. */
export function hashPassword(plaintext: string): Promise<string> {
  return bcrypt.hash(plaintext, config.bcryptRounds);
}

let decoyHash: Promise<string> | undefined;

function decoy(): Promise<string> {
  decoyHash ??= bcrypt.hash("decoy-password", config.bcryptRounds);
  return decoyHash;
}

/**
 * Compare against the stored hash. With no stored hash (unknown user) a
 * decoy of the same cost is compared instead and the result is always false,
 * so both failures take one bcrypt compare.
 */
export async function verifyPassword(
  plaintext: string,
  storedHash: string | null
): Promise<boolean> {
  if (storedHash === null) {
    await bcrypt.compare(plaintext, await decoy());
    return false;
  }
  return bcrypt.compare(plaintext, storedHash);
}
