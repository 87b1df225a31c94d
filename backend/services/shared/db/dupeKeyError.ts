// backend/services/shared/db/dupeKeyError.ts
/**
 * Purpose:
 * - Centralize Mongo duplicate-key (E11000) parsing.
 * - Provide a standard DuplicateKeyError usable across services.
 */

export type DuplicateInfo = {
  index?: string;
  key?: Record<string, unknown>;
  message: string;
};

function field(err: object, name: string): unknown {
  return name in err ? Reflect.get(err, name) : undefined;
}

export function parseDuplicateKey(err: unknown): DuplicateInfo | null {
  if (typeof err !== "object" || err === null) return null;
  const code = field(err, "code") ?? field(err, "errorCode");
  const message = String(field(err, "message") ?? "");

  if (code !== 11000 && !/E11000 duplicate key error/i.test(message)) {
    return null;
  }

  const out: DuplicateInfo = { message };

  const idxMatch = message.match(/index:\s*([^\s]+)\s/);
  if (idxMatch) out.index = idxMatch[1];

  const keyValue = field(err, "keyValue");
  if (typeof keyValue === "object" && keyValue !== null) {
    out.key = { ...keyValue };
  } else {
    const keyMatch = message.match(/dup key:\s*(\{.*\})/);
    if (keyMatch) out.key = { raw: keyMatch[1] };
  }

  return out;
}

export class DuplicateKeyError extends Error {
  public readonly index?: string;
  public readonly key?: Record<string, unknown>;

  constructor(info: DuplicateInfo, options?: { cause?: unknown }) {
    super(info.message, options);
    this.name = "DuplicateKeyError";
    this.index = info.index;
    this.key = info.key;
  }
}

/** Re-throws Mongo E11000 as DuplicateKeyError; anything else unchanged. */
export function rethrowDuplicate(err: unknown): never {
  const info = parseDuplicateKey(err);
  if (info) throw new DuplicateKeyError(info, { cause: err });
  throw err;
}
