// backend/services/pizza/src/validators/patchSource.ts
import { BadRequestError } from "@shared/http/errors";

/**
 * PATCH fields arrive either as query parameters or as a JSON body.
 * Both at once is ambiguous and rejected; neither is an empty patch.
 */
export function singleSource<T extends object>(fromBody: T, fromQuery: T): T {
  const inBody = Object.keys(fromBody).length > 0;
  const inQuery = Object.keys(fromQuery).length > 0;
  if (inBody && inQuery) {
    throw new BadRequestError(
      "Send update fields as query parameters or in the body, not both"
    );
  }
  return inQuery ? fromQuery : fromBody;
}
