/**
 * Acting account of a request.
 *
 * Every mutating vault call names the account performing it. Over HTTP
 * that account comes from the X-Caller header; the sandbox does not
 * authenticate it.
 */

import type { Address } from "@poolvault/types";
import { AddressSchema } from "../types/dto.js";
import { ApiError } from "../types/error.js";

export const CALLER_HEADER = "X-Caller";

interface HeaderSource {
  readonly req: { header(name: string): string | undefined };
}

/**
 * @throws {ApiError} MISSING_CALLER when the header is absent,
 *   VALIDATION_ERROR when it is not an address
 */
export function callerOf(c: HeaderSource): Address {
  const raw = c.req.header(CALLER_HEADER);
  if (raw === undefined || raw === "") {
    throw new ApiError(400, "MISSING_CALLER", `The ${CALLER_HEADER} header is required`);
  }
  const parsed = AddressSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ApiError(400, "VALIDATION_ERROR", `Invalid ${CALLER_HEADER} header: "${raw}"`);
  }
  return parsed.data;
}
