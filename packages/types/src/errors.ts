/**
 * Error Taxonomy
 *
 * Every error raised by the vault packages carries one of these
 * categories next to its specific code. Consumers (the HTTP layer, tests)
 * branch on the category; the code says exactly what failed.
 */

export type ErrorCategory =
  | "InvalidInput"
  | "Unauthorized"
  | "InsufficientFunds"
  | "NotFound"
  | "InvariantViolation"
  | "ReentrancyBlocked"
  | "ExternalCallFailed";

export const ERROR_CATEGORIES: readonly ErrorCategory[] = [
  "InvalidInput",
  "Unauthorized",
  "InsufficientFunds",
  "NotFound",
  "InvariantViolation",
  "ReentrancyBlocked",
  "ExternalCallFailed",
];
