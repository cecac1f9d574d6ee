/**
 * Primitive Types
 *
 * Account and token identity plus amount conventions shared by every
 * package.
 *
 * Rules:
 * - Addresses are "0x" + 40 lowercase hex digits
 * - Tokens are identified by their contract address
 * - Amounts are unsigned integers in token base units (bigint in the
 *   engine, decimal integer strings on the wire)
 */

/**
 * An account or contract address (e.g., "0x5fbdb2315678afecb367f032d93f642f64180aa3").
 */
export type Address = string;

/**
 * Token contract address.
 */
export type TokenAddress = Address;

/**
 * An unsigned token amount encoded as a decimal integer string ("1000000").
 * Used wherever an amount crosses a serialization boundary.
 */
export type AmountString = string;

/**
 * An 18-decimal fixed-point percentage encoded as a decimal integer string.
 * "1000000000000000000" = 100%, "5000000000000000" = 0.5%.
 */
export type FixedPointString = string;

/** The zero address. Never a valid controller, agent, or manager. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";
