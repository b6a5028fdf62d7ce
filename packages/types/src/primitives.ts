/**
 * Primitive wire types.
 *
 * Shaped to be assignable to and from viem's `Address` and `Hex`
 * without importing viem here.
 */

/** 0x-prefixed hex string of any length. */
export type Hex = `0x${string}`;

/** 20-byte EVM address, 0x-prefixed. Case is not significant. */
export type Address = `0x${string}`;
