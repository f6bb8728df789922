/**
 * Chain Types
 *
 * Identifiers shared by every component that lives on a domain.
 *
 * Addresses and byte strings use viem's template-literal types so that
 * the same values flow unchanged into ABI encoding and hashing.
 */

import type { Address, Hex } from "viem";

export type { Address, Hex };

/**
 * A 32-byte domain (blockchain) identifier, hex encoded.
 * Relay messages are tagged with the source and destination domain.
 */
export type DomainId = Hex;

/**
 * A component deployed at an address on a domain.
 */
export interface DomainRef {
  readonly domain: DomainId;
  readonly address: Address;
}

/**
 * Source of unix time, in seconds.
 *
 * Injected wherever a component compares timestamps so that staleness
 * windows can be exercised without waiting.
 */
export interface Clock {
  now(): bigint;
}

/** Wall-clock time, truncated to whole seconds. */
export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};
