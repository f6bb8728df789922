/**
 * @bondline/vault — In-memory bond ownership registry.
 *
 * Tracks who holds each bond token. The holder of a bond is its
 * creditor; the vault asks on every authorization check.
 */

import { isAddressEqual, zeroAddress } from "viem";
import type { Address, OwnershipRegistry } from "@bondline/types";
import { normalizeAddress } from "@bondline/ledger";
import { VaultError } from "./errors.js";

export class InMemoryBondRegistry implements OwnershipRegistry {
  private readonly owners = new Map<bigint, Address>();

  ownerOf(tokenId: bigint): Address {
    const owner = this.owners.get(tokenId);
    if (owner === undefined) {
      throw new VaultError("BOND_NOT_FOUND", `Bond ${tokenId.toString()} does not exist`);
    }
    return owner;
  }

  exists(tokenId: bigint): boolean {
    return this.owners.has(tokenId);
  }

  mint(tokenId: bigint, to: Address): void {
    if (this.owners.has(tokenId)) {
      throw new VaultError("BOND_ALREADY_EXISTS", `Bond ${tokenId.toString()} already exists`);
    }
    this.owners.set(tokenId, requireNonZero(to));
  }

  /**
   * Move a bond to a new holder. Only the current holder may transfer.
   */
  transfer(caller: Address, to: Address, tokenId: bigint): void {
    const owner = this.ownerOf(tokenId);
    if (!isAddressEqual(owner, normalizeAddress(caller))) {
      throw new VaultError("NOT_BOND_OWNER", `${caller} does not hold bond ${tokenId.toString()}`);
    }
    this.owners.set(tokenId, requireNonZero(to));
  }
}

function requireNonZero(address: Address): Address {
  const normalized = normalizeAddress(address);
  if (normalized === zeroAddress) {
    throw new VaultError("ZERO_ADDRESS", "Bond holder cannot be the zero address");
  }
  return normalized;
}
