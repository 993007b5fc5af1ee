/**
 * Ballot Ledger — Capabilities
 *
 * The platform has two privileged roles and they are deliberately kept
 * apart:
 *
 *   PlatformAdminCapability — held by one identity for the lifetime of
 *     the registry.  Grants and revokes organization admins and overrides
 *     an election's active flag.
 *   StoreOwnerCapability    — the ballot store's owner.  Pauses and
 *     unpauses voting and repoints the store at another registry.  Can be
 *     transferred or renounced.
 *
 * Neither implies the other; one address may hold both, but only because
 * it was given both.
 *
 * @module capabilities
 * @license AGPL-3.0-or-later
 */

import { ElectionError } from "./errors";
import { isZeroAddress, normalizeAddress, requireAddress } from "../utils/address";
import { ZERO_ADDRESS, type Address } from "../types";

function matches(holder: Address, caller: Address): boolean {
  const normalized = normalizeAddress(caller);
  return normalized !== null && !isZeroAddress(holder) && normalized === holder;
}

// ============================================================
// PlatformAdminCapability
// ============================================================

export class PlatformAdminCapability {
  readonly holder: Address;

  constructor(holder: Address) {
    this.holder = requireAddress(holder, "INVALID_ADMIN_ADDRESS", false);
  }

  isHeldBy(caller: Address): boolean {
    return matches(this.holder, caller);
  }

  /** @throws ElectionError NOT_PLATFORM_ADMIN */
  assertHeldBy(caller: Address): void {
    if (!this.isHeldBy(caller)) {
      throw new ElectionError(
        "Caller is not the platform admin",
        "NOT_PLATFORM_ADMIN",
        { caller }
      );
    }
  }
}

// ============================================================
// StoreOwnerCapability
// ============================================================

export interface OwnershipChange {
  previousOwner: Address;
  newOwner: Address;
}

export class StoreOwnerCapability {
  private current: Address = ZERO_ADDRESS;

  /** Current owner, or the zero address when unowned */
  get owner(): Address {
    return this.current;
  }

  isHeldBy(caller: Address): boolean {
    return matches(this.current, caller);
  }

  /** @throws ElectionError NOT_OWNER */
  assertHeldBy(caller: Address): void {
    if (!this.isHeldBy(caller)) {
      throw new ElectionError("Caller is not the owner", "NOT_OWNER", { caller });
    }
  }

  /**
   * Sets the first owner.  Only the store's initializer calls this.
   *
   * @throws ElectionError INVALID_OWNER for a zero or malformed address
   */
  establish(owner: Address): OwnershipChange {
    const newOwner = requireAddress(owner, "INVALID_OWNER", false);
    return this.replace(newOwner);
  }

  /**
   * Hands ownership to `newOwner`.
   *
   * @throws ElectionError NOT_OWNER, INVALID_OWNER
   */
  transfer(caller: Address, newOwner: Address): OwnershipChange {
    this.assertHeldBy(caller);
    const next = requireAddress(newOwner, "INVALID_OWNER", false);
    return this.replace(next);
  }

  /**
   * Leaves the store without an owner.  Owner-only operations become
   * permanently unavailable.
   *
   * @throws ElectionError NOT_OWNER
   */
  renounce(caller: Address): OwnershipChange {
    this.assertHeldBy(caller);
    return this.replace(ZERO_ADDRESS);
  }

  private replace(newOwner: Address): OwnershipChange {
    const change = { previousOwner: this.current, newOwner };
    this.current = newOwner;
    return change;
  }
}
