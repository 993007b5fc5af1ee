/**
 * Ballot Ledger — Address helpers
 *
 * @module utils/address
 * @license AGPL-3.0-or-later
 */

import { getAddress, isAddress } from "ethers";
import { ElectionError, type ElectionErrorCode } from "../core/errors";
import { ZERO_ADDRESS, type Address } from "../types";

/**
 * Returns the checksummed form of `value`, or null when it is not an
 * address at all.
 */
export function normalizeAddress(value: unknown): Address | null {
  if (typeof value !== "string" || !isAddress(value)) return null;
  return getAddress(value);
}

/** Whether `value` is the zero address (in any letter case). */
export function isZeroAddress(value: Address): boolean {
  return value.toLowerCase() === ZERO_ADDRESS;
}

/**
 * Checksums `value`, throwing an `ElectionError` with `code` when it is
 * malformed, or when it is the zero address and `allowZero` is false.
 */
export function requireAddress(
  value: unknown,
  code: ElectionErrorCode = "INVALID_ADDRESS",
  allowZero = true
): Address {
  const address = normalizeAddress(value);
  if (address === null || (!allowZero && isZeroAddress(address))) {
    throw new ElectionError(`Invalid address: ${String(value)}`, code, {
      address: value,
    });
  }
  return address;
}
