/**
 * Shared fixtures for the test suites.
 *
 * @license AGPL-3.0-or-later
 */

import { Wallet, getAddress, hexlify, randomBytes, toBeHex, zeroPadValue } from "ethers";
import { ElectionError, type ElectionErrorCode } from "../src/core/errors";
import { ManualClock } from "../src/core/clock";
import { deployPlatform, type Platform } from "../src/core/platform";
import type { EntropySource } from "../src/core/vote-hash";
import { DEFAULT_CONFIG, type Address } from "../src/types";

export const T0 = 1_700_000_000;
export const HOUR = 3600;
export const DAY = 86400;

export const ORG_ID = 1;

/** Deterministic checksummed address for a small integer. */
export function address(n: number): Address {
  return getAddress(zeroPadValue(toBeHex(n), 20));
}

export const PLATFORM_ADMIN = getAddress(DEFAULT_CONFIG.platformAdmin);
export const STORE_OWNER = getAddress(DEFAULT_CONFIG.storeOwner);
export const RELAYER = getAddress(DEFAULT_CONFIG.relayer);
export const ORG_ADMIN = address(0x0a);

export function randomWallet(): Wallet {
  return new Wallet(hexlify(randomBytes(32)));
}

/** Entropy source returning 32 copies of `byte`. */
export function fixedEntropy(byte = 7): EntropySource {
  return () => new Uint8Array(32).fill(byte);
}

/**
 * Runs `fn`, expecting an ElectionError with `code`.
 */
export function expectElectionError(fn: () => unknown, code: ElectionErrorCode): ElectionError {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(ElectionError);
  const error = caught as ElectionError;
  expect(error.code).toBe(code);
  return error;
}

export interface Fixture {
  platform: Platform;
  clock: ManualClock;
  electionId: number;
  startTime: number;
  endTime: number;
}

/**
 * Deploys a platform at T0 with one org admin and one election
 * ["Alice", "Bob", "Carol"] running from T0+1h to T0+7d.
 */
export function setupElection(candidates: string[] = ["Alice", "Bob", "Carol"]): Fixture {
  const clock = new ManualClock(T0);
  const platform = deployPlatform({ clock });
  platform.factory.addOrgAdmin(PLATFORM_ADMIN, ORG_ID, ORG_ADMIN);

  const startTime = T0 + HOUR;
  const endTime = T0 + 7 * DAY;
  const electionId = platform.factory.createElection(ORG_ADMIN, {
    orgId: ORG_ID,
    name: "Board Election",
    description: "Annual board seat",
    startTime,
    endTime,
    candidates,
  });

  return { platform, clock, electionId, startTime, endTime };
}
