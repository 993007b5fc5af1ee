/**
 * Ballot Ledger — Vote Receipt Hashes
 *
 * When a vote is recorded the ballot store derives a random salt and a
 * verification hash:
 *
 *   salt     = keccak256(voter ‖ electionId ‖ candidateId ‖ timestamp ‖ entropy)
 *   voteHash = keccak256(voter ‖ candidateId ‖ electionId ‖ timestamp ‖ salt)
 *
 * with `‖` being Solidity's packed encoding (address = 20 bytes, uint256 =
 * 32 bytes, bytes32 = 32 bytes).  Anyone holding the salt and timestamp
 * can recompute the hash for a claimed candidate and compare.
 *
 * Privacy limitation: this is a spot-check receipt, not a commitment
 * scheme.  The store keeps cleartext tallies and per-voter records next
 * to the hash, and salts are readable through the store's accessors, so
 * the hash hides nothing from whoever operates or reads the store.
 *
 * @module vote-hash
 * @license AGPL-3.0-or-later
 */

import { randomBytes } from "crypto";
import { hexlify, solidityPackedKeccak256 } from "ethers";
import type { Address, Bytes32 } from "../types";

/** Source of 32 unpredictable bytes per call. */
export type EntropySource = () => Uint8Array;

/** Node's CSPRNG. */
export const secureEntropy: EntropySource = () => randomBytes(32);

const PACKED_TYPES = ["address", "uint256", "uint256", "uint256", "bytes32"];

/**
 * Derives the per-vote salt.
 *
 * The entropy is what makes the salt unguessable; the other inputs only
 * bind it to the vote it belongs to.
 */
export function generateSalt(
  voter: Address,
  electionId: number,
  candidateId: number,
  timestamp: number,
  entropy: EntropySource = secureEntropy
): Bytes32 {
  const bytes = entropy();
  if (bytes.length !== 32) {
    throw new Error(`Entropy source must return 32 bytes, got ${bytes.length}`);
  }
  return solidityPackedKeccak256(PACKED_TYPES, [
    voter,
    electionId,
    candidateId,
    timestamp,
    hexlify(bytes),
  ]);
}

/**
 * Computes the verification hash stored with a vote.
 *
 * Note the argument order inside the hash: candidate before election.
 */
export function computeVoteHash(
  voter: Address,
  candidateId: number,
  electionId: number,
  timestamp: number,
  salt: Bytes32
): Bytes32 {
  return solidityPackedKeccak256(PACKED_TYPES, [
    voter,
    candidateId,
    electionId,
    timestamp,
    salt,
  ]);
}
