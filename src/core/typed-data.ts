/**
 * Ballot Ledger — EIP-712 Vote Payloads
 *
 * A voter who does not want to pay for (or cannot reach) the ballot store
 * signs a `Vote` struct off-line; a relayer then submits it through
 * `VoteStorage.voteWithSignature()`.  The signature is over the EIP-712
 * digest of the struct, bound to a domain made of the store's name,
 * version, chain id and address, so a payload signed for one store or one
 * chain is worthless on any other.
 *
 * The struct layout is fixed and must match on both sides:
 *
 *   Vote(address voter,uint256 electionId,uint256 candidateId,uint256 nonce,uint256 deadline)
 *
 * @module typed-data
 * @license AGPL-3.0-or-later
 */

import { TypedDataEncoder, verifyTypedData, type TypedDataField } from "ethers";
import type { Address, VoteData } from "../types";

// ============================================================
// Types
// ============================================================

export interface VoteDomain {
  name: string;
  version: string;
  chainId: number;
  verifyingContract: Address;
}

/** Anything that can produce an EIP-712 signature (e.g. an ethers Wallet). */
export interface TypedDataSigner {
  signTypedData(
    domain: VoteDomain,
    types: Record<string, TypedDataField[]>,
    value: Record<string, unknown>
  ): Promise<string>;
}

/** Everything a client needs to build a signature request. */
export interface VoteTypedData {
  domain: VoteDomain;
  types: Record<string, TypedDataField[]>;
  primaryType: "Vote";
  message: VoteData;
}

// ============================================================
// Constants
// ============================================================

export const VOTE_DOMAIN_NAME = "VoteStorage";
export const VOTE_DOMAIN_VERSION = "1";

export const VOTE_TYPES: Record<string, TypedDataField[]> = {
  Vote: [
    { name: "voter", type: "address" },
    { name: "electionId", type: "uint256" },
    { name: "candidateId", type: "uint256" },
    { name: "nonce", type: "uint256" },
    { name: "deadline", type: "uint256" },
  ],
};

// ============================================================
// Helpers
// ============================================================

function toMessage(data: VoteData): Record<string, unknown> {
  return {
    voter: data.voter,
    electionId: data.electionId,
    candidateId: data.candidateId,
    nonce: data.nonce,
    deadline: data.deadline,
  };
}

/** Full typed-data document for a vote, as wallets expect it. */
export function buildVoteTypedData(domain: VoteDomain, data: VoteData): VoteTypedData {
  return {
    domain: { ...domain },
    types: VOTE_TYPES,
    primaryType: "Vote",
    message: { ...data },
  };
}

/** Hash of the `Vote` struct alone (EIP-712 `hashStruct`). */
export function hashVoteStruct(data: VoteData): string {
  return TypedDataEncoder.hashStruct("Vote", VOTE_TYPES, toMessage(data));
}

/** The digest a voter actually signs. */
export function hashVoteTypedData(domain: VoteDomain, data: VoteData): string {
  return TypedDataEncoder.hash(domain, VOTE_TYPES, toMessage(data));
}

/** EIP-712 domain separator for a domain. */
export function voteDomainSeparator(domain: VoteDomain): string {
  return TypedDataEncoder.hashDomain(domain);
}

/**
 * Recovers the address that signed `data` under `domain`.
 *
 * @returns The signer, or null when the signature is malformed or does
 *   not correspond to any key
 */
export function recoverVoteSigner(
  domain: VoteDomain,
  data: VoteData,
  signature: string
): Address | null {
  try {
    return verifyTypedData(domain, VOTE_TYPES, toMessage(data), signature);
  } catch (err) {
    if (err instanceof Error) return null;
    throw err;
  }
}

/** Asks `signer` to sign a vote payload. */
export function signVote(
  signer: TypedDataSigner,
  domain: VoteDomain,
  data: VoteData
): Promise<string> {
  return signer.signTypedData(domain, VOTE_TYPES, toMessage(data));
}
