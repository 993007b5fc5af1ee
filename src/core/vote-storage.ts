/**
 * Ballot Ledger — Ballot Store
 *
 * VoteStorage records at most one vote per (election, voter), keeps live
 * per-candidate tallies and accepts votes submitted on a voter's behalf
 * by a relayer, authenticated by the voter's EIP-712 signature.
 *
 * Per (election, voter) the store is a two-state machine:
 *
 *   NotVoted ──vote / voteWithSignature──▶ Voted   (terminal)
 *
 * Globally it is Active or Paused; the owner flips it, and nothing can be
 * submitted while Paused.
 *
 * Every operation here is synchronous and validates everything before
 * the first write, so on the Node.js event loop each call is an atomic,
 * serialized transition: two submissions for the same voter can never
 * both pass the "not voted yet" or "nonce matches" checks, and the
 * registry state read during validation cannot change before the commit.
 *
 * @module vote-storage
 * @license AGPL-3.0-or-later
 */

import { ElectionError } from "./errors";
import { EventLog } from "./event-log";
import { systemClock, type Clock } from "./clock";
import { StoreOwnerCapability, type OwnershipChange } from "./capabilities";
import type { ElectionLookup } from "./election-factory";
import {
  computeVoteHash,
  generateSalt,
  secureEntropy,
  type EntropySource,
} from "./vote-hash";
import {
  VOTE_DOMAIN_NAME,
  VOTE_DOMAIN_VERSION,
  recoverVoteSigner,
  type VoteDomain,
} from "./typed-data";
import { isZeroAddress, normalizeAddress, requireAddress } from "../utils/address";
import {
  ZERO_ADDRESS,
  ZERO_BYTES32,
  type Address,
  type Bytes32,
  type Election,
  type VoteData,
  type VoteReceipt,
  type VoteRecord,
} from "../types";

// ============================================================
// Types
// ============================================================

export interface VoteStorageOptions {
  /** Address this store is deployed at (the EIP-712 verifying contract) */
  address: Address;
  chainId: number;
  /** EIP-712 domain name, defaults to "VoteStorage" */
  domainName?: string;
  /** EIP-712 domain version, defaults to "1" */
  domainVersion?: string;
  clock?: Clock;
  eventLog?: EventLog;
  /** Randomness mixed into every vote salt */
  entropy?: EntropySource;
}

/** A validated vote whose salt and hash have been derived but not stored */
interface SealedBallot {
  voter: Address;
  electionId: number;
  candidateId: number;
  timestamp: number;
  salt: Bytes32;
  voteHash: Bytes32;
}

const INITIALIZER_VERSION = 1;

const EMPTY_RECORD: VoteRecord = {
  hasVoted: false,
  voteHash: ZERO_BYTES32,
  salt: ZERO_BYTES32,
  timestamp: 0,
};

// ============================================================
// VoteStorage
// ============================================================

/**
 * @example
 * ```ts
 * const storage = new VoteStorage({ address, chainId: 31337, clock });
 * storage.initialize(owner, factory);
 *
 * // Direct vote
 * storage.vote(voter, electionId, 0);
 *
 * // Relayed vote
 * const data = { voter, electionId, candidateId: 1, nonce: storage.getNonce(voter), deadline };
 * const signature = await signVote(wallet, storage.domain(), data);
 * storage.voteWithSignature(relayer, data, signature);
 *
 * storage.getAllVoteCounts(electionId); // [1, 1]
 * ```
 */
export class VoteStorage {
  readonly address: Address;

  readonly chainId: number;

  readonly events: EventLog;

  private readonly domainName: string;

  private readonly domainVersion: string;

  private readonly clock: Clock;

  private readonly entropy: EntropySource;

  private readonly ownership = new StoreOwnerCapability();

  private electionFactory: ElectionLookup | null = null;

  private isInitialized = false;

  private isPaused = false;

  /** electionId -> voter -> record */
  private votes: Map<number, Map<Address, VoteRecord>> = new Map();

  /** electionId -> candidateId -> count */
  private tallies: Map<number, Map<number, number>> = new Map();

  /** voter -> next expected nonce */
  private nonces: Map<Address, number> = new Map();

  constructor(options: VoteStorageOptions) {
    this.address = requireAddress(options.address);
    this.chainId = options.chainId;
    this.domainName = options.domainName ?? VOTE_DOMAIN_NAME;
    this.domainVersion = options.domainVersion ?? VOTE_DOMAIN_VERSION;
    this.clock = options.clock ?? systemClock;
    this.events = options.eventLog ?? new EventLog(this.clock);
    this.entropy = options.entropy ?? secureEntropy;
  }

  // --------------------------------------------------------
  // Initialization & administration
  // --------------------------------------------------------

  /**
   * One-time setup: makes `caller` the owner and points the store at a
   * registry.  A null registry is accepted; votes then fail with
   * ELECTION_FACTORY_NOT_SET until the owner sets one.
   *
   * @throws ElectionError ALREADY_INITIALIZED, INVALID_OWNER
   */
  initialize(caller: Address, electionFactory: ElectionLookup | null): void {
    if (this.isInitialized) {
      throw new ElectionError(
        "Store has already been initialized",
        "ALREADY_INITIALIZED"
      );
    }

    const change = this.ownership.establish(caller);

    this.isInitialized = true;
    this.isPaused = false;
    this.electionFactory = electionFactory;

    this.emitOwnershipTransferred(change);
    this.events.append(this.address, {
      type: "Initialized",
      version: INITIALIZER_VERSION,
    });
  }

  /**
   * Points the store at another registry.
   *
   * @throws ElectionError NOT_OWNER, INVALID_FACTORY_ADDRESS
   */
  setElectionFactory(caller: Address, electionFactory: ElectionLookup): void {
    this.ownership.assertHeldBy(caller);
    const newAddress = requireAddress(
      electionFactory.address,
      "INVALID_FACTORY_ADDRESS",
      false
    );

    const oldAddress = this.electionFactoryAddress;
    this.electionFactory = electionFactory;

    this.events.append(this.address, {
      type: "ElectionFactoryUpdated",
      oldAddress,
      newAddress,
      changedBy: this.ownership.owner,
    });
  }

  /** @throws ElectionError NOT_OWNER, ENFORCED_PAUSE */
  pause(caller: Address): void {
    this.ownership.assertHeldBy(caller);
    this.requireNotPaused();

    this.isPaused = true;
    this.events.append(this.address, { type: "Paused", account: this.ownership.owner });
  }

  /** @throws ElectionError NOT_OWNER, EXPECTED_PAUSE */
  unpause(caller: Address): void {
    this.ownership.assertHeldBy(caller);
    if (!this.isPaused) {
      throw new ElectionError("Store is not paused", "EXPECTED_PAUSE");
    }

    this.isPaused = false;
    this.events.append(this.address, { type: "Unpaused", account: this.ownership.owner });
  }

  /** @throws ElectionError NOT_OWNER, INVALID_OWNER */
  transferOwnership(caller: Address, newOwner: Address): void {
    this.emitOwnershipTransferred(this.ownership.transfer(caller, newOwner));
  }

  /** @throws ElectionError NOT_OWNER */
  renounceOwnership(caller: Address): void {
    this.emitOwnershipTransferred(this.ownership.renounce(caller));
  }

  // --------------------------------------------------------
  // Voting
  // --------------------------------------------------------

  /**
   * Casts `caller`'s vote for `candidateId`.
   *
   * Checks, in order: not paused, registry set, election active, not yet
   * voted, candidate index in range.
   *
   * @throws ElectionError ENFORCED_PAUSE, ELECTION_FACTORY_NOT_SET,
   *   ELECTION_NOT_FOUND, ELECTION_NOT_ACTIVE, ALREADY_VOTED, INVALID_CANDIDATE,
   *   INVALID_ADDRESS
   */
  vote(caller: Address, electionId: number, candidateId: number): VoteReceipt {
    this.requireNotPaused();
    const voter = requireAddress(caller);
    this.validateBallot(voter, electionId, candidateId);

    return this.commitVote(this.sealBallot(voter, electionId, candidateId), false);
  }

  /**
   * Casts the vote described by `voteData` on behalf of `voteData.voter`.
   * `caller` is the relayer and is only recorded in the
   * MetaTransactionExecuted event.
   *
   * Checks, in order: not paused, registry set, election active, voter has
   * not voted, candidate in range, deadline not passed, nonce equals the
   * voter's current nonce, signature recovers to the voter.
   *
   * The nonce is consumed as soon as all checks pass, before the vote is
   * written.
   *
   * @throws ElectionError ENFORCED_PAUSE, ELECTION_FACTORY_NOT_SET,
   *   ELECTION_NOT_FOUND, ELECTION_NOT_ACTIVE, ALREADY_VOTED, INVALID_CANDIDATE,
   *   SIGNATURE_EXPIRED, INVALID_NONCE, INVALID_SIGNATURE, INVALID_ADDRESS
   */
  voteWithSignature(caller: Address, voteData: VoteData, signature: string): VoteReceipt {
    this.requireNotPaused();
    const relayer = requireAddress(caller);
    const voter = requireAddress(voteData.voter);
    const { electionId, candidateId, nonce, deadline } = voteData;

    this.validateBallot(voter, electionId, candidateId);

    const now = this.clock.now();
    if (now > deadline) {
      throw new ElectionError("Signature has expired", "SIGNATURE_EXPIRED", {
        deadline,
        now,
      });
    }

    const expectedNonce = this.getNonce(voter);
    if (nonce !== expectedNonce) {
      throw new ElectionError("Nonce does not match", "INVALID_NONCE", {
        expected: expectedNonce,
        received: nonce,
      });
    }

    const signer = recoverVoteSigner(this.domain(), { ...voteData, voter }, signature);
    if (signer === null || signer !== voter) {
      throw new ElectionError(
        "Signature was not produced by the voter",
        "INVALID_SIGNATURE",
        { voter, signer }
      );
    }

    const ballot = this.sealBallot(voter, electionId, candidateId);

    this.nonces.set(voter, expectedNonce + 1);
    this.events.append(this.address, {
      type: "MetaTransactionExecuted",
      voter,
      relayer,
      electionId,
      nonce: expectedNonce,
    });

    return this.commitVote(ballot, true);
  }

  // --------------------------------------------------------
  // Reads
  // --------------------------------------------------------

  getVoteRecord(electionId: number, voter: Address): VoteRecord {
    const record = this.votes.get(electionId)?.get(requireAddress(voter));
    return { ...(record ?? EMPTY_RECORD) };
  }

  hasVoted(electionId: number, voter: Address): boolean {
    return this.getVoteRecord(electionId, voter).hasVoted;
  }

  getVoteHash(electionId: number, voter: Address): Bytes32 {
    return this.getVoteRecord(electionId, voter).voteHash;
  }

  getVoteSalt(electionId: number, voter: Address): Bytes32 {
    return this.getVoteRecord(electionId, voter).salt;
  }

  getVoteTimestamp(electionId: number, voter: Address): number {
    return this.getVoteRecord(electionId, voter).timestamp;
  }

  getVoteCount(electionId: number, candidateId: number): number {
    return this.tallies.get(electionId)?.get(candidateId) ?? 0;
  }

  /**
   * Tallies for every candidate, in candidate-index order.
   *
   * @throws ElectionError ELECTION_FACTORY_NOT_SET, ELECTION_NOT_FOUND
   */
  getAllVoteCounts(electionId: number): number[] {
    const election = this.requireFactory().getElection(electionId);
    return election.candidates.map((_, candidateId) =>
      this.getVoteCount(electionId, candidateId)
    );
  }

  /** Nonce the voter's next signed payload must carry. */
  getNonce(voter: Address): number {
    return this.nonces.get(requireAddress(voter)) ?? 0;
  }

  /**
   * Recomputes the vote hash for `candidateId` from the stored salt and
   * timestamp and compares it with the stored hash.
   *
   * False means either that the voter has not voted in this election or
   * that they voted for a different candidate.
   */
  verifyVoteHash(electionId: number, voter: Address, candidateId: number): boolean {
    const account = normalizeAddress(voter);
    if (account === null) return false;

    const record = this.votes.get(electionId)?.get(account);
    if (!record) return false;

    const expected = computeVoteHash(
      account,
      candidateId,
      electionId,
      record.timestamp,
      record.salt
    );
    return expected === record.voteHash;
  }

  /** Registry address, or the zero address when none is set. */
  get electionFactoryAddress(): Address {
    return this.electionFactory?.address ?? ZERO_ADDRESS;
  }

  get owner(): Address {
    return this.ownership.owner;
  }

  get paused(): boolean {
    return this.isPaused;
  }

  get initialized(): boolean {
    return this.isInitialized;
  }

  /** The EIP-712 domain signatures must be made under. */
  domain(): VoteDomain {
    return {
      name: this.domainName,
      version: this.domainVersion,
      chainId: this.chainId,
      verifyingContract: this.address,
    };
  }

  // --------------------------------------------------------
  // Internals
  // --------------------------------------------------------

  private requireNotPaused(): void {
    if (this.isPaused) {
      throw new ElectionError("Store is paused", "ENFORCED_PAUSE");
    }
  }

  private requireFactory(): ElectionLookup {
    if (this.electionFactory === null || isZeroAddress(this.electionFactory.address)) {
      throw new ElectionError(
        "Election factory has not been set",
        "ELECTION_FACTORY_NOT_SET"
      );
    }
    return this.electionFactory;
  }

  /**
   * Registry set, election active, voter has not voted, candidate in
   * range.  Shared by both voting paths.
   */
  private validateBallot(voter: Address, electionId: number, candidateId: number): Election {
    const factory = this.requireFactory();

    if (!factory.isElectionActive(electionId)) {
      throw new ElectionError("Election is not active", "ELECTION_NOT_ACTIVE", {
        electionId,
      });
    }

    if (this.votes.get(electionId)?.get(voter)?.hasVoted) {
      throw new ElectionError(
        "Voter has already voted in this election",
        "ALREADY_VOTED",
        { electionId, voter }
      );
    }

    const election = factory.getElection(electionId);
    if (
      !Number.isInteger(candidateId) ||
      candidateId < 0 ||
      candidateId >= election.candidates.length
    ) {
      throw new ElectionError(
        `Candidate index must be between 0 and ${election.candidates.length - 1}`,
        "INVALID_CANDIDATE",
        { electionId, candidateId }
      );
    }

    return election;
  }

  /** Derives salt and hash; writes nothing. */
  private sealBallot(voter: Address, electionId: number, candidateId: number): SealedBallot {
    const timestamp = this.clock.now();
    const salt = generateSalt(voter, electionId, candidateId, timestamp, this.entropy);
    const voteHash = computeVoteHash(voter, candidateId, electionId, timestamp, salt);
    return { voter, electionId, candidateId, timestamp, salt, voteHash };
  }

  private commitVote(ballot: SealedBallot, isDelegated: boolean): VoteReceipt {
    const { voter, electionId, candidateId, timestamp, salt, voteHash } = ballot;

    let electionVotes = this.votes.get(electionId);
    if (!electionVotes) {
      electionVotes = new Map();
      this.votes.set(electionId, electionVotes);
    }
    electionVotes.set(voter, { hasVoted: true, voteHash, salt, timestamp });

    let tally = this.tallies.get(electionId);
    if (!tally) {
      tally = new Map();
      this.tallies.set(electionId, tally);
    }
    const newCount = (tally.get(candidateId) ?? 0) + 1;
    tally.set(candidateId, newCount);

    this.events.append(this.address, {
      type: "VoteCast",
      voter,
      electionId,
      candidateId,
      voteHash,
      timestamp,
      isDelegated,
    });
    this.events.append(this.address, {
      type: "VoteCountUpdated",
      electionId,
      candidateId,
      newCount,
    });

    return { voter, electionId, candidateId, voteHash, timestamp, isDelegated, newCount };
  }

  private emitOwnershipTransferred(change: OwnershipChange): void {
    this.events.append(this.address, {
      type: "OwnershipTransferred",
      previousOwner: change.previousOwner,
      newOwner: change.newOwner,
    });
  }
}
