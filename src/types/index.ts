/**
 * Ballot Ledger — Core Type Definitions
 *
 * Shared interfaces for the election registry, the ballot store, the
 * event log and the HTTP gateway.  Identities are Ethereum addresses and
 * every time value is a unix timestamp in seconds, the unit the rest of
 * the system calls a "block timestamp".
 *
 * @module types
 * @license AGPL-3.0-or-later
 */

// ============================================================
// Primitives
// ============================================================

/** EIP-55 checksummed 20-byte address. */
export type Address = string;

/** 0x-prefixed 32-byte hex string. */
export type Bytes32 = string;

/** The "null" identity. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/** The "null" hash. */
export const ZERO_BYTES32: Bytes32 =
  "0x0000000000000000000000000000000000000000000000000000000000000000";

// ============================================================
// Organizations
// ============================================================

/**
 * Read-only view of an organization aggregate.
 *
 * Organizations have no record of their own beyond their admin set and
 * the elections created for them; they come into existence on the first
 * admin grant.
 */
export interface OrganizationView {
  id: number;
  admins: Address[];
  electionIds: number[];
}

// ============================================================
// Elections
// ============================================================

export interface Election {
  orgId: number;
  /** Sequential, starting at 1 */
  electionId: number;
  name: string;
  description: string;
  startTime: number;
  endTime: number;
  /** Platform-admin override, independent of the time window */
  isActive: boolean;
  /** Ordered candidate labels; a vote names a candidate by index */
  candidates: string[];
  creator: Address;
  createdAt: number;
}

export interface CreateElectionParams {
  orgId: number;
  name: string;
  description?: string;
  startTime: number;
  endTime: number;
  candidates: string[];
}

// ============================================================
// Votes
// ============================================================

/** What the ballot store keeps per (election, voter). */
export interface VoteRecord {
  hasVoted: boolean;
  voteHash: Bytes32;
  salt: Bytes32;
  timestamp: number;
}

/**
 * Payload a voter signs so that a relayer can submit the vote for them.
 * Field order matches the EIP-712 `Vote` struct.
 */
export interface VoteData {
  voter: Address;
  electionId: number;
  candidateId: number;
  nonce: number;
  deadline: number;
}

/** Returned after a vote has been recorded. */
export interface VoteReceipt {
  voter: Address;
  electionId: number;
  candidateId: number;
  voteHash: Bytes32;
  timestamp: number;
  isDelegated: boolean;
  /** Tally of the chosen candidate after this vote */
  newCount: number;
}

// ============================================================
// Events
// ============================================================

export interface ElectionCreatedEvent {
  type: "ElectionCreated";
  orgId: number;
  electionId: number;
  name: string;
  creator: Address;
  startTime: number;
  endTime: number;
}

export interface OrgAdminAddedEvent {
  type: "OrgAdminAdded";
  orgId: number;
  admin: Address;
  addedBy: Address;
}

export interface OrgAdminRemovedEvent {
  type: "OrgAdminRemoved";
  orgId: number;
  admin: Address;
  removedBy: Address;
}

export interface ElectionStatusChangedEvent {
  type: "ElectionStatusChanged";
  electionId: number;
  isActive: boolean;
  changedBy: Address;
}

export interface VoteCastEvent {
  type: "VoteCast";
  voter: Address;
  electionId: number;
  candidateId: number;
  voteHash: Bytes32;
  timestamp: number;
  isDelegated: boolean;
}

export interface VoteCountUpdatedEvent {
  type: "VoteCountUpdated";
  electionId: number;
  candidateId: number;
  newCount: number;
}

export interface MetaTransactionExecutedEvent {
  type: "MetaTransactionExecuted";
  voter: Address;
  relayer: Address;
  electionId: number;
  nonce: number;
}

export interface ElectionFactoryUpdatedEvent {
  type: "ElectionFactoryUpdated";
  oldAddress: Address;
  newAddress: Address;
  changedBy: Address;
}

export interface OwnershipTransferredEvent {
  type: "OwnershipTransferred";
  previousOwner: Address;
  newOwner: Address;
}

export interface PausedEvent {
  type: "Paused";
  account: Address;
}

export interface UnpausedEvent {
  type: "Unpaused";
  account: Address;
}

export interface InitializedEvent {
  type: "Initialized";
  version: number;
}

export type PlatformEvent =
  | ElectionCreatedEvent
  | OrgAdminAddedEvent
  | OrgAdminRemovedEvent
  | ElectionStatusChangedEvent
  | VoteCastEvent
  | VoteCountUpdatedEvent
  | MetaTransactionExecutedEvent
  | ElectionFactoryUpdatedEvent
  | OwnershipTransferredEvent
  | PausedEvent
  | UnpausedEvent
  | InitializedEvent;

export type PlatformEventType = PlatformEvent["type"];

/** Narrows `PlatformEvent` to the member with the given `type`. */
export type EventOfType<K extends PlatformEventType> = Extract<PlatformEvent, { type: K }>;

// ============================================================
// Configuration
// ============================================================

export type NetworkName = "local" | "base-sepolia" | "eth-sepolia";

export interface NetworkConfig {
  name: NetworkName;
  chainId: number;
}

/** Networks the platform is deployed to. */
export const NETWORKS: Record<NetworkName, NetworkConfig> = {
  local: { name: "local", chainId: 31337 },
  "base-sepolia": { name: "base-sepolia", chainId: 84532 },
  "eth-sepolia": { name: "eth-sepolia", chainId: 11155111 },
};

/**
 * Runtime configuration for a platform deployment.
 */
export interface PlatformConfig {
  network: NetworkName;
  chainId: number;
  /** EIP-712 domain name of the ballot store */
  domainName: string;
  /** EIP-712 domain version of the ballot store */
  domainVersion: string;
  /** Account both components are deployed from; their addresses derive from it */
  deployer: Address;
  /** Holder of the platform-admin capability on the registry */
  platformAdmin: Address;
  /** Account that initializes, and so owns, the ballot store */
  storeOwner: Address;
  /** Identity the HTTP gateway submits signed votes as */
  relayer: Address;
  port: number;
}

/**
 * Defaults for local development and testing.
 */
export const DEFAULT_CONFIG: PlatformConfig = {
  network: "local",
  chainId: NETWORKS.local.chainId,
  domainName: "VoteStorage",
  domainVersion: "1",
  deployer: "0x00000000000000000000000000000000000000d1",
  platformAdmin: "0x00000000000000000000000000000000000000a1",
  storeOwner: "0x00000000000000000000000000000000000000b1",
  relayer: "0x00000000000000000000000000000000000000c1",
  port: 3001,
};
