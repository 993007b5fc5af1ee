/**
 * Ballot Ledger
 *
 * Organization-scoped election registry and ballot store with one vote
 * per voter per election, live tallies and relayed votes authenticated
 * by EIP-712 signatures.
 *
 * @packageDocumentation
 * @license AGPL-3.0-or-later
 */

// ============================================================
// Registry
// ============================================================

export { ElectionFactory } from "./core/election-factory";

export type {
  ElectionLookup,
  ElectionFactoryOptions,
} from "./core/election-factory";

// ============================================================
// Ballot store
// ============================================================

export { VoteStorage } from "./core/vote-storage";

export type { VoteStorageOptions } from "./core/vote-storage";

export {
  generateSalt,
  computeVoteHash,
  secureEntropy,
} from "./core/vote-hash";

export type { EntropySource } from "./core/vote-hash";

// ============================================================
// EIP-712 vote payloads
// ============================================================

export {
  VOTE_TYPES,
  VOTE_DOMAIN_NAME,
  VOTE_DOMAIN_VERSION,
  buildVoteTypedData,
  hashVoteStruct,
  hashVoteTypedData,
  voteDomainSeparator,
  recoverVoteSigner,
  signVote,
} from "./core/typed-data";

export type {
  VoteDomain,
  VoteTypedData,
  TypedDataSigner,
} from "./core/typed-data";

// ============================================================
// Roles, errors, events, time
// ============================================================

export {
  PlatformAdminCapability,
  StoreOwnerCapability,
} from "./core/capabilities";

export type { OwnershipChange } from "./core/capabilities";

export { ElectionError, isElectionError } from "./core/errors";

export type {
  ElectionErrorCode,
  ElectionErrorCategory,
} from "./core/errors";

export { EventLog, computeEntryHash, verifyEntries, EMPTY_LOG_HASH } from "./core/event-log";

export type {
  EventLogEntry,
  EventListener,
  EventQuery,
  LogVerificationResult,
} from "./core/event-log";

export { ManualClock, systemClock } from "./core/clock";

export type { Clock } from "./core/clock";

// ============================================================
// Deployment & configuration
// ============================================================

export { deployPlatform, deploymentAddress } from "./core/platform";

export type { DeployOptions, Platform } from "./core/platform";

export { loadConfig, ConfigError } from "./config";

// ============================================================
// Shared type definitions
// ============================================================

export type {
  Address,
  Bytes32,
  Election,
  CreateElectionParams,
  OrganizationView,
  VoteRecord,
  VoteData,
  VoteReceipt,
  PlatformEvent,
  PlatformEventType,
  EventOfType,
  PlatformConfig,
  NetworkName,
  NetworkConfig,
} from "./types";

export { DEFAULT_CONFIG, NETWORKS, ZERO_ADDRESS, ZERO_BYTES32 } from "./types";
