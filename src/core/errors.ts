/**
 * Ballot Ledger — Error Taxonomy
 *
 * Every rejection raised by the registry or the ballot store is an
 * `ElectionError` carrying one of the codes below.  A rejected call has
 * written nothing, so any of them can be retried with corrected input.
 *
 * @module errors
 * @license AGPL-3.0-or-later
 */

export type ElectionErrorCode =
  // Authorization
  | "NOT_PLATFORM_ADMIN"
  | "NOT_ORG_ADMIN"
  | "NOT_OWNER"
  // Input validation
  | "INVALID_ADDRESS"
  | "INVALID_ADMIN_ADDRESS"
  | "INVALID_FACTORY_ADDRESS"
  | "INVALID_OWNER"
  | "EMPTY_INPUT"
  | "NO_CANDIDATES_PROVIDED"
  | "INVALID_TIME_RANGE"
  | "START_TIME_MUST_BE_IN_FUTURE"
  | "INVALID_CANDIDATE"
  // State conflicts
  | "ALREADY_AN_ADMIN"
  | "NOT_AN_ADMIN"
  | "ALREADY_VOTED"
  | "ELECTION_NOT_FOUND"
  | "ELECTION_NOT_ACTIVE"
  | "ELECTION_FACTORY_NOT_SET"
  | "ALREADY_INITIALIZED"
  // Authentication
  | "INVALID_SIGNATURE"
  | "SIGNATURE_EXPIRED"
  | "INVALID_NONCE"
  // Availability
  | "ENFORCED_PAUSE"
  | "EXPECTED_PAUSE";

export type ElectionErrorCategory =
  | "authorization"
  | "validation"
  | "state"
  | "authentication"
  | "availability";

const CATEGORIES: Record<ElectionErrorCode, ElectionErrorCategory> = {
  NOT_PLATFORM_ADMIN: "authorization",
  NOT_ORG_ADMIN: "authorization",
  NOT_OWNER: "authorization",
  INVALID_ADDRESS: "validation",
  INVALID_ADMIN_ADDRESS: "validation",
  INVALID_FACTORY_ADDRESS: "validation",
  INVALID_OWNER: "validation",
  EMPTY_INPUT: "validation",
  NO_CANDIDATES_PROVIDED: "validation",
  INVALID_TIME_RANGE: "validation",
  START_TIME_MUST_BE_IN_FUTURE: "validation",
  INVALID_CANDIDATE: "validation",
  ALREADY_AN_ADMIN: "state",
  NOT_AN_ADMIN: "state",
  ALREADY_VOTED: "state",
  ELECTION_NOT_FOUND: "state",
  ELECTION_NOT_ACTIVE: "state",
  ELECTION_FACTORY_NOT_SET: "state",
  ALREADY_INITIALIZED: "state",
  INVALID_SIGNATURE: "authentication",
  SIGNATURE_EXPIRED: "authentication",
  INVALID_NONCE: "authentication",
  ENFORCED_PAUSE: "availability",
  EXPECTED_PAUSE: "availability",
};

/** Error thrown by the registry and the ballot store */
export class ElectionError extends Error {
  constructor(
    message: string,
    public readonly code: ElectionErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ElectionError";
  }

  get category(): ElectionErrorCategory {
    return CATEGORIES[this.code];
  }
}

/**
 * Type guard for `ElectionError`, optionally matching a specific code.
 */
export function isElectionError(
  err: unknown,
  code?: ElectionErrorCode
): err is ElectionError {
  return err instanceof ElectionError && (code === undefined || err.code === code);
}
