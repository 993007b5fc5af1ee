/**
 * Ballot Ledger API — Request Parsing
 *
 * Shape checks for path parameters and bodies.  Anything that fails here
 * is rejected as a 400 before the registry or ballot store is touched.
 *
 * @module api/params
 * @license AGPL-3.0-or-later
 */

import { ApiError } from "./middleware/error-handler";
import { normalizeAddress } from "../utils/address";
import type { Address, VoteData } from "../types";

/** Parses a non-negative integer from a path/query string or a JSON number. */
export function parseUint(value: unknown, field: string): number {
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && /^\d+$/.test(value)
        ? Number(value)
        : NaN;

  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new ApiError(400, "VALIDATION_ERROR", `${field} must be a non-negative integer.`, {
      field,
    });
  }
  return parsed;
}

export interface Pagination {
  page: number;
  limit: number;
}

/** `?page=&limit=` with page >= 1 and limit clamped to 1..100 (default 20). */
export function parsePagination(query: { page?: unknown; limit?: unknown }): Pagination {
  const page = query.page === undefined ? 1 : Math.max(1, parseUint(query.page, "page"));
  const limit = Math.min(
    query.limit === undefined ? 20 : Math.max(1, parseUint(query.limit, "limit")),
    100
  );
  return { page, limit };
}

export function parseAddress(value: unknown, field: string): Address {
  const address = normalizeAddress(value);
  if (address === null) {
    throw new ApiError(400, "INVALID_ADDRESS", `${field} must be a 20-byte hex address.`, {
      field,
    });
  }
  return address;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Relay request body: `{ vote: VoteData, signature }`.
 */
export function parseRelayBody(body: unknown): { vote: VoteData; signature: string } {
  if (!isRecord(body) || !isRecord(body.vote)) {
    throw new ApiError(400, "VALIDATION_ERROR", "Body must contain a vote object.");
  }

  const { signature } = body;
  if (typeof signature !== "string" || !/^0x[0-9a-fA-F]+$/.test(signature)) {
    throw new ApiError(400, "VALIDATION_ERROR", "signature must be a 0x-prefixed hex string.", {
      field: "signature",
    });
  }

  const vote = body.vote;
  return {
    vote: {
      voter: parseAddress(vote.voter, "vote.voter"),
      electionId: parseUint(vote.electionId, "vote.electionId"),
      candidateId: parseUint(vote.candidateId, "vote.candidateId"),
      nonce: parseUint(vote.nonce, "vote.nonce"),
      deadline: parseUint(vote.deadline, "vote.deadline"),
    },
    signature,
  };
}
