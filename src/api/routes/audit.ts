/**
 * Ballot Ledger API — Audit Routes
 *
 * Vote receipts, receipt verification and the event log, so third
 * parties can check what was recorded.
 *
 * Endpoints:
 * - GET /v1/elections/:id/votes/:voter                      — Stored vote record
 * - GET /v1/elections/:id/votes/:voter/verify/:candidateId  — Recompute and compare
 * - GET /v1/events                                          — Event log (filterable, paginated)
 * - GET /v1/events/verify                                   — Log integrity check
 *
 * @module api/routes/audit
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import type { Platform } from "../../core/platform";
import type { PlatformEventType } from "../../types";
import { ApiError } from "../middleware/error-handler";
import { parseAddress, parsePagination, parseUint } from "../params";
import { serializeLogEntry } from "../serializers";

const EVENT_TYPES: readonly PlatformEventType[] = [
  "ElectionCreated",
  "OrgAdminAdded",
  "OrgAdminRemoved",
  "ElectionStatusChanged",
  "VoteCast",
  "VoteCountUpdated",
  "MetaTransactionExecuted",
  "ElectionFactoryUpdated",
  "OwnershipTransferred",
  "Paused",
  "Unpaused",
  "Initialized",
];

function parseEventType(value: unknown): PlatformEventType | undefined {
  if (value === undefined) return undefined;
  const match = EVENT_TYPES.find((type) => type === value);
  if (!match) {
    throw new ApiError(400, "VALIDATION_ERROR", `Unknown event type: ${String(value)}`, {
      field: "type",
    });
  }
  return match;
}

export function createAuditRoutes(platform: Platform): Router {
  const router = Router();
  const { factory, storage, events } = platform;

  // --------------------------------------------------------
  // GET /v1/elections/:id/votes/:voter — Vote record
  // --------------------------------------------------------
  router.get("/elections/:id/votes/:voter", (req: Request, res: Response) => {
    const id = parseUint(req.params.id, "id");
    const voter = parseAddress(req.params.voter, "voter");
    factory.getElection(id);

    const record = storage.getVoteRecord(id, voter);

    res.json({
      election_id: id,
      voter,
      has_voted: record.hasVoted,
      vote_hash: record.voteHash,
      salt: record.salt,
      timestamp: record.timestamp,
    });
  });

  // --------------------------------------------------------
  // GET /v1/elections/:id/votes/:voter/verify/:candidateId
  // --------------------------------------------------------
  router.get(
    "/elections/:id/votes/:voter/verify/:candidateId",
    (req: Request, res: Response) => {
      const id = parseUint(req.params.id, "id");
      const voter = parseAddress(req.params.voter, "voter");
      const candidateId = parseUint(req.params.candidateId, "candidateId");
      factory.getElection(id);

      res.json({
        election_id: id,
        voter,
        candidate_id: candidateId,
        verified: storage.verifyVoteHash(id, voter, candidateId),
      });
    }
  );

  // --------------------------------------------------------
  // GET /v1/events — Event log
  // --------------------------------------------------------
  router.get("/events", (req: Request, res: Response) => {
    const type = parseEventType(req.query.type);
    const fromIndex = req.query.from === undefined ? 0 : parseUint(req.query.from, "from");

    const { page, limit } = parsePagination(req.query);

    const matches = events.query({ type, fromIndex });
    const pageEntries = matches.slice((page - 1) * limit, page * limit);

    res.json({
      events: pageEntries.map(serializeLogEntry),
      total: events.length,
      latest_hash: events.getLatestHash(),
      pagination: { page, limit, total: matches.length },
    });
  });

  // --------------------------------------------------------
  // GET /v1/events/verify — Integrity of the whole log
  // --------------------------------------------------------
  router.get("/events/verify", (_req: Request, res: Response) => {
    const result = events.verify();

    res.json({
      valid: result.isValid,
      entries_checked: result.entriesChecked,
      first_invalid_index: result.firstInvalidIndex,
      ...(result.error ? { error: result.error } : {}),
    });
  });

  return router;
}
