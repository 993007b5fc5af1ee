/**
 * Ballot Ledger API — Response Shapes
 *
 * @module api/serializers
 * @license AGPL-3.0-or-later
 */

import type { Election, VoteReceipt } from "../types";
import type { EventLogEntry } from "../core/event-log";

export function serializeElection(election: Election, activeNow: boolean) {
  return {
    id: election.electionId,
    org_id: election.orgId,
    name: election.name,
    description: election.description,
    start_time: election.startTime,
    end_time: election.endTime,
    is_active: election.isActive,
    active_now: activeNow,
    candidates: election.candidates,
    creator: election.creator,
    created_at: election.createdAt,
  };
}

export function serializeReceipt(receipt: VoteReceipt) {
  return {
    voter: receipt.voter,
    election_id: receipt.electionId,
    candidate_id: receipt.candidateId,
    vote_hash: receipt.voteHash,
    timestamp: receipt.timestamp,
    delegated: receipt.isDelegated,
    new_count: receipt.newCount,
  };
}

export function serializeLogEntry(entry: EventLogEntry) {
  return {
    index: entry.index,
    hash: entry.hash,
    previous_hash: entry.previousHash,
    timestamp: entry.timestamp,
    emitter: entry.emitter,
    event: entry.event,
  };
}
