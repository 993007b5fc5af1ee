/**
 * Ballot Ledger API — Election Routes
 *
 * Read-only views of the registry.  Elections are created on the
 * registry itself by organization admins, not through the gateway.
 *
 * Endpoints:
 * - GET /v1/elections                      — List elections (paginated)
 * - GET /v1/elections/:id                  — Election details
 * - GET /v1/elections/:id/status           — Whether votes are accepted now
 * - GET /v1/elections/:id/results          — Per-candidate tally
 * - GET /v1/orgs/:orgId/elections          — Election ids of an organization
 * - GET /v1/orgs/:orgId/admins/:address    — Org admin membership
 *
 * @module api/routes/elections
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import type { Platform } from "../../core/platform";
import { parseAddress, parsePagination, parseUint } from "../params";
import { serializeElection } from "../serializers";

export function createElectionRoutes(platform: Platform): Router {
  const router = Router();
  const { factory, storage } = platform;

  // --------------------------------------------------------
  // GET /v1/elections — List elections
  // --------------------------------------------------------
  router.get("/elections", (req: Request, res: Response) => {
    const { page, limit } = parsePagination(req.query);

    const total = factory.getTotalElections();
    const first = (page - 1) * limit + 1;
    const last = Math.min(total, first + limit - 1);

    const elections: ReturnType<typeof serializeElection>[] = [];
    for (let id = first; id <= last; id++) {
      elections.push(serializeElection(factory.getElection(id), factory.isElectionActive(id)));
    }

    res.json({
      elections,
      pagination: { page, limit, total },
    });
  });

  // --------------------------------------------------------
  // GET /v1/elections/:id — Election details
  // --------------------------------------------------------
  router.get("/elections/:id", (req: Request, res: Response) => {
    const id = parseUint(req.params.id, "id");
    const election = factory.getElection(id);

    res.json(serializeElection(election, factory.isElectionActive(id)));
  });

  // --------------------------------------------------------
  // GET /v1/elections/:id/status — Votable right now?
  // --------------------------------------------------------
  router.get("/elections/:id/status", (req: Request, res: Response) => {
    const id = parseUint(req.params.id, "id");

    res.json({
      election_id: id,
      active: factory.isElectionActive(id),
      paused: storage.paused,
    });
  });

  // --------------------------------------------------------
  // GET /v1/elections/:id/results — Tally
  // --------------------------------------------------------
  router.get("/elections/:id/results", (req: Request, res: Response) => {
    const id = parseUint(req.params.id, "id");
    const election = factory.getElection(id);
    const counts = storage.getAllVoteCounts(id);
    const totalVotes = counts.reduce((sum, n) => sum + n, 0);

    const results = election.candidates.map((candidate, index) => ({
      candidate,
      index,
      votes: counts[index],
      percentage: totalVotes > 0 ? +((counts[index] / totalVotes) * 100).toFixed(1) : 0,
    }));

    res.json({
      election_id: id,
      results,
      total_votes: totalVotes,
      active: factory.isElectionActive(id),
      end_time: election.endTime,
    });
  });

  // --------------------------------------------------------
  // GET /v1/orgs/:orgId/elections
  // --------------------------------------------------------
  router.get("/orgs/:orgId/elections", (req: Request, res: Response) => {
    const orgId = parseUint(req.params.orgId, "orgId");

    res.json({
      org_id: orgId,
      election_ids: factory.getOrganizationElections(orgId),
    });
  });

  // --------------------------------------------------------
  // GET /v1/orgs/:orgId/admins/:address
  // --------------------------------------------------------
  router.get("/orgs/:orgId/admins/:address", (req: Request, res: Response) => {
    const orgId = parseUint(req.params.orgId, "orgId");
    const address = parseAddress(req.params.address, "address");

    res.json({
      org_id: orgId,
      address,
      is_admin: factory.isOrgAdmin(orgId, address),
    });
  });

  return router;
}
