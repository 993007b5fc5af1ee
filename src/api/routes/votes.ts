/**
 * Ballot Ledger API — Relay Routes
 *
 * The gateway is a relayer: voters sign an EIP-712 `Vote` payload with
 * their own key and the gateway submits it to the ballot store under its
 * relayer identity, so voters need no funds or connection of their own.
 *
 * Endpoints:
 * - GET  /v1/typed-data            — Domain and types to sign against
 * - GET  /v1/voters/:address/nonce — Nonce the next payload must carry
 * - POST /v1/relay                 — Submit a signed vote
 *
 * @module api/routes/votes
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import type { Platform } from "../../core/platform";
import { VOTE_TYPES } from "../../core/typed-data";
import { requireAddress } from "../../utils/address";
import { parseAddress, parseRelayBody } from "../params";
import { serializeReceipt } from "../serializers";

export function createVoteRoutes(platform: Platform): Router {
  const router = Router();
  const { storage, config } = platform;
  const relayer = requireAddress(config.relayer);

  // --------------------------------------------------------
  // GET /v1/typed-data — What to sign
  // --------------------------------------------------------
  router.get("/typed-data", (_req: Request, res: Response) => {
    res.json({
      domain: storage.domain(),
      types: VOTE_TYPES,
      primary_type: "Vote",
    });
  });

  // --------------------------------------------------------
  // GET /v1/voters/:address/nonce
  // --------------------------------------------------------
  router.get("/voters/:address/nonce", (req: Request, res: Response) => {
    const voter = parseAddress(req.params.address, "address");

    res.json({ voter, nonce: storage.getNonce(voter) });
  });

  // --------------------------------------------------------
  // POST /v1/relay — Submit a signed vote
  // --------------------------------------------------------
  router.post("/relay", (req: Request, res: Response) => {
    const { vote, signature } = parseRelayBody(req.body);

    const receipt = storage.voteWithSignature(relayer, vote, signature);

    res.status(200).json({
      accepted: true,
      relayer,
      nonce_consumed: vote.nonce,
      receipt: serializeReceipt(receipt),
    });
  });

  return router;
}
