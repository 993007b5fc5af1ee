/**
 * Ballot Ledger API — Express Server
 *
 * Assembles all routes, middleware, and starts the HTTP server.
 *
 * The gateway is read-only apart from relaying signed votes.  Org admin
 * management, election creation, status overrides, direct votes and
 * store administration have no routes: they run on the registry and
 * ballot store of the platform handed to createApp(), so a standalone
 * server starts with an empty registry.
 *
 * Usage:
 *   Import createApp() with a platform you administer in-process, or run
 *   the compiled dist/api/server.js directly.
 *
 * @module api/server
 * @license AGPL-3.0-or-later
 */

import express, { Express } from "express";
import cors from "cors";
import { createElectionRoutes } from "./routes/elections";
import { createVoteRoutes } from "./routes/votes";
import { createAuditRoutes } from "./routes/audit";
import { notFoundHandler, errorHandler } from "./middleware/error-handler";
import { rateLimiters } from "./middleware/rate-limiter";
import { getPlatform, createPlatform } from "./store";
import { ManualClock } from "../core/clock";
import type { DeployOptions, Platform } from "../core/platform";

const VERSION = "0.1.0";

// ============================================================
// App Factory
// ============================================================

interface AppOptions {
  /** Optional platform (defaults to singleton) */
  platform?: Platform;
  /** Disable rate limiting (for testing) */
  disableRateLimiting?: boolean;
}

/**
 * Creates and configures the Express app.
 */
export function createApp(options: AppOptions = {}): Express {
  const app = express();
  const platform = options.platform ?? getPlatform();
  const useRateLimiting = !options.disableRateLimiting;

  // --------------------------------------------------------
  // Global Middleware
  // --------------------------------------------------------

  app.use(express.json());

  app.use(
    cors({
      origin: ["http://localhost:3000", "http://localhost:3001"],
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
    })
  );

  // --------------------------------------------------------
  // Health Check
  // --------------------------------------------------------

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      version: VERSION,
      network: platform.config.network,
      chain_id: platform.config.chainId,
      paused: platform.storage.paused,
      timestamp: new Date().toISOString(),
    });
  });

  // --------------------------------------------------------
  // API v1 Routes
  // --------------------------------------------------------

  if (useRateLimiting) app.use("/v1/relay", rateLimiters.relay);
  if (useRateLimiting) app.use("/v1/events", rateLimiters.audit);
  if (useRateLimiting) app.use("/v1", rateLimiters.read);

  app.use("/v1", createElectionRoutes(platform));
  app.use("/v1", createVoteRoutes(platform));
  app.use("/v1", createAuditRoutes(platform));

  // --------------------------------------------------------
  // Error Handling
  // --------------------------------------------------------

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Creates a fresh app over a freshly deployed platform driven by a
 * manual clock (for testing).
 */
export function createTestApp(
  options: Omit<DeployOptions, "clock"> & { startTime?: number } = {}
): { app: Express; platform: Platform; clock: ManualClock } {
  const clock = new ManualClock(options.startTime ?? 1_700_000_000);
  const platform = createPlatform({ ...options, clock });
  const app = createApp({ platform, disableRateLimiting: true });
  return { app, platform, clock };
}

// ============================================================
// Start Server (only when run directly)
// ============================================================

if (require.main === module) {
  const platform = getPlatform();
  const { port, network, chainId } = platform.config;
  const app = createApp({ platform });

  app.listen(port, () => {
    console.log(`Ballot Ledger API v${VERSION}`);
    console.log(`  Network:   ${network} (chain ${chainId})`);
    console.log(`  Registry:  ${platform.factory.address}`);
    console.log(`  Store:     ${platform.storage.address}`);
    console.log(`  Relayer:   ${platform.config.relayer}`);
    console.log(`  Listening: http://localhost:${port}/v1`);
    console.log("  Admin and direct-vote operations are not exposed over HTTP.");
  });
}
