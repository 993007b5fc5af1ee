/**
 * Ballot Ledger API — Platform Store
 *
 * Holds the deployed registry/store pair the routes operate on.  State
 * lives in memory and is lost on restart.
 *
 * @module api/store
 * @license AGPL-3.0-or-later
 */

import { deployPlatform, type DeployOptions, type Platform } from "../core/platform";
import { loadConfig } from "../config";

/** Singleton platform instance */
let platformInstance: Platform | null = null;

/**
 * Gets the global platform (singleton), deployed from the environment
 * configuration on first use.
 */
export function getPlatform(): Platform {
  if (!platformInstance) {
    platformInstance = deployPlatform({ config: loadConfig() });
  }
  return platformInstance;
}

/**
 * Deploys a fresh platform (for testing).
 */
export function createPlatform(options: DeployOptions = {}): Platform {
  return deployPlatform(options);
}
