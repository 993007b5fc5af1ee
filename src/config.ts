/**
 * Ballot Ledger — Configuration Loading
 *
 * Builds a `PlatformConfig` from environment variables on top of
 * `DEFAULT_CONFIG`:
 *
 *   NETWORK                 local | base-sepolia | eth-sepolia
 *   CHAIN_ID                overrides the network's chain id
 *   DEPLOYER_ADDRESS
 *   PLATFORM_ADMIN_ADDRESS
 *   STORE_OWNER_ADDRESS
 *   RELAYER_ADDRESS
 *   PORT
 *
 * @module config
 * @license AGPL-3.0-or-later
 */

import { normalizeAddress } from "./utils/address";
import {
  DEFAULT_CONFIG,
  NETWORKS,
  type Address,
  type NetworkName,
  type PlatformConfig,
} from "./types";

export class ConfigError extends Error {
  constructor(message: string, public readonly variable: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function isNetworkName(value: string): value is NetworkName {
  return Object.prototype.hasOwnProperty.call(NETWORKS, value);
}

function readAddress(env: NodeJS.ProcessEnv, variable: string, fallback: Address): Address {
  const raw = env[variable];
  if (raw === undefined || raw === "") return fallback;

  const address = normalizeAddress(raw);
  if (address === null) {
    throw new ConfigError(`${variable} is not a valid address: ${raw}`, variable);
  }
  return address;
}

function readPositiveInt(env: NodeJS.ProcessEnv, variable: string, fallback: number): number {
  const raw = env[variable];
  if (raw === undefined || raw === "") return fallback;

  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigError(`${variable} must be a positive integer: ${raw}`, variable);
  }
  return value;
}

/**
 * Reads the platform configuration from `env`.
 *
 * @throws ConfigError on an unknown network or a malformed value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlatformConfig {
  const networkName = env.NETWORK || DEFAULT_CONFIG.network;
  if (!isNetworkName(networkName)) {
    throw new ConfigError(
      `Unknown network: ${networkName}. Available networks: ${Object.keys(NETWORKS).join(", ")}`,
      "NETWORK"
    );
  }
  const network = NETWORKS[networkName];

  return {
    ...DEFAULT_CONFIG,
    network: network.name,
    chainId: readPositiveInt(env, "CHAIN_ID", network.chainId),
    deployer: readAddress(env, "DEPLOYER_ADDRESS", DEFAULT_CONFIG.deployer),
    platformAdmin: readAddress(env, "PLATFORM_ADMIN_ADDRESS", DEFAULT_CONFIG.platformAdmin),
    storeOwner: readAddress(env, "STORE_OWNER_ADDRESS", DEFAULT_CONFIG.storeOwner),
    relayer: readAddress(env, "RELAYER_ADDRESS", DEFAULT_CONFIG.relayer),
    port: readPositiveInt(env, "PORT", DEFAULT_CONFIG.port),
  };
}
