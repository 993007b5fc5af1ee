/**
 * Ballot Ledger — Platform Deployment
 *
 * Wires a registry and a ballot store together the way a deployment
 * does: the registry is deployed first with its platform admin, the store
 * second, then the store owner calls the store's one-time initializer
 * with the registry's address.
 *
 * Component addresses follow CREATE derivation from the deployer account
 * and its deployment nonce (registry = nonce 0, store = nonce 1) unless
 * given explicitly.
 *
 * @module platform
 * @license AGPL-3.0-or-later
 */

import { getCreateAddress } from "ethers";
import { ElectionFactory } from "./election-factory";
import { VoteStorage } from "./vote-storage";
import { EventLog } from "./event-log";
import { systemClock, type Clock } from "./clock";
import type { EntropySource } from "./vote-hash";
import { requireAddress } from "../utils/address";
import { DEFAULT_CONFIG, type Address, type PlatformConfig } from "../types";

export interface DeployOptions {
  config?: Partial<PlatformConfig>;
  clock?: Clock;
  entropy?: EntropySource;
  /** Overrides the derived registry address */
  factoryAddress?: Address;
  /** Overrides the derived store address */
  storageAddress?: Address;
}

/** A deployed registry/store pair sharing one event log. */
export interface Platform {
  config: PlatformConfig;
  clock: Clock;
  events: EventLog;
  factory: ElectionFactory;
  storage: VoteStorage;
}

/**
 * Address a contract deployed by `deployer` at deployment `nonce` lands on.
 */
export function deploymentAddress(deployer: Address, nonce: number): Address {
  return getCreateAddress({ from: requireAddress(deployer), nonce });
}

/**
 * Deploys and initializes a platform.
 *
 * @example
 * ```ts
 * const { factory, storage } = deployPlatform({ config: { chainId: 84532 } });
 * storage.electionFactoryAddress === factory.address; // true
 * ```
 */
export function deployPlatform(options: DeployOptions = {}): Platform {
  const config: PlatformConfig = { ...DEFAULT_CONFIG, ...options.config };
  const clock = options.clock ?? systemClock;
  const events = new EventLog(clock);

  const factory = new ElectionFactory({
    address: options.factoryAddress ?? deploymentAddress(config.deployer, 0),
    platformAdmin: config.platformAdmin,
    clock,
    eventLog: events,
  });

  const storage = new VoteStorage({
    address: options.storageAddress ?? deploymentAddress(config.deployer, 1),
    chainId: config.chainId,
    domainName: config.domainName,
    domainVersion: config.domainVersion,
    clock,
    eventLog: events,
    entropy: options.entropy,
  });

  storage.initialize(config.storeOwner, factory);

  return { config, clock, events, factory, storage };
}
