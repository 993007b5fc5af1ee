/**
 * Ballot Ledger — Election Registry
 *
 * The ElectionFactory owns organization admin sets and election
 * metadata, and is the single source of truth for "is this election
 * currently votable".  It depends on nothing else in the system; the
 * ballot store reads it through the `ElectionLookup` port.
 *
 * Principal operations:
 *   1. addOrgAdmin() / removeOrgAdmin() — platform admin manages org admins
 *   2. createElection()                 — org admin registers an election
 *   3. toggleElectionStatus()           — platform admin override
 *   4. getElection() / isElectionActive() — read side for the ballot store
 *
 * Every mutating call validates all of its input before writing
 * anything: a rejected call leaves no trace, not even a consumed id.
 *
 * @module election-factory
 * @license AGPL-3.0-or-later
 */

import { ElectionError } from "./errors";
import { EventLog } from "./event-log";
import { systemClock, type Clock } from "./clock";
import { PlatformAdminCapability } from "./capabilities";
import { normalizeAddress, requireAddress } from "../utils/address";
import type {
  Address,
  CreateElectionParams,
  Election,
  OrganizationView,
} from "../types";

// ============================================================
// Ports
// ============================================================

/**
 * Read-only view of the registry that the ballot store depends on.
 *
 * Any object with this shape can stand in for the registry, which is
 * how the ballot store is tested against a fake.
 */
export interface ElectionLookup {
  /** Address the registry is reachable at */
  readonly address: Address;
  /** @throws ElectionError ELECTION_NOT_FOUND */
  getElection(electionId: number): Election;
  /** @throws ElectionError ELECTION_NOT_FOUND */
  isElectionActive(electionId: number): boolean;
}

export interface ElectionFactoryOptions {
  /** Address this registry is deployed at */
  address: Address;
  /** Holder of the platform-admin capability */
  platformAdmin: Address;
  clock?: Clock;
  eventLog?: EventLog;
}

// ============================================================
// Organization aggregate
// ============================================================

class Organization {
  readonly admins: Set<Address> = new Set();
  readonly electionIds: number[] = [];

  constructor(readonly id: number) {}

  toView(): OrganizationView {
    return {
      id: this.id,
      admins: Array.from(this.admins),
      electionIds: [...this.electionIds],
    };
  }
}

function copyElection(election: Election): Election {
  return { ...election, candidates: [...election.candidates] };
}

// ============================================================
// ElectionFactory
// ============================================================

/**
 * @example
 * ```ts
 * const factory = new ElectionFactory({ address, platformAdmin, clock });
 *
 * factory.addOrgAdmin(platformAdmin, 1, orgAdmin);
 * const id = factory.createElection(orgAdmin, {
 *   orgId: 1,
 *   name: "Board election",
 *   startTime: clock.now() + 3600,
 *   endTime: clock.now() + 7 * 86400,
 *   candidates: ["Alice", "Bob"],
 * });
 *
 * factory.isElectionActive(id); // false until startTime
 * ```
 */
export class ElectionFactory implements ElectionLookup {
  readonly address: Address;

  readonly events: EventLog;

  private readonly admin: PlatformAdminCapability;

  private readonly clock: Clock;

  private organizations: Map<number, Organization> = new Map();

  private elections: Map<number, Election> = new Map();

  /** Id the next successful createElection() receives */
  private nextElectionId = 1;

  constructor(options: ElectionFactoryOptions) {
    this.address = requireAddress(options.address);
    this.admin = new PlatformAdminCapability(options.platformAdmin);
    this.clock = options.clock ?? systemClock;
    this.events = options.eventLog ?? new EventLog(this.clock);
  }

  // --------------------------------------------------------
  // Organization admins
  // --------------------------------------------------------

  /**
   * Grants `admin` the right to create elections for `orgId`.
   * Creates the organization on its first grant.
   *
   * @throws ElectionError NOT_PLATFORM_ADMIN, INVALID_ADMIN_ADDRESS, ALREADY_AN_ADMIN
   */
  addOrgAdmin(caller: Address, orgId: number, admin: Address): void {
    this.admin.assertHeldBy(caller);
    const account = requireAddress(admin, "INVALID_ADMIN_ADDRESS", false);

    const org = this.organizations.get(orgId);
    if (org?.admins.has(account)) {
      throw new ElectionError(
        "Address is already an admin of this organization",
        "ALREADY_AN_ADMIN",
        { orgId, admin: account }
      );
    }

    const target = org ?? new Organization(orgId);
    target.admins.add(account);
    this.organizations.set(orgId, target);

    this.events.append(this.address, {
      type: "OrgAdminAdded",
      orgId,
      admin: account,
      addedBy: this.admin.holder,
    });
  }

  /**
   * Revokes `admin`'s membership.  The organization itself remains.
   *
   * @throws ElectionError NOT_PLATFORM_ADMIN, NOT_AN_ADMIN
   */
  removeOrgAdmin(caller: Address, orgId: number, admin: Address): void {
    this.admin.assertHeldBy(caller);

    const account = normalizeAddress(admin);
    const org = this.organizations.get(orgId);
    if (!org || account === null || !org.admins.has(account)) {
      throw new ElectionError(
        "Address is not an admin of this organization",
        "NOT_AN_ADMIN",
        { orgId, admin }
      );
    }

    org.admins.delete(account);

    this.events.append(this.address, {
      type: "OrgAdminRemoved",
      orgId,
      admin: account,
      removedBy: this.admin.holder,
    });
  }

  // --------------------------------------------------------
  // Elections
  // --------------------------------------------------------

  /**
   * Registers a new election for an organization.
   *
   * Validation order: caller membership, name, start in the future,
   * end after start, at least one candidate.  Times must be whole
   * seconds; anything else fails the check it belongs to.
   *
   * @returns The new election id
   * @throws ElectionError NOT_ORG_ADMIN, EMPTY_INPUT, START_TIME_MUST_BE_IN_FUTURE,
   *   INVALID_TIME_RANGE, NO_CANDIDATES_PROVIDED
   */
  createElection(caller: Address, params: CreateElectionParams): number {
    const { orgId, name, description = "", startTime, endTime, candidates } = params;

    const creator = normalizeAddress(caller);
    if (creator === null || !this.isOrgAdmin(orgId, creator)) {
      throw new ElectionError(
        "Caller is not an admin of this organization",
        "NOT_ORG_ADMIN",
        { orgId, caller }
      );
    }

    if (name.length === 0) {
      throw new ElectionError("Election name is required", "EMPTY_INPUT");
    }

    const now = this.clock.now();
    if (!Number.isSafeInteger(startTime) || startTime <= now) {
      throw new ElectionError(
        "Start time must be in the future",
        "START_TIME_MUST_BE_IN_FUTURE",
        { startTime, now }
      );
    }

    if (!Number.isSafeInteger(endTime) || endTime <= startTime) {
      throw new ElectionError(
        "End time must be after start time",
        "INVALID_TIME_RANGE",
        { startTime, endTime }
      );
    }

    if (candidates.length === 0) {
      throw new ElectionError(
        "At least one candidate is required",
        "NO_CANDIDATES_PROVIDED"
      );
    }

    const electionId = this.nextElectionId++;
    const election: Election = {
      orgId,
      electionId,
      name,
      description,
      startTime,
      endTime,
      isActive: true,
      candidates: [...candidates],
      creator,
      createdAt: now,
    };

    this.elections.set(electionId, election);
    // createElection requires an admin, so the organization exists
    this.organizations.get(orgId)?.electionIds.push(electionId);

    this.events.append(this.address, {
      type: "ElectionCreated",
      orgId,
      electionId,
      name,
      creator,
      startTime,
      endTime,
    });

    return electionId;
  }

  /**
   * Flips an election's active flag.
   *
   * @returns The new value of the flag
   * @throws ElectionError NOT_PLATFORM_ADMIN, ELECTION_NOT_FOUND
   */
  toggleElectionStatus(caller: Address, electionId: number): boolean {
    this.admin.assertHeldBy(caller);
    const election = this.requireElection(electionId);

    election.isActive = !election.isActive;

    this.events.append(this.address, {
      type: "ElectionStatusChanged",
      electionId,
      isActive: election.isActive,
      changedBy: this.admin.holder,
    });

    return election.isActive;
  }

  // --------------------------------------------------------
  // Reads
  // --------------------------------------------------------

  /** @throws ElectionError ELECTION_NOT_FOUND */
  getElection(electionId: number): Election {
    return copyElection(this.requireElection(electionId));
  }

  /**
   * Whether votes are accepted right now: the active flag is set and the
   * current time lies within [startTime, endTime], both ends inclusive.
   *
   * @throws ElectionError ELECTION_NOT_FOUND
   */
  isElectionActive(electionId: number): boolean {
    const election = this.requireElection(electionId);
    const now = this.clock.now();
    return election.isActive && now >= election.startTime && now <= election.endTime;
  }

  /** Election ids of an organization in creation order (empty if none). */
  getOrganizationElections(orgId: number): number[] {
    return [...(this.organizations.get(orgId)?.electionIds ?? [])];
  }

  /** Never throws; malformed addresses are simply not admins. */
  isOrgAdmin(orgId: number, account: Address): boolean {
    const normalized = normalizeAddress(account);
    if (normalized === null) return false;
    return this.organizations.get(orgId)?.admins.has(normalized) ?? false;
  }

  hasOrganization(orgId: number): boolean {
    return this.organizations.has(orgId);
  }

  getOrganization(orgId: number): OrganizationView | undefined {
    return this.organizations.get(orgId)?.toView();
  }

  getOrgAdmins(orgId: number): Address[] {
    return this.getOrganization(orgId)?.admins ?? [];
  }

  get platformAdmin(): Address {
    return this.admin.holder;
  }

  /** Number of elections ever created. */
  getTotalElections(): number {
    return this.nextElectionId - 1;
  }

  private requireElection(electionId: number): Election {
    const election = this.elections.get(electionId);
    if (!election) {
      throw new ElectionError("Election does not exist", "ELECTION_NOT_FOUND", {
        electionId,
      });
    }
    return election;
  }
}
