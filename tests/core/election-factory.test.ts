/**
 * Ballot Ledger — Unit Tests for the Election Registry
 *
 * Covers:
 * - Org admin grants and revocations
 * - Election creation and its validation order
 * - Id assignment (failed attempts consume nothing)
 * - Status toggling and the inclusive voting window
 * - Read accessors and the organization aggregate
 *
 * @license AGPL-3.0-or-later
 */

import { ElectionFactory } from "../../src/core/election-factory";
import { EventLog } from "../../src/core/event-log";
import { ManualClock } from "../../src/core/clock";
import { ZERO_ADDRESS } from "../../src/types";
import {
  DAY,
  HOUR,
  ORG_ADMIN,
  ORG_ID,
  PLATFORM_ADMIN,
  T0,
  address,
  expectElectionError,
} from "../helpers";

const FACTORY_ADDRESS = address(0xfa);

describe("ElectionFactory", () => {
  let clock: ManualClock;
  let events: EventLog;
  let factory: ElectionFactory;

  const validParams = () => ({
    orgId: ORG_ID,
    name: "Board Election",
    description: "Annual board seat",
    startTime: T0 + HOUR,
    endTime: T0 + 7 * DAY,
    candidates: ["Alice", "Bob", "Carol"],
  });

  beforeEach(() => {
    clock = new ManualClock(T0);
    events = new EventLog(clock);
    factory = new ElectionFactory({
      address: FACTORY_ADDRESS,
      platformAdmin: PLATFORM_ADMIN,
      clock,
      eventLog: events,
    });
  });

  // ============================================================
  // Construction
  // ============================================================

  describe("constructor", () => {
    it("should expose the platform admin", () => {
      expect(factory.platformAdmin).toBe(PLATFORM_ADMIN);
      expect(factory.address).toBe(FACTORY_ADDRESS);
    });

    it("should reject a zero platform admin", () => {
      expectElectionError(
        () => new ElectionFactory({ address: FACTORY_ADDRESS, platformAdmin: ZERO_ADDRESS }),
        "INVALID_ADMIN_ADDRESS"
      );
    });

    it("should start with no elections", () => {
      expect(factory.getTotalElections()).toBe(0);
    });
  });

  // ============================================================
  // Org admins
  // ============================================================

  describe("addOrgAdmin", () => {
    it("should grant membership and emit OrgAdminAdded", () => {
      factory.addOrgAdmin(PLATFORM_ADMIN, ORG_ID, ORG_ADMIN);

      expect(factory.isOrgAdmin(ORG_ID, ORG_ADMIN)).toBe(true);

      const added = events.filter("OrgAdminAdded");
      expect(added).toHaveLength(1);
      expect(added[0].emitter).toBe(FACTORY_ADDRESS);
      expect(added[0].event).toEqual({
        type: "OrgAdminAdded",
        orgId: ORG_ID,
        admin: ORG_ADMIN,
        addedBy: PLATFORM_ADMIN,
      });
    });

    it("should accept a lowercase admin address and store it checksummed", () => {
      factory.addOrgAdmin(PLATFORM_ADMIN, ORG_ID, ORG_ADMIN.toLowerCase());

      expect(factory.getOrgAdmins(ORG_ID)).toEqual([ORG_ADMIN]);
    });

    it("should accept the platform admin caller in any letter case", () => {
      factory.addOrgAdmin(PLATFORM_ADMIN.toLowerCase(), ORG_ID, ORG_ADMIN);
      expect(factory.isOrgAdmin(ORG_ID, ORG_ADMIN)).toBe(true);
    });

    it("should reject callers other than the platform admin", () => {
      expectElectionError(
        () => factory.addOrgAdmin(ORG_ADMIN, ORG_ID, address(0x0b)),
        "NOT_PLATFORM_ADMIN"
      );
      expect(factory.isOrgAdmin(ORG_ID, address(0x0b))).toBe(false);
    });

    it("should reject the zero address", () => {
      expectElectionError(
        () => factory.addOrgAdmin(PLATFORM_ADMIN, ORG_ID, ZERO_ADDRESS),
        "INVALID_ADMIN_ADDRESS"
      );
    });

    it("should reject a malformed address", () => {
      expectElectionError(
        () => factory.addOrgAdmin(PLATFORM_ADMIN, ORG_ID, "0x1234"),
        "INVALID_ADMIN_ADDRESS"
      );
    });

    it("should reject a second grant to the same admin", () => {
      factory.addOrgAdmin(PLATFORM_ADMIN, ORG_ID, ORG_ADMIN);

      expectElectionError(
        () => factory.addOrgAdmin(PLATFORM_ADMIN, ORG_ID, ORG_ADMIN),
        "ALREADY_AN_ADMIN"
      );
      expect(events.filter("OrgAdminAdded")).toHaveLength(1);
    });

    it("should scope membership per organization", () => {
      factory.addOrgAdmin(PLATFORM_ADMIN, ORG_ID, ORG_ADMIN);

      expect(factory.isOrgAdmin(2, ORG_ADMIN)).toBe(false);
      factory.addOrgAdmin(PLATFORM_ADMIN, 2, ORG_ADMIN);
      expect(factory.isOrgAdmin(2, ORG_ADMIN)).toBe(true);
    });

    it("should create the organization on the first grant", () => {
      expect(factory.hasOrganization(ORG_ID)).toBe(false);
      expect(factory.getOrganization(ORG_ID)).toBeUndefined();

      factory.addOrgAdmin(PLATFORM_ADMIN, ORG_ID, ORG_ADMIN);

      expect(factory.hasOrganization(ORG_ID)).toBe(true);
      expect(factory.getOrganization(ORG_ID)).toEqual({
        id: ORG_ID,
        admins: [ORG_ADMIN],
        electionIds: [],
      });
    });
  });

  describe("removeOrgAdmin", () => {
    beforeEach(() => {
      factory.addOrgAdmin(PLATFORM_ADMIN, ORG_ID, ORG_ADMIN);
    });

    it("should revoke membership and emit OrgAdminRemoved", () => {
      factory.removeOrgAdmin(PLATFORM_ADMIN, ORG_ID, ORG_ADMIN);

      expect(factory.isOrgAdmin(ORG_ID, ORG_ADMIN)).toBe(false);
      expect(events.filter("OrgAdminRemoved")[0].event).toEqual({
        type: "OrgAdminRemoved",
        orgId: ORG_ID,
        admin: ORG_ADMIN,
        removedBy: PLATFORM_ADMIN,
      });
    });

    it("should keep the organization after its last admin is removed", () => {
      factory.removeOrgAdmin(PLATFORM_ADMIN, ORG_ID, ORG_ADMIN);

      expect(factory.hasOrganization(ORG_ID)).toBe(true);
      expect(factory.getOrgAdmins(ORG_ID)).toEqual([]);
    });

    it("should reject callers other than the platform admin", () => {
      expectElectionError(
        () => factory.removeOrgAdmin(ORG_ADMIN, ORG_ID, ORG_ADMIN),
        "NOT_PLATFORM_ADMIN"
      );
      expect(factory.isOrgAdmin(ORG_ID, ORG_ADMIN)).toBe(true);
    });

    it("should reject removing a non-admin", () => {
      expectElectionError(
        () => factory.removeOrgAdmin(PLATFORM_ADMIN, ORG_ID, address(0x0b)),
        "NOT_AN_ADMIN"
      );
    });

    it("should reject removing from an unknown organization", () => {
      expectElectionError(
        () => factory.removeOrgAdmin(PLATFORM_ADMIN, 42, ORG_ADMIN),
        "NOT_AN_ADMIN"
      );
    });

    it("should stop the removed admin from creating elections", () => {
      factory.removeOrgAdmin(PLATFORM_ADMIN, ORG_ID, ORG_ADMIN);

      expectElectionError(
        () => factory.createElection(ORG_ADMIN, validParams()),
        "NOT_ORG_ADMIN"
      );
    });
  });

  // ============================================================
  // Election creation
  // ============================================================

  describe("createElection", () => {
    beforeEach(() => {
      factory.addOrgAdmin(PLATFORM_ADMIN, ORG_ID, ORG_ADMIN);
    });

    it("should create an election with sequential ids starting at 1", () => {
      const first = factory.createElection(ORG_ADMIN, validParams());
      const second = factory.createElection(ORG_ADMIN, validParams());

      expect(first).toBe(1);
      expect(second).toBe(2);
      expect(factory.getTotalElections()).toBe(2);
    });

    it("should persist the full election record", () => {
      const id = factory.createElection(ORG_ADMIN, validParams());

      expect(factory.getElection(id)).toEqual({
        orgId: ORG_ID,
        electionId: 1,
        name: "Board Election",
        description: "Annual board seat",
        startTime: T0 + HOUR,
        endTime: T0 + 7 * DAY,
        isActive: true,
        candidates: ["Alice", "Bob", "Carol"],
        creator: ORG_ADMIN,
        createdAt: T0,
      });
    });

    it("should default the description to an empty string", () => {
      const { description: _omitted, ...params } = validParams();
      const id = factory.createElection(ORG_ADMIN, params);

      expect(factory.getElection(id).description).toBe("");
    });

    it("should append the id to the organization and emit ElectionCreated", () => {
      const id = factory.createElection(ORG_ADMIN, validParams());

      expect(factory.getOrganizationElections(ORG_ID)).toEqual([id]);
      expect(events.filter("ElectionCreated")[0].event).toEqual({
        type: "ElectionCreated",
        orgId: ORG_ID,
        electionId: id,
        name: "Board Election",
        creator: ORG_ADMIN,
        startTime: T0 + HOUR,
        endTime: T0 + 7 * DAY,
      });
    });

    it("should not share the candidate array with the caller", () => {
      const params = validParams();
      const id = factory.createElection(ORG_ADMIN, params);

      params.candidates.push("Mallory");
      factory.getElection(id).candidates.push("Eve");

      expect(factory.getElection(id).candidates).toEqual(["Alice", "Bob", "Carol"]);
    });

    it("should reject callers that are not admins of the organization", () => {
      expectElectionError(
        () => factory.createElection(address(0x0b), validParams()),
        "NOT_ORG_ADMIN"
      );
      expectElectionError(
        () => factory.createElection(ORG_ADMIN, { ...validParams(), orgId: 2 }),
        "NOT_ORG_ADMIN"
      );
    });

    it("should not let the platform admin create elections without membership", () => {
      expectElectionError(
        () => factory.createElection(PLATFORM_ADMIN, validParams()),
        "NOT_ORG_ADMIN"
      );
    });

    it("should reject an empty name", () => {
      expectElectionError(
        () => factory.createElection(ORG_ADMIN, { ...validParams(), name: "" }),
        "EMPTY_INPUT"
      );
    });

    it("should reject a start time equal to now", () => {
      expectElectionError(
        () => factory.createElection(ORG_ADMIN, { ...validParams(), startTime: T0 }),
        "START_TIME_MUST_BE_IN_FUTURE"
      );
    });

    it("should reject a start time in the past", () => {
      expectElectionError(
        () => factory.createElection(ORG_ADMIN, { ...validParams(), startTime: T0 - 1 }),
        "START_TIME_MUST_BE_IN_FUTURE"
      );
    });

    it("should reject an end time equal to the start time", () => {
      expectElectionError(
        () =>
          factory.createElection(ORG_ADMIN, {
            ...validParams(),
            startTime: T0 + HOUR,
            endTime: T0 + HOUR,
          }),
        "INVALID_TIME_RANGE"
      );
    });

    it("should reject an end time before the start time", () => {
      expectElectionError(
        () =>
          factory.createElection(ORG_ADMIN, {
            ...validParams(),
            startTime: T0 + DAY,
            endTime: T0 + HOUR,
          }),
        "INVALID_TIME_RANGE"
      );
    });

    it("should reject start times that are not whole seconds", () => {
      for (const startTime of [NaN, Infinity, T0 + HOUR + 0.5]) {
        expectElectionError(
          () => factory.createElection(ORG_ADMIN, { ...validParams(), startTime }),
          "START_TIME_MUST_BE_IN_FUTURE"
        );
      }
    });

    it("should reject end times that are not whole seconds", () => {
      for (const endTime of [NaN, Infinity, T0 + DAY + 0.5]) {
        expectElectionError(
          () => factory.createElection(ORG_ADMIN, { ...validParams(), endTime }),
          "INVALID_TIME_RANGE"
        );
      }
    });

    it("should not store an election with NaN times", () => {
      expectElectionError(
        () =>
          factory.createElection(ORG_ADMIN, {
            ...validParams(),
            startTime: NaN,
            endTime: NaN,
          }),
        "START_TIME_MUST_BE_IN_FUTURE"
      );

      expect(factory.getTotalElections()).toBe(0);
      expect(factory.createElection(ORG_ADMIN, validParams())).toBe(1);
    });

    it("should reject an empty candidate list", () => {
      expectElectionError(
        () => factory.createElection(ORG_ADMIN, { ...validParams(), candidates: [] }),
        "NO_CANDIDATES_PROVIDED"
      );
    });

    it("should accept a single candidate", () => {
      const id = factory.createElection(ORG_ADMIN, { ...validParams(), candidates: ["Only"] });
      expect(factory.getElection(id).candidates).toEqual(["Only"]);
    });

    it("should report the name before the time checks", () => {
      expectElectionError(
        () =>
          factory.createElection(ORG_ADMIN, {
            ...validParams(),
            name: "",
            startTime: T0 - 1,
            candidates: [],
          }),
        "EMPTY_INPUT"
      );
    });

    it("should report the start time before the range check", () => {
      expectElectionError(
        () =>
          factory.createElection(ORG_ADMIN, {
            ...validParams(),
            startTime: T0,
            endTime: T0 - 10,
          }),
        "START_TIME_MUST_BE_IN_FUTURE"
      );
    });

    it("should not consume an id on failed attempts", () => {
      expectElectionError(
        () => factory.createElection(ORG_ADMIN, { ...validParams(), startTime: T0 }),
        "START_TIME_MUST_BE_IN_FUTURE"
      );
      expectElectionError(
        () =>
          factory.createElection(ORG_ADMIN, {
            ...validParams(),
            endTime: T0 + HOUR,
          }),
        "INVALID_TIME_RANGE"
      );
      expectElectionError(
        () => factory.createElection(ORG_ADMIN, { ...validParams(), name: "" }),
        "EMPTY_INPUT"
      );

      expect(factory.getTotalElections()).toBe(0);
      expect(events.filter("ElectionCreated")).toHaveLength(0);
      expect(factory.getOrganizationElections(ORG_ID)).toEqual([]);

      expect(factory.createElection(ORG_ADMIN, validParams())).toBe(1);
    });
  });

  // ============================================================
  // Status
  // ============================================================

  describe("toggleElectionStatus", () => {
    let id: number;

    beforeEach(() => {
      factory.addOrgAdmin(PLATFORM_ADMIN, ORG_ID, ORG_ADMIN);
      id = factory.createElection(ORG_ADMIN, validParams());
    });

    it("should flip the active flag and emit ElectionStatusChanged", () => {
      expect(factory.toggleElectionStatus(PLATFORM_ADMIN, id)).toBe(false);
      expect(factory.getElection(id).isActive).toBe(false);

      expect(factory.toggleElectionStatus(PLATFORM_ADMIN, id)).toBe(true);
      expect(factory.getElection(id).isActive).toBe(true);

      const changes = events.filter("ElectionStatusChanged").map((e) => e.event);
      expect(changes).toEqual([
        { type: "ElectionStatusChanged", electionId: id, isActive: false, changedBy: PLATFORM_ADMIN },
        { type: "ElectionStatusChanged", electionId: id, isActive: true, changedBy: PLATFORM_ADMIN },
      ]);
    });

    it("should reject org admins", () => {
      expectElectionError(
        () => factory.toggleElectionStatus(ORG_ADMIN, id),
        "NOT_PLATFORM_ADMIN"
      );
      expect(factory.getElection(id).isActive).toBe(true);
    });

    it("should reject unknown elections", () => {
      expectElectionError(
        () => factory.toggleElectionStatus(PLATFORM_ADMIN, 99),
        "ELECTION_NOT_FOUND"
      );
    });

    it("should check the caller before the election", () => {
      expectElectionError(
        () => factory.toggleElectionStatus(ORG_ADMIN, 99),
        "NOT_PLATFORM_ADMIN"
      );
    });
  });

  // ============================================================
  // Voting window
  // ============================================================

  describe("isElectionActive", () => {
    let id: number;
    const start = T0 + HOUR;
    const end = T0 + 7 * DAY;

    beforeEach(() => {
      factory.addOrgAdmin(PLATFORM_ADMIN, ORG_ID, ORG_ADMIN);
      id = factory.createElection(ORG_ADMIN, validParams());
    });

    it("should be false before the start time", () => {
      clock.set(start - 1);
      expect(factory.isElectionActive(id)).toBe(false);
    });

    it("should be true at exactly the start time", () => {
      clock.set(start);
      expect(factory.isElectionActive(id)).toBe(true);
    });

    it("should be true at exactly the end time", () => {
      clock.set(end);
      expect(factory.isElectionActive(id)).toBe(true);
    });

    it("should be false after the end time", () => {
      clock.set(end + 1);
      expect(factory.isElectionActive(id)).toBe(false);
    });

    it("should be false inside the window when deactivated", () => {
      clock.set(start + 10);
      factory.toggleElectionStatus(PLATFORM_ADMIN, id);
      expect(factory.isElectionActive(id)).toBe(false);
    });

    it("should throw for unknown elections", () => {
      expectElectionError(() => factory.isElectionActive(0), "ELECTION_NOT_FOUND");
      expectElectionError(() => factory.isElectionActive(2), "ELECTION_NOT_FOUND");
    });
  });

  // ============================================================
  // Reads
  // ============================================================

  describe("reads", () => {
    it("should throw ELECTION_NOT_FOUND for id 0", () => {
      expectElectionError(() => factory.getElection(0), "ELECTION_NOT_FOUND");
    });

    it("should return an empty list for organizations without elections", () => {
      expect(factory.getOrganizationElections(7)).toEqual([]);
    });

    it("should list elections per organization in creation order", () => {
      factory.addOrgAdmin(PLATFORM_ADMIN, 1, ORG_ADMIN);
      factory.addOrgAdmin(PLATFORM_ADMIN, 2, ORG_ADMIN);

      factory.createElection(ORG_ADMIN, { ...validParams(), orgId: 1 });
      factory.createElection(ORG_ADMIN, { ...validParams(), orgId: 2 });
      factory.createElection(ORG_ADMIN, { ...validParams(), orgId: 1 });

      expect(factory.getOrganizationElections(1)).toEqual([1, 3]);
      expect(factory.getOrganizationElections(2)).toEqual([2]);
      expect(factory.getOrganization(1)?.electionIds).toEqual([1, 3]);
    });

    it("should answer isOrgAdmin with false for malformed addresses", () => {
      expect(factory.isOrgAdmin(ORG_ID, "not-an-address")).toBe(false);
    });
  });
});
