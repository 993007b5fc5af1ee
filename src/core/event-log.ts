/**
 * Ballot Ledger — Hash-linked Event Log
 *
 * Every state change in the registry and the ballot store emits a
 * notification into an append-only log.  Each entry references the
 * previous entry's SHA-256 hash, so editing, dropping or reordering any
 * entry breaks every hash after it and shows up in `verify()`.
 *
 * Entries carry the address of the component that emitted them, the
 * block timestamp at emission and the typed event payload.
 *
 * @module event-log
 * @license AGPL-3.0-or-later
 */

import { createHash } from "crypto";
import type {
  Address,
  EventOfType,
  PlatformEvent,
  PlatformEventType,
} from "../types";
import { systemClock, type Clock } from "./clock";

// ============================================================
// Types
// ============================================================

/** A single entry in the event log */
export interface EventLogEntry<E extends PlatformEvent = PlatformEvent> {
  /** Sequential index, starting at 0 */
  index: number;
  /** SHA-256 hash of the previous entry (64 zeros for the first) */
  previousHash: string;
  /** SHA-256 hash of this entry */
  hash: string;
  /** Block timestamp at emission */
  timestamp: number;
  /** Address of the emitting component */
  emitter: Address;
  event: E;
}

/** Result of an integrity check over the whole log */
export interface LogVerificationResult {
  isValid: boolean;
  entriesChecked: number;
  /** Index of the first corrupted entry (-1 if all valid) */
  firstInvalidIndex: number;
  error?: string;
}

export interface EventQuery<K extends PlatformEventType = PlatformEventType> {
  type?: K;
  emitter?: Address;
  /** Only entries with index >= fromIndex */
  fromIndex?: number;
}

export type EventListener = (entry: EventLogEntry) => void;

// ============================================================
// Hashing
// ============================================================

/** Link used by the first entry */
export const EMPTY_LOG_HASH =
  "0000000000000000000000000000000000000000000000000000000000000000";

/**
 * Computes the SHA-256 hash of an entry from its fields.
 *
 * The payload is serialised with `JSON.stringify`; events only hold
 * strings, numbers and booleans, so the serialisation is deterministic
 * for a given key order.
 */
export function computeEntryHash(
  index: number,
  previousHash: string,
  timestamp: number,
  emitter: Address,
  event: PlatformEvent
): string {
  const data = `${index}|${previousHash}|${timestamp}|${emitter}|${JSON.stringify(event)}`;
  return createHash("sha256").update(data).digest("hex");
}

// ============================================================
// EventLog
// ============================================================

/**
 * Append-only, tamper-evident notification log.
 *
 * @example
 * ```ts
 * const log = new EventLog(clock);
 * log.subscribe((entry) => console.log(entry.event.type));
 *
 * log.append(factoryAddress, {
 *   type: "OrgAdminAdded", orgId: 1, admin, addedBy: platformAdmin,
 * });
 *
 * log.filter("OrgAdminAdded").length; // 1
 * log.verify().isValid;               // true
 * ```
 */
export class EventLog {
  private entries: EventLogEntry[] = [];

  private listeners: Set<EventListener> = new Set();

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Appends an event and notifies subscribers.  A listener that throws
   * is logged and skipped; the entry stays appended.
   *
   * @returns A copy of the created entry
   */
  append<E extends PlatformEvent>(emitter: Address, event: E): EventLogEntry<E> {
    const index = this.entries.length;
    const previousHash = index === 0 ? EMPTY_LOG_HASH : this.entries[index - 1].hash;
    const timestamp = this.clock.now();
    const payload: E = { ...event };

    const entry: EventLogEntry<E> = {
      index,
      previousHash,
      hash: computeEntryHash(index, previousHash, timestamp, emitter, payload),
      timestamp,
      emitter,
      event: payload,
    };

    this.entries.push(entry);

    for (const listener of this.listeners) {
      try {
        listener(copyEntry(entry));
      } catch (err) {
        // The append is already committed; a subscriber cannot undo it.
        console.error(`Event listener failed on entry ${index} (${payload.type}):`, err);
      }
    }

    return copyEntry(entry);
  }

  /**
   * Registers a listener for every subsequent entry.
   *
   * @returns A function that removes the listener
   */
  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Entries whose event has the given type, in log order. */
  filter<K extends PlatformEventType>(type: K): EventLogEntry<EventOfType<K>>[] {
    const matches: EventLogEntry<EventOfType<K>>[] = [];
    for (const entry of this.entries) {
      if (isEntryOfType(entry, type)) matches.push(copyEntry(entry));
    }
    return matches;
  }

  query(q: EventQuery = {}): EventLogEntry[] {
    const from = q.fromIndex ?? 0;
    return this.entries
      .filter(
        (entry) =>
          entry.index >= from &&
          (q.type === undefined || entry.event.type === q.type) &&
          (q.emitter === undefined || entry.emitter === q.emitter)
      )
      .map(copyEntry);
  }

  /**
   * Verifies the integrity of the whole log.
   *
   * Checks that indices are sequential, that every stored hash matches
   * its recomputed value, and that every entry links to its predecessor.
   */
  verify(): LogVerificationResult {
    return verifyEntries(this.entries);
  }

  /** A copy of every entry (for export/audit). */
  getAll(): EventLogEntry[] {
    return this.entries.map(copyEntry);
  }

  /** A copy of the entry at `index`. */
  getEntry(index: number): EventLogEntry | undefined {
    const entry = this.entries[index];
    return entry ? copyEntry(entry) : undefined;
  }

  /** Hash of the latest entry, or the empty-log hash. */
  getLatestHash(): string {
    const latest = this.entries[this.entries.length - 1];
    return latest ? latest.hash : EMPTY_LOG_HASH;
  }

  get length(): number {
    return this.entries.length;
  }

  /**
   * Rebuilds a log from exported entries, refusing a corrupted export.
   *
   * @returns The restored log, or null when verification fails
   */
  static fromEntries(entries: EventLogEntry[], clock: Clock = systemClock): EventLog | null {
    const log = new EventLog(clock);
    log.entries = entries.map(copyEntry);
    return log.verify().isValid ? log : null;
  }
}

function isEntryOfType<K extends PlatformEventType>(
  entry: EventLogEntry,
  type: K
): entry is EventLogEntry<EventOfType<K>> {
  return entry.event.type === type;
}

function copyEntry<E extends PlatformEvent>(entry: EventLogEntry<E>): EventLogEntry<E> {
  return { ...entry, event: { ...entry.event } };
}

/**
 * Checks a sequence of entries as a chain: sequential indices, links to
 * the predecessor's hash, and stored hashes matching their fields.
 */
export function verifyEntries(entries: readonly EventLogEntry[]): LogVerificationResult {
  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];

    if (entry.index !== i) {
      return {
        isValid: false,
        entriesChecked: i + 1,
        firstInvalidIndex: i,
        error: `Entry ${i} has wrong index: expected ${i}, got ${entry.index}`,
      };
    }

    const expectedPrevious = i === 0 ? EMPTY_LOG_HASH : entries[i - 1].hash;
    if (entry.previousHash !== expectedPrevious) {
      return {
        isValid: false,
        entriesChecked: i + 1,
        firstInvalidIndex: i,
        error: `Entry ${i} previousHash does not match entry ${i - 1} hash`,
      };
    }

    const expectedHash = computeEntryHash(
      entry.index,
      entry.previousHash,
      entry.timestamp,
      entry.emitter,
      entry.event
    );
    if (entry.hash !== expectedHash) {
      return {
        isValid: false,
        entriesChecked: i + 1,
        firstInvalidIndex: i,
        error: `Entry ${i} hash mismatch`,
      };
    }
  }

  return {
    isValid: true,
    entriesChecked: entries.length,
    firstInvalidIndex: -1,
  };
}
