import { randomUUID } from "node:crypto";
import type { ChangeEvent, ChangeKind } from "./watcher.js";

export interface JournalEntry {
  path: string;
  kind: ChangeKind;
  /** Position in flush order, starting at 1. */
  sequence: number;
}

export interface ChangeJournalOptions {
  /** Distinct paths remembered before the oldest is forgotten. */
  capacity?: number;
  session?: string;
}

const DEFAULT_CAPACITY = 4096;

/**
 * The latest flushed change of each recently changed path, numbered in flush
 * order. A page records the sequence current when it was served; a browser
 * polling with that number learns about changes it was not subscribed for.
 *
 * Only the last `capacity` distinct paths are kept. A query reaching back
 * past a forgotten change is answered as if the first path had changed.
 */
export class ChangeJournal {
  /** Identifies this process, so sequences from an earlier run are not trusted. */
  readonly session: string;

  private readonly capacity: number;
  private readonly latest = new Map<string, JournalEntry>();
  private current = 0;
  private forgottenThrough = 0;

  constructor(options: ChangeJournalOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_CAPACITY;
    this.session = options.session ?? randomUUID();
  }

  get sequence(): number {
    return this.current;
  }

  get size(): number {
    return this.latest.size;
  }

  record(change: ChangeEvent): JournalEntry {
    this.current += 1;
    const entry: JournalEntry = { path: change.path, kind: change.kind, sequence: this.current };

    // Re-inserting keeps the map ordered by sequence.
    this.latest.delete(change.path);
    this.latest.set(change.path, entry);

    if (this.latest.size > this.capacity) {
      const [oldest] = this.latest.values();
      if (oldest) {
        this.latest.delete(oldest.path);
        this.forgottenThrough = oldest.sequence;
      }
    }
    return entry;
  }

  /** Newest change to any of `paths` after `since`, if there was one. */
  changedSince(paths: Iterable<string>, since: number): JournalEntry | undefined {
    const candidates = [...paths];
    let newest: JournalEntry | undefined;
    for (const filePath of candidates) {
      const entry = this.latest.get(filePath);
      if (entry && entry.sequence > since && (!newest || entry.sequence > newest.sequence)) {
        newest = entry;
      }
    }
    if (newest) {
      return newest;
    }

    const [first] = candidates;
    if (since < this.forgottenThrough && first !== undefined) {
      return { path: first, kind: "modified", sequence: this.current };
    }
    return undefined;
  }
}
