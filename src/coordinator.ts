import type { ChangeJournal } from "./change-journal.js";
import { errorMessage } from "./errors.js";
import type { ReloadHub } from "./live-reload.js";
import { log } from "./logger.js";
import type { RenderCache } from "./render-cache.js";
import type { ChangeEvent, ChangeKind } from "./watcher.js";

export type PathPhase = "idle" | "debouncing" | "flushing";

export interface FlushRecord {
  path: string;
  /** Net effect of every event seen during the window. */
  kind: ChangeKind;
  /** How many raw events the window absorbed. */
  events: number;
  /** Journal sequence assigned to the change. */
  sequence: number;
  invalidated: boolean;
  /** Pages reloaded because they embed `path`. */
  embeddingPages: string[];
  notified: number;
}

export interface ChangeCoordinatorOptions {
  cache: RenderCache;
  hub: ReloadHub;
  journal: ChangeJournal;
  /** Quiet period after the last event for a path before it is flushed. */
  debounceMs: number;
  onFlush?: (record: FlushRecord) => void;
}

interface DebounceWindow {
  kinds: ChangeKind[];
  timer: NodeJS.Timeout;
}

/**
 * Reduces the raw events of one window to a single change. A removal followed
 * by a re-creation is how editors save atomically, so it counts as a
 * modification rather than a delete.
 */
export function coalesceChanges(kinds: readonly ChangeKind[]): ChangeKind {
  let effective: ChangeKind | undefined;

  for (const kind of kinds) {
    if (effective === undefined) {
      effective = kind;
      continue;
    }

    const wasGone = effective === "removed" || effective === "renamed";
    const isGone = kind === "removed" || kind === "renamed";

    if (wasGone) {
      effective = isGone ? kind : "modified";
    } else if (effective === "created") {
      effective = isGone ? "removed" : "created";
    } else {
      effective = isGone ? kind : "modified";
    }
  }

  return effective ?? "modified";
}

/**
 * Turns the watcher's event stream into cache invalidations and reload
 * signals. Each path moves idle → debouncing → flushing → idle on its own;
 * paths never wait on one another.
 *
 * A flush invalidates and notifies in the same synchronous block, so a browser
 * told to reload can only ever fetch a fresh render. The change is journaled
 * in that block too, for browsers that were between polls.
 */
export class ChangeCoordinator {
  private readonly cache: RenderCache;
  private readonly hub: ReloadHub;
  private readonly journal: ChangeJournal;
  private readonly debounceMs: number;
  private readonly onFlush?: (record: FlushRecord) => void;
  private readonly windows = new Map<string, DebounceWindow>();
  private readonly flushing = new Set<string>();
  private flushCount = 0;
  private disposed = false;

  constructor(options: ChangeCoordinatorOptions) {
    this.cache = options.cache;
    this.hub = options.hub;
    this.journal = options.journal;
    this.debounceMs = options.debounceMs;
    this.onFlush = options.onFlush;
  }

  /** Flushes performed so far. */
  get flushes(): number {
    return this.flushCount;
  }

  get openWindows(): number {
    return this.windows.size;
  }

  state(filePath: string): PathPhase {
    if (this.flushing.has(filePath)) {
      return "flushing";
    }
    return this.windows.has(filePath) ? "debouncing" : "idle";
  }

  /** Feeds one raw event in, opening or extending the path's window. */
  push(event: ChangeEvent): void {
    if (this.disposed) {
      return;
    }

    const open = this.windows.get(event.path);
    if (open) {
      clearTimeout(open.timer);
      open.kinds.push(event.kind);
      open.timer = this.schedule(event.path);
      return;
    }

    this.windows.set(event.path, {
      kinds: [event.kind],
      timer: this.schedule(event.path),
    });
  }

  /** Pumps `source` into the coordinator until it ends. */
  async consume(source: AsyncIterable<ChangeEvent>): Promise<void> {
    for await (const event of source) {
      this.push(event);
    }
  }

  /** Flushes every open window now instead of waiting out the quiet period. */
  flushAll(): void {
    for (const filePath of [...this.windows.keys()]) {
      this.flush(filePath);
    }
  }

  /** Drops pending windows without flushing them and ignores later events. */
  dispose(): void {
    this.disposed = true;
    for (const window of this.windows.values()) {
      clearTimeout(window.timer);
    }
    this.windows.clear();
  }

  private schedule(filePath: string): NodeJS.Timeout {
    return setTimeout(() => {
      this.flush(filePath);
    }, this.debounceMs);
  }

  private flush(filePath: string): void {
    const window = this.windows.get(filePath);
    if (!window) {
      return;
    }
    clearTimeout(window.timer);
    this.windows.delete(filePath);
    this.flushing.add(filePath);

    try {
      const kind = coalesceChanges(window.kinds);
      const embeddingPages = this.cache.references.pagesEmbedding(filePath);
      const gone = kind === "removed" || kind === "renamed";

      const invalidated = gone ? this.cache.remove(filePath) : this.cache.invalidate(filePath);
      const change = this.journal.record({ path: filePath, kind });
      const notified = this.hub.notify([filePath, ...embeddingPages], change);

      this.flushCount += 1;
      const record: FlushRecord = {
        path: filePath,
        kind,
        events: window.kinds.length,
        sequence: change.sequence,
        invalidated,
        embeddingPages,
        notified,
      };
      log.debug(
        `${kind} ${filePath} (${record.events} event(s), ${notified} reload(s))`,
      );
      this.onFlush?.(record);
    } catch (error) {
      log.error(`Failed to apply change to ${filePath}: ${errorMessage(error)}`);
    } finally {
      this.flushing.delete(filePath);
    }
  }
}
