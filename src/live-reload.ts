import type { JournalEntry } from "./change-journal.js";
import type { ChangeKind } from "./watcher.js";

export type ReloadOutcome =
  | { type: "reload"; path: string; kind: ChangeKind; sequence: number }
  | { type: "keepalive" };

export interface ReloadHandle {
  readonly id: number;
  readonly paths: readonly string[];
  /** Settles once: on a matching change, or with a keepalive after the hold limit. */
  readonly result: Promise<ReloadOutcome>;
  /** Withdraws the subscription. Returns false if it had already settled. */
  cancel(): boolean;
}

export interface ReloadHubOptions {
  maxHoldMs: number;
}

interface Subscription {
  id: number;
  paths: ReadonlySet<string>;
  resolve(outcome: ReloadOutcome): void;
  timer: NodeJS.Timeout;
}

/**
 * Browsers waiting to hear that the page they show is stale. Each subscription
 * is indexed under every path it cares about, so both signalling and
 * cancelling touch only the paths involved.
 */
export class ReloadHub {
  private readonly maxHoldMs: number;
  private readonly subscriptions = new Map<number, Subscription>();
  private readonly byPath = new Map<string, Set<Subscription>>();
  private nextId = 1;

  constructor(options: ReloadHubOptions) {
    this.maxHoldMs = options.maxHoldMs;
  }

  get size(): number {
    return this.subscriptions.size;
  }

  has(id: number): boolean {
    return this.subscriptions.has(id);
  }

  /** Number of open subscriptions interested in `filePath`. */
  watchersOf(filePath: string): number {
    return this.byPath.get(filePath)?.size ?? 0;
  }

  subscribe(
    pathsOfInterest: Iterable<string>,
    options: { maxHoldMs?: number } = {},
  ): ReloadHandle {
    const id = this.nextId++;
    const paths = new Set(pathsOfInterest);
    const holdMs = options.maxHoldMs ?? this.maxHoldMs;

    // The executor runs synchronously, so the subscription is registered
    // before this method returns.
    const result = new Promise<ReloadOutcome>((resolve) => {
      const subscription: Subscription = {
        id,
        paths,
        resolve,
        timer: setTimeout(() => {
          this.settle(subscription, { type: "keepalive" });
        }, holdMs),
      };
      this.attach(subscription);
    });

    return {
      id,
      paths: [...paths],
      result,
      cancel: () => this.cancel(id),
    };
  }

  /**
   * Fires every subscription interested in any of `paths` with a reload for
   * `change`. A subscription interested in several of them still fires once.
   * Returns how many fired.
   */
  notify(paths: Iterable<string>, change: JournalEntry): number {
    const matched = new Set<Subscription>();
    for (const filePath of paths) {
      for (const subscription of this.byPath.get(filePath) ?? []) {
        matched.add(subscription);
      }
    }

    for (const subscription of matched) {
      this.settle(subscription, {
        type: "reload",
        path: change.path,
        kind: change.kind,
        sequence: change.sequence,
      });
    }
    return matched.size;
  }

  /** Drops a subscription without settling it; it will never be signalled. */
  cancel(id: number): boolean {
    const subscription = this.subscriptions.get(id);
    if (!subscription) {
      return false;
    }
    this.detach(subscription);
    return true;
  }

  /** Releases every held subscription with a keepalive, e.g. on shutdown. */
  closeAll(): number {
    const open = [...this.subscriptions.values()];
    for (const subscription of open) {
      this.settle(subscription, { type: "keepalive" });
    }
    return open.length;
  }

  private settle(subscription: Subscription, outcome: ReloadOutcome): void {
    if (!this.subscriptions.has(subscription.id)) {
      return;
    }
    this.detach(subscription);
    subscription.resolve(outcome);
  }

  private attach(subscription: Subscription): void {
    this.subscriptions.set(subscription.id, subscription);
    for (const filePath of subscription.paths) {
      let bucket = this.byPath.get(filePath);
      if (!bucket) {
        bucket = new Set();
        this.byPath.set(filePath, bucket);
      }
      bucket.add(subscription);
    }
  }

  private detach(subscription: Subscription): void {
    clearTimeout(subscription.timer);
    this.subscriptions.delete(subscription.id);
    for (const filePath of subscription.paths) {
      const bucket = this.byPath.get(filePath);
      bucket?.delete(subscription);
      if (bucket?.size === 0) {
        this.byPath.delete(filePath);
      }
    }
  }
}
