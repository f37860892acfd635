import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ReloadHub, type ReloadOutcome } from "../src/live-reload.js";

function track(result: Promise<ReloadOutcome>): { outcome?: ReloadOutcome } {
  const seen: { outcome?: ReloadOutcome } = {};
  void result.then((outcome) => {
    seen.outcome = outcome;
  });
  return seen;
}

describe("ReloadHub", () => {
  let hub: ReloadHub;

  beforeEach(() => {
    vi.useFakeTimers();
    hub = new ReloadHub({ maxHoldMs: 1_000 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("registers a subscription under every path before returning", () => {
    const handle = hub.subscribe(["/docs/a.md", "/docs/logo.png"]);

    expect(hub.size).toBe(1);
    expect(hub.has(handle.id)).toBe(true);
    expect(hub.watchersOf("/docs/a.md")).toBe(1);
    expect(hub.watchersOf("/docs/logo.png")).toBe(1);
    expect(handle.paths).toEqual(["/docs/a.md", "/docs/logo.png"]);
  });

  it("signals subscribers of a changed path and nobody else", async () => {
    const a = hub.subscribe(["/docs/a.md"]);
    const b = hub.subscribe(["/docs/b.md"]);
    const other = track(b.result);

    expect(hub.notify(["/docs/a.md"], { path: "/docs/a.md", kind: "modified", sequence: 1 })).toBe(1);

    await expect(a.result).resolves.toEqual({
      type: "reload",
      path: "/docs/a.md",
      kind: "modified",
      sequence: 1,
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(other.outcome).toBeUndefined();
    expect(hub.has(a.id)).toBe(false);
    expect(hub.has(b.id)).toBe(true);
  });

  it("fires a subscription once even when several of its paths change", async () => {
    const handle = hub.subscribe(["/docs/a.md", "/docs/logo.png"]);

    const fired = hub.notify(["/docs/logo.png", "/docs/a.md"], {
      path: "/docs/logo.png",
      kind: "modified",
      sequence: 1,
    });

    expect(fired).toBe(1);
    expect(hub.notify(["/docs/a.md"], { path: "/docs/a.md", kind: "modified", sequence: 1 })).toBe(0);
    await expect(handle.result).resolves.toMatchObject({ path: "/docs/logo.png" });
    expect(hub.watchersOf("/docs/a.md")).toBe(0);
  });

  it("answers with a keepalive once the hold limit passes", async () => {
    const handle = hub.subscribe(["/docs/a.md"]);
    const seen = track(handle.result);

    await vi.advanceTimersByTimeAsync(999);
    expect(seen.outcome).toBeUndefined();

    await vi.advanceTimersByTimeAsync(1);
    expect(seen.outcome).toEqual({ type: "keepalive" });
    expect(hub.size).toBe(0);
    expect(hub.watchersOf("/docs/a.md")).toBe(0);
  });

  it("honours a per-subscription hold limit", async () => {
    const handle = hub.subscribe(["/docs/a.md"], { maxHoldMs: 50 });
    const seen = track(handle.result);

    await vi.advanceTimersByTimeAsync(50);

    expect(seen.outcome).toEqual({ type: "keepalive" });
  });

  it("never signals a cancelled subscription", async () => {
    const handle = hub.subscribe(["/docs/a.md"]);
    const seen = track(handle.result);

    expect(handle.cancel()).toBe(true);
    expect(handle.cancel()).toBe(false);
    expect(hub.notify(["/docs/a.md"], { path: "/docs/a.md", kind: "modified", sequence: 1 })).toBe(0);
    await vi.advanceTimersByTimeAsync(5_000);

    expect(seen.outcome).toBeUndefined();
    expect(hub.size).toBe(0);
  });

  it("releases everyone with a keepalive on shutdown", async () => {
    const first = hub.subscribe(["/docs/a.md"]);
    const second = hub.subscribe(["/docs/b.md"]);

    expect(hub.closeAll()).toBe(2);

    await expect(first.result).resolves.toEqual({ type: "keepalive" });
    await expect(second.result).resolves.toEqual({ type: "keepalive" });
    expect(hub.size).toBe(0);
  });
});
