import fs from "node:fs/promises";
import http from "node:http";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ChangeJournal } from "../src/change-journal.js";
import { ChangeCoordinator } from "../src/coordinator.js";
import { ReloadHub } from "../src/live-reload.js";
import { createPreviewServer, type PreviewServer } from "../src/preview-server.js";
import { createLocalRenderer } from "../src/render/index.js";
import { RenderCache } from "../src/render-cache.js";
import type { ChangeEvent } from "../src/watcher.js";

const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

let root: string;
let cache: RenderCache;
let hub: ReloadHub;
let journal: ChangeJournal;
let coordinator: ChangeCoordinator;
let server: PreviewServer;

beforeEach(async () => {
  root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "mdlive-server-")));
  await fs.mkdir(path.join(root, "guide"));
  await fs.writeFile(path.join(root, "README.md"), "# Home\n\n![logo](logo.png)\n");
  await fs.writeFile(path.join(root, "logo.png"), PNG);
  await fs.writeFile(path.join(root, "guide", "ok.md"), "# Fine\n");
  await fs.writeFile(path.join(root, "guide", "bad.md"), Buffer.from([0x23, 0x20, 0xc3, 0x28]));

  cache = new RenderCache({ root, renderer: createLocalRenderer() });
  hub = new ReloadHub({ maxHoldMs: 400 });
  journal = new ChangeJournal({ session: "test-session" });
  coordinator = new ChangeCoordinator({ cache, hub, journal, debounceMs: 0 });
  server = await createPreviewServer({ root, cache, hub, journal, port: 0 });
});

afterEach(async () => {
  vi.restoreAllMocks();
  coordinator.dispose();
  await server.close();
  await fs.rm(root, { recursive: true, force: true });
});

function url(requestPath: string): string {
  return new URL(requestPath, server.url).toString();
}

/** Sends `requestPath` byte for byte; fetch would fold `..` segments first. */
function rawGet(requestPath: string): Promise<{ status: number; body: string }> {
  return new Promise((resolve, reject) => {
    const req = http.get(
      { host: "127.0.0.1", port: server.port, path: requestPath },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () =>
          resolve({ status: res.statusCode ?? 0, body: Buffer.concat(chunks).toString("utf8") }),
        );
      },
    );
    req.on("error", reject);
  });
}

function applyChange(event: ChangeEvent): void {
  coordinator.push(event);
  coordinator.flushAll();
}

/** The `session` and `since` a served page polls with. */
function freshnessOf(page: string): { session: string; since: string } {
  const [, session, since] = /data-session="([^"]*)" data-since="(\d+)"/.exec(page) ?? [];
  if (session === undefined || since === undefined) {
    throw new Error("page carries no freshness attributes");
  }
  return { session, since };
}

function pollUrl(watchPath: string, freshness: { session: string; since: string }): string {
  return url(`/__livereload?${new URLSearchParams({ path: watchPath, ...freshness }).toString()}`);
}

async function waitForSubscribers(count: number): Promise<void> {
  await vi.waitFor(() => {
    expect(hub.size).toBe(count);
  });
}

describe("file serving", () => {
  it("serves a folder's README as a live page", async () => {
    const response = await fetch(url("/"));
    const body = await response.text();

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(body).toContain('<h1 id="home"><a class="anchor" aria-hidden="true" href="#home"></a>Home</h1>');
    expect(body).toContain('data-watch-path="/README.md"');
  });

  it("answers a matching ETag with 304", async () => {
    const first = await fetch(url("/README.md"));
    const etag = first.headers.get("etag");
    await first.arrayBuffer();

    expect(etag).toMatch(/^"[0-9a-f]{40}"$/);

    const second = await fetch(url("/README.md"), { headers: { "if-none-match": etag ?? "" } });
    expect(second.status).toBe(304);
  });

  it("derives ETags from content, so a restarted server never confirms a stale copy", async () => {
    const readme = path.join(root, "README.md");
    const page = await fetch(url("/README.md"));
    const pageEtag = page.headers.get("etag") ?? "";
    await page.text();
    const logo = await fetch(url("/logo.png"));
    const logoEtag = logo.headers.get("etag") ?? "";
    await logo.arrayBuffer();

    await server.close();
    await fs.writeFile(readme, "# Restarted\n");
    cache = new RenderCache({ root, renderer: createLocalRenderer() });
    hub = new ReloadHub({ maxHoldMs: 400 });
    journal = new ChangeJournal({ session: "next-session" });
    server = await createPreviewServer({ root, cache, hub, journal, port: 0 });

    const edited = await fetch(url("/README.md"), { headers: { "if-none-match": pageEtag } });
    expect(edited.status).toBe(200);
    expect(await edited.text()).toContain('<h1 id="restarted">');

    const unchanged = await fetch(url("/logo.png"), { headers: { "if-none-match": logoEtag } });
    expect(unchanged.status).toBe(304);
    expect(unchanged.headers.get("etag")).toBe(logoEtag);
  });

  it("serves other files as raw bytes", async () => {
    const response = await fetch(url("/logo.png"));

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("image/png");
    expect(Buffer.from(await response.arrayBuffer()).equals(PNG)).toBe(true);
  });

  it("refuses paths that climb out of the folder", async () => {
    const response = await rawGet("/../../etc/passwd");

    expect(response.status).toBe(403);
    expect(response.body).toContain("<h1>Outside the served folder</h1>");
  });

  it("reports missing files with a page that waits for them", async () => {
    const response = await fetch(url("/missing.md"));
    const body = await response.text();

    expect(response.status).toBe(404);
    expect(body).toContain("<h1>Couldn&#39;t find /missing.md</h1>");
    expect(body).toContain('data-watch-path="/missing.md"');
  });

  it("fails a file that cannot be rendered without affecting its siblings", async () => {
    const bad = await fetch(url("/guide/bad.md"));
    const body = await bad.text();

    expect(bad.status).toBe(500);
    expect(body).toContain("<h1>Couldn&#39;t render /guide/bad.md</h1>");
    expect(body).toContain("file is not valid UTF-8");

    const ok = await fetch(url("/guide/ok.md"));
    expect(ok.status).toBe(200);
    expect(await ok.text()).toContain('<h1 id="fine">');
  });

  it("only answers GET and HEAD", async () => {
    const response = await fetch(url("/README.md"), { method: "POST", body: "x" });

    expect(response.status).toBe(405);
    expect(response.headers.get("allow")).toBe("GET, HEAD");
  });

  it("serves the bundled stylesheet with a content hash", async () => {
    const response = await fetch(url("/__mdlive/style.css"));
    const etag = response.headers.get("etag");
    await response.text();

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/css; charset=utf-8");
    expect(etag).toMatch(/^"[0-9a-f]{40}"$/);

    const again = await fetch(url("/__mdlive/style.css"), {
      headers: { "if-none-match": etag ?? "" },
    });
    expect(again.status).toBe(304);
  });

  it("serves the highlight.js theme for each page theme", async () => {
    const response = await fetch(url("/__mdlive/highlight/dark.css"));

    expect(response.status).toBe(200);
    expect(await response.text()).toContain(".hljs");
    expect((await fetch(url("/__mdlive/highlight/neon.css"))).status).toBe(404);
  });
});

describe("live reload", () => {
  it("signals a change and serves the fresh render right after", async () => {
    const readme = path.join(root, "README.md");
    expect(await (await fetch(url("/"))).text()).toContain("Home");

    const waiting = fetch(url("/__livereload?path=/README.md"));
    await waitForSubscribers(1);

    await fs.writeFile(readme, "# Changed\n");
    applyChange({ path: readme, kind: "modified" });

    const response = await waiting;
    expect(response.headers.get("content-type")).toBe("application/json; charset=utf-8");
    expect(await response.json()).toEqual({
      type: "reload",
      path: "/README.md",
      kind: "modified",
      sequence: 1,
    });

    const page = await (await fetch(url("/"))).text();
    expect(page).toContain('<h1 id="changed">');
    expect(page).not.toContain('<h1 id="home">');
  });

  it("reloads a page when an image it embeds changes", async () => {
    await (await fetch(url("/"))).text();

    const waiting = fetch(url("/__livereload?path=/"));
    await waitForSubscribers(1);
    expect(hub.watchersOf(path.join(root, "logo.png"))).toBe(1);

    applyChange({ path: path.join(root, "logo.png"), kind: "modified" });

    expect(await (await waiting).json()).toEqual({
      type: "reload",
      path: "/logo.png",
      kind: "modified",
      sequence: 1,
    });
  });

  it("leaves unrelated pages waiting", async () => {
    const waiting = fetch(url("/__livereload?path=/guide/ok.md"));
    await waitForSubscribers(1);

    applyChange({ path: path.join(root, "README.md"), kind: "modified" });

    expect(hub.size).toBe(1);
    expect(await (await waiting).json()).toEqual({ type: "keepalive" });
  });

  it("waits for a missing page to appear", async () => {
    const created = path.join(root, "guide", "new.md");
    const waiting = fetch(url("/__livereload?path=/guide/new.md"));
    await waitForSubscribers(1);

    await fs.writeFile(created, "# New\n");
    applyChange({ path: created, kind: "created" });

    expect(await (await waiting).json()).toEqual({
      type: "reload",
      path: "/guide/new.md",
      kind: "created",
      sequence: 1,
    });
    expect((await fetch(url("/guide/new.md"))).status).toBe(200);
  });

  it("falls back to the referring page", async () => {
    const waiting = fetch(url("/__livereload"), {
      headers: { referer: url("/guide/ok.md") },
    });
    await waitForSubscribers(1);

    expect(hub.watchersOf(path.join(root, "guide", "ok.md"))).toBe(1);
    hub.closeAll();
    expect(await (await waiting).json()).toEqual({ type: "keepalive" });
  });

  it("answers with a keepalive once the hold limit passes", async () => {
    const response = await fetch(url("/__livereload?path=/README.md"));

    expect(await response.json()).toEqual({ type: "keepalive" });
    expect(hub.size).toBe(0);
  });

  it("cancels the subscription of a browser that went away", async () => {
    const controller = new AbortController();
    const waiting = fetch(url("/__livereload?path=/README.md"), { signal: controller.signal });
    await waitForSubscribers(1);

    controller.abort();
    await expect(waiting).rejects.toThrow();

    await waitForSubscribers(0);
  });

  it("never subscribes a browser that left while its page was being looked up", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const lookup = vi
      .spyOn(fs, "realpath")
      .mockImplementationOnce(() =>
        gate.then(() => Promise.reject(Object.assign(new Error("no such file"), { code: "ENOENT" }))),
      );
    const subscribe = vi.spyOn(hub, "subscribe");

    const controller = new AbortController();
    const waiting = fetch(url("/__livereload?path=/missing.md"), { signal: controller.signal });
    await vi.waitFor(() => {
      expect(lookup).toHaveBeenCalled();
    });
    controller.abort();
    await expect(waiting).rejects.toThrow();
    await new Promise((resolve) => setTimeout(resolve, 50));

    release();
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(subscribe).not.toHaveBeenCalled();
    expect(hub.size).toBe(0);
  });

  it("rejects subscriptions outside the folder", async () => {
    const response = await fetch(url("/__livereload?path=/../../etc/passwd"));

    expect(response.status).toBe(403);
    expect(await response.json()).toMatchObject({ type: "error" });
    expect(hub.size).toBe(0);
  });
});

describe("changes between polls", () => {
  it("reloads at once for a change flushed before the first poll", async () => {
    const readme = path.join(root, "README.md");
    const freshness = freshnessOf(await (await fetch(url("/README.md"))).text());
    expect(freshness).toEqual({ session: "test-session", since: "0" });

    await fs.writeFile(readme, "# Changed\n");
    applyChange({ path: readme, kind: "modified" });

    expect(await (await fetch(pollUrl("/README.md", freshness))).json()).toEqual({
      type: "reload",
      path: "/README.md",
      kind: "modified",
      sequence: 1,
    });
    expect(hub.size).toBe(0);
  });

  it("reloads at once for a change flushed between a keepalive and the next poll", async () => {
    const freshness = freshnessOf(await (await fetch(url("/"))).text());

    expect(await (await fetch(pollUrl("/README.md", freshness))).json()).toEqual({
      type: "keepalive",
    });

    applyChange({ path: path.join(root, "logo.png"), kind: "modified" });

    expect(await (await fetch(pollUrl("/README.md", freshness))).json()).toEqual({
      type: "reload",
      path: "/logo.png",
      kind: "modified",
      sequence: 1,
    });
  });

  it("holds a poll whose page already reflects every change", async () => {
    const readme = path.join(root, "README.md");
    await fs.writeFile(readme, "# Changed\n");
    applyChange({ path: readme, kind: "modified" });
    applyChange({ path: path.join(root, "guide", "ok.md"), kind: "modified" });

    const page = await (await fetch(url("/README.md"))).text();
    expect(page).toContain('<h1 id="changed">');
    const freshness = freshnessOf(page);
    expect(freshness.since).toBe("2");

    const waiting = fetch(pollUrl("/README.md", freshness));
    await waitForSubscribers(1);
    hub.closeAll();

    expect(await (await waiting).json()).toEqual({ type: "keepalive" });
  });

  it("reloads a page served by an earlier run of the server", async () => {
    const response = await fetch(pollUrl("/README.md", { session: "old-session", since: "7" }));

    expect(await response.json()).toEqual({
      type: "reload",
      path: "/README.md",
      kind: "modified",
      sequence: 0,
    });
    expect(hub.size).toBe(0);
  });
});
