import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import type { IncomingMessage, ServerResponse } from "node:http";
import http from "node:http";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { contentTypeFor } from "./content-types.js";
import {
  ConnectionDropped,
  errorMessage,
  type PreviewError,
  RenderError,
  toPreviewError,
} from "./errors.js";
import type { ChangeJournal } from "./change-journal.js";
import type { ReloadHandle, ReloadHub, ReloadOutcome } from "./live-reload.js";
import { log } from "./logger.js";
import {
  ASSET_PREFIX,
  LIVE_RELOAD_PATH,
  type PageFreshness,
  renderErrorPage,
  renderPage,
} from "./page.js";
import {
  INDEX_FILE,
  normalizeRequestPath,
  resolveRequestPath,
  toRequestPath,
} from "./path-resolver.js";
import type { CacheEntry, RenderCache } from "./render-cache.js";
import { isHighlightTheme, VendorAssets } from "./vendor-assets.js";
import type { ChangeKind } from "./watcher.js";

export interface PreviewServer {
  url: string;
  port: number;
  close(): Promise<void>;
}

export interface CreatePreviewServerOptions {
  /** Canonical folder being served. */
  root: string;
  cache: RenderCache;
  hub: ReloadHub;
  journal: ChangeJournal;
  host?: string;
  /** 0 picks a free port. */
  port?: number;
  vendor?: VendorAssets;
}

/** JSON body answering a live-reload request. */
export type LiveReloadMessage =
  | { type: "reload"; path: string; kind: ChangeKind; sequence: number }
  | { type: "keepalive" };

const STYLESHEET_URL = new URL("../static/style.css", import.meta.url);
const NO_STORE = "no-cache, no-store, must-revalidate";

interface StaticText {
  body: string;
  etag: string;
}

export async function createPreviewServer(
  options: CreatePreviewServerOptions,
): Promise<PreviewServer> {
  const { root, cache, hub, journal } = options;
  const host = options.host ?? "127.0.0.1";
  const vendor = options.vendor ?? new VendorAssets();
  let stylesheet: StaticText | undefined;

  const server = http.createServer((req, res) => {
    void handle(req, res).catch((error: unknown) => {
      log.error(`Failed to answer ${req.method ?? "?"} ${req.url ?? "?"}: ${errorMessage(error)}`);
      if (!res.headersSent) {
        sendText(res, 500, "Internal server error");
      } else {
        res.destroy();
      }
    });
  });

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (!req.url) {
      sendText(res, 400, "Bad request");
      return;
    }

    if (req.method !== "GET" && req.method !== "HEAD") {
      res.setHeader("allow", "GET, HEAD");
      sendText(res, 405, "Method not allowed");
      return;
    }

    let requestUrl: URL;
    try {
      requestUrl = new URL(req.url, "http://127.0.0.1");
    } catch {
      sendText(res, 400, "Bad request");
      return;
    }

    // WHATWG URL parsing folds `..` segments away; the resolver must see them
    // to reject traversal, so the raw path is used for files.
    const rawPath = req.url.split("?")[0] ?? "/";
    const { pathname } = requestUrl;

    if (pathname === LIVE_RELOAD_PATH) {
      await holdLiveReload(req, res, requestUrl);
      return;
    }

    if (pathname.startsWith(`${ASSET_PREFIX}/`)) {
      await serveBundledAsset(req, res, pathname.slice(ASSET_PREFIX.length + 1));
      return;
    }

    await serveFile(req, res, rawPath);
  }

  async function serveFile(
    req: IncomingMessage,
    res: ServerResponse,
    requestPath: string,
  ): Promise<void> {
    // Read before anything is resolved or rendered: every change journaled up
    // to here is already reflected in what this request serves.
    const freshness = { session: journal.session, since: journal.sequence };

    let filePath: string;
    try {
      filePath = await resolveRequestPath(root, requestPath);
    } catch (error) {
      sendPreviewError(req, res, toPreviewError(error, requestPath), {
        watchPath: watchPathFor(requestPath),
        freshness,
      });
      return;
    }

    const watchPath = toRequestPath(root, filePath);
    let entry: CacheEntry;
    try {
      entry = await cache.getOrRender(filePath);
    } catch (error) {
      sendPreviewError(req, res, toPreviewError(error, requestPath, filePath), {
        watchPath,
        freshness,
      });
      return;
    }

    if (entry.kind === "markdown") {
      const page = renderPage({
        fileName: path.basename(filePath),
        watchPath,
        freshness,
        html: entry.content.toString("utf8"),
      });
      sendCacheable(req, res, "text/html; charset=utf-8", etagOf(page), page);
      return;
    }

    sendCacheable(req, res, contentTypeFor(filePath), `"${entry.digest}"`, entry.content);
  }

  async function holdLiveReload(
    req: IncomingMessage,
    res: ServerResponse,
    requestUrl: URL,
  ): Promise<void> {
    const { searchParams } = requestUrl;
    const target = searchParams.get("path") ?? refererPath(req) ?? "/";
    const session = searchParams.get("session");
    const sinceParam = searchParams.get("since");
    const since = sinceParam !== null && /^\d+$/.test(sinceParam) ? Number(sinceParam) : undefined;

    let handle: ReloadHandle | undefined;
    let dropped = false;
    res.on("close", () => {
      dropped = true;
      if (handle && hub.cancel(handle.id)) {
        log.debug(new ConnectionDropped(handle.id).message);
      }
    });

    let filePath: string;
    try {
      filePath = await resolveRequestPath(root, target);
    } catch (error) {
      const failure = toPreviewError(error, target);
      const pending = failure.code === "NOT_FOUND" ? watchFileFor(target) : undefined;
      if (!pending) {
        sendJson(res, failure.httpStatus, { type: "error", message: failure.message });
        return;
      }
      // Not there yet: wait for it to be created.
      filePath = pending;
    }

    if (dropped) {
      return;
    }

    const paths = [filePath, ...cache.references.assetsOf(filePath)];
    const missed = missedChange(filePath, paths, session, since);
    if (missed) {
      sendJson(res, 200, missed);
      return;
    }

    handle = hub.subscribe(paths);
    const outcome = await handle.result;
    if (res.destroyed || res.writableEnded) {
      return;
    }
    sendJson(res, 200, toMessage(outcome));
  }

  /**
   * A change the browser was not subscribed for: one journaled after the
   * sequence its page was served at, or any change at all when that page came
   * from an earlier run of the server.
   */
  function missedChange(
    filePath: string,
    paths: readonly string[],
    session: string | null,
    since: number | undefined,
  ): LiveReloadMessage | undefined {
    if (since === undefined) {
      return undefined;
    }
    if (session !== null && session !== journal.session) {
      return {
        type: "reload",
        path: toRequestPath(root, filePath),
        kind: "modified",
        sequence: journal.sequence,
      };
    }
    const change = journal.changedSince(paths, since);
    return change ? toMessage({ type: "reload", ...change }) : undefined;
  }

  async function serveBundledAsset(
    req: IncomingMessage,
    res: ServerResponse,
    assetPath: string,
  ): Promise<void> {
    try {
      if (assetPath === "style.css") {
        stylesheet ??= await loadStaticText(STYLESHEET_URL);
        sendCacheable(req, res, "text/css; charset=utf-8", stylesheet.etag, stylesheet.body);
        return;
      }

      const highlight = /^highlight\/(\w+)\.css$/.exec(assetPath);
      if (highlight?.[1] && isHighlightTheme(highlight[1])) {
        const body = await vendor.highlightTheme(highlight[1]);
        send(req, res, 200, { "content-type": "text/css; charset=utf-8" }, body);
        return;
      }

      if (assetPath.startsWith("mermaid/")) {
        const body = await vendor.mermaid(assetPath.slice("mermaid/".length));
        send(req, res, 200, { "content-type": "text/javascript; charset=utf-8" }, body);
        return;
      }

      sendText(res, 404, "This file does not exist");
    } catch (error) {
      const failure = toPreviewError(error, assetPath);
      log.warn(`Failed to serve bundled asset '${assetPath}': ${failure.message}`);
      sendText(res, failure.httpStatus, failure.isUserError() ? "This file does not exist" : "Unable to load asset");
    }
  }

  function sendPreviewError(
    req: IncomingMessage,
    res: ServerResponse,
    error: PreviewError,
    live: { watchPath?: string; freshness: PageFreshness },
  ): void {
    const { watchPath, freshness } = live;
    if (error.isUserError()) {
      log.debug(error.message);
    } else {
      log.warn(error.message);
    }

    const requestPath = error.requestPath ?? req.url ?? "/";
    const page =
      error.code === "OUT_OF_BOUNDS"
        ? renderErrorPage({
            status: 403,
            heading: "Outside the served folder",
            detail: `${requestPath} is not inside the folder mdlive is serving.`,
          })
        : error.code === "NOT_FOUND"
          ? renderErrorPage({
              status: 404,
              heading: `Couldn't find ${requestPath}`,
              detail: `For a folder mdlive looks for a file named ${INDEX_FILE}. Otherwise it looks for an exact file name.`,
              watchPath,
              freshness,
            })
          : renderErrorPage({
              status: error.httpStatus,
              heading: `Couldn't render ${requestPath}`,
              detail: error instanceof RenderError ? error.reason : error.code,
              watchPath,
              freshness,
            });

    send(req, res, error.httpStatus, {
      "content-type": "text/html; charset=utf-8",
      "cache-control": NO_STORE,
    }, page);
  }

  function watchFileFor(requestPath: string): string | undefined {
    try {
      const candidate = normalizeRequestPath(root, requestPath);
      return requestPath.endsWith("/") || candidate === root
        ? path.join(candidate, INDEX_FILE)
        : candidate;
    } catch {
      return undefined;
    }
  }

  function watchPathFor(requestPath: string): string | undefined {
    const file = watchFileFor(requestPath);
    return file === undefined ? undefined : toRequestPath(root, file);
  }

  function toMessage(outcome: ReloadOutcome): LiveReloadMessage {
    return outcome.type === "reload"
      ? {
          type: "reload",
          path: toRequestPath(root, outcome.path),
          kind: outcome.kind,
          sequence: outcome.sequence,
        }
      : { type: "keepalive" };
  }

  const port: number = await new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port ?? 0, host, () => {
      server.off("error", reject);
      const address = server.address();
      if (address && typeof address === "object") {
        resolve(address.port);
      } else {
        reject(new Error("Unable to determine server port"));
      }
    });
  });

  server.on("error", (error) => {
    log.error(`Server error: ${errorMessage(error)}`);
  });

  const close = async (): Promise<void> => {
    hub.closeAll();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
      server.closeAllConnections();
    });
  };

  const displayHost = host.includes(":") ? `[${host}]` : host;
  return {
    url: `http://${displayHost}:${port}/`,
    port,
    close,
  };
}

function refererPath(req: IncomingMessage): string | undefined {
  const referer = req.headers.referer;
  if (!referer) {
    return undefined;
  }
  try {
    return new URL(referer).pathname;
  } catch {
    return undefined;
  }
}

async function loadStaticText(url: URL): Promise<StaticText> {
  const body = await fs.readFile(fileURLToPath(url), "utf8");
  return { body, etag: etagOf(body) };
}

function etagOf(body: string | Buffer): string {
  return `"${createHash("sha1").update(body).digest("hex")}"`;
}

function sendCacheable(
  req: IncomingMessage,
  res: ServerResponse,
  contentType: string,
  etag: string,
  body: string | Buffer,
): void {
  if (req.headers["if-none-match"] === etag) {
    res.writeHead(304, { etag, "cache-control": "no-cache" });
    res.end();
    return;
  }
  send(req, res, 200, { "content-type": contentType, "cache-control": "no-cache", etag }, body);
}

function send(
  req: IncomingMessage,
  res: ServerResponse,
  status: number,
  headers: Record<string, string>,
  body: string | Buffer,
): void {
  res.writeHead(status, {
    ...headers,
    "content-length": String(Buffer.byteLength(body)),
  });
  res.end(req.method === "HEAD" ? undefined : body);
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, {
    "content-type": "application/json; charset=utf-8",
    "cache-control": NO_STORE,
  });
  res.end(JSON.stringify(body));
}

function sendText(res: ServerResponse, status: number, body: string): void {
  res.writeHead(status, {
    "content-type": "text/plain; charset=utf-8",
    "cache-control": NO_STORE,
  });
  res.end(body);
}
