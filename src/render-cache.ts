import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import { toPreviewError } from "./errors.js";
import { ReferenceIndex } from "./reference-index.js";
import {
  collectEmbeddedSources,
  decodeMarkdown,
  isMarkdownFile,
  type MarkdownRenderer,
  renderFile,
  resolveEmbeddedPaths,
} from "./render/index.js";

export type ContentKind = "markdown" | "asset";

export interface CacheEntry {
  path: string;
  /** Rendered HTML fragment for markdown, the file's bytes otherwise. */
  content: Buffer;
  kind: ContentKind;
  generation: number;
  /** SHA-1 of `content`, hex encoded. */
  digest: string;
  mtimeMs: number;
  /** Local files the page embeds; always empty for assets. */
  references: readonly string[];
}

export interface RenderCacheOptions {
  root: string;
  renderer: MarkdownRenderer;
  /** `owner/name` handed to the renderer. */
  context?: string;
  references?: ReferenceIndex;
}

interface RenderTicket {
  /** Set once the path is invalidated while the render runs. */
  superseded: boolean;
}

interface PendingRender {
  ticket: RenderTicket;
  promise: Promise<CacheEntry>;
}

/**
 * Last render of every file that has been requested, keyed by canonical path.
 *
 * At most one render per path is in flight: concurrent misses share it. An
 * invalidation while a render is running means that render's result is handed
 * to the callers already waiting but never stored, so nothing read before the
 * invalidation can be served after it.
 */
export class RenderCache {
  readonly references: ReferenceIndex;

  private readonly root: string;
  private readonly renderer: MarkdownRenderer;
  private readonly context?: string;
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inflight = new Map<string, PendingRender>();
  private nextGeneration = 1;

  constructor(options: RenderCacheOptions) {
    this.root = options.root;
    this.renderer = options.renderer;
    this.context = options.context;
    this.references = options.references ?? new ReferenceIndex();
  }

  get size(): number {
    return this.entries.size;
  }

  /** Paths with a render currently shared by waiting callers. */
  get rendering(): number {
    return this.inflight.size;
  }

  peek(filePath: string): CacheEntry | undefined {
    return this.entries.get(filePath);
  }

  async getOrRender(filePath: string): Promise<CacheEntry> {
    const cached = this.entries.get(filePath);
    if (cached) {
      return cached;
    }

    const pending = this.inflight.get(filePath);
    if (pending) {
      return pending.promise;
    }

    const ticket: RenderTicket = { superseded: false };
    const render: PendingRender = { ticket, promise: this.load(filePath, ticket) };
    this.inflight.set(filePath, render);
    try {
      return await render.promise;
    } finally {
      if (this.inflight.get(filePath) === render) {
        this.inflight.delete(filePath);
      }
    }
  }

  /** Drops the cached render of `filePath`. Returns whether one was cached. */
  invalidate(filePath: string): boolean {
    const pending = this.inflight.get(filePath);
    if (pending) {
      pending.ticket.superseded = true;
      this.inflight.delete(filePath);
    }
    return this.entries.delete(filePath);
  }

  /** For files that no longer exist: also forgets what the page embedded. */
  remove(filePath: string): boolean {
    this.references.forgetPage(filePath);
    return this.invalidate(filePath);
  }

  clear(): void {
    for (const filePath of [...this.entries.keys(), ...this.inflight.keys()]) {
      this.invalidate(filePath);
    }
  }

  private async load(
    filePath: string,
    ticket: Readonly<RenderTicket>,
  ): Promise<CacheEntry> {
    let bytes: Buffer;
    let mtimeMs: number;
    try {
      const stat = await fs.stat(filePath);
      bytes = await fs.readFile(filePath);
      mtimeMs = stat.mtimeMs;
    } catch (error) {
      throw toPreviewError(error, filePath);
    }

    let content: Buffer = bytes;
    let kind: ContentKind = "asset";
    let references: string[] = [];
    if (isMarkdownFile(filePath)) {
      const markdown = decodeMarkdown(filePath, bytes);
      const html = await renderFile(this.renderer, filePath, markdown, this.context);
      content = Buffer.from(html, "utf8");
      kind = "markdown";
      references = resolveEmbeddedPaths(this.root, filePath, collectEmbeddedSources(markdown));
    }

    const entry: CacheEntry = {
      path: filePath,
      content,
      kind,
      generation: this.nextGeneration++,
      digest: createHash("sha1").update(content).digest("hex"),
      mtimeMs,
      references,
    };

    // A superseded render still answers the callers that were waiting on it.
    if (!ticket.superseded) {
      this.entries.set(filePath, entry);
      if (entry.kind === "markdown") {
        this.references.setPageReferences(filePath, entry.references);
      }
    }
    return entry;
  }
}
