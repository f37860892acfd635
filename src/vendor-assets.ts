import fs from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import { NotFoundError, OutOfBoundsError, toPreviewError } from "./errors.js";
import { isWithinRoot } from "./path-resolver.js";

export const MERMAID_ENTRY = "mermaid.esm.min.mjs";

const HIGHLIGHT_THEMES = {
  light: "github.css",
  dark: "github-dark.css",
} as const;

export type HighlightTheme = keyof typeof HIGHLIGHT_THEMES;

export function isHighlightTheme(value: string): value is HighlightTheme {
  return value === "light" || value === "dark";
}

const require = createRequire(import.meta.url);

/**
 * Browser-side files served straight out of node_modules: highlight.js
 * themes and the browser build of mermaid. Mermaid's entry module imports its
 * chunks relatively, so anything under its dist folder may be requested, and
 * nothing outside it.
 */
export class VendorAssets {
  private readonly sources = new Map<string, string>();
  private distDir: string | undefined;

  constructor(private readonly resolveModule: (specifier: string) => string = require.resolve) {}

  /** highlight.js's GitHub stylesheet for the given page theme. */
  async highlightTheme(theme: HighlightTheme): Promise<string> {
    const specifier = `highlight.js/styles/${HIGHLIGHT_THEMES[theme]}`;
    const cached = this.sources.get(specifier);
    if (cached !== undefined) {
      return cached;
    }

    let source: string;
    try {
      source = await fs.readFile(this.resolveModule(specifier), "utf8");
    } catch (error) {
      throw toPreviewError(error, specifier);
    }
    this.sources.set(specifier, source);
    return source;
  }

  /** A file from mermaid's dist folder, relative to it. */
  async mermaid(relativePath: string): Promise<string> {
    const cacheKey = `mermaid/${relativePath}`;
    const cached = this.sources.get(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    const distDir = this.locateDist(relativePath);
    const file = path.resolve(distDir, relativePath.replace(/^\/+/, ""));
    if (!isWithinRoot(distDir, file) || file === distDir) {
      throw new OutOfBoundsError(relativePath, file);
    }
    if (path.extname(file) !== ".mjs" && path.extname(file) !== ".js") {
      throw new NotFoundError(relativePath);
    }

    let source: string;
    try {
      source = await fs.readFile(file, "utf8");
    } catch (error) {
      throw toPreviewError(error, relativePath, file);
    }
    this.sources.set(cacheKey, source);
    return source;
  }

  private locateDist(relativePath: string): string {
    if (this.distDir) {
      return this.distDir;
    }
    try {
      this.distDir = path.dirname(this.resolveModule(`mermaid/dist/${MERMAID_ENTRY}`));
    } catch (error) {
      throw new NotFoundError(relativePath, error);
    }
    return this.distDir;
  }
}
