import path from "node:path";
import { marked } from "marked";
import { isWithinRoot } from "../path-resolver.js";

const HTML_IMAGE_SOURCE = /<(?:img|source|video|audio)\b[^>]*?\ssrc\s*=\s*(?:"([^"]*)"|'([^']*)')/gi;
const URL_SCHEME = /^[a-z][a-z\d+.-]*:/i;

/**
 * Collects the `src`/`href` of everything a markdown document embeds: image
 * syntax plus `<img>`-like tags written as inline or block HTML. Links are
 * not embeds and are left out.
 */
export function collectEmbeddedSources(markdown: string): string[] {
  const sources = new Set<string>();
  const tokens = marked.lexer(markdown, { gfm: true });

  marked.walkTokens(tokens, (token) => {
    if (token.type === "image" && "href" in token && typeof token.href === "string") {
      sources.add(token.href);
      return;
    }
    if (token.type === "html" && "text" in token && typeof token.text === "string") {
      for (const match of token.text.matchAll(HTML_IMAGE_SOURCE)) {
        const source = match[1] ?? match[2];
        if (source) {
          sources.add(source);
        }
      }
    }
  });

  return [...sources];
}

/**
 * Turns the sources embedded by `pageFile` into absolute paths beneath `root`.
 * Remote URLs, fragments and anything that would leave `root` are dropped.
 */
export function resolveEmbeddedPaths(
  root: string,
  pageFile: string,
  sources: readonly string[],
): string[] {
  const resolved = new Set<string>();

  for (const source of sources) {
    const trimmed = source.trim();
    if (trimmed === "" || trimmed.startsWith("#") || trimmed.startsWith("//")) {
      continue;
    }
    if (URL_SCHEME.test(trimmed)) {
      continue;
    }

    const withoutSuffix = trimmed.replace(/[?#].*$/, "");
    let decoded: string;
    try {
      decoded = decodeURIComponent(withoutSuffix);
    } catch {
      continue;
    }

    const target = decoded.startsWith("/")
      ? path.join(root, decoded)
      : path.resolve(path.dirname(pageFile), decoded);
    if (isWithinRoot(root, target) && target !== root) {
      resolved.add(target);
    }
  }

  return [...resolved];
}
