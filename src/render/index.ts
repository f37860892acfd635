import path from "node:path";
import { errorMessage, RenderError } from "../errors.js";
import { renderMarkdownWithGitHub } from "./github.js";
import { renderMarkdownLocally } from "./markdown.js";

export { collectEmbeddedSources, resolveEmbeddedPaths } from "./references.js";
export { escapeHtml } from "./html.js";

const MARKDOWN_EXTENSIONS = new Set([".md", ".markdown", ".mdown", ".mkd"]);

/** Turns markdown source into an HTML fragment. */
export interface MarkdownRenderer {
  readonly name: string;
  render(markdown: string, context?: string): Promise<string>;
}

export function isMarkdownFile(filePath: string): boolean {
  return MARKDOWN_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function createLocalRenderer(): MarkdownRenderer {
  return {
    name: "local",
    async render(markdown, context) {
      return renderMarkdownLocally(markdown, { context });
    },
  };
}

export function createGitHubRenderer(apiBase: string): MarkdownRenderer {
  return {
    name: "github",
    render(markdown, context) {
      return renderMarkdownWithGitHub(apiBase, markdown, context);
    },
  };
}

export function createRenderer(options: {
  offline: boolean;
  githubApi: string;
}): MarkdownRenderer {
  return options.offline ? createLocalRenderer() : createGitHubRenderer(options.githubApi);
}

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decodes a markdown file's bytes, rejecting anything that is not UTF-8.
 * A leading byte-order mark is dropped.
 */
export function decodeMarkdown(filePath: string, bytes: Uint8Array): string {
  try {
    return strictUtf8.decode(bytes);
  } catch (error) {
    throw new RenderError(filePath, "file is not valid UTF-8", error);
  }
}

/** Runs `renderer`, reporting any failure as a RenderError for `filePath`. */
export async function renderFile(
  renderer: MarkdownRenderer,
  filePath: string,
  markdown: string,
  context?: string,
): Promise<string> {
  try {
    return await renderer.render(markdown, context);
  } catch (error) {
    if (error instanceof RenderError) {
      throw error;
    }
    throw new RenderError(filePath, errorMessage(error), error);
  }
}
