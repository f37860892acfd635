import hljs from "highlight.js";
import type { Tokens } from "marked";
import { marked } from "marked";
import { emojify } from "node-emoji";
import { escapeHtml } from "./html.js";

const PLAIN_LANGUAGE = "plaintext";
const MERMAID_LANGUAGE = "mermaid";

const LANGUAGE_ALIASES: Record<string, string> = {
  console: "bash",
  shell: "bash",
  sh: "bash",
  zsh: "bash",
  text: PLAIN_LANGUAGE,
  txt: PLAIN_LANGUAGE,
  plain: PLAIN_LANGUAGE,
  js: "javascript",
  mjs: "javascript",
  cjs: "javascript",
  ts: "typescript",
  yml: "yaml",
  md: "markdown",
  rs: "rust",
  py: "python",
  "c#": "csharp",
  docker: "dockerfile",
};

type TokensList = ReturnType<typeof marked.lexer>;

interface AlertKind {
  label: string;
  icon: string;
}

// GitHub's `> [!NOTE]` alert syntax
const ALERT_KINDS: Record<string, AlertKind> = {
  note: { label: "Note", icon: "ℹ️" },
  tip: { label: "Tip", icon: "💡" },
  important: { label: "Important", icon: "❗" },
  warning: { label: "Warning", icon: "⚠️" },
  caution: { label: "Caution", icon: "🛑" },
};

export interface LocalRenderOptions {
  /** `owner/name`; turns `#123` in prose into links to that repository's issues. */
  context?: string;
}

/**
 * Renders GitHub-flavored markdown to an HTML fragment without leaving the
 * process. Headings get GitHub-style anchors, fenced code is highlighted and
 * mermaid fences become placeholders the page script draws in the browser.
 */
export function renderMarkdownLocally(
  markdown: string,
  options: LocalRenderOptions = {},
): string {
  const renderer = new marked.Renderer();
  const slugCounts = new Map<string, number>();
  let diagramCount = 0;

  renderer.heading = ({ tokens, depth, text }) => {
    const slug = createSlug(text, slugCounts);
    const content = renderer.parser.parseInline(tokens);
    return `<h${depth} id="${slug}"><a class="anchor" aria-hidden="true" href="#${slug}"></a>${content}</h${depth}>\n`;
  };

  const defaultBlockquote = renderer.blockquote.bind(renderer);
  renderer.blockquote = (token) => {
    const alert = parseAlert(token);
    if (!alert) {
      return defaultBlockquote(token);
    }
    const body = alert.body.length > 0 ? renderer.parser.parse(alert.body) : "";
    return `<div class="markdown-alert markdown-alert-${alert.variant}">
<p class="markdown-alert-title"><span aria-hidden="true">${alert.kind.icon}</span> ${escapeHtml(alert.title)}</p>
${body}</div>
`;
  };

  const defaultText = renderer.text.bind(renderer);
  renderer.text = (token) => {
    const html = emojify(defaultText(token));
    return options.context ? linkIssueReferences(html, options.context) : html;
  };

  renderer.code = ({ text, lang }) => {
    const language =
      typeof lang === "string" && lang.trim().length > 0
        ? normalizeLanguage(lang.trim().split(/\s+/)[0] ?? "")
        : undefined;

    if (language === MERMAID_LANGUAGE) {
      diagramCount += 1;
      return renderMermaidPlaceholder(text, diagramCount);
    }

    const source = normalizeNewlines(text).replace(/\n$/, "");
    const highlighted = highlightCode(source, language);
    const languageClass = highlighted.language ? ` language-${highlighted.language}` : "";
    const dataAttribute = highlighted.language
      ? ` data-language="${escapeHtml(highlighted.language)}"`
      : "";

    return `<div class="highlight"${dataAttribute}><button type="button" class="code-copy" aria-label="Copy">Copy</button><pre><code class="hljs${languageClass}">${highlighted.value}</code></pre></div>\n`;
  };

  return marked.parse(markdown, { async: false, gfm: true, breaks: false, renderer }) as string;
}

function createSlug(source: string, counts: Map<string, number>): string {
  const base = String(source)
    .toLowerCase()
    .trim()
    .replace(/<[^>]*>/g, "")
    .replace(/[^\p{L}\p{N}\s_-]/gu, "")
    .replace(/\s/g, "-");

  const slug = base || "section";
  const seen = counts.get(slug) ?? 0;
  counts.set(slug, seen + 1);
  return seen === 0 ? slug : `${slug}-${seen}`;
}

function highlightCode(
  code: string,
  language: string | undefined,
): { value: string; language?: string } {
  if (!language || language === PLAIN_LANGUAGE || !hljs.getLanguage(language)) {
    return { value: escapeHtml(code), language };
  }

  try {
    return { value: hljs.highlight(code, { language }).value, language };
  } catch (error) {
    console.warn(`[mdlive] Failed to highlight ${language} block:`, error);
    return { value: escapeHtml(code), language };
  }
}

function renderMermaidPlaceholder(source: string, index: number): string {
  const id = `mermaid-diagram-${index}`;
  return `<figure class="diagram" data-diagram-kind="mermaid" data-diagram-state="pending">
<div class="diagram-target" id="${id}" role="img" aria-label="Mermaid diagram"></div>
<pre class="diagram-source" data-diagram-source="${id}"><code>${escapeHtml(normalizeNewlines(source))}</code></pre>
</figure>
`;
}

function parseAlert(
  token: Tokens.Blockquote,
): { variant: string; kind: AlertKind; title: string; body: TokensList } | undefined {
  const lines = token.raw.split("\n").map((line) => line.replace(/^ {0,3}> ?/, ""));
  const [first, ...rest] = lines;
  const match = first?.trim().match(/^\[!(\w+)\](?:\s+(.*))?$/);
  if (!match?.[1]) {
    return undefined;
  }

  const variant = match[1].toLowerCase();
  const kind = ALERT_KINDS[variant];
  if (!kind) {
    return undefined;
  }

  const body = rest.join("\n").trim();
  return {
    variant,
    kind,
    title: match[2]?.trim() || kind.label,
    body: body.length > 0 ? marked.lexer(body) : marked.lexer(""),
  };
}

function linkIssueReferences(html: string, context: string): string {
  return html.replace(
    /(^|[\s(])#(\d+)\b/g,
    (_match, lead: string, issue: string) =>
      `${lead}<a class="issue-link" href="https://github.com/${context}/issues/${issue}">#${issue}</a>`,
  );
}

function normalizeLanguage(language: string): string {
  const lower = language.toLowerCase();
  return LANGUAGE_ALIASES[lower] ?? lower;
}

function normalizeNewlines(value: string): string {
  return value.replace(/\r\n/g, "\n");
}
