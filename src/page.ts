import { escapeHtml } from "./render/index.js";
import { MERMAID_ENTRY } from "./vendor-assets.js";

export const ASSET_PREFIX = "/__mdlive";
export const LIVE_RELOAD_PATH = "/__livereload";

/** Where the served content stands in the change journal. */
export interface PageFreshness {
  session: string;
  since: number;
}

export interface PageOptions {
  /** Shown in the tab and the file header. */
  fileName: string;
  /** Request path the live-reload script subscribes to, e.g. `/docs/a.md`. */
  watchPath: string;
  freshness: PageFreshness;
  /** Rendered markdown. */
  html: string;
}

export interface ErrorPageOptions {
  status: number;
  heading: string;
  detail: string;
  /** When set, the page reloads itself once this path changes. */
  watchPath?: string;
  freshness?: PageFreshness;
}

export function renderPage(options: PageOptions): string {
  return documentShell({
    title: options.fileName,
    watchPath: options.watchPath,
    freshness: options.freshness,
    body: `<header class="file-header">
        <span id="source-name">${escapeHtml(options.fileName)}</span>
        <button id="theme-toggle" type="button">Toggle theme</button>
      </header>
      <article id="content" class="markdown-body">
${options.html}
      </article>`,
  });
}

export function renderErrorPage(options: ErrorPageOptions): string {
  return documentShell({
    title: `${options.status} · mdlive`,
    watchPath: options.watchPath,
    freshness: options.freshness,
    body: `<article class="markdown-body error-page">
        <h1>${escapeHtml(options.heading)}</h1>
        <pre>${escapeHtml(options.detail)}</pre>
      </article>`,
  });
}

function documentShell(options: {
  title: string;
  watchPath?: string;
  freshness?: PageFreshness;
  body: string;
}): string {
  let watchAttribute = "";
  if (options.watchPath !== undefined) {
    watchAttribute = ` data-watch-path="${escapeHtml(options.watchPath)}"`;
    if (options.freshness) {
      watchAttribute += ` data-session="${escapeHtml(options.freshness.session)}" data-since="${options.freshness.since}"`;
    }
  }

  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${escapeHtml(options.title)}</title>
    <link rel="stylesheet" href="${ASSET_PREFIX}/style.css" />
    <link id="highlight-theme" rel="stylesheet" href="${ASSET_PREFIX}/highlight/light.css" />
  </head>
  <body data-theme="light"${watchAttribute}>
    <main>
      <p id="mdlive-status" hidden></p>
      ${options.body}
    </main>
    <script type="module">${CLIENT_SCRIPT}</script>
  </body>
</html>
`;
}

const CLIENT_SCRIPT = `
const STORAGE_KEY = "mdlive-theme";
const prefersDark = window.matchMedia("(prefers-color-scheme: dark)");
const status = document.getElementById("mdlive-status");
const content = document.getElementById("content");
const themeToggle = document.getElementById("theme-toggle");
const highlightTheme = document.getElementById("highlight-theme");
const watchPath = document.body.dataset.watchPath;
const session = document.body.dataset.session;
let since = document.body.dataset.since;
let mermaidModule;

const showStatus = (text) => {
  status.textContent = text;
  status.hidden = false;
};

const renderDiagrams = async () => {
  const diagrams = content?.querySelectorAll('[data-diagram-kind="mermaid"]') ?? [];
  if (diagrams.length === 0) {
    return;
  }
  try {
    mermaidModule ??= (await import("${ASSET_PREFIX}/mermaid/${MERMAID_ENTRY}")).default;
  } catch (error) {
    console.error("[mdlive] Failed to load Mermaid", error);
    diagrams.forEach((diagram) => { diagram.dataset.diagramState = "error"; });
    return;
  }
  mermaidModule.initialize({
    startOnLoad: false,
    securityLevel: "strict",
    theme: document.body.dataset.theme === "dark" ? "dark" : "default",
  });
  for (const diagram of diagrams) {
    const target = diagram.querySelector(".diagram-target");
    const source = diagram.querySelector(".diagram-source");
    if (!target || !source) {
      continue;
    }
    try {
      const { svg } = await mermaidModule.render(target.id + "-svg", source.textContent ?? "");
      target.innerHTML = svg;
      diagram.dataset.diagramState = "rendered";
    } catch (error) {
      diagram.dataset.diagramState = "error";
      console.error("[mdlive] Failed to render Mermaid diagram", error);
    }
  }
};

const applyTheme = (theme) => {
  document.body.dataset.theme = theme;
  highlightTheme.href = "${ASSET_PREFIX}/highlight/" + theme + ".css";
  if (themeToggle) {
    themeToggle.textContent = theme === "dark" ? "Switch to light" : "Switch to dark";
  }
};

applyTheme(localStorage.getItem(STORAGE_KEY) ?? (prefersDark.matches ? "dark" : "light"));

themeToggle?.addEventListener("click", () => {
  const next = document.body.dataset.theme === "dark" ? "light" : "dark";
  localStorage.setItem(STORAGE_KEY, next);
  applyTheme(next);
  void renderDiagrams();
});

content?.addEventListener("click", async (event) => {
  const button = event.target.closest?.(".code-copy");
  const code = button?.parentElement?.querySelector("code");
  if (!code) {
    return;
  }
  try {
    await navigator.clipboard.writeText(code.textContent ?? "");
    button.textContent = "Copied";
    setTimeout(() => { button.textContent = "Copy"; }, 1500);
  } catch (error) {
    console.error("[mdlive] Failed to copy code", error);
  }
});

const waitForChanges = async () => {
  let failures = 0;
  for (;;) {
    let outcome;
    try {
      const query = new URLSearchParams({ path: watchPath });
      if (session && since) {
        query.set("session", session);
        query.set("since", since);
      }
      const response = await fetch("${LIVE_RELOAD_PATH}?" + query, { cache: "no-store" });
      if (!response.ok) {
        throw new Error("HTTP " + response.status);
      }
      outcome = await response.json();
      failures = 0;
    } catch (error) {
      failures += 1;
      showStatus("Reconnecting to mdlive…");
      await new Promise((resolve) => setTimeout(resolve, Math.min(5000, 500 * failures)));
      continue;
    }

    if (outcome.type !== "reload") {
      continue;
    }
    const gone = outcome.kind === "removed" || outcome.kind === "renamed";
    if (gone && outcome.path === watchPath) {
      since = String(outcome.sequence);
      showStatus(watchPath + " was removed. Waiting for it to come back…");
      continue;
    }
    location.reload();
    return;
  }
};

void renderDiagrams();
if (watchPath) {
  void waitForChanges();
}
`;
