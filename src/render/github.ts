import { errorMessage } from "../errors.js";

interface MarkdownRequestBody {
  text: string;
  /** `gfm` links issues and mentions, and needs a context repository. */
  mode: "markdown" | "gfm";
  context?: string;
}

export class GitHubApiError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "GitHubApiError";
    this.status = status;
  }
}

export function buildMarkdownRequest(text: string, context?: string): MarkdownRequestBody {
  return context ? { text, mode: "gfm", context } : { text, mode: "markdown" };
}

/**
 * Converts markdown through GitHub's `POST /markdown` endpoint, which is
 * exactly what github.com shows for a README.
 */
export async function renderMarkdownWithGitHub(
  apiBase: string,
  markdown: string,
  context?: string,
): Promise<string> {
  const url = `${apiBase.replace(/\/+$/, "")}/markdown`;

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: {
        accept: "text/html",
        "content-type": "application/json",
        "user-agent": "mdlive",
        "x-github-api-version": "2022-11-28",
      },
      body: JSON.stringify(buildMarkdownRequest(markdown, context)),
    });
  } catch (error) {
    throw new GitHubApiError(`GitHub API unavailable: ${errorMessage(error)}`, undefined, error);
  }

  const body = await response.text().catch(() => "Could not read response body from GitHub");
  if (response.status >= 400) {
    throw new GitHubApiError(body.trim() || `GitHub API responded ${response.status}`, response.status);
  }
  return body;
}
