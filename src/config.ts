import path from "node:path";
import process from "node:process";
import { z, ZodError } from "zod";

export const DEFAULT_GITHUB_API = "https://api.github.com";

export const ConfigSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  // 0 picks a free port
  port: z.number().int().min(0).max(65535).default(4000),
  folder: z.string().min(1).default("."),
  context: z
    .string()
    .regex(/^[\w.-]+\/[\w.-]+$/, "context must look like owner/name")
    .optional(),
  offline: z.boolean().default(false),
  githubApi: z.string().url().default(DEFAULT_GITHUB_API),
  debounceMs: z.number().int().min(0).default(75),
  maxHoldMs: z.number().int().min(100).default(25_000),
  open: z.boolean().default(false),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

export type CliCommand =
  | { kind: "serve"; config: Config }
  | { kind: "help" }
  | { kind: "version" };

const VALUE_FLAGS: Record<string, keyof ConfigInput> = {
  host: "host",
  port: "port",
  folder: "folder",
  context: "context",
  debounce: "debounceMs",
  hold: "maxHoldMs",
};

const NUMERIC_KEYS = new Set<keyof ConfigInput>(["port", "debounceMs", "maxHoldMs"]);

const SHORT_FLAGS: Record<string, string> = {
  "-H": "--host",
  "-p": "--port",
  "-f": "--folder",
  "-c": "--context",
  "-o": "--offline",
  "-h": "--help",
  "-v": "--version",
};

export const USAGE = `
mdlive - preview a folder of markdown files with live reload

USAGE:
  mdlive [OPTIONS] [folder]

OPTIONS:
  -H, --host HOST        Host to listen on (default: 127.0.0.1)
  -p, --port PORT        Port to listen on (default: 4000)
  -f, --folder DIR       Folder to serve (default: .)
  -c, --context OWNER/NAME
                         GitHub repository to render issue references against
  -o, --offline          Render locally instead of through the GitHub API
      --debounce MS      Quiet period before a change is applied (default: 75)
      --hold MS          Longest a live-reload request is held open (default: 25000)
      --open             Open the preview in a browser once it is ready
  -h, --help             Show this message
  -v, --version          Show the version

ENVIRONMENT:
  MDLIVE_GITHUB_API      GitHub API base URL (default: ${DEFAULT_GITHUB_API})
  MDLIVE_DEBUG           Print debug logging
`;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Parses `argv` (without the node and script entries) into a command.
 * Values are validated against ConfigSchema; the first problem is reported as
 * a ConfigError.
 */
export function parseArgs(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): CliCommand {
  const input: ConfigInput = {};
  const positional: string[] = [];

  if (env.MDLIVE_GITHUB_API) {
    input.githubApi = env.MDLIVE_GITHUB_API;
  }

  for (let index = 0; index < argv.length; index += 1) {
    const raw = argv[index];
    if (raw === undefined || raw === "") {
      continue;
    }

    const [flagPart, inlineValue] = splitInlineValue(SHORT_FLAGS[raw] ?? raw);

    if (flagPart === "--help") {
      return { kind: "help" };
    }
    if (flagPart === "--version") {
      return { kind: "version" };
    }
    if (flagPart === "--offline") {
      input.offline = true;
      continue;
    }
    if (flagPart === "--open") {
      input.open = true;
      continue;
    }

    if (flagPart.startsWith("--")) {
      const key = VALUE_FLAGS[flagPart.slice(2)];
      if (!key) {
        throw new ConfigError(`Unknown flag: ${raw}`);
      }

      let value = inlineValue;
      if (value === undefined) {
        index += 1;
        value = argv[index];
      }
      if (value === undefined || value === "") {
        throw new ConfigError(`${flagPart} requires a value`);
      }

      assignValue(input, key, value);
      continue;
    }

    if (flagPart.startsWith("-")) {
      throw new ConfigError(`Unknown argument: ${raw}`);
    }

    positional.push(flagPart);
  }

  if (positional.length > 1) {
    throw new ConfigError(`Expected at most one folder, got ${positional.length}`);
  }
  const [folder] = positional;
  if (folder !== undefined) {
    if (input.folder !== undefined) {
      throw new ConfigError("Pass the folder either positionally or with --folder, not both");
    }
    input.folder = folder;
  }

  return { kind: "serve", config: validateConfig(input) };
}

export function validateConfig(input: ConfigInput): Config {
  try {
    return ConfigSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      const where = issue?.path.join(".") || "config";
      throw new ConfigError(`Invalid ${where}: ${issue?.message ?? "invalid value"}`);
    }
    throw error;
  }
}

export function resolveFolder(config: Config, cwd: string = process.cwd()): string {
  return path.resolve(cwd, config.folder);
}

function splitInlineValue(flag: string): [string, string | undefined] {
  if (!flag.startsWith("--")) {
    return [flag, undefined];
  }
  const equals = flag.indexOf("=");
  if (equals === -1) {
    return [flag, undefined];
  }
  return [flag.slice(0, equals), flag.slice(equals + 1)];
}

function assignValue(input: ConfigInput, key: keyof ConfigInput, value: string): void {
  if (NUMERIC_KEYS.has(key)) {
    const parsed = Number(value);
    if (!/^\d+$/.test(value) || Number.isNaN(parsed)) {
      throw new ConfigError(`Invalid ${key}: expected a whole number, got '${value}'`);
    }
    switch (key) {
      case "port":
        input.port = parsed;
        return;
      case "debounceMs":
        input.debounceMs = parsed;
        return;
      case "maxHoldMs":
        input.maxHoldMs = parsed;
        return;
    }
  }

  switch (key) {
    case "host":
      input.host = value;
      return;
    case "folder":
      input.folder = value;
      return;
    case "context":
      input.context = value;
      return;
    default:
      throw new ConfigError(`Unsupported option: ${key}`);
  }
}
