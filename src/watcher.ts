import { constants } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { watch } from "chokidar";
import { AsyncQueue } from "./async-queue.js";
import { errorMessage, isErrnoException, WatchEstablishError } from "./errors.js";
import { log } from "./logger.js";

export type ChangeKind = "created" | "modified" | "removed" | "renamed";

export interface ChangeEvent {
  path: string;
  kind: ChangeKind;
}

/**
 * Live view of a directory tree. Iterate it once to receive every change;
 * iteration ends after `close()`.
 */
export interface DirectoryWatch extends AsyncIterable<ChangeEvent> {
  readonly root: string;
  close(): Promise<void>;
}

export interface WatchOptions {
  /** Directory names never descended into. */
  ignoredDirectories?: readonly string[];
  /** Poll instead of using native notifications, e.g. on network mounts. */
  usePolling?: boolean;
  pollInterval?: number;
}

const DEFAULT_IGNORED_DIRECTORIES = [".git", "node_modules"];

/**
 * Starts a recursive watch on `root`, including directories created later.
 * Resolves once the initial scan is done; rejects with WatchEstablishError if
 * the directory is missing, unreadable, or the watcher fails before it is
 * ready. Editors' duplicate notifications are passed through untouched.
 */
export async function watchDirectory(
  root: string,
  options: WatchOptions = {},
): Promise<DirectoryWatch> {
  await assertWatchable(root);

  const ignored = new Set(options.ignoredDirectories ?? DEFAULT_IGNORED_DIRECTORIES);
  const queue = new AsyncQueue<ChangeEvent>();
  const watcher = watch(root, {
    persistent: true,
    ignoreInitial: true,
    usePolling: options.usePolling ?? false,
    interval: options.pollInterval ?? 100,
    ignored: (candidate: string) =>
      candidate !== root && ignored.has(path.basename(candidate)),
  });

  const emit = (kind: ChangeKind) => (changed: string) => {
    queue.push({ path: path.resolve(root, changed), kind });
  };

  watcher.on("add", emit("created"));
  watcher.on("addDir", emit("created"));
  watcher.on("change", emit("modified"));
  watcher.on("unlink", emit("removed"));
  watcher.on("unlinkDir", emit("removed"));

  try {
    await new Promise<void>((resolve, reject) => {
      watcher.once("ready", () => resolve());
      watcher.once("error", (error: unknown) => reject(error));
    });
  } catch (error) {
    await watcher.close();
    queue.close();
    throw new WatchEstablishError(root, errorMessage(error), error);
  }

  watcher.on("error", (error: unknown) => {
    log.warn(`Watcher error: ${errorMessage(error)}`);
  });

  return {
    root,
    async close() {
      queue.close();
      await watcher.close();
    },
    [Symbol.asyncIterator]() {
      return queue[Symbol.asyncIterator]();
    },
  };
}

async function assertWatchable(root: string): Promise<void> {
  try {
    const stat = await fs.stat(root);
    if (!stat.isDirectory()) {
      throw new WatchEstablishError(root, "not a directory");
    }
    await fs.access(root, constants.R_OK | constants.X_OK);
  } catch (error) {
    if (error instanceof WatchEstablishError) {
      throw error;
    }
    const reason =
      isErrnoException(error) && error.code === "ENOENT"
        ? "directory does not exist"
        : isErrnoException(error) && (error.code === "EACCES" || error.code === "EPERM")
          ? "permission denied"
          : errorMessage(error);
    throw new WatchEstablishError(root, reason, error);
  }
}
