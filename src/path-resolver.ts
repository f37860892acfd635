import fs from "node:fs/promises";
import path from "node:path";
import { NotFoundError, OutOfBoundsError, toPreviewError } from "./errors.js";

export const INDEX_FILE = "README.md";

/** True when `candidate` is `root` itself or somewhere beneath it. */
export function isWithinRoot(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === "") {
    return true;
  }
  return (
    relative !== ".." &&
    !relative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(relative)
  );
}

/**
 * Maps the path part of a request URL onto a file beneath `root`.
 *
 * `root` must already be canonical (see {@link canonicalRoot}). Parent
 * segments are folded lexically first, so `/../../etc/passwd` is rejected
 * without touching the disk; symlinks are then followed and the real path is
 * checked again. Directories resolve to their README.md.
 */
export async function resolveRequestPath(
  root: string,
  requestPath: string,
): Promise<string> {
  const candidate = normalizeRequestPath(root, requestPath);
  const resolved = await realpathWithin(root, candidate, requestPath);

  const stat = await fs.stat(resolved).catch((error: unknown) => {
    throw toPreviewError(error, requestPath, resolved);
  });

  if (!stat.isDirectory()) {
    return resolved;
  }

  const index = await realpathWithin(root, path.join(resolved, INDEX_FILE), requestPath);
  const indexStat = await fs.stat(index).catch((error: unknown) => {
    throw toPreviewError(error, requestPath, index);
  });
  if (!indexStat.isFile()) {
    throw new NotFoundError(requestPath);
  }
  return index;
}

/**
 * The purely lexical half of {@link resolveRequestPath}: decodes and folds the
 * request path onto `root` without touching the disk. Still throws
 * OutOfBoundsError for paths that climb above `root`.
 */
export function normalizeRequestPath(root: string, requestPath: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(requestPath);
  } catch (error) {
    throw new NotFoundError(requestPath, error);
  }

  if (decoded.includes("\0")) {
    throw new NotFoundError(requestPath);
  }

  const segments: string[] = [];
  for (const segment of decoded.split(/[\\/]+/)) {
    if (segment === "" || segment === ".") {
      continue;
    }
    if (segment === "..") {
      if (segments.length === 0) {
        throw new OutOfBoundsError(requestPath);
      }
      segments.pop();
      continue;
    }
    segments.push(segment);
  }

  return path.join(root, ...segments);
}

/**
 * Canonical form of the folder being served: absolute, symlinks resolved, and
 * guaranteed to be a directory.
 */
export async function canonicalRoot(folder: string): Promise<string> {
  const resolved = await fs.realpath(path.resolve(folder));
  const stat = await fs.stat(resolved);
  if (!stat.isDirectory()) {
    throw new Error(`'${folder}' is not a directory`);
  }
  return resolved;
}

/** Inverse of {@link resolveRequestPath} for files beneath `root`. */
export function toRequestPath(root: string, filePath: string): string {
  const relative = path.relative(root, filePath);
  return `/${relative.split(path.sep).join("/")}`;
}

async function realpathWithin(
  root: string,
  candidate: string,
  requestPath: string,
): Promise<string> {
  let real: string;
  try {
    real = await fs.realpath(candidate);
  } catch (error) {
    throw toPreviewError(error, requestPath, candidate);
  }

  if (!isWithinRoot(root, real)) {
    throw new OutOfBoundsError(requestPath, real);
  }
  return real;
}
