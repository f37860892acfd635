export type PreviewErrorCode =
  | "OUT_OF_BOUNDS"
  | "NOT_FOUND"
  | "RENDER_FAILED"
  | "WATCH_FAILED"
  | "CONNECTION_DROPPED";

const HTTP_STATUS: Record<PreviewErrorCode, number> = {
  OUT_OF_BOUNDS: 403,
  NOT_FOUND: 404,
  RENDER_FAILED: 500,
  WATCH_FAILED: 500,
  // nginx's "client closed request"; never actually written to a socket
  CONNECTION_DROPPED: 499,
};

/**
 * Base class for every failure the preview server knows how to report.
 * `requestPath` is what the browser asked for and is safe to echo back in an
 * error page; filesystem paths stay in `message` for the console only.
 */
export class PreviewError extends Error {
  readonly code: PreviewErrorCode;
  readonly httpStatus: number;
  readonly requestPath?: string;

  constructor(
    message: string,
    code: PreviewErrorCode,
    options?: { requestPath?: string; cause?: unknown },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = HTTP_STATUS[code];
    this.requestPath = options?.requestPath;
  }

  /** Errors the browser caused; these are not worth more than a debug line. */
  isUserError(): boolean {
    return this.code === "OUT_OF_BOUNDS" || this.code === "NOT_FOUND";
  }
}

export class OutOfBoundsError extends PreviewError {
  constructor(requestPath: string, resolved?: string) {
    super(
      resolved
        ? `'${requestPath}' resolves to '${resolved}', outside the served folder`
        : `'${requestPath}' escapes the served folder`,
      "OUT_OF_BOUNDS",
      { requestPath },
    );
  }
}

export class NotFoundError extends PreviewError {
  constructor(requestPath: string, cause?: unknown) {
    super(`Could not find ${requestPath}`, "NOT_FOUND", { requestPath, cause });
  }
}

export class RenderError extends PreviewError {
  readonly filePath: string;
  readonly reason: string;

  constructor(filePath: string, reason: string, cause?: unknown) {
    super(`Could not render ${filePath}: ${reason}`, "RENDER_FAILED", { cause });
    this.filePath = filePath;
    this.reason = reason;
  }
}

export class WatchEstablishError extends PreviewError {
  readonly directory: string;

  constructor(directory: string, reason: string, cause?: unknown) {
    super(`Unable to watch '${directory}': ${reason}`, "WATCH_FAILED", { cause });
    this.directory = directory;
  }
}

export class ConnectionDropped extends PreviewError {
  constructor(subscriberId: number) {
    super(`Live-reload subscriber ${subscriberId} disconnected`, "CONNECTION_DROPPED");
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalizes anything thrown while serving `requestPath` into a PreviewError.
 * Filesystem "missing" codes become NotFound, everything else is treated as a
 * failure to render that one path.
 */
export function toPreviewError(
  error: unknown,
  requestPath: string,
  filePath = requestPath,
): PreviewError {
  if (error instanceof PreviewError) {
    return error;
  }

  if (isErrnoException(error)) {
    switch (error.code) {
      case "ENOENT":
      case "ENOTDIR":
        return new NotFoundError(requestPath, error);
      case "EACCES":
      case "EPERM":
        return new RenderError(filePath, "permission denied", error);
      case "EISDIR":
        return new RenderError(filePath, "is a directory", error);
    }
  }

  return new RenderError(filePath, errorMessage(error), error);
}
