// ── Error taxonomy ───────────────────────────────────────────────────────────
//
// Per-file failures (ArchiveError, ParseError) are reported and skipped by the
// aggregation step. Everything else ends the run with a non-zero exit code.

export class RouteHighlighterError extends Error {
  /** File or directory the failure is about. */
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.path = path;
  }
}

/** Input directory missing, not a directory, or holding no archives. */
export class InputError extends RouteHighlighterError {}

/** KMZ container unreadable, empty, or without a KML document. */
export class ArchiveError extends RouteHighlighterError {}

/** KML document not well-formed or not KML at all. */
export class ParseError extends RouteHighlighterError {}

/** Merge store exists but does not hold a valid route collection. */
export class StoreCorruptError extends RouteHighlighterError {}

/** Output document or merge store could not be written. */
export class WriteError extends RouteHighlighterError {}

export class UploadError extends RouteHighlighterError {
  /** HTTP status of the failing response, when the server answered. */
  readonly status?: number;

  constructor(message: string, path: string, options?: { cause?: unknown; status?: number }) {
    super(message, path, options);
    this.status = options?.status;
  }
}

/** Message of an unknown thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node system error carrying an errno code such as ENOENT. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
