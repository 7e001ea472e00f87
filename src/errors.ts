export const AnalysisErrorCode = {
  ARCHIVE_TOO_LARGE: "ARCHIVE_TOO_LARGE",
  PATH_TRAVERSAL: "PATH_TRAVERSAL",
  UNSUPPORTED_ARCHIVE: "UNSUPPORTED_ARCHIVE",
  INVALID_CONFIG: "INVALID_CONFIG",
  ANALYSIS_ABORTED: "ANALYSIS_ABORTED",
} as const;

export type AnalysisErrorCode = (typeof AnalysisErrorCode)[keyof typeof AnalysisErrorCode];

export type ErrorDetails = Record<string, string | number>;

/**
 * Request-fatal failure. Messages and details refer to archive entry names,
 * never to the workspace location on disk.
 */
export class AnalysisError extends Error {
  constructor(
    public readonly code: AnalysisErrorCode,
    message: string,
    public readonly details: ErrorDetails = {},
  ) {
    super(message);
    this.name = "AnalysisError";
  }
}

export type SizeScope = "compressed" | "uncompressed" | "entries";

export class ArchiveTooLargeError extends AnalysisError {
  constructor(
    public readonly scope: SizeScope,
    public readonly observed: number,
    public readonly limit: number,
    entry?: string,
  ) {
    const unit = scope === "entries" ? "entries" : "bytes";
    const where = entry ? ` (at entry "${entry}")` : "";
    super(
      AnalysisErrorCode.ARCHIVE_TOO_LARGE,
      `Archive ${scope} size ${observed} ${unit} exceeds the limit of ${limit} ${unit}${where}`,
      entry ? { scope, observed, limit, entry } : { scope, observed, limit },
    );
    this.name = "ArchiveTooLargeError";
  }
}

export class PathTraversalError extends AnalysisError {
  constructor(
    public readonly entry: string,
    target?: string,
  ) {
    const message = target
      ? `Archive entry "${entry}" links to "${target}", outside the extraction root`
      : `Archive entry "${entry}" resolves outside the extraction root`;
    super(AnalysisErrorCode.PATH_TRAVERSAL, message, target ? { entry, target } : { entry });
    this.name = "PathTraversalError";
  }
}

export class UnsupportedArchiveError extends AnalysisError {
  constructor(reason: string) {
    super(AnalysisErrorCode.UNSUPPORTED_ARCHIVE, `Not a supported ZIP archive: ${reason}`, { reason });
    this.name = "UnsupportedArchiveError";
  }
}

export class InvalidConfigError extends AnalysisError {
  constructor(issues: string[]) {
    super(AnalysisErrorCode.INVALID_CONFIG, `Invalid analyzer configuration: ${issues.join("; ")}`, {
      issues: issues.join("; "),
    });
    this.name = "InvalidConfigError";
  }
}

export class AnalysisAbortedError extends AnalysisError {
  constructor(stage: string) {
    super(AnalysisErrorCode.ANALYSIS_ABORTED, `Analysis aborted during ${stage}`, { stage });
    this.name = "AnalysisAbortedError";
  }
}
