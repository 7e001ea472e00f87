import AdmZip from "adm-zip";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import * as zlib from "zlib";

import type { AnalyzerConfig } from "./config";
import type { TruncatedEntry } from "./analyzers/types";
import {
  AnalysisAbortedError,
  ArchiveTooLargeError,
  PathTraversalError,
  UnsupportedArchiveError,
} from "./errors";

export type SandboxLimits = Pick<AnalyzerConfig, "maxArchiveBytes" | "maxUncompressedBytes" | "maxFileBytes" | "maxEntries">;

export type WorkspaceHandle = {
  readonly id: string;
  readonly root: string;
  readonly truncated: TruncatedEntry[];
  readonly skippedLinks: string[];
  filesWritten: number;
  closed: boolean;
};

type PlannedFile = {
  entry: AdmZip.IZipEntry;
  relativePath: string;
  declaredSize: number;
};

type ExtractionPlan = {
  files: PlannedFile[];
  truncated: TruncatedEntry[];
  skippedLinks: string[];
};

const WORKSPACE_PREFIX = "featuremap-";
const S_IFMT = 0o170000;
const S_IFLNK = 0o120000;
const STORED = 0;
const DEFLATED = 8;
const ENCRYPTED_FLAG = 0x1;
const MAX_LINK_TARGET_BYTES = 4096;

/**
 * Extracts an untrusted ZIP archive into a fresh temporary directory.
 *
 * Every entry is validated before the first byte is written, so a size or
 * traversal violation leaves nothing on disk. If writing fails part way, the
 * directory is removed before the error propagates.
 */
export async function openWorkspace(
  archive: Uint8Array,
  limits: SandboxLimits,
  signal?: AbortSignal
): Promise<WorkspaceHandle> {
  if (archive.byteLength === 0) {
    throw new UnsupportedArchiveError("archive is empty");
  }
  if (archive.byteLength > limits.maxArchiveBytes) {
    throw new ArchiveTooLargeError("compressed", archive.byteLength, limits.maxArchiveBytes);
  }

  const entries = readEntries(archive);
  const plan = planExtraction(entries, limits);

  const root = await fs.mkdtemp(path.join(os.tmpdir(), WORKSPACE_PREFIX));
  const handle: WorkspaceHandle = {
    id: path.basename(root),
    root,
    truncated: plan.truncated,
    skippedLinks: plan.skippedLinks,
    filesWritten: 0,
    closed: false,
  };

  try {
    await writeFiles(handle, plan.files, limits, signal);
  } catch (error) {
    await closeWorkspace(handle);
    throw error;
  }
  return handle;
}

export async function closeWorkspace(handle: WorkspaceHandle): Promise<void> {
  if (handle.closed) { return; }
  handle.closed = true;
  await fs.rm(handle.root, { recursive: true, force: true });
}

export async function withWorkspace<T>(
  archive: Uint8Array,
  limits: SandboxLimits,
  fn: (handle: WorkspaceHandle) => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  const handle = await openWorkspace(archive, limits, signal);
  try {
    return await fn(handle);
  } finally {
    await closeWorkspace(handle);
  }
}

/**
 * Normalizes an archive entry name to a POSIX path relative to the extraction
 * root. Returns "." for entries naming the root itself.
 */
export function resolveEntryPath(entryName: string): string {
  const name = entryName.replace(/\\/g, "/");
  if (name.startsWith("/") || /^[A-Za-z]:/.test(name) || name.includes("\0")) {
    throw new PathTraversalError(entryName);
  }
  const normalized = path.posix.normalize(name).replace(/\/+$/, "");
  if (normalized === ".." || normalized.startsWith("../")) {
    throw new PathTraversalError(entryName);
  }
  return normalized === "" ? "." : normalized;
}

function readEntries(archive: Uint8Array): AdmZip.IZipEntry[] {
  try {
    const zip = new AdmZip(Buffer.from(archive.buffer, archive.byteOffset, archive.byteLength));
    return zip.getEntries();
  } catch (error) {
    throw new UnsupportedArchiveError(error instanceof Error ? error.message : String(error));
  }
}

function planExtraction(entries: AdmZip.IZipEntry[], limits: SandboxLimits): ExtractionPlan {
  if (entries.length > limits.maxEntries) {
    throw new ArchiveTooLargeError("entries", entries.length, limits.maxEntries);
  }

  const declaredTotal = entries.reduce((sum, entry) => sum + entry.header.size, 0);
  if (declaredTotal > limits.maxUncompressedBytes) {
    throw new ArchiveTooLargeError("uncompressed", declaredTotal, limits.maxUncompressedBytes);
  }

  const plan: ExtractionPlan = { files: [], truncated: [], skippedLinks: [] };

  for (const entry of entries) {
    const relativePath = resolveEntryPath(entry.entryName);
    if (entry.isDirectory || relativePath === ".") { continue; }

    if (isSymlink(entry)) {
      const data = inflateEntry(entry, MAX_LINK_TARGET_BYTES);
      if (data === undefined) {
        throw new UnsupportedArchiveError(`link entry "${relativePath}" has an oversized target`);
      }
      const target = data.toString("utf8");
      if (!linkStaysInside(relativePath, target)) {
        throw new PathTraversalError(entry.entryName, target);
      }
      // Links are never materialized, even when they point inside the root
      plan.skippedLinks.push(relativePath);
      continue;
    }

    const declaredSize = entry.header.size;
    if (declaredSize > limits.maxFileBytes) {
      plan.truncated.push({ path: relativePath, size: declaredSize, limit: limits.maxFileBytes });
      continue;
    }
    plan.files.push({ entry, relativePath, declaredSize });
  }

  return plan;
}

async function writeFiles(
  handle: WorkspaceHandle,
  files: PlannedFile[],
  limits: SandboxLimits,
  signal?: AbortSignal
): Promise<void> {
  let written = 0;

  for (const file of files) {
    if (signal?.aborted) {
      throw new AnalysisAbortedError("extraction");
    }

    // Declared sizes come from the archive itself, so inflation is capped by the remaining budget instead
    const budget = Math.min(limits.maxFileBytes, limits.maxUncompressedBytes - written);
    const data = inflateEntry(file.entry, budget);
    if (data === undefined) {
      if (budget < limits.maxFileBytes) {
        throw new ArchiveTooLargeError("uncompressed", written + budget + 1, limits.maxUncompressedBytes, file.relativePath);
      }
      handle.truncated.push({ path: file.relativePath, size: budget + 1, limit: limits.maxFileBytes });
      continue;
    }
    if (data.length > file.declaredSize) {
      handle.truncated.push({ path: file.relativePath, size: data.length, limit: limits.maxFileBytes });
      continue;
    }
    written += data.length;

    const target = path.resolve(handle.root, ...file.relativePath.split("/"));
    const fromRoot = path.relative(handle.root, target);
    if (fromRoot.startsWith("..") || path.isAbsolute(fromRoot)) {
      throw new PathTraversalError(file.entry.entryName);
    }

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, data);
    } catch (error) {
      if (isPathConflict(error)) {
        throw new UnsupportedArchiveError(`entry "${file.relativePath}" conflicts with another entry`);
      }
      throw error;
    }
    handle.filesWritten++;
  }
}

/**
 * Inflates one entry, producing at most `budget` bytes. Resolves to undefined
 * when the entry holds more than that, without materializing the excess.
 */
function inflateEntry(entry: AdmZip.IZipEntry, budget: number): Buffer | undefined {
  if ((entry.header.flags & ENCRYPTED_FLAG) !== 0) {
    throw new UnsupportedArchiveError(`entry "${entry.entryName}" is encrypted`);
  }

  const raw = entry.getCompressedData();
  switch (entry.header.method) {
    case STORED:
      return raw.length > budget ? undefined : raw;
    case DEFLATED: {
      let data: Buffer;
      try {
        data = zlib.inflateRawSync(raw, { maxOutputLength: budget + 1 });
      } catch (error) {
        if (isOutputTooLarge(error)) { return undefined; }
        const reason = error instanceof Error ? error.message : String(error);
        throw new UnsupportedArchiveError(`entry "${entry.entryName}" cannot be inflated (${reason})`);
      }
      return data.length > budget ? undefined : data;
    }
    default:
      throw new UnsupportedArchiveError(`entry "${entry.entryName}" uses compression method ${entry.header.method}`);
  }
}

function isOutputTooLarge(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ERR_BUFFER_TOO_LARGE";
}

function isSymlink(entry: AdmZip.IZipEntry): boolean {
  return ((entry.attr >>> 16) & S_IFMT) === S_IFLNK;
}

function linkStaysInside(linkPath: string, target: string): boolean {
  const normalizedTarget = target.replace(/\\/g, "/");
  if (normalizedTarget.startsWith("/") || /^[A-Za-z]:/.test(normalizedTarget)) { return false; }
  const resolved = path.posix.normalize(path.posix.join(path.posix.dirname(linkPath), normalizedTarget));
  return resolved !== ".." && !resolved.startsWith("../");
}

function isPathConflict(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) { return false; }
  return error.code === "EEXIST" || error.code === "ENOTDIR" || error.code === "EISDIR";
}
