import * as fs from "fs/promises";
import * as path from "path";

import type { SourceEncoding, SourceFile } from "./analyzers/types";
import { languageForPath, manifestExtensions, manifestFileNames } from "./config";
import type { WorkspaceHandle } from "./sandbox";

export type InventoryOptions = {
  ignoredDirectories: string[];
};

export type InventoryResult = {
  files: SourceFile[];
  unreadable: string[];
  manifests: string[];
};

type Decoded = {
  content: string;
  encoding: SourceEncoding;
};

const REPLACEMENT_CHAR = "\uFFFD";
const MAX_REPLACEMENT_RATIO = 0.1;

export async function listSourceFiles(handle: WorkspaceHandle, options: InventoryOptions): Promise<InventoryResult> {
  const ignored = new Set(options.ignoredDirectories);
  const files: SourceFile[] = [];
  const unreadable: string[] = [];
  const manifests: string[] = [];

  for (const relativePath of await walk(handle.root, "", ignored)) {
    if (isManifest(relativePath)) {
      manifests.push(relativePath);
    }

    const language = languageForPath(relativePath);
    if (!language) { continue; }

    const bytes = await fs.readFile(path.join(handle.root, ...relativePath.split("/")));
    const decoded = decodeSource(bytes);
    if (!decoded) {
      unreadable.push(relativePath);
      continue;
    }

    files.push({
      path: relativePath,
      language,
      content: decoded.content,
      lineCount: countLines(decoded.content),
      encoding: decoded.encoding,
    });
  }

  files.sort((a, b) => comparePaths(a.path, b.path));
  unreadable.sort(comparePaths);
  manifests.sort(comparePaths);
  return { files, unreadable, manifests };
}

async function walk(root: string, relativeDir: string, ignored: Set<string>): Promise<string[]> {
  const results: string[] = [];
  const entries = await fs.readdir(path.join(root, ...splitPosix(relativeDir)), { withFileTypes: true });

  for (const entry of entries) {
    const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      if (ignored.has(entry.name)) { continue; }
      results.push(...(await walk(root, relativePath, ignored)));
    } else if (entry.isFile()) {
      results.push(relativePath);
    }
  }
  return results;
}

/**
 * Decodes source bytes, honouring UTF-16 byte order marks and falling back to
 * a lossy UTF-8 decode. Returns undefined for content that looks binary.
 */
export function decodeSource(bytes: Uint8Array): Decoded | undefined {
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return { content: new TextDecoder("utf-16le").decode(bytes), encoding: "utf-16le" };
  }
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    return { content: new TextDecoder("utf-16be").decode(bytes), encoding: "utf-16be" };
  }
  if (bytes.includes(0)) {
    return undefined;
  }

  const strict = decodeStrictUtf8(bytes);
  if (strict !== undefined) {
    return { content: strict, encoding: "utf-8" };
  }

  // Invalid UTF-8: substitute the offending bytes instead of dropping the file
  const content = new TextDecoder("utf-8").decode(bytes);
  let replaced = 0;
  for (const ch of content) {
    if (ch === REPLACEMENT_CHAR) { replaced++; }
  }
  if (content.length > 0 && replaced / content.length > MAX_REPLACEMENT_RATIO) {
    return undefined;
  }
  return { content, encoding: "utf-8-lossy" };
}

function decodeStrictUtf8(bytes: Uint8Array): string | undefined {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

export function countLines(content: string): number {
  if (content.length === 0) { return 0; }
  const lines = content.split(/\r\n|\r|\n/);
  return lines[lines.length - 1] === "" ? lines.length - 1 : lines.length;
}

// Code-unit order, independent of the host locale
export function comparePaths(a: string, b: string): number {
  if (a < b) { return -1; }
  return a > b ? 1 : 0;
}

function isManifest(relativePath: string): boolean {
  const base = relativePath.slice(relativePath.lastIndexOf("/") + 1);
  if (manifestFileNames.has(base)) { return true; }
  const dot = base.lastIndexOf(".");
  return dot > 0 && manifestExtensions.has(base.slice(dot));
}

function splitPosix(relativePath: string): string[] {
  return relativePath ? relativePath.split("/") : [];
}
