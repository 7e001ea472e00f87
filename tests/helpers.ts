import AdmZip from "adm-zip";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import type { CodeUnit, Language, SourceFile } from "../src/analyzers/types";
import { countLines } from "../src/inventory";
import type { SandboxLimits } from "../src/sandbox";

export const testLimits: SandboxLimits = {
  maxArchiveBytes: 1024 * 1024,
  maxUncompressedBytes: 1024 * 1024,
  maxFileBytes: 64 * 1024,
  maxEntries: 100,
};

export function buildZip(files: Record<string, string | Buffer>, links: Record<string, string> = {}): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, typeof content === "string" ? Buffer.from(content, "utf8") : content);
  }
  for (const [name, target] of Object.entries(links)) {
    zip.addFile(name, Buffer.from(target, "utf8"));
    const entry = zip.getEntry(name);
    if (entry) {
      entry.attr = (0o120777 << 16) >>> 0;
    }
  }
  return zip.toBuffer();
}

const END_OF_CENTRAL_DIRECTORY = 0x06054b50;

/**
 * Rewrites the uncompressed size an archive declares for one entry, in both
 * its central directory record and its local header. Assumes no archive comment.
 */
export function withDeclaredSize(archive: Buffer, entryName: string, size: number): Buffer {
  const patched = Buffer.from(archive);
  const end = patched.length - 22;
  if (patched.readUInt32LE(end) !== END_OF_CENTRAL_DIRECTORY) {
    throw new Error("archive has a trailing comment");
  }

  const count = patched.readUInt16LE(end + 10);
  let offset = patched.readUInt32LE(end + 16);
  for (let i = 0; i < count; i++) {
    const nameLength = patched.readUInt16LE(offset + 28);
    const name = patched.toString("utf8", offset + 46, offset + 46 + nameLength);
    if (name === entryName) {
      patched.writeUInt32LE(size, offset + 24);
      patched.writeUInt32LE(size, patched.readUInt32LE(offset + 42) + 22);
      return patched;
    }
    offset += 46 + nameLength + patched.readUInt16LE(offset + 30) + patched.readUInt16LE(offset + 32);
  }
  throw new Error(`no entry named ${entryName}`);
}

export function sourceFile(filePath: string, language: Language, content: string): SourceFile {
  return { path: filePath, language, content, lineCount: countLines(content), encoding: "utf-8" };
}

export function makeUnit(overrides: Partial<CodeUnit> & Pick<CodeUnit, "filePath" | "name">): CodeUnit {
  return {
    kind: "function",
    signature: `def ${overrides.name}()`,
    startLine: 1,
    endLine: 2,
    bodyExcerpt: "",
    ...overrides,
  };
}

/**
 * Points os.tmpdir() at a private directory for the duration of a test, so a
 * test can assert that nothing was left behind.
 */
export function useScratchTmpdir(): { dir: () => string; setup: () => void; teardown: () => void } {
  let scratch = "";
  let previous: string | undefined;
  return {
    dir: () => scratch,
    setup: () => {
      previous = process.env.TMPDIR;
      scratch = fs.mkdtempSync(path.join(os.tmpdir(), "featuremap-scratch-"));
      process.env.TMPDIR = scratch;
    },
    teardown: () => {
      if (previous === undefined) {
        delete process.env.TMPDIR;
      } else {
        process.env.TMPDIR = previous;
      }
      fs.rmSync(scratch, { recursive: true, force: true });
    },
  };
}
