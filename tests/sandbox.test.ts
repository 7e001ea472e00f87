import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";

import { closeWorkspace, openWorkspace, resolveEntryPath, withWorkspace } from "../src/sandbox";
import {
  AnalysisError,
  ArchiveTooLargeError,
  PathTraversalError,
  UnsupportedArchiveError,
} from "../src/errors";
import { buildZip, testLimits, useScratchTmpdir, withDeclaredSize } from "./helpers";

const scratch = useScratchTmpdir();

beforeEach(() => scratch.setup());
afterEach(() => scratch.teardown());

describe("openWorkspace", () => {
  it("extracts entries into a fresh directory and close removes it", async () => {
    const archive = buildZip({ "src/app.py": "print('hi')\n", "docs/notes.txt": "notes" });

    const handle = await openWorkspace(archive, testLimits);
    expect(handle.filesWritten).toBe(2);
    expect(fs.readFileSync(path.join(handle.root, "src", "app.py"), "utf8")).toBe("print('hi')\n");
    expect(path.dirname(handle.root)).toBe(scratch.dir());

    await closeWorkspace(handle);
    expect(fs.existsSync(handle.root)).toBe(false);
    expect(fs.readdirSync(scratch.dir())).toEqual([]);
  });

  it("treats a second close as a no-op", async () => {
    const handle = await openWorkspace(buildZip({ "a.py": "x = 1\n" }), testLimits);
    await closeWorkspace(handle);
    await expect(closeWorkspace(handle)).resolves.toBeUndefined();
    expect(handle.closed).toBe(true);
  });

  it("gives concurrent workspaces distinct directories", async () => {
    const archive = buildZip({ "a.py": "x = 1\n" });
    const [first, second] = await Promise.all([openWorkspace(archive, testLimits), openWorkspace(archive, testLimits)]);
    expect(first.root).not.toBe(second.root);
    await Promise.all([closeWorkspace(first), closeWorkspace(second)]);
  });

  it("rejects an entry that climbs out of the root without writing anything", async () => {
    const archive = buildZip({ "ok.py": "x = 1\n", "../evil.txt": "owned" });

    const error = await openWorkspace(archive, testLimits).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(PathTraversalError);
    expect(error).toBeInstanceOf(AnalysisError);
    if (error instanceof PathTraversalError) {
      expect(error.code).toBe("PATH_TRAVERSAL");
      expect(error.message).toBe('Archive entry "../evil.txt" resolves outside the extraction root');
      expect(error.message).not.toContain(scratch.dir());
    }
    expect(fs.readdirSync(scratch.dir())).toEqual([]);
  });

  it("rejects a symbolic link whose target escapes the root", async () => {
    const archive = buildZip({ "a.py": "x = 1\n" }, { "src/link": "../../etc/passwd" });

    const error = await openWorkspace(archive, testLimits).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(PathTraversalError);
    if (error instanceof PathTraversalError) {
      expect(error.details).toEqual({ entry: "src/link", target: "../../etc/passwd" });
    }
    expect(fs.readdirSync(scratch.dir())).toEqual([]);
  });

  it("records in-root symbolic links without materializing them", async () => {
    const archive = buildZip({ "README.md": "# readme" }, { "src/readme-link": "../README.md" });

    const handle = await openWorkspace(archive, testLimits);
    expect(handle.skippedLinks).toEqual(["src/readme-link"]);
    expect(fs.existsSync(path.join(handle.root, "src", "readme-link"))).toBe(false);
    expect(handle.filesWritten).toBe(1);
    await closeWorkspace(handle);
  });

  it("rejects an archive over the compressed size limit before parsing it", async () => {
    const archive = buildZip({ "a.py": "x = 1\n" });

    const error = await openWorkspace(archive, { ...testLimits, maxArchiveBytes: 10 }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ArchiveTooLargeError);
    if (error instanceof ArchiveTooLargeError) {
      expect(error.scope).toBe("compressed");
      expect(error.observed).toBe(archive.byteLength);
      expect(error.limit).toBe(10);
    }
  });

  it("rejects an archive whose declared contents exceed the uncompressed limit", async () => {
    const archive = buildZip({ "big.txt": "a".repeat(100) });

    const error = await openWorkspace(archive, { ...testLimits, maxUncompressedBytes: 50, maxFileBytes: 50 })
      .catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ArchiveTooLargeError);
    if (error instanceof ArchiveTooLargeError) {
      expect(error.scope).toBe("uncompressed");
      expect(error.observed).toBe(100);
      expect(error.limit).toBe(50);
      expect(error.message).toBe("Archive uncompressed size 100 bytes exceeds the limit of 50 bytes");
    }
    expect(fs.readdirSync(scratch.dir())).toEqual([]);
  });

  it("rejects an archive with too many entries", async () => {
    const archive = buildZip({ "a.py": "a = 1\n", "b.py": "b = 2\n", "c.py": "c = 3\n" });

    const error = await openWorkspace(archive, { ...testLimits, maxEntries: 2 }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ArchiveTooLargeError);
    if (error instanceof ArchiveTooLargeError) {
      expect(error.scope).toBe("entries");
      expect(error.observed).toBe(3);
    }
  });

  it("skips files over the per-file cap and reports them as truncated", async () => {
    const archive = buildZip({ "big.py": "x".repeat(20), "small.py": "y = 1" });

    const handle = await openWorkspace(archive, { ...testLimits, maxFileBytes: 10 });
    expect(handle.truncated).toEqual([{ path: "big.py", size: 20, limit: 10 }]);
    expect(fs.existsSync(path.join(handle.root, "big.py"))).toBe(false);
    expect(fs.existsSync(path.join(handle.root, "small.py"))).toBe(true);
    await closeWorkspace(handle);
  });

  it("stops inflating an entry that declares no size at the per-file cap", async () => {
    const archive = withDeclaredSize(buildZip({ "dump.sql": "a".repeat(2 * 1024 * 1024), "app.py": "x = 1\n" }), "dump.sql", 0);

    const handle = await openWorkspace(archive, testLimits);
    expect(handle.truncated).toEqual([{ path: "dump.sql", size: 64 * 1024 + 1, limit: 64 * 1024 }]);
    expect(fs.existsSync(path.join(handle.root, "dump.sql"))).toBe(false);
    expect(handle.filesWritten).toBe(1);
    await closeWorkspace(handle);
    expect(fs.readdirSync(scratch.dir())).toEqual([]);
  });

  it("skips an entry that inflates past its declared size", async () => {
    const archive = withDeclaredSize(buildZip({ "data.txt": "b".repeat(32 * 1024) }), "data.txt", 100);

    const handle = await openWorkspace(archive, testLimits);
    expect(handle.truncated).toEqual([{ path: "data.txt", size: 32 * 1024, limit: 64 * 1024 }]);
    expect(handle.filesWritten).toBe(0);
    await closeWorkspace(handle);
  });

  it("fails when undeclared contents overrun the uncompressed limit", async () => {
    const archive = withDeclaredSize(buildZip({ "blob.txt": "c".repeat(500) }), "blob.txt", 0);

    const error = await openWorkspace(archive, { ...testLimits, maxUncompressedBytes: 100 }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ArchiveTooLargeError);
    if (error instanceof ArchiveTooLargeError) {
      expect(error.scope).toBe("uncompressed");
      expect(error.observed).toBe(101);
      expect(error.limit).toBe(100);
    }
    expect(fs.readdirSync(scratch.dir())).toEqual([]);
  });

  it("rejects bytes that are not a ZIP archive", async () => {
    await expect(openWorkspace(Buffer.from("definitely not a zip archive"), testLimits))
      .rejects.toBeInstanceOf(UnsupportedArchiveError);
    await expect(openWorkspace(new Uint8Array(0), testLimits))
      .rejects.toThrow("Not a supported ZIP archive: archive is empty");
  });
});

describe("withWorkspace", () => {
  it("removes the workspace when the callback throws", async () => {
    let root = "";
    await expect(
      withWorkspace(buildZip({ "a.py": "x = 1\n" }), testLimits, async (handle) => {
        root = handle.root;
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(root).not.toBe("");
    expect(fs.existsSync(root)).toBe(false);
  });

  it("returns the callback result and cleans up", async () => {
    const names = await withWorkspace(buildZip({ "pkg/mod.py": "x = 1\n" }), testLimits, async (handle) =>
      fs.readdirSync(path.join(handle.root, "pkg"))
    );
    expect(names).toEqual(["mod.py"]);
    expect(fs.readdirSync(scratch.dir())).toEqual([]);
  });
});

describe("resolveEntryPath", () => {
  it("normalizes separators and dot segments", () => {
    expect(resolveEntryPath("src\\lib\\util.py")).toBe("src/lib/util.py");
    expect(resolveEntryPath("./src/./app.js")).toBe("src/app.js");
    expect(resolveEntryPath("src/old/../app.js")).toBe("src/app.js");
    expect(resolveEntryPath("src/")).toBe("src");
    expect(resolveEntryPath("./")).toBe(".");
  });

  it.each(["/etc/passwd", "C:\\Windows\\system.ini", "\\\\server\\share\\x", "../x", "a/../../x", "..", "a\0b"])(
    "rejects %j",
    (name) => {
      expect(() => resolveEntryPath(name)).toThrow(PathTraversalError);
    }
  );
});
