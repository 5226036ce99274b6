import { describe, it, beforeEach, afterEach, mock } from "node:test";
import assert from "node:assert/strict";
import { appendFileSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileSize, readLogIncrement, readSnapshotFile } from "../source-reader.js";

describe("readLogIncrement", () => {
  let dir: string;
  let logPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tunnelwatch-reader-"));
    logPath = join(dir, "openvpn.log");
    mock.method(console, "warn", () => {});
  });

  afterEach(() => {
    mock.restoreAll();
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns lines appended after the offset", async () => {
    writeFileSync(logPath, "one\n");
    const first = await readLogIncrement(logPath, 0);
    assert.deepEqual(first, { text: "one\n", offset: 4 });

    appendFileSync(logPath, "two\nthree\n");
    const second = await readLogIncrement(logPath, 4);
    assert.deepEqual(second, { text: "two\nthree\n", offset: 14 });
  });

  it("leaves a partial trailing line for the next read", async () => {
    writeFileSync(logPath, "a\nb");
    const first = await readLogIncrement(logPath, 0);
    assert.deepEqual(first, { text: "a\n", offset: 2 });

    appendFileSync(logPath, "c\n");
    const second = await readLogIncrement(logPath, 2);
    assert.deepEqual(second, { text: "bc\n", offset: 5 });
  });

  it("returns no text when a lone partial line is pending", async () => {
    writeFileSync(logPath, "partial");
    assert.deepEqual(await readLogIncrement(logPath, 0), { text: "", offset: 0 });
  });

  it("returns no text when nothing was appended", async () => {
    writeFileSync(logPath, "one\n");
    assert.deepEqual(await readLogIncrement(logPath, 4), { text: "", offset: 4 });
  });

  it("rereads from the start when the file shrank", async () => {
    const warn = mock.method(console, "warn", () => {});
    writeFileSync(logPath, "new\n");
    const result = await readLogIncrement(logPath, 100);
    assert.deepEqual(result, { text: "new\n", offset: 4 });
    assert.equal(warn.mock.calls[0].arguments[0], "[tunnelwatch] Server log shrank (100 → 4 bytes), rereading from start");
  });

  it("returns null and warns when the file is missing", async () => {
    const warn = mock.method(console, "warn", () => {});
    const missing = join(dir, "absent.log");
    assert.equal(await readLogIncrement(missing, 0), null);
    assert.equal(warn.mock.callCount(), 1);
    assert.equal(warn.mock.calls[0].arguments[0], `[tunnelwatch] Server log not found: ${missing}`);
  });
});

describe("readSnapshotFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tunnelwatch-reader-"));
    mock.method(console, "warn", () => {});
  });

  afterEach(() => {
    mock.restoreAll();
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns content and byte size", async () => {
    const path = join(dir, "status.log");
    writeFileSync(path, "END\n");
    assert.deepEqual(await readSnapshotFile(path), { content: "END\n", size: 4 });
  });

  it("returns null when the file is missing", async () => {
    assert.equal(await readSnapshotFile(join(dir, "absent.log")), null);
  });
});

describe("fileSize", () => {
  it("is 0 for a missing file", async () => {
    assert.equal(await fileSize(join(tmpdir(), "tunnelwatch-does-not-exist.log")), 0);
  });
});
