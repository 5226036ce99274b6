/**
 * File access for the two sources: the append-only server log (read by byte
 * offset) and the status file (read whole every cycle).
 */

import { open, readFile, stat } from "node:fs/promises";
import { existsSync } from "node:fs";

const NEWLINE = 0x0a;

export interface LogIncrement {
  /** Complete lines appended since the previous offset */
  text: string;
  /** Offset just past the last complete line consumed */
  offset: number;
}

export interface SnapshotRead {
  content: string;
  size: number;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read bytes appended to `path` after `offset`. A trailing line without its
 * newline is left for the next read. Returns null when the file is missing
 * or unreadable.
 */
export async function readLogIncrement(path: string, offset: number): Promise<LogIncrement | null> {
  if (!existsSync(path)) {
    console.warn(`[tunnelwatch] Server log not found: ${path}`);
    return null;
  }

  try {
    const stats = await stat(path);
    let start = offset;

    // File was truncated/rotated — start over
    if (stats.size < start) {
      console.warn(`[tunnelwatch] Server log shrank (${start} → ${stats.size} bytes), rereading from start`);
      start = 0;
    }

    if (stats.size === start) {
      return { text: "", offset: start };
    }

    const fh = await open(path, "r");
    try {
      const length = stats.size - start;
      const buf = Buffer.alloc(length);
      const { bytesRead } = await fh.read(buf, 0, length, start);
      const lastNewline = buf.subarray(0, bytesRead).lastIndexOf(NEWLINE);
      if (lastNewline < 0) {
        return { text: "", offset: start };
      }
      return {
        text: buf.subarray(0, lastNewline + 1).toString("utf8"),
        offset: start + lastNewline + 1,
      };
    } finally {
      await fh.close();
    }
  } catch (err) {
    console.warn(`[tunnelwatch] Failed to read server log ${path}: ${describe(err)}`);
    return null;
  }
}

/**
 * Read the whole status file. Returns null when it is missing or unreadable.
 */
export async function readSnapshotFile(path: string): Promise<SnapshotRead | null> {
  if (!existsSync(path)) {
    console.warn(`[tunnelwatch] Status file not found: ${path}`);
    return null;
  }

  try {
    const buf = await readFile(path);
    return { content: buf.toString("utf8"), size: buf.length };
  } catch (err) {
    console.warn(`[tunnelwatch] Failed to read status file ${path}: ${describe(err)}`);
    return null;
  }
}

/** Current size of the file, or 0 when it does not exist. */
export async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch {
    return 0;
  }
}
