/**
 * Event persistence — JSONL file store with auto-rotation.
 */

import { appendFile, readFile, writeFile, stat, mkdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join, dirname } from "node:path";
import type { ConnectionEvent } from "./config.js";

const DEFAULT_MAX_SIZE_MB = 10;
const ROTATION_KEEP_RATIO = 0.5; // Keep last 50% on rotation

/** Accepts derived events for storage */
export interface EventSink {
  write(event: ConnectionEvent): Promise<void>;
}

export type StoredEvent = Record<string, string | number>;

/**
 * Flatten an event for storage: absent (null) fields are dropped.
 */
export function serializeEvent(event: ConnectionEvent): StoredEvent {
  const out: StoredEvent = {};
  for (const [key, value] of Object.entries(event)) {
    if (typeof value === "string" || typeof value === "number") {
      out[key] = value;
    }
  }
  return out;
}

function isStoredEvent(value: unknown): value is StoredEvent {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === "string" || typeof v === "number");
}

function parseStoredLine(line: string): StoredEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  return isStoredEvent(parsed) ? parsed : null;
}

export class EventStore implements EventSink {
  private filePath: string;
  private maxSizeBytes: number;

  constructor(stateDir: string, maxSizeMB: number = DEFAULT_MAX_SIZE_MB) {
    this.filePath = join(stateDir, "events.jsonl");
    this.maxSizeBytes = maxSizeMB * 1024 * 1024;
  }

  /**
   * Append an event to the JSONL file.
   * Auto-rotates if file exceeds max size.
   */
  async write(event: ConnectionEvent): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }

    await appendFile(this.filePath, JSON.stringify(serializeEvent(event)) + "\n");

    const stats = await stat(this.filePath);
    if (stats.size > this.maxSizeBytes) {
      await this.rotate();
    }
  }

  /**
   * Load the most recent stored events, oldest first.
   */
  async loadRecent(limit: number = 100): Promise<StoredEvent[]> {
    if (!existsSync(this.filePath)) return [];

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);

    const events: StoredEvent[] = [];
    let skipped = 0;
    for (const line of lines.slice(-limit)) {
      const event = parseStoredLine(line);
      if (event) events.push(event);
      else skipped++;
    }
    if (skipped > 0) {
      console.warn(`[tunnelwatch] Skipped ${skipped} malformed lines in events.jsonl`);
    }
    return events;
  }

  /**
   * Rotate the file — keep the most recent half of the lines.
   */
  async rotate(): Promise<void> {
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);

    const keepCount = Math.floor(lines.length * ROTATION_KEEP_RATIO);
    const kept = keepCount > 0 ? lines.slice(-keepCount) : [];

    await writeFile(this.filePath, kept.length > 0 ? kept.join("\n") + "\n" : "");
    console.log(
      `[tunnelwatch] Rotated events.jsonl: ${lines.length} → ${kept.length} entries`,
    );
  }

  get path(): string {
    return this.filePath;
  }
}
