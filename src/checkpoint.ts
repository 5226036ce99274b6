/**
 * Poll checkpoint persistence — keeps byte offsets, the last client set,
 * known sessions and pending logout suppressions across restarts.
 */

import { readFile, writeFile, mkdir, rename } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { EngineCheckpoint } from "./engine.js";

const CheckpointSchema = Type.Object({
  version: Type.Literal(1),
  cursor: Type.Object({
    logOffset: Type.Integer({ minimum: 0 }),
    snapshotOffset: Type.Integer({ minimum: 0 }),
    previousClients: Type.Array(Type.String()),
  }),
  sessions: Type.Record(
    Type.String(),
    Type.Object({
      active: Type.Boolean(),
      username: Type.Union([Type.String(), Type.Null()]),
      virtualIp: Type.Union([Type.String(), Type.Null()]),
      connectedSince: Type.Union([Type.Number(), Type.Null()]),
    }),
  ),
  suppressed: Type.Array(Type.String()),
  pendingLogins: Type.Record(Type.String(), Type.Integer({ minimum: 0 })),
  finalized: Type.Array(Type.String()),
});

export class CheckpointStore {
  private filePath: string;

  constructor(stateDir: string) {
    this.filePath = join(stateDir, "positions.json");
  }

  /**
   * Load the last saved checkpoint. Returns null when none exists or the
   * file does not hold a valid one.
   */
  async load(): Promise<EngineCheckpoint | null> {
    if (!existsSync(this.filePath)) return null;
    try {
      const parsed: unknown = JSON.parse(await readFile(this.filePath, "utf-8"));
      if (Value.Check(CheckpointSchema, parsed)) return parsed;
      console.warn(`[tunnelwatch] Ignoring invalid checkpoint ${this.filePath}`);
    } catch (err) {
      console.warn(`[tunnelwatch] Failed to load checkpoint: ${err instanceof Error ? err.message : String(err)}`);
    }
    return null;
  }

  async save(checkpoint: EngineCheckpoint): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    const tmp = `${this.filePath}.tmp`;
    await writeFile(tmp, JSON.stringify(checkpoint, null, 2));
    await rename(tmp, this.filePath);
  }

  get path(): string {
    return this.filePath;
  }
}
