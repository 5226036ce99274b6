/**
 * EventDerivationEngine — correlates the server log and the status snapshot
 * into one deduplicated stream of ConnectionEvents per poll cycle.
 *
 * Each cycle:
 *   log increment → login/logout/auth-failure signals → registry
 *   status file   → current clients → diff against previous cycle
 *   → [log events, connects, heartbeats, snapshot disconnects]
 *
 * A logout seen in the log produces the session's disconnect and marks the
 * key suppressed, so its later disappearance from the snapshot does not
 * produce a second one. The reverse also holds for one cycle: a logout for a
 * key the snapshot finalized in the previous cycle is dropped.
 *
 * A login whose session is never listed in a snapshot is forgotten after
 * LOGIN_GRACE_CYCLES snapshot cycles.
 */

import { randomUUID } from "node:crypto";
import type {
  AuthFailedEvent,
  ConnectionEvent,
  DisconnectEvent,
  ServerIdentity,
  SnapshotEvent,
} from "./config.js";
import { scanLog, type LogSignal } from "./log-scanner.js";
import { SessionRegistry, splitAddress, type SessionEntry } from "./session-registry.js";
import { diffClients, parseSnapshot, type ClientRecord } from "./snapshot.js";
import { readLogIncrement, readSnapshotFile } from "./source-reader.js";

/** Snapshot cycles a login may go unlisted before its registry entry is dropped */
export const LOGIN_GRACE_CYCLES = 3;

export interface PollCursor {
  logOffset: number;
  snapshotOffset: number;
  previousClients: string[];
}

/** Everything needed to resume polling after a restart */
export interface EngineCheckpoint {
  version: 1;
  cursor: PollCursor;
  sessions: Record<string, SessionEntry>;
  suppressed: string[];
  /** Unlisted snapshot cycles per login-only session */
  pendingLogins: Record<string, number>;
  /** Keys disconnected by the last snapshot stage */
  finalized: string[];
}

export interface CycleInput {
  /** Newly appended server log text */
  logText: string;
  /** Full status file content, or null when it could not be read */
  snapshot: string | null;
}

export interface EngineOptions extends ServerIdentity {
  statusPath: string;
  logPath: string;
  checkpoint?: EngineCheckpoint;
  /** Epoch ms clock, replaceable in tests */
  clock?: () => number;
}

export class EventDerivationEngine {
  private statusPath: string;
  private logPath: string;
  private identity: ServerIdentity;
  private clock: () => number;
  private registry: SessionRegistry;
  private previousClients: Set<string>;
  /** Keys whose disconnect already came from a logout line */
  private suppressed: Set<string>;
  private pendingLogins: Map<string, number>;
  private finalized: Set<string>;
  private logOffset: number;
  private snapshotOffset: number;

  constructor(opts: EngineOptions) {
    this.statusPath = opts.statusPath;
    this.logPath = opts.logPath;
    this.identity = { serverName: opts.serverName, serverLocation: opts.serverLocation };
    this.clock = opts.clock ?? Date.now;

    const cp = opts.checkpoint;
    this.registry = new SessionRegistry(cp?.sessions);
    this.previousClients = new Set(cp?.cursor.previousClients ?? []);
    this.suppressed = new Set(cp?.suppressed ?? []);
    this.pendingLogins = new Map(Object.entries(cp?.pendingLogins ?? {}));
    this.finalized = new Set(cp?.finalized ?? []);
    this.logOffset = cp?.cursor.logOffset ?? 0;
    this.snapshotOffset = cp?.cursor.snapshotOffset ?? 0;
  }

  /**
   * Read both sources and derive this cycle's events. Never throws: an
   * unavailable source contributes nothing.
   */
  async poll(): Promise<ConnectionEvent[]> {
    try {
      const increment = await readLogIncrement(this.logPath, this.logOffset);
      const snapshot = await readSnapshotFile(this.statusPath);

      const events = this.derive({
        logText: increment?.text ?? "",
        snapshot: snapshot?.content ?? null,
      });

      if (increment) this.logOffset = increment.offset;
      if (snapshot) this.snapshotOffset = snapshot.size;
      return events;
    } catch (err) {
      console.error(`[tunnelwatch] Poll cycle failed: ${err instanceof Error ? err.message : String(err)}`);
      return [];
    }
  }

  /**
   * Merge one cycle of input into the registry and return the events in
   * emission order.
   */
  derive(input: CycleInput): ConnectionEvent[] {
    const now = this.clock();
    const logEvents = this.applyLogSignals(scanLog(input.logText), now);

    // Without a readable snapshot there is nothing to diff; keep the previous
    // client set so the gap does not look like everyone left.
    if (input.snapshot === null) return logEvents;

    const { clients } = parseSnapshot(input.snapshot);
    const { joined, left } = diffClients(this.previousClients, clients.keys());

    const connects: ConnectionEvent[] = [];
    for (const key of joined) {
      const record = clients.get(key);
      if (!record) continue;
      if (!this.registry.has(key)) {
        connects.push(this.snapshotEvent("connect", record, record.username, now));
      }
      this.registry.update(key, { active: true });
    }

    const disconnects: ConnectionEvent[] = [];
    this.finalized.clear();
    for (const key of left) {
      const entry = this.registry.remove(key);
      this.pendingLogins.delete(key);
      if (this.suppressed.delete(key)) continue;
      this.finalized.add(key);
      const { clientIp, clientPort } = splitAddress(key);
      disconnects.push(this.disconnectEvent(clientIp, clientPort, entry?.username ?? null, entry?.connectedSince ?? null, "snapshot", now));
    }

    const heartbeats: ConnectionEvent[] = [];
    for (const record of clients.values()) {
      const entry = this.registry.update(record.key, {
        active: true,
        username: record.username,
        virtualIp: record.virtualIp,
        connectedSince: record.connectedSince,
      });
      heartbeats.push(this.snapshotEvent("authenticated", record, entry.username, now));
      this.pendingLogins.delete(record.key);
    }

    this.expirePendingLogins();

    this.previousClients = new Set(clients.keys());
    // A suppression only matters while the session is still listed
    for (const key of this.suppressed) {
      if (!this.previousClients.has(key)) this.suppressed.delete(key);
    }

    return [...logEvents, ...connects, ...heartbeats, ...disconnects];
  }

  private applyLogSignals(signals: LogSignal[], now: number): ConnectionEvent[] {
    const events: ConnectionEvent[] = [];
    for (const sig of signals) {
      switch (sig.kind) {
        case "login": {
          const entry = this.registry.update(sig.sessionKey, { username: sig.username });
          if (!entry.active) this.pendingLogins.set(sig.sessionKey, 0);
          this.finalized.delete(sig.sessionKey);
          break;
        }
        case "logout": {
          // The snapshot already reported this session's end
          if (this.finalized.delete(sig.sessionKey) && !this.registry.has(sig.sessionKey)) break;
          const entry = this.registry.remove(sig.sessionKey);
          this.pendingLogins.delete(sig.sessionKey);
          events.push(this.disconnectEvent(
            sig.clientIp,
            sig.clientPort,
            sig.username ?? entry?.username ?? null,
            entry?.connectedSince ?? null,
            "log",
            now,
          ));
          this.suppressed.add(sig.sessionKey);
          break;
        }
        case "auth_failed":
          events.push(this.authFailedEvent(sig, now));
          break;
      }
    }
    return events;
  }

  private expirePendingLogins(): void {
    for (const [key, cycles] of this.pendingLogins) {
      if (cycles + 1 <= LOGIN_GRACE_CYCLES) {
        this.pendingLogins.set(key, cycles + 1);
        continue;
      }
      this.pendingLogins.delete(key);
      if (this.registry.get(key)?.active === false) this.registry.remove(key);
    }
  }

  private snapshotEvent(
    eventType: SnapshotEvent["eventType"],
    record: ClientRecord,
    username: string | null,
    now: number,
  ): SnapshotEvent {
    return {
      id: randomUUID(),
      timestamp: now,
      eventType,
      source: "snapshot",
      clientIp: record.clientIp,
      clientPort: record.clientPort,
      username,
      virtualIp: record.virtualIp,
      bytesReceived: record.bytesReceived,
      bytesSent: record.bytesSent,
      connectedSince: record.connectedSince,
      sessionDuration: null,
      ...this.identity,
    };
  }

  private disconnectEvent(
    clientIp: string,
    clientPort: number,
    username: string | null,
    connectedSince: number | null,
    source: DisconnectEvent["source"],
    now: number,
  ): DisconnectEvent {
    return {
      id: randomUUID(),
      timestamp: now,
      eventType: "disconnect",
      source,
      clientIp,
      clientPort,
      username,
      virtualIp: null,
      bytesReceived: null,
      bytesSent: null,
      connectedSince,
      sessionDuration: connectedSince === null
        ? null
        : Math.max(0, Math.floor(now / 1000) - connectedSince),
      ...this.identity,
    };
  }

  private authFailedEvent(sig: LogSignal, now: number): AuthFailedEvent {
    return {
      id: randomUUID(),
      timestamp: now,
      eventType: "auth_failed",
      source: "log",
      clientIp: sig.clientIp,
      clientPort: sig.clientPort,
      username: sig.username,
      virtualIp: null,
      bytesReceived: null,
      bytesSent: null,
      connectedSince: null,
      sessionDuration: null,
      ...this.identity,
    };
  }

  /** Move the log cursor, e.g. to the end of the file on first start. */
  seekLog(offset: number): void {
    this.logOffset = offset;
  }

  cursor(): PollCursor {
    return {
      logOffset: this.logOffset,
      snapshotOffset: this.snapshotOffset,
      previousClients: [...this.previousClients],
    };
  }

  checkpoint(): EngineCheckpoint {
    return {
      version: 1,
      cursor: this.cursor(),
      sessions: this.registry.toJSON(),
      suppressed: [...this.suppressed],
      pendingLogins: Object.fromEntries(this.pendingLogins),
      finalized: [...this.finalized],
    };
  }

  /** Sessions currently listed in the status file, with their last known metadata */
  activeSessions(): Array<{ key: string } & SessionEntry> {
    const out: Array<{ key: string } & SessionEntry> = [];
    for (const key of this.previousClients) {
      const entry = this.registry.get(key);
      if (entry) out.push({ key, ...entry });
    }
    return out;
  }

  /** True while a logout-derived disconnect is waiting for the key to leave the snapshot */
  isSuppressed(key: string): boolean {
    return this.suppressed.has(key);
  }

  /** Registry lookup for status reporting and tests */
  session(key: string): SessionEntry | undefined {
    return this.registry.get(key);
  }
}
