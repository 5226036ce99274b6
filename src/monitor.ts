/**
 * ConnectionMonitor — runs the derivation engine on a fixed interval and hands
 * each cycle's events to the storage and notification sinks.
 *
 * Cycles never overlap: a tick that fires while one is still running is
 * dropped. Cursor and registry state are committed (and checkpointed) before
 * the sinks run, so a failing sink never rewinds them.
 */

import { EventEmitter } from "node:events";
import type { ConnectionEvent, MonitorConfig } from "./config.js";
import { EventDerivationEngine } from "./engine.js";
import type { CheckpointStore } from "./checkpoint.js";
import type { EventSink } from "./persistence.js";
import { summarize, type NotificationSink } from "./notifier.js";
import { createNotifyState, shouldNotify, type NotifyState } from "./alerts.js";
import { fileSize } from "./source-reader.js";

export interface MonitorOptions {
  config: MonitorConfig;
  eventSink: EventSink;
  notificationSink: NotificationSink | null;
  checkpointStore: CheckpointStore | null;
  /** Epoch ms clock passed to the engine */
  clock?: () => number;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ConnectionMonitor extends EventEmitter {
  private config: MonitorConfig;
  private eventSink: EventSink;
  private notificationSink: NotificationSink | null;
  private checkpointStore: CheckpointStore | null;
  private clock: (() => number) | undefined;
  private notifyState: NotifyState = createNotifyState();
  private engine: EventDerivationEngine | null = null;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private polling = false;
  private running = false;

  constructor(opts: MonitorOptions) {
    super();
    this.config = opts.config;
    this.eventSink = opts.eventSink;
    this.notificationSink = opts.notificationSink;
    this.checkpointStore = opts.checkpointStore;
    this.clock = opts.clock;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    const checkpoint = (await this.checkpointStore?.load()) ?? null;
    // stop() may have been called while loading
    if (!this.running) return;

    this.engine = new EventDerivationEngine({
      statusPath: this.config.statusPath,
      logPath: this.config.logPath,
      serverName: this.config.serverName,
      serverLocation: this.config.serverLocation,
      checkpoint: checkpoint ?? undefined,
      clock: this.clock,
    });

    if (checkpoint) {
      console.log(`[tunnelwatch] Resumed from checkpoint, log offset=${checkpoint.cursor.logOffset}`);
    } else if (this.config.logStartPosition === "end") {
      // Only lines written from now on are of interest
      const offset = await fileSize(this.config.logPath);
      if (!this.running) return;
      this.engine.seekLog(offset);
      console.log(`[tunnelwatch] Monitor started, log offset=${offset}`);
    } else {
      console.log("[tunnelwatch] Monitor started, reading server log from the beginning");
    }

    await this.runCycle();
    if (!this.running) return;

    this.pollTimer = setInterval(() => {
      this.runCycle().catch((err) => {
        console.error(`[tunnelwatch] Poll cycle error: ${describe(err)}`);
      });
    }, this.config.pollIntervalMs);

    this.emit("started");
  }

  stop(): void {
    this.running = false;
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    this.emit("stopped");
    console.log("[tunnelwatch] Monitor stopped");
  }

  /**
   * Run one poll cycle and deliver its events. Returns the derived events, or
   * an empty list when the monitor is not started or a cycle is in progress.
   */
  async runCycle(): Promise<ConnectionEvent[]> {
    if (!this.engine) return [];
    if (this.polling) {
      console.warn("[tunnelwatch] Previous poll cycle still running, skipping this tick");
      return [];
    }

    this.polling = true;
    try {
      const events = await this.engine.poll();

      if (this.checkpointStore) {
        await this.checkpointStore.save(this.engine.checkpoint()).catch((err) => {
          console.warn(`[tunnelwatch] Failed to save checkpoint: ${describe(err)}`);
        });
      }

      await this.deliver(events);

      const transitions = events.filter((e) => e.eventType !== "authenticated").length;
      if (transitions > 0) {
        console.log(
          `[tunnelwatch] ${transitions} connection events, ${this.engine.activeSessions().length} active sessions`,
        );
      }
      this.emit("cycle", events);
      return events;
    } finally {
      this.polling = false;
    }
  }

  private async deliver(events: ConnectionEvent[]): Promise<void> {
    for (const evt of events) {
      const target = `${evt.clientIp}:${evt.clientPort}`;

      try {
        await this.eventSink.write(evt);
      } catch (err) {
        console.error(`[tunnelwatch] Failed to persist ${evt.eventType} event for ${target}: ${describe(err)}`);
      }

      if (!this.notificationSink) continue;
      if (!shouldNotify(evt, this.notifyState, this.config.notifyEventTypes, evt.timestamp)) continue;

      try {
        await this.notificationSink.notify(summarize(evt));
      } catch (err) {
        console.error(`[tunnelwatch] Notification delivery failed for ${evt.eventType} ${target}: ${describe(err)}`);
      }
    }
  }

  /** Engine state for status reporting; null before start() */
  status(): { running: boolean; activeSessions: number; logOffset: number } | null {
    if (!this.engine) return null;
    return {
      running: this.running,
      activeSessions: this.engine.activeSessions().length,
      logOffset: this.engine.cursor().logOffset,
    };
  }
}
