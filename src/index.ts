/**
 * tunnelwatch
 *
 * Derives connect / authenticated / disconnect / auth_failed events for an
 * OpenVPN server by polling its status file and tailing its server log.
 *
 * Architecture:
 *   status file + server log → EventDerivationEngine → ConnectionMonitor
 *     → EventStore (events.jsonl)
 *     → shouldNotify → NotificationSink
 */

import type { MonitorConfig } from "./config.js";
import { CheckpointStore } from "./checkpoint.js";
import { ConnectionMonitor } from "./monitor.js";
import { ConsoleNotifier, PushoverNotifier, type NotificationSink } from "./notifier.js";
import { EventStore } from "./persistence.js";

export * from "./config.js";
export { SessionRegistry, sessionKey, splitAddress, type SessionEntry } from "./session-registry.js";
export {
  parseSnapshot,
  parseClientRecord,
  diffClients,
  CLIENT_RECORD_MARKER,
  type ClientRecord,
  type ParsedSnapshot,
  type SnapshotDiff,
} from "./snapshot.js";
export {
  scanLog,
  parseLoginLine,
  parseLogoutLine,
  parseAuthFailureLine,
  type LogSignal,
  type LogSignalKind,
} from "./log-scanner.js";
export { readLogIncrement, readSnapshotFile, type LogIncrement, type SnapshotRead } from "./source-reader.js";
export {
  EventDerivationEngine,
  LOGIN_GRACE_CYCLES,
  type EngineCheckpoint,
  type EngineOptions,
  type CycleInput,
  type PollCursor,
} from "./engine.js";
export { CheckpointStore } from "./checkpoint.js";
export { EventStore, serializeEvent, type EventSink, type StoredEvent } from "./persistence.js";
export { shouldNotify, createNotifyState, type NotifyState } from "./alerts.js";
export {
  formatNotification,
  summarize,
  PushoverNotifier,
  ConsoleNotifier,
  type NotificationSink,
  type NotificationSummary,
  type FormattedNotification,
} from "./notifier.js";
export { ConnectionMonitor, type MonitorOptions } from "./monitor.js";

/**
 * Wire a monitor with the stock sinks: events.jsonl and positions.json in the
 * state directory, Pushover when credentials are configured, console otherwise.
 */
export function createMonitor(config: MonitorConfig): ConnectionMonitor {
  let notificationSink: NotificationSink;
  if (config.pushover) {
    notificationSink = new PushoverNotifier({ config: config.pushover });
  } else {
    console.log("[tunnelwatch] Pushover notifications disabled, logging to console");
    notificationSink = new ConsoleNotifier();
  }

  return new ConnectionMonitor({
    config,
    eventSink: new EventStore(config.stateDir, config.eventStoreMaxSizeMB),
    notificationSink,
    checkpointStore: new CheckpointStore(config.stateDir),
  });
}
