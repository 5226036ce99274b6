/**
 * Notification rate limiting, dedup, and event-type filtering.
 */

import type { ConnectionEvent, EventType } from "./config.js";

const MAX_NOTIFICATIONS_PER_MINUTE = 10;
const NOTIFY_DEDUP_WINDOW_MS = 60 * 1000; // 1 minute

export interface NotificationRecord {
  time: number;
  key: string;
}

export interface NotifyState {
  recent: NotificationRecord[];
}

export function createNotifyState(): NotifyState {
  return { recent: [] };
}

function dedupKey(evt: ConnectionEvent): string {
  return `${evt.eventType}:${evt.clientIp}:${evt.clientPort}`;
}

/**
 * Check if an event should be forwarded to the notification sink
 * (type filter + rate limit + dedup).
 */
export function shouldNotify(
  evt: ConnectionEvent,
  state: NotifyState,
  allowedTypes: readonly EventType[],
  now: number = Date.now(),
): boolean {
  if (!allowedTypes.includes(evt.eventType)) return false;

  state.recent = state.recent.filter((r) => now - r.time < NOTIFY_DEDUP_WINDOW_MS);

  if (state.recent.length >= MAX_NOTIFICATIONS_PER_MINUTE) {
    return false;
  }

  const key = dedupKey(evt);

  // Every failed login attempt is reported
  if (evt.eventType !== "auth_failed") {
    if (state.recent.some((r) => r.key === key)) return false;
  }

  state.recent.push({ time: now, key });
  return true;
}
