/**
 * Connection notifications — human-readable formatting and delivery.
 */

import type { ConnectionEvent, EventType, PushoverConfig } from "./config.js";

export const PUSHOVER_API_URL = "https://api.pushover.net/1/messages.json";

const DEFAULT_TIMEOUT_MS = 10_000;

/** What a notification sink is told about an event */
export interface NotificationSummary {
  eventType: EventType;
  clientIp: string;
  clientPort: number;
  username: string | null;
  virtualIp: string | null;
  serverName: string;
  timestamp: number;
}

export interface NotificationSink {
  notify(summary: NotificationSummary): Promise<void>;
}

export interface FormattedNotification {
  title: string;
  message: string;
  /** Pushover priority, -2 (lowest) to 2 (emergency) */
  priority: number;
  sound: string;
}

export function summarize(evt: ConnectionEvent): NotificationSummary {
  return {
    eventType: evt.eventType,
    clientIp: evt.clientIp,
    clientPort: evt.clientPort,
    username: evt.username,
    virtualIp: evt.virtualIp,
    serverName: evt.serverName,
    timestamp: evt.timestamp,
  };
}

/** "2026-10-19 09:12:44 UTC" */
export function formatTimestamp(ms: number): string {
  return new Date(ms).toISOString().replace("T", " ").slice(0, 19) + " UTC";
}

const STYLES: Record<EventType, Omit<FormattedNotification, "message">> = {
  connect: { title: "🔗 VPN User Connected", priority: 0, sound: "cosmic" },
  disconnect: { title: "🔌 VPN User Disconnected", priority: 0, sound: "pushover" },
  auth_failed: { title: "⚠️ VPN Auth Failed", priority: 1, sound: "siren" },
  authenticated: { title: "ℹ️ VPN Session Active", priority: 0, sound: "pushover" },
};

/**
 * Format an event summary for human-readable delivery.
 */
export function formatNotification(summary: NotificationSummary): FormattedNotification {
  const { title, priority, sound } = STYLES[summary.eventType];

  const lines: string[] = [];
  if (summary.username && summary.username !== "UNDEF") {
    lines.push(`User: ${summary.username}`);
  }
  lines.push(summary.clientPort ? `IP: ${summary.clientIp}:${summary.clientPort}` : `IP: ${summary.clientIp}`);
  if (summary.virtualIp) lines.push(`Virtual IP: ${summary.virtualIp}`);
  if (summary.serverName) lines.push(`Server: ${summary.serverName}`);
  lines.push(`Time: ${formatTimestamp(summary.timestamp)}`);

  return { title, message: lines.join("\n"), priority, sound };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export interface PushoverNotifierOptions {
  config: PushoverConfig;
  fetch?: typeof fetch;
  timeoutMs?: number;
}

/**
 * Delivers notifications through the Pushover messages API. Throws on
 * delivery failure; the caller decides whether that matters.
 */
export class PushoverNotifier implements NotificationSink {
  private config: PushoverConfig;
  private fetchImpl: typeof fetch;
  private timeoutMs: number;

  constructor(opts: PushoverNotifierOptions) {
    this.config = opts.config;
    this.fetchImpl = opts.fetch ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async notify(summary: NotificationSummary): Promise<void> {
    const { title, message, priority, sound } = formatNotification(summary);
    const body = new URLSearchParams({
      token: this.config.apiToken,
      user: this.config.userKey,
      title,
      message,
      // auth failures keep their raised priority
      priority: String(Math.max(priority, this.config.priority ?? 0)),
      sound: this.config.sound ?? sound,
    });
    if (this.config.device) body.set("device", this.config.device);

    const res = await this.fetchImpl(PUSHOVER_API_URL, {
      method: "POST",
      body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      throw new Error(`Pushover API returned HTTP ${res.status}`);
    }
    const result: unknown = await res.json();
    if (!isRecord(result) || result.status !== 1) {
      throw new Error(`Pushover API error: ${JSON.stringify(result)}`);
    }
    console.log(`[tunnelwatch] Notification sent: ${title}`);
  }
}

/** Fallback sink when no delivery channel is configured */
export class ConsoleNotifier implements NotificationSink {
  async notify(summary: NotificationSummary): Promise<void> {
    const { title, message } = formatNotification(summary);
    console.log(`[tunnelwatch] ${title}\n${message}`);
  }
}
