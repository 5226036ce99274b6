/**
 * tunnelwatch configuration, event types and defaults.
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/** Lifecycle transitions derived for a tunnel session */
export type EventType = "connect" | "authenticated" | "disconnect" | "auth_failed";

const EventTypeSchema = Type.Union([
  Type.Literal("connect"),
  Type.Literal("authenticated"),
  Type.Literal("disconnect"),
  Type.Literal("auth_failed"),
]);

const PushoverSchema = Type.Object({
  apiToken: Type.String({ minLength: 1 }),
  userKey: Type.String({ minLength: 1 }),
  device: Type.Optional(Type.String()),
  priority: Type.Optional(Type.Integer({ minimum: -2, maximum: 2 })),
  sound: Type.Optional(Type.String()),
});

export const MonitorConfigSchema = Type.Object({
  statusPath: Type.String({ minLength: 1 }),
  logPath: Type.String({ minLength: 1 }),
  serverName: Type.String(),
  serverLocation: Type.String(),
  pollIntervalMs: Type.Integer({ minimum: 1000 }),
  stateDir: Type.String({ minLength: 1 }),
  /** Where the event log is read from when no checkpoint exists */
  logStartPosition: Type.Union([Type.Literal("start"), Type.Literal("end")]),
  notifyEventTypes: Type.Array(EventTypeSchema),
  eventStoreMaxSizeMB: Type.Number({ exclusiveMinimum: 0 }),
  pushover: Type.Optional(PushoverSchema),
});

export type MonitorConfig = Static<typeof MonitorConfigSchema>;
export type PushoverConfig = Static<typeof PushoverSchema>;

export const DEFAULT_STATE_DIR = join(homedir(), ".tunnelwatch");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_STATE_DIR, "config.json");

export const DEFAULT_CONFIG: MonitorConfig = {
  statusPath: "/var/log/openvpn/status.log",
  logPath: "/var/log/openvpn/openvpn.log",
  serverName: "openvpn-server-01",
  serverLocation: "us-east-1",
  pollIntervalMs: 60_000, // 1 minute
  stateDir: DEFAULT_STATE_DIR,
  logStartPosition: "end",
  notifyEventTypes: ["connect", "disconnect", "auth_failed"],
  eventStoreMaxSizeMB: 10,
};

/** Identity tags stamped on every derived event */
export interface ServerIdentity {
  serverName: string;
  serverLocation: string;
}

interface EventBase {
  id: string;
  /** Epoch ms at which the event was derived */
  timestamp: number;
  clientIp: string;
  clientPort: number;
  username: string | null;
  serverName: string;
  serverLocation: string;
}

/** `connect` and `authenticated` events, built from a status snapshot record */
export interface SnapshotEvent extends EventBase {
  eventType: "connect" | "authenticated";
  source: "snapshot";
  virtualIp: string;
  bytesReceived: number;
  bytesSent: number;
  /** Epoch seconds reported by the server, when the record carries it */
  connectedSince: number | null;
  sessionDuration: null;
}

/** A departed session. The snapshot no longer lists it, so no address or counters. */
export interface DisconnectEvent extends EventBase {
  eventType: "disconnect";
  source: "snapshot" | "log";
  virtualIp: null;
  bytesReceived: null;
  bytesSent: null;
  connectedSince: number | null;
  /** Seconds between `connectedSince` and derivation */
  sessionDuration: number | null;
}

export interface AuthFailedEvent extends EventBase {
  eventType: "auth_failed";
  source: "log";
  virtualIp: null;
  bytesReceived: null;
  bytesSent: null;
  connectedSince: null;
  sessionDuration: null;
}

export type ConnectionEvent = SnapshotEvent | DisconnectEvent | AuthFailedEvent;

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid tunnelwatch configuration:\n  ${problems.join("\n  ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) return {};
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
    if (isRecord(parsed)) return parsed;
    console.warn(`[tunnelwatch] Ignoring config file ${path}: expected a JSON object`);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`[tunnelwatch] Ignoring unreadable config file ${path}: ${message}`);
  }
  return {};
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (env.OPENVPN_STATUS_PATH) out.statusPath = env.OPENVPN_STATUS_PATH;
  if (env.OPENVPN_LOG_PATH) out.logPath = env.OPENVPN_LOG_PATH;
  if (env.SERVER_NAME) out.serverName = env.SERVER_NAME;
  if (env.SERVER_LOCATION) out.serverLocation = env.SERVER_LOCATION;
  if (env.TUNNELWATCH_STATE_DIR) out.stateDir = env.TUNNELWATCH_STATE_DIR;
  // LOG_INTERVAL is in seconds
  if (env.LOG_INTERVAL) out.pollIntervalMs = Number(env.LOG_INTERVAL) * 1000;
  return out;
}

function pushoverOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (env.PUSHOVER_API_TOKEN) out.apiToken = env.PUSHOVER_API_TOKEN;
  if (env.PUSHOVER_USER_KEY) out.userKey = env.PUSHOVER_USER_KEY;
  if (env.PUSHOVER_DEVICE) out.device = env.PUSHOVER_DEVICE;
  if (env.PUSHOVER_PRIORITY) out.priority = Number(env.PUSHOVER_PRIORITY);
  if (env.PUSHOVER_SOUND) out.sound = env.PUSHOVER_SOUND;
  return out;
}

/**
 * Build the effective configuration: defaults, then the JSON config file,
 * then environment variables. Throws ConfigError when the result does not
 * satisfy the schema.
 */
export function loadConfig(opts: LoadConfigOptions = {}): MonitorConfig {
  const env = opts.env ?? process.env;
  const configPath = opts.configPath ?? env.TUNNELWATCH_CONFIG ?? DEFAULT_CONFIG_PATH;
  const fileConfig = readConfigFile(configPath);

  const merged: Record<string, unknown> = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    ...envOverrides(env),
  };

  const filePushover = isRecord(fileConfig.pushover) ? fileConfig.pushover : {};
  const pushover = { ...filePushover, ...pushoverOverrides(env) };
  if (Object.keys(pushover).length > 0) {
    merged.pushover = pushover;
  }

  if (!Value.Check(MonitorConfigSchema, merged)) {
    const problems = [...Value.Errors(MonitorConfigSchema, merged)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new ConfigError(problems);
  }
  return merged;
}
