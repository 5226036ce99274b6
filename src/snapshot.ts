/**
 * Status snapshot parsing and diffing.
 *
 * The server rewrites its status file on every update, so each read is a
 * complete picture of who is connected. Client records look like:
 *   CLIENT_LIST,alice,203.0.113.7:51234,10.8.0.6,,41234,98211,2026-10-19 09:12:44,1792400000,alice,3,0
 *
 * Fields: common name, real address, virtual address, virtual IPv6,
 * bytes received, bytes sent, connected since, connected since (epoch),
 * username, client id, peer id. Only the first seven are required.
 */

import { sessionKey, splitAddress } from "./session-registry.js";

export const CLIENT_RECORD_MARKER = "CLIENT_LIST,";

/** Marker included, a record needs at least this many fields */
const MIN_FIELDS = 8;

export interface ClientRecord {
  key: string;
  commonName: string;
  clientIp: string;
  clientPort: number;
  virtualIp: string;
  virtualIpv6: string;
  bytesReceived: number;
  bytesSent: number;
  connectedSinceText: string;
  connectedSince: number | null;
  username: string | null;
}

export interface ParsedSnapshot {
  /** Current clients by session key, in file order */
  clients: Map<string, ClientRecord>;
  malformed: number;
}

export interface SnapshotDiff {
  joined: string[];
  left: string[];
}

function toCounter(value: string | undefined): number {
  if (!value || !/^\d+$/.test(value.trim())) return 0;
  return parseInt(value, 10);
}

function toUsername(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? "";
  // The server writes UNDEF when the client did not authenticate by username
  if (!trimmed || trimmed === "UNDEF") return null;
  return trimmed;
}

/**
 * Parse one CLIENT_LIST line. Returns null for records with too few fields.
 */
export function parseClientRecord(line: string): ClientRecord | null {
  const parts = line.trim().split(",");
  if (parts.length < MIN_FIELDS) return null;

  const { clientIp, clientPort } = splitAddress(parts[2].trim());
  const epoch = parts[8]?.trim();

  return {
    key: sessionKey(clientIp, clientPort),
    commonName: parts[1],
    clientIp,
    clientPort,
    virtualIp: parts[3].trim(),
    virtualIpv6: parts[4].trim(),
    bytesReceived: toCounter(parts[5]),
    bytesSent: toCounter(parts[6]),
    connectedSinceText: parts[7].trim(),
    connectedSince: epoch && /^\d+$/.test(epoch) ? parseInt(epoch, 10) : null,
    username: toUsername(parts[9]),
  };
}

/**
 * Parse the full status file. Malformed records are skipped and counted,
 * never fatal.
 */
export function parseSnapshot(content: string): ParsedSnapshot {
  const clients = new Map<string, ClientRecord>();
  let malformed = 0;

  for (const line of content.split("\n")) {
    if (!line.startsWith(CLIENT_RECORD_MARKER)) continue;

    const record = parseClientRecord(line);
    if (!record) {
      malformed++;
      console.warn(`[tunnelwatch] Skipping malformed status record: ${line.trim()}`);
      continue;
    }
    clients.set(record.key, record);
  }

  return { clients, malformed };
}

/**
 * Compare the previous poll's client set against the current one.
 */
export function diffClients(previous: Iterable<string>, current: Iterable<string>): SnapshotDiff {
  const prev = new Set(previous);
  const curr = new Set(current);
  return {
    joined: [...curr].filter((key) => !prev.has(key)),
    left: [...prev].filter((key) => !curr.has(key)),
  };
}
