/**
 * Server log scanning — turns newly appended event-log lines into login,
 * logout and auth-failure signals. Scanning is pure; byte offsets are kept
 * by the source reader.
 */

import { sessionKey } from "./session-registry.js";

export type LogSignalKind = "login" | "logout" | "auth_failed";

export interface LogSignal {
  kind: LogSignalKind;
  sessionKey: string;
  clientIp: string;
  clientPort: number;
  username: string | null;
  line: string;
}

function signal(
  kind: LogSignalKind,
  clientIp: string,
  port: string,
  username: string | null,
  line: string,
): LogSignal {
  const clientPort = parseInt(port, 10);
  return {
    kind,
    sessionKey: sessionKey(clientIp, clientPort),
    clientIp,
    clientPort,
    username,
    line,
  };
}

/**
 * Login with username. Lines look like:
 *   2026-10-19 09:12:44 203.0.113.7:51234 [alice] Peer Connection Initiated with [AF_INET]203.0.113.7:51234
 */
export function parseLoginLine(line: string): LogSignal | null {
  const match = line.match(
    /(\d+\.\d+\.\d+\.\d+):(\d+)\s+\[([^\]]+)\]\s+Peer Connection Initiated/,
  );
  if (!match) return null;
  const [, ip, port, user] = match;
  return signal("login", ip, port, user === "UNDEF" ? null : user, line);
}

/**
 * Client-initiated exit. Lines look like:
 *   2026-10-19 10:02:13 alice/203.0.113.7:51234 SIGTERM[soft,remote-exit] received, client-instance exiting
 */
export function parseLogoutLine(line: string): LogSignal | null {
  const match = line.match(
    /([^\s/]+)\/(\d+\.\d+\.\d+\.\d+):(\d+)\s+SIGTERM\[soft,remote-exit\]/,
  );
  if (!match) return null;
  const [, user, ip, port] = match;
  return signal("logout", ip, port, user, line);
}

/**
 * Rejected credentials. Lines look like:
 *   2026-10-19 09:40:01 198.51.100.23:40112 TLS Auth Error: Auth Username/Password verification failed for peer
 *   2026-10-19 09:40:01 198.51.100.23:40112 TLS Auth Error: --client-config-dir authentication failed for common name 'mallory' file='/etc/openvpn/ccd/mallory'
 *   2026-10-19 09:40:01 198.51.100.23:40112 AUTH: Failed
 */
export function parseAuthFailureLine(line: string): LogSignal | null {
  const match = line.match(/(\d+\.\d+\.\d+\.\d+):(\d+)\s+(?:TLS Auth Error:|AUTH: Failed)/);
  if (!match) return null;
  const [, ip, port] = match;
  const nameMatch = line.match(/common name '([^']+)'/);
  return signal("auth_failed", ip, port, nameMatch ? nameMatch[1] : null, line);
}

/**
 * Scan a chunk of log text. Lines that match no pattern are ignored.
 */
export function scanLog(text: string): LogSignal[] {
  const signals: LogSignal[] = [];
  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (!line) continue;
    const sig = parseLoginLine(line)
      ?? parseLogoutLine(line)
      ?? parseAuthFailureLine(line);
    if (sig) signals.push(sig);
  }
  return signals;
}
