/**
 * Session registry — last known metadata per tunnel session, keyed by the
 * client's real `ip:port`.
 */

export interface SessionEntry {
  /** True once the session has been seen in a status snapshot */
  active: boolean;
  username: string | null;
  virtualIp: string | null;
  connectedSince: number | null;
}

export function sessionKey(clientIp: string, clientPort: number): string {
  return `${clientIp}:${clientPort}`;
}

/**
 * Split a real address ("1.2.3.4:5678", "2001:db8::1:443") into ip and port.
 * The port is whatever follows the last colon; a missing or non-numeric port
 * becomes 0.
 */
export function splitAddress(address: string): { clientIp: string; clientPort: number } {
  const idx = address.lastIndexOf(":");
  if (idx < 0) return { clientIp: address, clientPort: 0 };
  const port = parseInt(address.slice(idx + 1), 10);
  return {
    clientIp: address.slice(0, idx),
    clientPort: Number.isFinite(port) ? port : 0,
  };
}

export class SessionRegistry {
  private entries = new Map<string, SessionEntry>();

  constructor(initial?: Record<string, SessionEntry>) {
    if (initial) {
      for (const [key, entry] of Object.entries(initial)) {
        this.entries.set(key, { ...entry });
      }
    }
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): SessionEntry | undefined {
    return this.entries.get(key);
  }

  /** Merge non-null fields into the entry, creating an inactive one first if needed. */
  update(key: string, patch: Partial<SessionEntry>): SessionEntry {
    const current = this.entries.get(key) ?? {
      active: false,
      username: null,
      virtualIp: null,
      connectedSince: null,
    };
    const next: SessionEntry = {
      active: patch.active ?? current.active,
      username: patch.username ?? current.username,
      virtualIp: patch.virtualIp ?? current.virtualIp,
      connectedSince: patch.connectedSince ?? current.connectedSince,
    };
    this.entries.set(key, next);
    return next;
  }

  remove(key: string): SessionEntry | undefined {
    const entry = this.entries.get(key);
    this.entries.delete(key);
    return entry;
  }

  get size(): number {
    return this.entries.size;
  }

  toJSON(): Record<string, SessionEntry> {
    return Object.fromEntries(this.entries);
  }
}
