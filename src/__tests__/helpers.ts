export interface ClientLineOptions {
  commonName?: string;
  virtualIp?: string;
  bytesReceived?: string | number;
  bytesSent?: string | number;
  connectedSinceEpoch?: string | number;
  username?: string;
}

/** One CLIENT_LIST record in status-version-2 layout */
export function clientLine(realAddress: string, opts: ClientLineOptions = {}): string {
  return [
    "CLIENT_LIST",
    opts.commonName ?? "client",
    realAddress,
    opts.virtualIp ?? "10.8.0.2",
    "",
    String(opts.bytesReceived ?? 1000),
    String(opts.bytesSent ?? 2000),
    "2026-10-19 09:00:00",
    String(opts.connectedSinceEpoch ?? ""),
    opts.username ?? "UNDEF",
    "1",
    "0",
  ].join(",");
}

/** A complete status file around the given client records */
export function statusFile(...clients: string[]): string {
  return [
    "TITLE,OpenVPN 2.6.8 x86_64-pc-linux-gnu",
    "TIME,2026-10-19 09:30:00,1792402200",
    "HEADER,CLIENT_LIST,Common Name,Real Address,Virtual Address,Virtual IPv6 Address,Bytes Received,Bytes Sent,Connected Since,Connected Since (time_t),Username,Client ID,Peer ID",
    ...clients,
    "HEADER,ROUTING_TABLE,Virtual Address,Common Name,Real Address,Last Ref,Last Ref (time_t)",
    "GLOBAL_STATS,Max bcast/mcast queue length,0",
    "END",
    "",
  ].join("\n");
}

export const loginLine = (address: string, user: string): string =>
  `2026-10-19 09:12:44 ${address} [${user}] Peer Connection Initiated with [AF_INET]${address}\n`;

export const logoutLine = (address: string, user: string): string =>
  `2026-10-19 10:02:13 ${user}/${address} SIGTERM[soft,remote-exit] received, client-instance exiting\n`;
