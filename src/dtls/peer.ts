/**
 * Address of the peer a handshake message came from or goes to.
 * Carried for logging and routing only.
 */
export interface PeerAddress {
  host: string;
  port: number;
}

export function formatPeer(peer: PeerAddress | undefined): string {
  if (!peer) {
    return '<unknown peer>';
  }
  // bracket IPv6 literals
  return peer.host.includes(':') ? `[${peer.host}]:${peer.port}` : `${peer.host}:${peer.port}`;
}
