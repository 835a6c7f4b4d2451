/**
 * Domain entities representing a torrent as reported by the torrent client
 * This is a domain model, independent of the RPC wire format
 */

export interface TorrentEntity {
  id: number;
  name: string;
  /** Completion fraction in [0, 1] */
  percentDone: number;
  /** Connected peers currently sending data to the local client */
  peersSendingToUs: number;
  trackers: TrackerEntity[];
  peers: PeerEntity[];
}

export interface TrackerEntity {
  announce: string;
  /** Null when the client did not report a tier for this tracker */
  tier: number | null;
}

export interface PeerEntity {
  address: string;
  progress: number;
}

export type MutationDirection = 'disable' | 'enable';

/**
 * Full tracker-list replacement for a single torrent
 */
export interface TorrentMutation {
  torrentId: number;
  torrentName: string;
  direction: MutationDirection;
  trackerTiers: string[][];
}
