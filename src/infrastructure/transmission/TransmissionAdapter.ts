/**
 * Adapter to convert Transmission RPC records to domain entities and back
 */

import { TorrentEntity, TrackerEntity } from '../../domain/entities';
import { RawTorrent, RawTracker } from './TransmissionSchemas';

export class TransmissionAdapter {
  static toTorrentEntity(torrent: RawTorrent): TorrentEntity {
    return {
      id: torrent.id,
      name: torrent.name,
      percentDone: torrent.percentDone,
      peersSendingToUs: torrent.peersSendingToUs,
      trackers: torrent.trackers.map((t) => this.toTrackerEntity(t)),
      peers: torrent.peers.map((p) => ({ address: p.address, progress: p.progress }))
    };
  }

  static toTrackerEntity(tracker: RawTracker): TrackerEntity {
    return {
      announce: tracker.announce,
      tier: tracker.tier ?? null
    };
  }

  /**
   * Encodes tiers as torrent-set's `trackerList`: one announce URL per line,
   * tiers separated by an empty line
   */
  static toTrackerList(trackerTiers: readonly string[][]): string {
    return trackerTiers.map((tier) => tier.join('\n')).join('\n\n');
  }
}
