import { TorrentEntity, TorrentMutation } from '../entities';
import { hasMarker } from '../value-objects/DisabledMarker';
import { hasRebuildableTiers, rebuildTiers } from './TierRebuilder';

/**
 * Plans the restoration of every disabled tracker on every torrent.
 * Target prefixes are not consulted, only the marker, so suppression applied
 * under an older configuration is undone as well.
 */
export function reenableAll(torrents: readonly TorrentEntity[], markerPrefix: string): TorrentMutation[] {
  return torrents
    .filter((torrent) => hasRebuildableTiers(torrent.trackers))
    .filter((torrent) => torrent.trackers.some((tracker) => hasMarker(tracker.announce, markerPrefix)))
    .map((torrent) => ({
      torrentId: torrent.id,
      torrentName: torrent.name,
      direction: 'enable' as const,
      trackerTiers: rebuildTiers(
        torrent.trackers,
        (tracker) => (hasMarker(tracker.announce, markerPrefix) ? 'enable' : 'keep'),
        markerPrefix
      )
    }));
}
