import { TorrentEntity } from '../entities';
import { hasMarker } from '../value-objects/DisabledMarker';

/**
 * Process-lifetime record of torrents known to carry disabled trackers.
 * Nothing is persisted: the set is rebuilt from live data with seed() on
 * startup and after every reconnect.
 */
export class DisabledSetTracker {
  private ids = new Set<number>();

  /**
   * Replaces the current contents with every torrent that has a marked tracker
   * @returns number of torrents found disabled
   */
  seed(torrents: readonly TorrentEntity[], markerPrefix: string): number {
    this.ids.clear();
    for (const torrent of torrents) {
      if (torrent.trackers.some((tracker) => hasMarker(tracker.announce, markerPrefix))) {
        this.ids.add(torrent.id);
      }
    }
    return this.ids.size;
  }

  markDisabled(id: number): void {
    this.ids.add(id);
  }

  markEnabled(id: number): void {
    this.ids.delete(id);
  }

  contains(id: number): boolean {
    return this.ids.has(id);
  }

  /**
   * Drops ids of torrents that are no longer present
   * @returns ids removed
   */
  prune(torrents: readonly TorrentEntity[]): number[] {
    const present = new Set(torrents.map((torrent) => torrent.id));
    const removed = this.toArray().filter((id) => !present.has(id));
    for (const id of removed) {
      this.ids.delete(id);
    }
    return removed;
  }

  clear(): void {
    this.ids.clear();
  }

  get size(): number {
    return this.ids.size;
  }

  toArray(): number[] {
    return [...this.ids].sort((a, b) => a - b);
  }
}
