/**
 * Decides, for one pass over a torrent snapshot, which torrents need their
 * targeted trackers disabled or re-enabled
 *
 * The engine only plans mutations. The caller submits them to the torrent
 * client and calls commit() for each one the client accepted, so the disabled
 * set never records a change that did not actually happen.
 */

import { TorrentEntity, TorrentMutation } from '../entities';
import { ILogger } from '../interfaces/ILogger';
import { DEFAULT_MARKER_PREFIX, hasMarker } from '../value-objects/DisabledMarker';
import { DisabledSetTracker } from './DisabledSetTracker';
import { hasRebuildableTiers, rebuildTiers, TrackerAction } from './TierRebuilder';
import { isTargeted } from './TrackerUrlMatcher';

export interface LeechConditions {
  hasConnectedPeers: boolean;
  hasFullSeeder: boolean;
  hasStartedDownloading: boolean;
}

export function evaluateLeechConditions(torrent: TorrentEntity): LeechConditions {
  return {
    hasConnectedPeers: torrent.peersSendingToUs > 0,
    hasFullSeeder: torrent.peers.some((peer) => peer.progress >= 1.0),
    hasStartedDownloading: torrent.percentDone > 0.0
  };
}

export class TrackerDecisionEngine {
  constructor(
    private logger: ILogger,
    private markerPrefix: string = DEFAULT_MARKER_PREFIX
  ) { }

  evaluate(
    torrents: readonly TorrentEntity[],
    targetPrefixes: readonly string[],
    disabledSet: DisabledSetTracker
  ): TorrentMutation[] {
    const mutations: TorrentMutation[] = [];

    for (const torrent of torrents) {
      const mutation = this.evaluateTorrent(torrent, targetPrefixes, disabledSet);
      if (mutation) {
        mutations.push(mutation);
      }
    }

    return mutations;
  }

  /**
   * Records an accepted mutation in the disabled set
   */
  commit(mutation: TorrentMutation, disabledSet: DisabledSetTracker): void {
    if (mutation.direction === 'disable') {
      disabledSet.markDisabled(mutation.torrentId);
    } else {
      disabledSet.markEnabled(mutation.torrentId);
    }
  }

  private evaluateTorrent(
    torrent: TorrentEntity,
    targetPrefixes: readonly string[],
    disabledSet: DisabledSetTracker
  ): TorrentMutation | null {
    if (!hasRebuildableTiers(torrent.trackers)) {
      return null;
    }

    const targeted = (announce: string): boolean => isTargeted(announce, this.markerPrefix, targetPrefixes);
    if (!torrent.trackers.some((tracker) => targeted(tracker.announce))) {
      return null;
    }

    if (torrent.percentDone >= 1.0) {
      if (!disabledSet.contains(torrent.id)) {
        return null;
      }
      this.logger.info(`Torrent ${torrent.id} (${torrent.name}) is complete. Re-enabling trackers...`);
      return this.buildMutation(torrent, 'enable', (announce) =>
        targeted(announce) && hasMarker(announce, this.markerPrefix) ? 'enable' : 'keep'
      );
    }

    // Already suppressed; never re-toggle an incomplete torrent
    if (disabledSet.contains(torrent.id)) {
      return null;
    }

    const conditions = evaluateLeechConditions(torrent);
    this.logDecision(torrent, conditions);

    if (!(conditions.hasConnectedPeers && conditions.hasFullSeeder && conditions.hasStartedDownloading)) {
      this.logger.info('    -> Conditions not met. Trackers stay enabled for now.');
      return null;
    }

    this.logger.info(`    -> Conditions met. Disabling trackers for torrent ${torrent.id}.`);
    return this.buildMutation(torrent, 'disable', (announce) =>
      targeted(announce) && !hasMarker(announce, this.markerPrefix) ? 'disable' : 'keep'
    );
  }

  private buildMutation(
    torrent: TorrentEntity,
    direction: TorrentMutation['direction'],
    actionFor: (announce: string) => TrackerAction
  ): TorrentMutation {
    return {
      torrentId: torrent.id,
      torrentName: torrent.name,
      direction,
      trackerTiers: rebuildTiers(torrent.trackers, (tracker) => actionFor(tracker.announce), this.markerPrefix)
    };
  }

  private logDecision(torrent: TorrentEntity, conditions: LeechConditions): void {
    this.logger.debug(`Analyzing torrent ${torrent.id} (${torrent.name.substring(0, 40)})`, {
      percentDone: torrent.percentDone,
      peersSendingToUs: torrent.peersSendingToUs,
      peers: torrent.peers.map((peer) => ({ address: peer.address, progress: peer.progress }))
    });
    this.logger.info(`  - Analyzing ${torrent.id} (${torrent.name.substring(0, 30)}):`);
    this.logger.info(
      `    - Conditions: Peers(${conditions.hasConnectedPeers}), ` +
      `Seeders(${conditions.hasFullSeeder}), Progress(${conditions.hasStartedDownloading})`
    );
  }
}
