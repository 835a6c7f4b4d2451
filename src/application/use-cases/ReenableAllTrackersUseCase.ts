/**
 * Use case for the administrative global re-enable
 * Restores every disabled tracker on every torrent and resets the disabled set
 */

import { ITorrentClient, ILogger } from '../../domain/interfaces';
import { DisabledSetTracker, hasRebuildableTiers, reenableAll } from '../../domain/services';
import { hasMarker, isConnectivityFailure } from '../../domain/value-objects';
import { PassStatus, FailedMutation } from './RunEvaluationPassUseCase';

export interface ReenableAllTrackersRequest {
    disabledSet: DisabledSetTracker;
}

export interface ReenableAllTrackersResponse {
    status: PassStatus;
    reenabled: number[];
    failed: FailedMutation[];
    error?: string;
}

export class ReenableAllTrackersUseCase {
    constructor(
        private torrentClient: ITorrentClient,
        private markerPrefix: string,
        private logger: ILogger
    ) { }

    async execute(request: ReenableAllTrackersRequest): Promise<ReenableAllTrackersResponse> {
        const response: ReenableAllTrackersResponse = { status: 'completed', reenabled: [], failed: [] };

        this.logger.info('Launching global tracker re-enabling...');
        const snapshot = await this.torrentClient.listTorrents();
        if (!snapshot.ok) {
            this.logger.error(`Could not fetch torrents: ${snapshot.error.message}`);
            response.status = isConnectivityFailure(snapshot.error) ? 'connectivity-lost' : 'snapshot-rejected';
            response.error = snapshot.error.message;
            return response;
        }

        for (const mutation of reenableAll(snapshot.value, this.markerPrefix)) {
            this.logger.info(`Re-enabling trackers for torrent ${mutation.torrentId} (${mutation.torrentName})`);
            const result = await this.torrentClient.replaceTrackers(mutation.torrentId, mutation.trackerTiers);

            if (result.ok) {
                request.disabledSet.markEnabled(mutation.torrentId);
                response.reenabled.push(mutation.torrentId);
                continue;
            }
            if (isConnectivityFailure(result.error)) {
                this.logger.error(`Lost connection during global re-enabling: ${result.error.message}`);
                response.status = 'connectivity-lost';
                response.error = result.error.message;
                return response;
            }
            this.logger.warn(`Failed to re-enable trackers for torrent ${mutation.torrentId}: ${result.error.message}`);
            response.failed.push({ torrentId: mutation.torrentId, message: result.error.message });
        }

        // Marked torrents with a broken tier list get no mutation
        for (const torrent of snapshot.value) {
            if (hasRebuildableTiers(torrent.trackers)) continue;
            if (!torrent.trackers.some((tracker) => hasMarker(tracker.announce, this.markerPrefix))) continue;
            this.logger.warn(`Cannot re-enable trackers for torrent ${torrent.id} (${torrent.name}): unrebuildable tier list`);
            response.failed.push({ torrentId: torrent.id, message: 'unrebuildable tier list' });
        }

        // Torrents in failed still carry the marker
        request.disabledSet.clear();
        for (const { torrentId } of response.failed) {
            request.disabledSet.markDisabled(torrentId);
        }

        this.logger.info(`Global re-enabling complete: ${response.reenabled.length} restored, ${response.failed.length} failed.`);
        return response;
    }
}
