/**
 * Use case for rebuilding the disabled set from live torrent data
 * Runs at startup and after every reconnect, since the set is never persisted
 */

import { ITorrentClient, ILogger } from '../../domain/interfaces';
import { DisabledSetTracker } from '../../domain/services';
import { RpcFailure } from '../../domain/value-objects';

export interface SeedDisabledSetRequest {
    disabledSet: DisabledSetTracker;
}

export interface SeedDisabledSetResponse {
    success: boolean;
    disabledCount: number;
    error?: RpcFailure;
}

export class SeedDisabledSetUseCase {
    constructor(
        private torrentClient: ITorrentClient,
        private markerPrefix: string,
        private logger: ILogger
    ) { }

    async execute(request: SeedDisabledSetRequest): Promise<SeedDisabledSetResponse> {
        this.logger.info('Initialising state: searching for trackers already disabled...');

        const snapshot = await this.torrentClient.listTorrents();
        if (!snapshot.ok) {
            this.logger.error(`Could not read torrents to seed state: ${snapshot.error.message}`);
            return { success: false, disabledCount: 0, error: snapshot.error };
        }

        const disabledCount = request.disabledSet.seed(snapshot.value, this.markerPrefix);
        this.logger.info(`Found ${disabledCount} torrent(s) with disabled trackers out of ${snapshot.value.length}`);

        return { success: true, disabledCount };
    }
}
