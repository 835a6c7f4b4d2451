/**
 * Use case for one evaluation pass over every torrent
 *
 * Mutations are submitted one torrent at a time. A refused mutation is logged
 * and retried on the next pass; a lost connection aborts the rest of the pass.
 */

import { ITorrentClient, ILogger } from '../../domain/interfaces';
import { DisabledSetTracker, TrackerDecisionEngine } from '../../domain/services';
import { isConnectivityFailure } from '../../domain/value-objects';

export interface RunEvaluationPassRequest {
    targetTrackers: readonly string[];
    disabledSet: DisabledSetTracker;
}

export type PassStatus = 'completed' | 'connectivity-lost' | 'snapshot-rejected';

export interface FailedMutation {
    torrentId: number;
    message: string;
}

export interface RunEvaluationPassResponse {
    status: PassStatus;
    checked: number;
    disabled: number[];
    enabled: number[];
    failed: FailedMutation[];
    error?: string;
}

export class RunEvaluationPassUseCase {
    constructor(
        private torrentClient: ITorrentClient,
        private engine: TrackerDecisionEngine,
        private logger: ILogger
    ) { }

    async execute(request: RunEvaluationPassRequest): Promise<RunEvaluationPassResponse> {
        const response: RunEvaluationPassResponse = {
            status: 'completed',
            checked: 0,
            disabled: [],
            enabled: [],
            failed: []
        };

        const snapshot = await this.torrentClient.listTorrents();
        if (!snapshot.ok) {
            this.logger.error(`Could not fetch torrents: ${snapshot.error.message}`);
            response.status = isConnectivityFailure(snapshot.error) ? 'connectivity-lost' : 'snapshot-rejected';
            response.error = snapshot.error.message;
            return response;
        }

        const torrents = snapshot.value;
        response.checked = torrents.length;
        const removed = request.disabledSet.prune(torrents);
        if (removed.length > 0) {
            this.logger.debug(`Forgetting removed torrent(s): ${removed.join(', ')}`);
        }
        this.logger.info(`Checking ${torrents.length} torrents...`);

        const mutations = this.engine.evaluate(torrents, request.targetTrackers, request.disabledSet);

        for (const mutation of mutations) {
            const result = await this.torrentClient.replaceTrackers(mutation.torrentId, mutation.trackerTiers);

            if (result.ok) {
                this.engine.commit(mutation, request.disabledSet);
                (mutation.direction === 'disable' ? response.disabled : response.enabled).push(mutation.torrentId);
                continue;
            }

            if (isConnectivityFailure(result.error)) {
                this.logger.error(
                    `Lost connection while updating torrent ${mutation.torrentId}, aborting pass: ${result.error.message}`
                );
                response.status = 'connectivity-lost';
                response.error = result.error.message;
                return response;
            }

            this.logger.warn(
                `Failed to ${mutation.direction} trackers for torrent ${mutation.torrentId} (${mutation.torrentName}), ` +
                `will retry next pass: ${result.error.message}`
            );
            response.failed.push({ torrentId: mutation.torrentId, message: result.error.message });
        }

        this.logger.info(
            `Verification run complete: ${response.disabled.length} disabled, ` +
            `${response.enabled.length} re-enabled, ${response.failed.length} failed.`
        );
        return response;
    }
}
