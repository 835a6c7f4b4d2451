/**
 * One-shot global re-enable, run with `REENABLE_ALL` as the first argument
 */

import { ILogger } from '../../domain/interfaces';
import { TrackerMonitor } from '../../application/TrackerMonitor';

/**
 * Restores every disabled tracker and resolves with the process exit code:
 * 0 once the pass completed (refused torrents are only reported), 1 when
 * Transmission could not be reached
 */
export async function runReenableAll(monitor: TrackerMonitor, logger: ILogger): Promise<number> {
    const result = await monitor.reenableAll();

    if (result.status === 'completed') {
        logger.info(`Re-enabled trackers on ${result.reenabled.length} torrent(s).`);
        for (const failure of result.failed) {
            logger.warn(`  - Torrent ${failure.torrentId} still has disabled trackers: ${failure.message}`);
        }
        return 0;
    }

    logger.error(`Global re-enabling aborted: ${result.error ?? result.status}`);
    return 1;
}
