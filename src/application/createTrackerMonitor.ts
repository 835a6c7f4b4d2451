/**
 * Wires the monitor with its use cases
 * Shared by the HTTP server, the one-shot command and tests
 */

import { ILogger, ISettingsStore, ITorrentClient } from '../domain/interfaces';
import { TrackerDecisionEngine } from '../domain/services';
import { TrackerMonitor } from './TrackerMonitor';
import { SeedDisabledSetUseCase } from './use-cases/SeedDisabledSetUseCase';
import { RunEvaluationPassUseCase } from './use-cases/RunEvaluationPassUseCase';
import { ReenableAllTrackersUseCase } from './use-cases/ReenableAllTrackersUseCase';
import { GetSettingsUseCase } from './use-cases/GetSettingsUseCase';
import { UpdateSettingsUseCase } from './use-cases/UpdateSettingsUseCase';
import { DisableServiceUseCase } from './use-cases/DisableServiceUseCase';

export interface TrackerMonitorOptions {
    torrentClient: ITorrentClient;
    settingsStore: ISettingsStore;
    logger: ILogger;
    markerPrefix: string;
    intervalSeconds: number;
}

export function createTrackerMonitor(options: TrackerMonitorOptions): TrackerMonitor {
    const { torrentClient, settingsStore, logger, markerPrefix } = options;

    const engine = new TrackerDecisionEngine(logger, markerPrefix);
    const reenableAllTrackers = new ReenableAllTrackersUseCase(torrentClient, markerPrefix, logger);
    const updateSettings = new UpdateSettingsUseCase(settingsStore, logger);

    return new TrackerMonitor(
        {
            torrentClient,
            settingsStore,
            seedDisabledSet: new SeedDisabledSetUseCase(torrentClient, markerPrefix, logger),
            runEvaluationPass: new RunEvaluationPassUseCase(torrentClient, engine, logger),
            reenableAllTrackers,
            getSettings: new GetSettingsUseCase(settingsStore),
            updateSettings,
            disableService: new DisableServiceUseCase(reenableAllTrackers, updateSettings, logger),
            logger
        },
        options.intervalSeconds
    );
}
