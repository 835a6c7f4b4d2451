/**
 * Owns the tracker-suppression state and its polling loop
 *
 * Lifecycle: start() connects and seeds the disabled set, then runs a pass
 * every interval until stop(). Passes and administrative actions share one
 * mutex, so the disabled set and the settings read by a pass are never
 * touched concurrently. A connectivity failure marks the monitor
 * disconnected; the next pass reconnects and reseeds before evaluating.
 */

import { ILogger, ISettingsStore, ITorrentClient } from '../domain/interfaces';
import { DisabledSetTracker } from '../domain/services';
import { Mutex } from '../utils/mutex';
import { SeedDisabledSetUseCase } from './use-cases/SeedDisabledSetUseCase';
import { RunEvaluationPassResponse, RunEvaluationPassUseCase } from './use-cases/RunEvaluationPassUseCase';
import { ReenableAllTrackersResponse, ReenableAllTrackersUseCase } from './use-cases/ReenableAllTrackersUseCase';
import { GetSettingsResponse, GetSettingsUseCase } from './use-cases/GetSettingsUseCase';
import { UpdateSettingsRequest, UpdateSettingsResponse, UpdateSettingsUseCase } from './use-cases/UpdateSettingsUseCase';
import { DisableServiceResponse, DisableServiceUseCase } from './use-cases/DisableServiceUseCase';

export type ConnectionState = 'connected' | 'disconnected';

export type MonitorPassOutcome =
    | { status: 'skipped'; reason: 'service-disabled' | 'no-target-trackers' | 'settings-unreadable' }
    | { status: 'not-connected'; error: string }
    | RunEvaluationPassResponse;

export interface MonitorStatus {
    running: boolean;
    // A pass or an administrative action holds the lock
    busy: boolean;
    connection: ConnectionState;
    intervalSeconds: number;
    lastPassAt: string | null;
    lastOutcome: MonitorPassOutcome | null;
    lastError: string | null;
    disabledTorrentIds: number[];
}

export interface TrackerMonitorDependencies {
    torrentClient: ITorrentClient;
    settingsStore: ISettingsStore;
    seedDisabledSet: SeedDisabledSetUseCase;
    runEvaluationPass: RunEvaluationPassUseCase;
    reenableAllTrackers: ReenableAllTrackersUseCase;
    getSettings: GetSettingsUseCase;
    updateSettings: UpdateSettingsUseCase;
    disableService: DisableServiceUseCase;
    logger: ILogger;
}

export class TrackerMonitor {
    private disabledSet = new DisabledSetTracker();
    private connection: ConnectionState = 'disconnected';
    private mutex = new Mutex();
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    private running = false;
    private lastPassAt: string | null = null;
    private lastOutcome: MonitorPassOutcome | null = null;
    private lastError: string | null = null;

    constructor(
        private deps: TrackerMonitorDependencies,
        private intervalSeconds: number
    ) { }

    /**
     * Connects, seeds the disabled set and schedules the first pass immediately
     */
    async start(): Promise<void> {
        if (this.running) return;
        this.running = true;
        try {
            await this.mutex.runExclusive(() => this.ensureConnected());
        } catch (error) {
            this.lastError = error instanceof Error ? error.message : String(error);
            this.deps.logger.error('Initial connection failed unexpectedly:', error);
        }
        this.schedule(0);
    }

    /**
     * Stops scheduling and waits for a pass in progress
     */
    async stop(): Promise<void> {
        this.running = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.inFlight) {
            await this.inFlight;
        }
    }

    runOnce(): Promise<MonitorPassOutcome> {
        return this.mutex.runExclusive(() => this.pass());
    }

    reenableAll(): Promise<ReenableAllTrackersResponse> {
        return this.mutex.runExclusive<ReenableAllTrackersResponse>(async () => {
            if (!(await this.ensureConnected())) {
                return { status: 'connectivity-lost', reenabled: [], failed: [], error: this.lastError ?? 'Not connected' };
            }
            const response = await this.deps.reenableAllTrackers.execute({ disabledSet: this.disabledSet });
            this.trackConnectivity(response.status, response.error);
            return response;
        });
    }

    disableAndReenable(): Promise<DisableServiceResponse> {
        return this.mutex.runExclusive<DisableServiceResponse>(async () => {
            if (!(await this.ensureConnected())) {
                const error = this.lastError ?? 'Not connected';
                return {
                    success: false,
                    reenable: { status: 'connectivity-lost', reenabled: [], failed: [], error },
                    error
                };
            }
            const response = await this.deps.disableService.execute({ disabledSet: this.disabledSet });
            this.trackConnectivity(response.reenable.status, response.reenable.error);
            return response;
        });
    }

    getSettings(): Promise<GetSettingsResponse> {
        return this.mutex.runExclusive(() => this.deps.getSettings.execute());
    }

    updateSettings(request: UpdateSettingsRequest): Promise<UpdateSettingsResponse> {
        return this.mutex.runExclusive(() => this.deps.updateSettings.execute(request));
    }

    status(): MonitorStatus {
        return {
            running: this.running,
            busy: this.mutex.isLocked,
            connection: this.connection,
            intervalSeconds: this.intervalSeconds,
            lastPassAt: this.lastPassAt,
            lastOutcome: this.lastOutcome,
            lastError: this.lastError,
            disabledTorrentIds: this.disabledSet.toArray()
        };
    }

    private schedule(delayMs: number): void {
        this.timer = setTimeout(() => {
            this.timer = null;
            this.tick();
        }, delayMs);
    }

    private tick(): void {
        this.inFlight = this.runOnce()
            .then(() => {
                this.deps.logger.info(`Next check in ${this.intervalSeconds} seconds.`);
            })
            .catch((error: unknown) => {
                this.lastError = error instanceof Error ? error.message : String(error);
                this.deps.logger.error('An unexpected error has occurred in the worker:', error);
            })
            .finally(() => {
                this.inFlight = null;
                if (this.running) {
                    this.schedule(this.intervalSeconds * 1000);
                }
            });
    }

    private async pass(): Promise<MonitorPassOutcome> {
        const { logger } = this.deps;
        const outcome = await this.evaluate();
        this.lastPassAt = new Date().toISOString();
        this.lastOutcome = outcome;

        if (outcome.status === 'skipped' && outcome.reason === 'service-disabled') {
            logger.info('The service is disabled from the web interface. Paused.');
        } else if (outcome.status === 'skipped' && outcome.reason === 'no-target-trackers') {
            logger.info('No target tracker configured in the web interface. Paused.');
        }
        return outcome;
    }

    private async evaluate(): Promise<MonitorPassOutcome> {
        let targetTrackers: string[];
        try {
            const settings = await this.deps.settingsStore.load();
            if (!settings.enabled) return { status: 'skipped', reason: 'service-disabled' };
            if (settings.targetTrackers.length === 0) return { status: 'skipped', reason: 'no-target-trackers' };
            targetTrackers = settings.targetTrackers;
        } catch (error) {
            this.lastError = error instanceof Error ? error.message : String(error);
            this.deps.logger.error('Could not read settings:', error);
            return { status: 'skipped', reason: 'settings-unreadable' };
        }

        if (!(await this.ensureConnected())) {
            return { status: 'not-connected', error: this.lastError ?? 'Not connected' };
        }

        this.deps.logger.info('--- New worker run ---');
        const response = await this.deps.runEvaluationPass.execute({ targetTrackers, disabledSet: this.disabledSet });
        this.trackConnectivity(response.status, response.error);
        return response;
    }

    /**
     * Reconnects and reseeds when the previous call lost the connection
     */
    private async ensureConnected(): Promise<boolean> {
        if (this.connection === 'connected') return true;

        const connected = await this.deps.torrentClient.connect();
        if (!connected.ok) {
            this.lastError = connected.error.message;
            this.deps.logger.error(`Transmission connection error: ${connected.error.message}`);
            return false;
        }

        const seeded = await this.deps.seedDisabledSet.execute({ disabledSet: this.disabledSet });
        if (!seeded.success) {
            this.lastError = seeded.error?.message ?? 'Could not seed disabled set';
            return false;
        }

        this.connection = 'connected';
        this.lastError = null;
        return true;
    }

    private trackConnectivity(status: RunEvaluationPassResponse['status'], error: string | undefined): void {
        if (status === 'connectivity-lost') {
            this.connection = 'disconnected';
            this.lastError = error ?? 'Connection lost';
            this.deps.logger.warn('Connection to Transmission lost; will reconnect and reseed before the next pass.');
        }
    }
}
