/**
 * Unit tests for TrackerMonitor: lifecycle, reconnect-and-reseed, admin actions
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TrackerMonitor } from './TrackerMonitor';
import { createTrackerMonitor } from './createTrackerMonitor';
import { ILogger } from '../domain/interfaces';
import { FakeTorrentClient } from '../__mocks__/fakeTorrentClient';
import { MemorySettingsStore } from '../__mocks__/memorySettingsStore';
import {
    createMockLogger,
    createTorrent,
    DISABLED_PRIVATE_URL,
    PRIVATE_URL,
    PUBLIC_URL,
    TARGET
} from '../__mocks__/fixtures';

describe('TrackerMonitor', () => {
    let client: FakeTorrentClient;
    let store: MemorySettingsStore;
    let mockLogger: ILogger;
    let monitor: TrackerMonitor;

    beforeEach(() => {
        client = new FakeTorrentClient([createTorrent(1)]);
        store = new MemorySettingsStore({ enabled: true, targetTrackers: [TARGET] });
        mockLogger = createMockLogger();
        monitor = createTrackerMonitor({
            torrentClient: client,
            settingsStore: store,
            logger: mockLogger,
            markerPrefix: 'disabled-',
            intervalSeconds: 60
        });
    });

    afterEach(async () => {
        await monitor.stop();
    });

    it('should pause while the service is disabled', async () => {
        await store.save({ enabled: false, targetTrackers: [TARGET] });

        const outcome = await monitor.runOnce();

        expect(outcome).toEqual({ status: 'skipped', reason: 'service-disabled' });
        expect(client.connectCalls).toBe(0);
        expect(mockLogger.info).toHaveBeenCalledWith('The service is disabled from the web interface. Paused.');
    });

    it('should pause without target trackers', async () => {
        await store.save({ enabled: true, targetTrackers: [] });

        expect(await monitor.runOnce()).toEqual({ status: 'skipped', reason: 'no-target-trackers' });
        expect(mockLogger.info).toHaveBeenCalledWith('No target tracker configured in the web interface. Paused.');
    });

    it('should connect and seed before the first pass', async () => {
        client.setTorrents([
            createTorrent(1),
            createTorrent(2, { trackers: [{ announce: DISABLED_PRIVATE_URL, tier: 0 }] })
        ]);

        const outcome = await monitor.runOnce();

        expect(outcome).toEqual({ status: 'completed', checked: 2, disabled: [1], enabled: [], failed: [] });
        expect(client.connectCalls).toBe(1);
        expect(client.listCalls).toBe(2);
        expect(monitor.status().disabledTorrentIds).toEqual([1, 2]);
        expect(monitor.status().connection).toBe('connected');
    });

    it('should report when the client cannot be reached', async () => {
        client.offline = true;

        const outcome = await monitor.runOnce();

        expect(outcome).toEqual({ status: 'not-connected', error: 'fake client offline' });
        expect(monitor.status().lastError).toBe('fake client offline');
        expect(mockLogger.error).toHaveBeenCalledWith('Transmission connection error: fake client offline');
    });

    it('should reconnect and reseed after losing the connection mid-pass', async () => {
        client.dropConnectionOnIds.add(1);

        const first = await monitor.runOnce();
        expect(first.status).toBe('connectivity-lost');
        expect(monitor.status().connection).toBe('disconnected');

        client.dropConnectionOnIds.clear();
        const second = await monitor.runOnce();

        expect(second).toEqual({ status: 'completed', checked: 1, disabled: [1], enabled: [], failed: [] });
        expect(client.connectCalls).toBe(2);
        expect(client.listCalls).toBe(4);
        expect(client.announces(1)).toEqual([DISABLED_PRIVATE_URL, PUBLIC_URL]);
    });

    it('should not reconnect after a refused mutation', async () => {
        client.rejectIds.add(1);

        await monitor.runOnce();
        await monitor.runOnce();

        expect(client.connectCalls).toBe(1);
        expect(monitor.status().connection).toBe('connected');
    });

    it('should restore everything on a global re-enable', async () => {
        await monitor.runOnce();
        expect(monitor.status().disabledTorrentIds).toEqual([1]);

        const result = await monitor.reenableAll();

        expect(result).toEqual({ status: 'completed', reenabled: [1], failed: [] });
        expect(client.announces(1)).toEqual([PRIVATE_URL, PUBLIC_URL]);
        expect(monitor.status().disabledTorrentIds).toEqual([]);
    });

    it('should disable the service after restoring trackers', async () => {
        await monitor.runOnce();

        const result = await monitor.disableAndReenable();

        expect(result.success).toBe(true);
        expect(result.settings).toEqual({ enabled: false, targetTrackers: [TARGET] });
        expect(await monitor.runOnce()).toEqual({ status: 'skipped', reason: 'service-disabled' });
    });

    it('should serialize settings updates with passes', async () => {
        const [outcome, update] = await Promise.all([
            monitor.runOnce(),
            monitor.updateSettings({ targetTrackers: [] })
        ]);

        expect(outcome.status).toBe('completed');
        expect(update.settings).toEqual({ enabled: true, targetTrackers: [] });
        expect(await monitor.runOnce()).toEqual({ status: 'skipped', reason: 'no-target-trackers' });
    });

    it('should read settings only after a queued update has been saved', async () => {
        const update = monitor.updateSettings({ enabled: false });
        const read = monitor.getSettings();

        await Promise.resolve();
        expect(monitor.status().busy).toBe(true);

        expect(await read).toEqual({ success: true, settings: { enabled: false, targetTrackers: [TARGET] } });
        expect((await update).success).toBe(true);
        expect(monitor.status().busy).toBe(false);
    });

    it('should keep polling on its interval until stopped', async () => {
        monitor = createTrackerMonitor({
            torrentClient: client,
            settingsStore: store,
            logger: mockLogger,
            markerPrefix: 'disabled-',
            intervalSeconds: 0.01
        });

        await monitor.start();
        await vi.waitFor(() => {
            expect(client.listCalls).toBeGreaterThanOrEqual(3);
        });
        await monitor.stop();

        const calls = client.listCalls;
        await new Promise((resolve) => setTimeout(resolve, 30));
        expect(client.listCalls).toBe(calls);
        expect(monitor.status().running).toBe(false);
    });

    it('should log unexpected errors and keep the loop alive', async () => {
        const boom = new Error('unexpected');
        vi.spyOn(client, 'replaceTrackers').mockRejectedValueOnce(boom);
        monitor = createTrackerMonitor({
            torrentClient: client,
            settingsStore: store,
            logger: mockLogger,
            markerPrefix: 'disabled-',
            intervalSeconds: 0.01
        });

        await monitor.start();
        await vi.waitFor(() => {
            expect(monitor.status().disabledTorrentIds).toEqual([1]);
        });

        expect(mockLogger.error).toHaveBeenCalledWith('An unexpected error has occurred in the worker:', boom);
    });
});
