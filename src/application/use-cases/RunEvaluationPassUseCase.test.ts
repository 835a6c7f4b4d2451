/**
 * Unit tests for RunEvaluationPassUseCase
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RunEvaluationPassUseCase } from './RunEvaluationPassUseCase';
import { DisabledSetTracker, TrackerDecisionEngine } from '../../domain/services';
import { ILogger } from '../../domain/interfaces';
import { FakeTorrentClient } from '../../__mocks__/fakeTorrentClient';
import {
    createMockLogger,
    createTorrent,
    DISABLED_PRIVATE_URL,
    PRIVATE_URL,
    PUBLIC_URL,
    TARGET
} from '../../__mocks__/fixtures';

describe('RunEvaluationPassUseCase', () => {
    let client: FakeTorrentClient;
    let disabledSet: DisabledSetTracker;
    let mockLogger: ILogger;
    let useCase: RunEvaluationPassUseCase;

    beforeEach(() => {
        client = new FakeTorrentClient();
        disabledSet = new DisabledSetTracker();
        mockLogger = createMockLogger();
        useCase = new RunEvaluationPassUseCase(client, new TrackerDecisionEngine(mockLogger), mockLogger);
    });

    it('should disable, then restore trackers when the torrent completes', async () => {
        client.setTorrents([createTorrent(1)]);

        const first = await useCase.execute({ targetTrackers: [TARGET], disabledSet });

        expect(first).toEqual({ status: 'completed', checked: 1, disabled: [1], enabled: [], failed: [] });
        expect(client.announces(1)).toEqual([DISABLED_PRIVATE_URL, PUBLIC_URL]);
        expect(disabledSet.contains(1)).toBe(true);

        const second = await useCase.execute({ targetTrackers: [TARGET], disabledSet });
        expect(second.disabled).toEqual([]);
        expect(client.replaceCalls).toHaveLength(1);

        client.update(1, { percentDone: 1 });
        const third = await useCase.execute({ targetTrackers: [TARGET], disabledSet });

        expect(third).toEqual({ status: 'completed', checked: 1, disabled: [], enabled: [1], failed: [] });
        expect(client.announces(1)).toEqual([PRIVATE_URL, PUBLIC_URL]);
        expect(disabledSet.contains(1)).toBe(false);
    });

    it('should isolate a refused mutation and leave its state unchanged', async () => {
        client.setTorrents([createTorrent(1), createTorrent(2)]);
        client.rejectIds.add(1);

        const result = await useCase.execute({ targetTrackers: [TARGET], disabledSet });

        expect(result).toEqual({
            status: 'completed',
            checked: 2,
            disabled: [2],
            enabled: [],
            failed: [{ torrentId: 1, message: 'torrent-set refused for 1' }]
        });
        expect(disabledSet.toArray()).toEqual([2]);
        expect(mockLogger.warn).toHaveBeenCalledWith(
            'Failed to disable trackers for torrent 1 (Torrent 1), will retry next pass: torrent-set refused for 1'
        );
    });

    it('should retry a refused mutation on the next pass', async () => {
        client.setTorrents([createTorrent(1)]);
        client.rejectIds.add(1);
        await useCase.execute({ targetTrackers: [TARGET], disabledSet });

        client.rejectIds.clear();
        const result = await useCase.execute({ targetTrackers: [TARGET], disabledSet });

        expect(result.disabled).toEqual([1]);
        expect(disabledSet.contains(1)).toBe(true);
    });

    it('should abort the remaining torrents when the connection drops', async () => {
        client.setTorrents([createTorrent(1), createTorrent(2), createTorrent(3)]);
        client.dropConnectionOnIds.add(2);

        const result = await useCase.execute({ targetTrackers: [TARGET], disabledSet });

        expect(result).toEqual({
            status: 'connectivity-lost',
            checked: 3,
            disabled: [1],
            enabled: [],
            failed: [],
            error: 'fake client offline'
        });
        expect(client.replaceCalls.map((c) => c.torrentId)).toEqual([1, 2]);
        expect(disabledSet.toArray()).toEqual([1]);
    });

    it('should report a lost connection when the snapshot fails', async () => {
        client.offline = true;

        const result = await useCase.execute({ targetTrackers: [TARGET], disabledSet });

        expect(result).toEqual({
            status: 'connectivity-lost',
            checked: 0,
            disabled: [],
            enabled: [],
            failed: [],
            error: 'fake client offline'
        });
        expect(client.replaceCalls).toEqual([]);
    });

    it('should forget torrents that were removed from the client', async () => {
        client.setTorrents([createTorrent(1, { percentDone: 0 })]);
        disabledSet.markDisabled(1);
        disabledSet.markDisabled(8);

        const result = await useCase.execute({ targetTrackers: [TARGET], disabledSet });

        expect(result.status).toBe('completed');
        expect(disabledSet.toArray()).toEqual([1]);
        expect(mockLogger.debug).toHaveBeenCalledWith('Forgetting removed torrent(s): 8');
    });
});
