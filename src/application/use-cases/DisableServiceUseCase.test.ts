import { describe, it, expect, beforeEach } from 'vitest';
import { DisableServiceUseCase } from './DisableServiceUseCase';
import { ReenableAllTrackersUseCase } from './ReenableAllTrackersUseCase';
import { UpdateSettingsUseCase } from './UpdateSettingsUseCase';
import { DisabledSetTracker } from '../../domain/services';
import { FakeTorrentClient } from '../../__mocks__/fakeTorrentClient';
import { MemorySettingsStore } from '../../__mocks__/memorySettingsStore';
import { createMockLogger, createTorrent, DISABLED_PRIVATE_URL, TARGET } from '../../__mocks__/fixtures';

describe('DisableServiceUseCase', () => {
    let client: FakeTorrentClient;
    let store: MemorySettingsStore;
    let useCase: DisableServiceUseCase;

    beforeEach(() => {
        const logger = createMockLogger();
        client = new FakeTorrentClient([createTorrent(1, { trackers: [{ announce: DISABLED_PRIVATE_URL, tier: 0 }] })]);
        store = new MemorySettingsStore({ enabled: true, targetTrackers: [TARGET] });
        useCase = new DisableServiceUseCase(
            new ReenableAllTrackersUseCase(client, 'disabled-', logger),
            new UpdateSettingsUseCase(store, logger),
            logger
        );
    });

    it('should restore trackers and then disable the service', async () => {
        const result = await useCase.execute({ disabledSet: new DisabledSetTracker() });

        expect(result).toEqual({
            success: true,
            settings: { enabled: false, targetTrackers: [TARGET] },
            reenable: { status: 'completed', reenabled: [1], failed: [] }
        });
        expect(await store.load()).toEqual({ enabled: false, targetTrackers: [TARGET] });
    });

    it('should keep the service enabled when trackers could not be restored', async () => {
        client.offline = true;

        const result = await useCase.execute({ disabledSet: new DisabledSetTracker() });

        expect(result.success).toBe(false);
        expect(result.error).toBe('fake client offline');
        expect(store.saves).toBe(0);
    });
});
