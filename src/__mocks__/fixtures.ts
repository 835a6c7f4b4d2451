/**
 * Torrent fixtures shared by the application and HTTP tests
 */

import { TorrentEntity } from '../domain/entities';
import { ILogger } from '../domain/interfaces';
import { vi } from 'vitest';

export const TARGET = 'https://tracker.private.test';
export const PRIVATE_URL = 'https://tracker.private.test/announce/abc';
export const DISABLED_PRIVATE_URL = 'https://disabled-tracker.private.test/announce/abc';
export const PUBLIC_URL = 'udp://open.public.test:6969/announce';

export function createTorrent(id: number, overrides: Partial<TorrentEntity> = {}): TorrentEntity {
    return {
        id,
        name: `Torrent ${id}`,
        percentDone: 0.5,
        peersSendingToUs: 2,
        trackers: [
            { announce: PRIVATE_URL, tier: 0 },
            { announce: PUBLIC_URL, tier: 1 }
        ],
        peers: [{ address: '10.0.0.2', progress: 1 }],
        ...overrides
    };
}

export function createMockLogger(): ILogger {
    return {
        log: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        info: vi.fn(),
        debug: vi.fn()
    };
}
