/**
 * In-memory stand-in for the Transmission RPC endpoint used by tests
 */

import { TorrentEntity } from '../domain/entities';
import { ITorrentClient } from '../domain/interfaces';
import {
    connectivityFailure,
    rejectedFailure,
    Result,
    resultOf,
    resultOfErr,
    RpcFailure
} from '../domain/value-objects';

export interface ReplaceTrackersCall {
    torrentId: number;
    trackerTiers: string[][];
}

export class FakeTorrentClient implements ITorrentClient {
    /** When true every call fails with a connectivity failure */
    offline = false;
    /** Torrent ids whose tracker replacement is refused */
    rejectIds = new Set<number>();
    /** Torrent ids whose tracker replacement loses the connection */
    dropConnectionOnIds = new Set<number>();

    connectCalls = 0;
    listCalls = 0;
    replaceCalls: ReplaceTrackersCall[] = [];

    private torrents = new Map<number, TorrentEntity>();

    constructor(torrents: TorrentEntity[] = []) {
        this.setTorrents(torrents);
    }

    setTorrents(torrents: TorrentEntity[]): void {
        this.torrents = new Map(torrents.map((t) => [t.id, structuredClone(t)]));
    }

    /**
     * Updates fields of a stored torrent, e.g. to simulate download progress
     */
    update(id: number, patch: Partial<Omit<TorrentEntity, 'id'>>): void {
        const torrent = this.torrents.get(id);
        if (!torrent) {
            throw new Error(`Unknown torrent ${id}`);
        }
        this.torrents.set(id, { ...torrent, ...structuredClone(patch) });
    }

    announces(id: number): string[] {
        return this.torrents.get(id)?.trackers.map((t) => t.announce) ?? [];
    }

    async connect(): Promise<Result<void, RpcFailure>> {
        this.connectCalls++;
        return this.offline ? resultOfErr(connectivityFailure('fake client offline')) : resultOf(undefined);
    }

    async listTorrents(): Promise<Result<TorrentEntity[], RpcFailure>> {
        this.listCalls++;
        if (this.offline) {
            return resultOfErr(connectivityFailure('fake client offline'));
        }
        return resultOf([...this.torrents.values()].map((t) => structuredClone(t)));
    }

    async replaceTrackers(torrentId: number, trackerTiers: string[][]): Promise<Result<void, RpcFailure>> {
        this.replaceCalls.push({ torrentId, trackerTiers });
        if (this.offline || this.dropConnectionOnIds.has(torrentId)) {
            return resultOfErr(connectivityFailure('fake client offline'));
        }
        if (this.rejectIds.has(torrentId)) {
            return resultOfErr(rejectedFailure(`torrent-set refused for ${torrentId}`));
        }
        const torrent = this.torrents.get(torrentId);
        if (!torrent) {
            return resultOfErr(rejectedFailure(`unknown torrent ${torrentId}`));
        }
        // Transmission renumbers tiers consecutively from zero
        torrent.trackers = trackerTiers.flatMap((urls, tier) => urls.map((announce) => ({ announce, tier })));
        return resultOf(undefined);
    }
}
