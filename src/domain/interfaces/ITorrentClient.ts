/**
 * Port to the remote torrent client (Transmission RPC)
 * Implementations never throw for RPC failures; they return a classified Result
 */

import { TorrentEntity } from '../entities';
import { Result } from '../value-objects/Result';
import { RpcFailure } from '../value-objects/RpcFailure';

export interface ITorrentClient {
  /**
   * (Re)establishes the session with the client and verifies credentials
   */
  connect(): Promise<Result<void, RpcFailure>>;

  /**
   * Full snapshot of every torrent with trackers and peers populated
   */
  listTorrents(): Promise<Result<TorrentEntity[], RpcFailure>>;

  /**
   * Replaces the complete tracker list of one torrent
   * @param trackerTiers - announce URLs grouped by tier, tiers in ascending order
   */
  replaceTrackers(torrentId: number, trackerTiers: string[][]): Promise<Result<void, RpcFailure>>;
}
