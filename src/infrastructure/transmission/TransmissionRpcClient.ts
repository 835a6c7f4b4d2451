/**
 * Transmission RPC implementation of ITorrentClient
 *
 * Speaks JSON over HTTP POST. Transmission answers 409 with a fresh
 * X-Transmission-Session-Id until the header is echoed back; the id is cached
 * and renewed transparently once per call.
 */

import { TorrentEntity } from '../../domain/entities';
import { ILogger, ITorrentClient } from '../../domain/interfaces';
import {
  connectivityFailure,
  rejectedFailure,
  Result,
  resultOf,
  resultOfErr,
  RpcFailure
} from '../../domain/value-objects';
import { TransmissionAdapter } from './TransmissionAdapter';
import {
  rawTorrentSchema,
  rpcResponseSchema,
  sessionGetArgumentsSchema,
  TORRENT_FIELDS,
  torrentGetArgumentsSchema
} from './TransmissionSchemas';

export const SESSION_ID_HEADER = 'X-Transmission-Session-Id';

// trackerList in torrent-set appeared in RPC version 17 (Transmission 4.0)
const MIN_TRACKER_LIST_RPC_VERSION = 17;

export interface TransmissionRpcClientOptions {
  url: string;
  username?: string;
  password?: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

type RpcArguments = Record<string, unknown>;

export class TransmissionRpcClient implements ITorrentClient {
  private sessionId: string | null = null;
  private fetchFn: typeof fetch;

  constructor(
    private options: TransmissionRpcClientOptions,
    private logger: ILogger
  ) {
    this.fetchFn = options.fetch ?? fetch;
  }

  async connect(): Promise<Result<void, RpcFailure>> {
    this.sessionId = null;
    const response = await this.call('session-get', { fields: ['rpc-version', 'version'] });
    if (!response.ok) {
      return response;
    }

    const session = sessionGetArgumentsSchema.safeParse(response.value);
    const version = session.success ? session.data.version : undefined;
    const rpcVersion = session.success ? session.data['rpc-version'] : undefined;
    this.logger.info(`Connected to Transmission ${version ?? '(unknown version)'} at ${this.options.url}`);
    if (rpcVersion !== undefined && rpcVersion < MIN_TRACKER_LIST_RPC_VERSION) {
      this.logger.warn(`Transmission RPC version ${rpcVersion} may not support replacing tracker lists`);
    }
    return resultOf(undefined);
  }

  async listTorrents(): Promise<Result<TorrentEntity[], RpcFailure>> {
    const response = await this.call('torrent-get', { fields: [...TORRENT_FIELDS] });
    if (!response.ok) {
      return response;
    }

    const args = torrentGetArgumentsSchema.safeParse(response.value);
    if (!args.success) {
      return resultOfErr(connectivityFailure('Malformed torrent-get response', args.error));
    }

    const torrents: TorrentEntity[] = [];
    for (const raw of args.data.torrents) {
      const parsed = rawTorrentSchema.safeParse(raw);
      if (parsed.success) {
        torrents.push(TransmissionAdapter.toTorrentEntity(parsed.data));
      } else {
        this.logger.warn('Skipping malformed torrent record:', parsed.error.issues);
      }
    }
    return resultOf(torrents);
  }

  async replaceTrackers(torrentId: number, trackerTiers: string[][]): Promise<Result<void, RpcFailure>> {
    const response = await this.call('torrent-set', {
      ids: [torrentId],
      trackerList: TransmissionAdapter.toTrackerList(trackerTiers)
    });
    return response.ok ? resultOf(undefined) : response;
  }

  private async call(method: string, args: RpcArguments, renewedSession = false): Promise<Result<RpcArguments, RpcFailure>> {
    const headers = new Headers({ 'Content-Type': 'application/json' });
    if (this.sessionId) headers.set(SESSION_ID_HEADER, this.sessionId);
    if (this.options.username !== undefined) {
      const credentials = Buffer.from(`${this.options.username}:${this.options.password ?? ''}`).toString('base64');
      headers.set('Authorization', `Basic ${credentials}`);
    }

    let response: Response;
    try {
      response = await this.fetchFn(this.options.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ method, arguments: args }),
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        return resultOfErr(connectivityFailure(
          `Transmission method ${method} timed out after ${this.options.timeoutMs} ms`,
          error
        ));
      }
      return resultOfErr(connectivityFailure(`Failed to connect to Transmission at ${this.options.url}`, error));
    }

    if (!response.ok) {
      // Release the connection; error bodies are not read
      await response.body?.cancel();
    }
    if (response.status === 409) {
      const sessionId = response.headers.get(SESSION_ID_HEADER);
      if (sessionId && !renewedSession) {
        this.sessionId = sessionId;
        return this.call(method, args, true);
      }
      return resultOfErr(connectivityFailure('Transmission session handshake failed'));
    }
    if (response.status === 401 || response.status === 403) {
      return resultOfErr(connectivityFailure(`Transmission rejected the credentials (HTTP ${response.status})`));
    }
    if (response.status >= 500) {
      return resultOfErr(connectivityFailure(`Transmission answered HTTP ${response.status} to ${method}`));
    }
    if (!response.ok) {
      return resultOfErr(rejectedFailure(`Transmission answered HTTP ${response.status} to ${method}`));
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return resultOfErr(connectivityFailure(`Transmission method ${method} response was not JSON`, error));
    }

    const parsed = rpcResponseSchema.safeParse(body);
    if (!parsed.success) {
      return resultOfErr(connectivityFailure(`Transmission method ${method} response was not an RPC response`, parsed.error));
    }
    if (parsed.data.result !== 'success') {
      return resultOfErr(rejectedFailure(`Transmission method ${method} failed: ${parsed.data.result}`));
    }
    return resultOf(parsed.data.arguments ?? {});
  }
}
