/**
 * Classified failure of a call to the torrent client
 *
 * - connectivity: the endpoint is unreachable, timed out, rejected our
 *   credentials or answered with something that is not an RPC response.
 *   In-memory state can no longer be trusted and must be reseeded.
 * - rejected: the endpoint answered but refused this particular request.
 */

export type RpcFailureKind = 'connectivity' | 'rejected';

export interface RpcFailure {
  kind: RpcFailureKind;
  message: string;
  cause?: unknown;
}

export function connectivityFailure(message: string, cause?: unknown): RpcFailure {
  return cause === undefined ? { kind: 'connectivity', message } : { kind: 'connectivity', message, cause };
}

export function rejectedFailure(message: string, cause?: unknown): RpcFailure {
  return cause === undefined ? { kind: 'rejected', message } : { kind: 'rejected', message, cause };
}

export function isConnectivityFailure(failure: RpcFailure): boolean {
  return failure.kind === 'connectivity';
}
