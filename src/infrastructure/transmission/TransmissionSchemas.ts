/**
 * Shapes of the Transmission RPC payloads this service reads
 * Validated at the decoding boundary so the domain only sees well-typed records
 */

import { z } from 'zod';

export const TORRENT_FIELDS = ['id', 'name', 'percentDone', 'peersSendingToUs', 'trackers', 'peers'] as const;

export const rpcResponseSchema = z.object({
  result: z.string(),
  arguments: z.record(z.unknown()).optional()
});

export const rawTrackerSchema = z.object({
  announce: z.string(),
  tier: z.number().optional()
});

export const rawPeerSchema = z.object({
  address: z.string().default(''),
  progress: z.number().default(0)
});

export const rawTorrentSchema = z.object({
  id: z.number().int(),
  name: z.string().default(''),
  percentDone: z.number(),
  peersSendingToUs: z.number().default(0),
  trackers: z.array(rawTrackerSchema).default([]),
  peers: z.array(rawPeerSchema).default([])
});

export const torrentGetArgumentsSchema = z.object({
  torrents: z.array(z.unknown())
});

export const sessionGetArgumentsSchema = z.object({
  'rpc-version': z.number().optional(),
  version: z.string().optional()
});

export type RawTorrent = z.infer<typeof rawTorrentSchema>;
export type RawTracker = z.infer<typeof rawTrackerSchema>;
